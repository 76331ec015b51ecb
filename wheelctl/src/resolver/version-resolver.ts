import { ResolutionError } from "../errors.js";
import type { PackageIndex } from "../pypi/package-index.js";
import { LATEST } from "../types/config.js";
import type { PackageMetadata, ResolvedVersion } from "../types/package-index.js";

/** Pick the sdist download URL; wheels are never substituted. */
export function sdistUrlOf(metadata: PackageMetadata, packageName: string): string {
  const sdist = metadata.urls.find((r) => r.packagetype === "sdist");
  if (!sdist) {
    throw new ResolutionError("SDIST_NOT_FOUND", `No sdist published for ${packageName}==${metadata.info.version}`, {
      package: packageName,
      version: metadata.info.version,
    });
  }
  return sdist.url;
}

/**
 * Resolves configured version selectors to concrete releases. Lookups are
 * memoized per (package, selector) for the lifetime of the resolver, which
 * is one matrix pass.
 */
export class VersionResolver {
  private readonly cache = new Map<string, Promise<ResolvedVersion>>();

  constructor(private readonly index: PackageIndex) {}

  resolve(packageName: string, selector: string): Promise<ResolvedVersion> {
    const key = `${packageName}\u0000${selector}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const pending = this.lookup(packageName, selector);
    this.cache.set(key, pending);
    return pending;
  }

  private async lookup(packageName: string, selector: string): Promise<ResolvedVersion> {
    const metadata =
      selector === LATEST
        ? await this.index.getLatestVersion(packageName)
        : await this.index.getVersion(packageName, selector);

    return {
      version: metadata.info.version,
      sdistUrl: sdistUrlOf(metadata, packageName),
    };
  }
}
