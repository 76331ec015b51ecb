import { diag, silentReporter, type Reporter } from "../diagnostics.js";
import { constraintsFor } from "../resolver/constraints.js";
import type { VersionResolver } from "../resolver/version-resolver.js";
import type { ArtifactStore } from "../storage/artifact-store.js";
import { buildSpecKey, createBuildSpec, type BuildSpec } from "../types/build-spec.js";
import type { MatrixConfig } from "../types/config.js";
import { artifactExists, DEFAULT_KEY_PREFIX } from "./existence.js";
import { parsePythonTag } from "./python-tag.js";

export type EnumerateDeps = {
  resolver: VersionResolver;
  report?: Reporter;
};

export type FindMissingDeps = EnumerateDeps & {
  store: ArtifactStore;
  keyPrefix?: string;
};

/** Deduplicate on every field, then order by that same key. */
function toSortedSet(specs: Iterable<BuildSpec>): BuildSpec[] {
  const unique = new Map<string, BuildSpec>();
  for (const spec of specs) {
    const key = buildSpecKey(spec);
    if (!unique.has(key)) unique.set(key, spec);
  }
  return [...unique.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([, spec]) => spec);
}

/** Check every configured python tag; throws on the first malformed one. */
export function validatePythonTags(config: MatrixConfig): void {
  for (const [pkgName, pkgReqs] of Object.entries(config.packages)) {
    for (const [selector, versionEntry] of Object.entries(pkgReqs.versions)) {
      for (const wheel of versionEntry.wheels) {
        for (const python of wheel.python) {
          parsePythonTag(python.tag, { package: pkgName, version: selector, platform_tag: wheel.platform_tag });
        }
      }
    }
  }
}

/**
 * Expand package → version → wheel target → python into concrete build
 * specs. Python tags are checked up front, so a malformed tag fails the
 * pass before the index or storage is consulted. Each configured version is
 * resolved once.
 */
export async function enumerateBuildSpecs(config: MatrixConfig, deps: EnumerateDeps): Promise<BuildSpec[]> {
  const report = deps.report ?? silentReporter;
  validatePythonTags(config);
  const specs: BuildSpec[] = [];

  for (const [pkgName, pkgReqs] of Object.entries(config.packages)) {
    for (const [selector, versionEntry] of Object.entries(pkgReqs.versions)) {
      const { version, sdistUrl } = await deps.resolver.resolve(pkgName, selector);
      report(
        diag("debug", "VERSION_RESOLVED", `${pkgName} ${selector} resolved to ${version}`, {
          details: { package: pkgName, selector, version },
        }),
      );
      const constraints = constraintsFor(pkgName, version);

      for (const wheel of versionEntry.wheels) {
        for (const python of wheel.python) {
          specs.push(
            createBuildSpec({
              package: pkgName,
              version,
              platform_instance: wheel.platform_instance,
              platform_arch: wheel.platform_arch,
              python_tag: python.tag,
              abi_tag: python.abi ?? "",
              platform_tag: wheel.platform_tag,
              sdist_url: sdistUrl,
              constraints,
            }),
          );
        }
      }
    }
  }

  return toSortedSet(specs);
}

/** Build specs whose wheel is not yet in the store, in deterministic order. */
export async function findMissing(config: MatrixConfig, deps: FindMissingDeps): Promise<BuildSpec[]> {
  const specs = await enumerateBuildSpecs(config, deps);
  const missing: BuildSpec[] = [];
  for (const spec of specs) {
    if (!(await artifactExists(deps.store, spec, deps.keyPrefix ?? DEFAULT_KEY_PREFIX, deps.report))) {
      missing.push(spec);
    }
  }
  return missing;
}
