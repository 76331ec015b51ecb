import { ResolutionError, errorMessage } from "../errors.js";
import { compileSchema } from "../schema/ajv.js";
import type { PackageMetadata } from "../types/package-index.js";

/** Read-only view of a package index. */
export interface PackageIndex {
  getLatestVersion(name: string): Promise<PackageMetadata>;
  getVersion(name: string, version: string): Promise<PackageMetadata>;
}

const METADATA_SCHEMA = {
  type: "object",
  required: ["info", "urls"],
  properties: {
    info: {
      type: "object",
      required: ["version"],
      properties: {
        name: { type: "string" },
        version: { type: "string", minLength: 1 },
      },
    },
    urls: {
      type: "array",
      items: {
        type: "object",
        required: ["packagetype", "url"],
        properties: {
          packagetype: { type: "string" },
          url: { type: "string" },
          filename: { type: "string" },
        },
      },
    },
  },
};

const checkMetadata = compileSchema<PackageMetadata>(METADATA_SCHEMA, { dataVar: "response" });

export type FetchFn = (url: string, init?: { headers?: Record<string, string> }) => Promise<Response>;

/**
 * Client for the PyPI JSON API (`<base>/<name>/json`,
 * `<base>/<name>/<version>/json`).
 */
export class PypiClient implements PackageIndex {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchFn;

  constructor(baseUrl: string, fetchImpl: FetchFn = fetch) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.fetchImpl = fetchImpl;
  }

  async getLatestVersion(name: string): Promise<PackageMetadata> {
    return this.get(`${this.baseUrl}/${encodeURIComponent(name)}/json`, { package: name, version: "latest" });
  }

  async getVersion(name: string, version: string): Promise<PackageMetadata> {
    return this.get(`${this.baseUrl}/${encodeURIComponent(name)}/${encodeURIComponent(version)}/json`, {
      package: name,
      version,
    });
  }

  private async get(url: string, context: { package: string; version: string }): Promise<PackageMetadata> {
    const label = `${context.package}==${context.version}`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers: { Accept: "application/json" } });
    } catch (e) {
      throw new ResolutionError("INDEX_UNAVAILABLE", `Package index request failed for ${label}: ${errorMessage(e)}`, { ...context, url }, { cause: e });
    }

    if (response.status === 404) {
      throw new ResolutionError("PACKAGE_NOT_FOUND", `${label} not found in package index`, { ...context, url });
    }
    if (!response.ok) {
      throw new ResolutionError("INDEX_UNAVAILABLE", `Package index returned HTTP ${response.status} for ${label}`, {
        ...context,
        url,
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (e) {
      throw new ResolutionError("INDEX_RESPONSE_INVALID", `Package index returned invalid JSON for ${label}`, { ...context, url }, { cause: e });
    }

    const res = checkMetadata(body);
    if (!res.valid) {
      throw new ResolutionError("INDEX_RESPONSE_INVALID", `Unexpected package index response for ${label}: ${res.errors}`, { ...context, url });
    }
    return res.value;
  }
}
