import { loadConfig } from "../config/loader.js";
import { diag, silentReporter, type Reporter } from "../diagnostics.js";
import { WheelctlError, errorMessage } from "../errors.js";
import { PypiClient, type PackageIndex } from "../pypi/package-index.js";
import { buildMatrix } from "../matrix/builder.js";
import { findMissing } from "../matrix/enumerator.js";
import { matrixDirectives } from "../pipeline/variables.js";
import { VersionResolver } from "../resolver/version-resolver.js";
import { S3ArtifactStore, type ArtifactStore } from "../storage/artifact-store.js";
import type { BuildSpec } from "../types/build-spec.js";
import type { MatrixConfig, MatrixSettings } from "../types/config.js";
import type { JobMatrix } from "../types/job.js";
import { exitCodeFor, type ExitCode } from "./exit-codes.js";

export type GenerateOptions = {
  configPath?: string;
  settings?: Partial<MatrixSettings>;
  env?: NodeJS.ProcessEnv;
  report?: Reporter;
  /** Substitutes for the PyPI and S3 clients built from config. */
  index?: PackageIndex;
  store?: ArtifactStore;
};

export type GenerateError = { code: string; message: string; details: Record<string, unknown> };

export type GenerateResult =
  | { ok: true; config: MatrixConfig; missing: BuildSpec[]; matrix: JobMatrix; directives: string[] }
  | { ok: false; exitCode: ExitCode; error: GenerateError };

function toGenerateError(err: unknown): GenerateError {
  if (err instanceof WheelctlError) {
    return { code: err.code, message: err.message, details: err.details };
  }
  return { code: "UNEXPECTED", message: errorMessage(err), details: {} };
}

/**
 * Compute the job matrix: load config, find unpublished wheels, group them
 * into jobs and render the pipeline directives. Any failure yields no
 * directives at all.
 */
export async function generate(opts: GenerateOptions = {}): Promise<GenerateResult> {
  const report = opts.report ?? silentReporter;
  try {
    const config = loadConfig(opts.configPath, opts.settings, opts.env);
    const index = opts.index ?? new PypiClient(config.index_url);
    const store = opts.store ?? new S3ArtifactStore(config.bucket, { region: config.region });

    const missing = await findMissing(config, {
      resolver: new VersionResolver(index),
      store,
      keyPrefix: config.key_prefix,
      report,
    });
    const matrix = buildMatrix(missing, report);
    report(diag("debug", "MATRIX_BUILT", `output matrix is now: ${JSON.stringify(matrix)}`, {
      details: { jobs: Object.keys(matrix).length, missing: missing.length },
    }));

    return { ok: true, config, missing, matrix, directives: matrixDirectives(matrix) };
  } catch (e) {
    return { ok: false, exitCode: exitCodeFor(e), error: toGenerateError(e) };
  }
}
