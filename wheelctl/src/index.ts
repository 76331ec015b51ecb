export { generate, type GenerateOptions, type GenerateResult } from "./commands/generate.js";
export { validateMatrixConfig, type ValidateResult } from "./commands/validate.js";
export { loadConfig, DEFAULT_SETTINGS } from "./config/loader.js";
export { buildJobs, buildMatrix, serializeMatrix, toMatrixEntry } from "./matrix/builder.js";
export { enumerateBuildSpecs, findMissing, validatePythonTags } from "./matrix/enumerator.js";
export { artifactExists } from "./matrix/existence.js";
export { PypiClient, type PackageIndex } from "./pypi/package-index.js";
export { VersionResolver } from "./resolver/version-resolver.js";
export { constraintsFor, BUILD_CONSTRAINTS } from "./resolver/constraints.js";
export { S3ArtifactStore, type ArtifactStore } from "./storage/artifact-store.js";
export { matrixDirectives, setVariable } from "./pipeline/variables.js";
export { createBuildSpec, sdistDir, wheelFilename, type BuildSpec } from "./types/build-spec.js";
export type { Job, JobMatrix, MatrixEntry } from "./types/job.js";
export type { MatrixConfig } from "./types/config.js";
export * from "./errors.js";
