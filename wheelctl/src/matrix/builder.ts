import { diag, silentReporter, type Reporter } from "../diagnostics.js";
import { sdistDir, wheelFilename, type BuildSpec } from "../types/build-spec.js";
import type { Job, JobMatrix, JobPackage, MatrixEntry } from "../types/job.js";
import { comparePythonVersions, formatPythonVersion, parsePythonTag, pythonInterpreter } from "./python-tag.js";

function byName(a: { name: string }, b: { name: string }): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export function jobName(spec: BuildSpec): string {
  return `wheel_${spec.platform_tag}`;
}

export function toJobPackage(spec: BuildSpec): JobPackage {
  return {
    name: spec.package,
    version: spec.version,
    python: pythonInterpreter(spec.python_tag),
    python_version: formatPythonVersion(parsePythonTag(spec.python_tag)),
    python_tag: spec.python_tag,
    abi: spec.abi_tag,
    sdist_dir: sdistDir(spec),
    sdist_url: spec.sdist_url,
    expected_output_filename: wheelFilename(spec),
    constraints: spec.constraints,
  };
}

function addToJob(job: Job, spec: BuildSpec): void {
  job.packages.push(toJobPackage(spec));
  const version = parsePythonTag(spec.python_tag);
  if (!job.python_versions.some((v) => comparePythonVersions(v, version) === 0)) {
    job.python_versions.push(version);
    job.python_versions.sort(comparePythonVersions);
  }
}

/**
 * Group missing specs by platform into jobs, sorted by job name. Package
 * order within a job follows the input order.
 */
export function buildJobs(missing: readonly BuildSpec[]): Job[] {
  const jobs = new Map<string, Job>();
  for (const spec of missing) {
    const name = jobName(spec);
    let job = jobs.get(name);
    if (!job) {
      job = { name, instance: spec.platform_instance, arch: spec.platform_arch, packages: [], python_versions: [] };
      jobs.set(name, job);
    }
    // Last spec wins, as the platform tag identifies the instance
    job.instance = spec.platform_instance;
    job.arch = spec.platform_arch;
    addToJob(job, spec);
  }
  return [...jobs.values()].sort(byName);
}

/**
 * Flatten a job into the pipeline's string-only, two-level shape. The lowest
 * python provisions the instance; the rest are installed alongside it.
 */
export function toMatrixEntry(job: Job): MatrixEntry {
  const [primary, ...additional] = job.python_versions;
  if (!primary) {
    throw new Error(`Job ${job.name} has no packages`);
  }
  return {
    instance: job.instance,
    arch: job.arch,
    python: formatPythonVersion(primary),
    pythons: additional.map(formatPythonVersion).join(" "),
    job_data: JSON.stringify({ instance: job.instance, arch: job.arch, packages: job.packages }),
  };
}

export function serializeMatrix(jobs: readonly Job[], report: Reporter = silentReporter): JobMatrix {
  const matrix: JobMatrix = {};
  for (const job of [...jobs].sort(byName)) {
    const entry = toMatrixEntry(job);
    report(diag("debug", "JOB_DATA", `${job.name} data is ${entry.job_data}`, { details: { job: job.name } }));
    matrix[job.name] = entry;
  }
  return matrix;
}

/** Missing specs → transport matrix. Empty when nothing is missing. */
export function buildMatrix(missing: readonly BuildSpec[], report: Reporter = silentReporter): JobMatrix {
  return serializeMatrix(buildJobs(missing), report);
}
