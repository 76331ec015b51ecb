/** One package build inside a job, as handed to the build step. */
export type JobPackage = {
  name: string;
  version: string;
  /** Interpreter executable, e.g. `python3.9`. */
  python: string;
  /** Dotted version, e.g. `3.9`. */
  python_version: string;
  python_tag: string;
  abi: string;
  sdist_dir: string;
  sdist_url: string;
  expected_output_filename: string;
  constraints: string;
};

/** Missing wheels for one platform, grouped into a single CI job. */
export type Job = {
  name: string;
  instance: string;
  arch: string;
  packages: JobPackage[];
  /** Distinct (major, minor) versions, ascending. */
  python_versions: PythonVersion[];
};

export type PythonVersion = readonly [major: number, minor: number];

/** Nested job payload, carried as a JSON string in `MatrixEntry.job_data`. */
export type JobData = {
  instance: string;
  arch: string;
  packages: JobPackage[];
};

/**
 * Transport shape of one matrix entry. The pipeline accepts at most two
 * levels of nesting and only string values.
 */
export type MatrixEntry = {
  instance: string;
  arch: string;
  /** Version used to provision the instance. */
  python: string;
  /** Additional versions to install, space-separated; may be empty. */
  pythons: string;
  job_data: string;
};

export type JobMatrix = Record<string, MatrixEntry>;
