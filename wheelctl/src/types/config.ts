/** Matrix configuration types — the `wheel_matrix.yml` document. */

/** Version selector that resolves to the package index's current release. */
export const LATEST = "latest";

export type PythonSpec = {
  tag: string;
  abi?: string;
};

export type WheelTarget = {
  platform_tag: string;
  platform_instance: string;
  platform_arch: string;
  python: PythonSpec[];
};

export type VersionEntry = {
  wheels: WheelTarget[];
};

export type PackageEntry = {
  versions: Record<string, VersionEntry>;
};

/** Where artifacts live and where packages are looked up. */
export type MatrixSettings = {
  bucket: string;
  key_prefix: string;
  index_url: string;
  region?: string;
};

export type MatrixConfig = MatrixSettings & {
  packages: Record<string, PackageEntry>;
};
