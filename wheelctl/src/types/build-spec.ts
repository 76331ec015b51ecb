/**
 * One required wheel: a (package, version, platform, python, abi) combination.
 *
 * Values are frozen on construction; derived names are pure functions of the
 * fields so two equal specs always map to the same storage key.
 */
export type BuildSpec = Readonly<{
  package: string;
  version: string;
  platform_instance: string;
  platform_arch: string;
  python_tag: string;
  /** Empty when the wheel reuses `python_tag` as its ABI tag. */
  abi_tag: string;
  platform_tag: string;
  sdist_url: string;
  /** Extra build constraints, newline-joined. */
  constraints: string;
}>;

export function createBuildSpec(fields: BuildSpec): BuildSpec {
  return Object.freeze({ ...fields });
}

/** `<package>-<version>` with dashes in the name folded to underscores. */
export function sdistDir(spec: BuildSpec): string {
  return [spec.package.replace(/-/g, "_"), spec.version].join("-");
}

/** Canonical wheel filename, e.g. `pkg-1.2.3-cp39-cp39-manylinux_2_17_x86_64.whl`. */
export function wheelFilename(spec: BuildSpec): string {
  const parts = [sdistDir(spec), spec.python_tag, spec.abi_tag || spec.python_tag, spec.platform_tag];
  return parts.filter((p) => p.length > 0).join("-") + ".whl";
}

const KEY_FIELDS = [
  "package",
  "version",
  "platform_instance",
  "platform_arch",
  "python_tag",
  "abi_tag",
  "platform_tag",
  "sdist_url",
  "constraints",
] as const satisfies readonly (keyof BuildSpec)[];

/** Structural identity over every field; used for set membership and ordering. */
export function buildSpecKey(spec: BuildSpec): string {
  return JSON.stringify(KEY_FIELDS.map((f) => spec[f]));
}
