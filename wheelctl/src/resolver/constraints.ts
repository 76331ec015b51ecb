import pep440 from "@renovatebot/pep440";

export type BuildConstraint = Readonly<{
  package: string;
  specifier: string;
  constraints: readonly string[];
}>;

/**
 * Build-time pins needed to compile specific package releases from source.
 * First matching row wins.
 */
export const BUILD_CONSTRAINTS: readonly BuildConstraint[] = Object.freeze([
  // PyYAML's setup.py breaks under Cython 3
  { package: "pyyaml", specifier: ">= 5.4, <= 6.0", constraints: ["Cython < 3.0"] },
]);

/** Throws unless `specifier` is a valid PEP 440 specifier set such as `>= 5.4, <= 6.0`. */
export function checkSpecifier(specifier: string): string {
  if (!pep440.validRange(specifier)) {
    throw new Error(`Unsupported version specifier: "${specifier}"`);
  }
  return specifier;
}

/**
 * PEP 440 membership: post-releases sort after their base release,
 * pre- and dev-releases before it and are excluded unless named.
 */
export function specifierContains(specifier: string, version: string): boolean {
  if (!pep440.valid(version)) return false;
  return pep440.satisfies(version, specifier);
}

for (const row of BUILD_CONSTRAINTS) checkSpecifier(row.specifier);

/** Constraint lines for a package release, newline-joined; `""` when none apply. */
export function constraintsFor(packageName: string, version: string): string {
  const name = packageName.toLowerCase();
  const row = BUILD_CONSTRAINTS.find((r) => r.package === name && specifierContains(r.specifier, version));
  return row ? row.constraints.join("\n") : "";
}
