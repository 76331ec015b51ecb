import { diag, silentReporter, type Reporter } from "../diagnostics.js";
import type { ArtifactStore } from "../storage/artifact-store.js";
import { wheelFilename, type BuildSpec } from "../types/build-spec.js";

export const DEFAULT_KEY_PREFIX = "packages/";

/** True when an object keyed `<keyPrefix><filename>` is already published. */
export async function artifactExists(
  store: ArtifactStore,
  spec: BuildSpec,
  keyPrefix: string = DEFAULT_KEY_PREFIX,
  report: Reporter = silentReporter,
): Promise<boolean> {
  const filename = wheelFilename(spec);
  report(diag("debug", "CHECK_ARTIFACT", `checking bucket for ${filename}`, { details: { filename } }));

  const exists = await store.hasKeyWithPrefix(`${keyPrefix}${filename}`);
  if (!exists) {
    report(diag("info", "ARTIFACT_MISSING", `${filename} is not present in bucket`, { details: { filename } }));
  }
  return exists;
}
