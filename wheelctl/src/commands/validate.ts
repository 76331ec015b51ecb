import { loadConfig } from "../config/loader.js";
import { diag, type Diagnostic } from "../diagnostics.js";
import { WheelctlError, errorMessage } from "../errors.js";
import { parsePythonTag } from "../matrix/python-tag.js";
import type { MatrixConfig, MatrixSettings } from "../types/config.js";

export type ValidateSummary = {
  packages: number;
  versions: number;
  targets: number;
};

export type ValidateResult = { ok: true; summary: ValidateSummary } | { ok: false; errors: Diagnostic[] };

function checkTags(config: MatrixConfig, errors: Diagnostic[]): ValidateSummary {
  const summary: ValidateSummary = { packages: 0, versions: 0, targets: 0 };
  for (const [pkgName, pkgReqs] of Object.entries(config.packages)) {
    summary.packages++;
    for (const [selector, versionEntry] of Object.entries(pkgReqs.versions)) {
      summary.versions++;
      for (const wheel of versionEntry.wheels) {
        for (const python of wheel.python) {
          summary.targets++;
          try {
            parsePythonTag(python.tag);
          } catch (e) {
            errors.push(
              diag("error", "INVALID_TAG", `${pkgName} ${selector} (${wheel.platform_tag}): ${errorMessage(e)}`, {
                details: { package: pkgName, version: selector, platform_tag: wheel.platform_tag, tag: python.tag },
              }),
            );
          }
        }
      }
    }
  }
  return summary;
}

/**
 * Offline check of a matrix document: schema, settings and python tags.
 * Reports every bad tag rather than stopping at the first.
 */
export function validateMatrixConfig(opts: {
  configPath?: string;
  settings?: Partial<MatrixSettings>;
  env?: NodeJS.ProcessEnv;
}): ValidateResult {
  let config: MatrixConfig;
  try {
    config = loadConfig(opts.configPath, opts.settings, opts.env);
  } catch (e) {
    if (e instanceof WheelctlError) {
      return { ok: false, errors: [diag("error", e.code, e.message, { details: e.details })] };
    }
    throw e;
  }

  const errors: Diagnostic[] = [];
  const summary = checkTags(config, errors);
  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, summary };
}
