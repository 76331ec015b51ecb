import type { JobMatrix } from "../types/job.js";

export const MATRIX_VARIABLE = "matrix";
export const HAS_JOBS_VARIABLE = "matrix_has_jobs";

/**
 * Azure Pipelines logging command. Values must stay on one line; JSON from
 * `JSON.stringify` never contains a raw newline.
 */
export function setVariable(name: string, value: string, opts: { isOutput?: boolean } = {}): string {
  const props = [`variable=${name}`];
  if (opts.isOutput ?? true) props.push("isOutput=true");
  return `##vso[task.setvariable ${props.join(";")}]${value.replace(/\r?\n/g, "%0A")}`;
}

/**
 * Directives publishing the matrix. `matrix_has_jobs` is only set when there
 * is at least one job, since downstream stages cannot test an empty matrix.
 */
export function matrixDirectives(matrix: JobMatrix): string[] {
  const lines = [setVariable(MATRIX_VARIABLE, JSON.stringify(matrix))];
  if (Object.keys(matrix).length > 0) {
    lines.push(setVariable(HAS_JOBS_VARIABLE, "true"));
  }
  return lines;
}
