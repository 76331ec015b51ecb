import { InvalidTagError, type ErrorDetails } from "../errors.js";
import type { PythonVersion } from "../types/job.js";

const PYTHON_TAG = /^cp(\d)(\d{1,2})$/;

/** `cp39` → `[3, 9]`, `cp310` → `[3, 10]`. */
export function parsePythonTag(tag: string, context?: ErrorDetails): PythonVersion {
  const m = PYTHON_TAG.exec(tag);
  if (!m) throw new InvalidTagError(tag, context);
  return [Number(m[1]), Number(m[2])];
}

export function formatPythonVersion(version: PythonVersion): string {
  return version.join(".");
}

/** Interpreter executable for a tag, e.g. `python3.8`. */
export function pythonInterpreter(tag: string): string {
  return `python${formatPythonVersion(parsePythonTag(tag))}`;
}

/** Numeric (major, minor) ordering: 3.9 sorts before 3.10. */
export function comparePythonVersions(a: PythonVersion, b: PythonVersion): number {
  return a[0] - b[0] || a[1] - b[1];
}
