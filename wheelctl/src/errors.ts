/** Failure taxonomy. Every failure aborts the run. */
export type ErrorDetails = Record<string, unknown>;

export class WheelctlError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details: ErrorDetails = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Config file missing, unparseable, or not matching the schema. */
export class ConfigError extends WheelctlError {
  constructor(message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, details, options);
  }
}

/** Python tag is not `cp<major><minor>`. */
export class InvalidTagError extends WheelctlError {
  constructor(readonly tag: string, details: ErrorDetails = {}) {
    super("INVALID_TAG", `invalid python tag ${tag}`, { tag, ...details });
  }
}

/** Package, version or sdist not found in the package index, or the index could not be read. */
export class ResolutionError extends WheelctlError {}

/** Storage lookup could not complete. */
export class StorageUnavailableError extends WheelctlError {
  constructor(message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super("STORAGE_UNAVAILABLE", message, details, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
