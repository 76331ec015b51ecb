import type { CommanderError } from "commander";
import {
  ConfigError,
  InvalidTagError,
  ResolutionError,
  StorageUnavailableError,
} from "../errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILED: 1,
  INPUT_INVALID: 2,
  INVALID_ARGS: 3,
  RETRYABLE_FAILURE: 10,
  PERMANENT_FAILURE: 20,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** Storage outages are worth retrying the whole run; bad input and unknown packages are not. */
export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof ConfigError || err instanceof InvalidTagError) return EXIT.INPUT_INVALID;
  if (err instanceof StorageUnavailableError) return EXIT.RETRYABLE_FAILURE;
  if (err instanceof ResolutionError) return EXIT.PERMANENT_FAILURE;
  return EXIT.FAILED;
}

/** Help and version exit cleanly; any other commander error is bad usage. */
export function usageExitCode(err: CommanderError): ExitCode {
  return err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS;
}
