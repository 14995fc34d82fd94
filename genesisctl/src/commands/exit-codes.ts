import type { GenesisErrorCode } from "../errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  BUILD_FAILED: 1,
  INVALID_ARGS: 2,
  CONFIG_ERROR: 3,
  INPUT_MISSING: 4,
  VERSION_UNDETERMINED: 5,
  CANCELLED: 6,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** Codes a command can fail with: setup errors plus run outcomes. */
export type CommandErrorCode = GenesisErrorCode | "BUILD_FAILED" | "CANCELLED";

export function exitCodeFor(code: CommandErrorCode): ExitCode {
  switch (code) {
    case "CONFIG_NOT_FOUND":
    case "CONFIG_MALFORMED":
    case "SETTINGS_INVALID":
      return EXIT.CONFIG_ERROR;
    case "DEPENDENCY_MISSING":
    case "STAGING_FAILED":
    case "INPUT_MISSING":
      return EXIT.INPUT_MISSING;
    case "VERSION_UNDETERMINED":
      return EXIT.VERSION_UNDETERMINED;
    case "CANCELLED":
      return EXIT.CANCELLED;
    case "BUILD_FAILED":
      return EXIT.BUILD_FAILED;
  }
}
