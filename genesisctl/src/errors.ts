/** Error codes raised before any build unit starts. */
export type GenesisErrorCode =
  | "CONFIG_NOT_FOUND"
  | "CONFIG_MALFORMED"
  | "SETTINGS_INVALID"
  | "DEPENDENCY_MISSING"
  | "STAGING_FAILED"
  | "INPUT_MISSING"
  | "VERSION_UNDETERMINED";

export class GenesisError extends Error {
  readonly code: GenesisErrorCode;

  constructor(code: GenesisErrorCode, message: string) {
    super(message);
    this.name = "GenesisError";
    this.code = code;
  }
}

export function isGenesisError(e: unknown): e is GenesisError {
  return e instanceof GenesisError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
