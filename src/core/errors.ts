/**
 * Typed error for organizer operations. The code tells callers which
 * unit (file, folder, model, run) the failure belongs to.
 */

export type ErrorCode =
  | "NO_MATCH"
  | "UNRECOGNIZED"
  | "PARAMETER_MISMATCH"
  | "MISSING_PRECONDITION"
  | "IO_ERROR"
  | "INVALID_IDENTIFIER"
  | "SOURCE_NOT_FOUND"
  | "CONFIG_ERROR";

export class OrganizerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrganizerError";
    this.code = code;
  }

  static noMatch(folderName: string): OrganizerError {
    return new OrganizerError("NO_MATCH", `Could not parse folder name: ${folderName}`);
  }

  static unrecognized(filename: string, reason: string): OrganizerError {
    return new OrganizerError("UNRECOGNIZED", `${filename}: ${reason}`);
  }

  static parameterMismatch(filename: string, found: string, expected: string): OrganizerError {
    return new OrganizerError(
      "PARAMETER_MISMATCH",
      `${filename} has different model parameters (${found}) than target (${expected})`,
    );
  }

  static missingPrecondition(message: string): OrganizerError {
    return new OrganizerError("MISSING_PRECONDITION", message);
  }

  static io(message: string, cause?: unknown): OrganizerError {
    return new OrganizerError("IO_ERROR", message, { cause });
  }

  static invalidIdentifier(raw: string): OrganizerError {
    return new OrganizerError("INVALID_IDENTIFIER", `Not a numeric identifier: "${raw}"`);
  }

  static sourceNotFound(dir: string): OrganizerError {
    return new OrganizerError("SOURCE_NOT_FOUND", `Source directory ${dir} not found`);
  }

  static config(message: string): OrganizerError {
    return new OrganizerError("CONFIG_ERROR", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
