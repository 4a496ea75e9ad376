export type TwoUpErrorCode = "INPUT_NOT_FOUND" | "INVALID_PARAMETER" | "WRITE_FAILURE";

/**
 * Base class for every failure the tool reports. All of them are terminal:
 * the CLI exits 1 and the HTTP layer maps the code to a status.
 */
export class TwoUpError extends Error {
  readonly code: TwoUpErrorCode;

  constructor(code: TwoUpErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Source path is missing, or its bytes do not parse as a PDF. */
export class InputNotFoundError extends TwoUpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INPUT_NOT_FOUND", message, options);
  }
}

export class InvalidParameterError extends TwoUpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_PARAMETER", message, options);
  }
}

/** Serializing the output or writing it to disk failed. */
export class WriteFailureError extends TwoUpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("WRITE_FAILURE", message, options);
  }
}

export function describeCause(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
