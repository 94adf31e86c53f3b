export type AzureFnErrorCode =
  | "envelope_invalid_json"
  | "log_still_borrowed"
  | "log_already_finalized"
  | "log_handle_released";

type LogOwnershipCode = Exclude<AzureFnErrorCode, "envelope_invalid_json">;

const OWNERSHIP_MESSAGES: Record<LogOwnershipCode, (outstanding: number) => string> = {
  log_still_borrowed: (outstanding) =>
    `invocation log finalized with ${outstanding} borrowed handle(s) outstanding`,
  log_already_finalized: () => "invocation log already finalized",
  log_handle_released: () => "invocation log handle used after release",
};

export class EnvelopeDecodeError extends Error {
  public readonly code: AzureFnErrorCode = "envelope_invalid_json";
  public readonly statusCode = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EnvelopeDecodeError";
  }

  toJSON() {
    return {
      error: "envelope_decode_failed",
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Raised when the invocation log is drained while a borrowed handle is still
 * alive, or drained twice. Indicates a handle kept beyond its request: not
 * retried, not converted into a user-facing error.
 */
export class LogOwnershipError extends Error {
  public readonly code: LogOwnershipCode;
  public readonly statusCode = 500;
  public readonly outstanding: number;

  constructor(code: LogOwnershipCode, outstanding = 0) {
    super(OWNERSHIP_MESSAGES[code](outstanding));
    this.name = "LogOwnershipError";
    this.code = code;
    this.outstanding = outstanding;
  }

  toJSON() {
    return {
      error: "internal_error",
      code: this.code,
      message: this.message,
      outstanding: this.outstanding,
    };
  }
}
