/**
 * Operation error class.
 *
 * Raised by the client's built-in middleware and transport, and rebuilt from
 * `{ ok: false, error }` replies sent by the remote side.
 */

export type OperationErrorCode =
  | "VALIDATION_ERROR"
  | "TIMEOUT"
  | "CANCELLED"
  | "NOT_FOUND"
  | "UPSTREAM_ERROR"
  | "DECODE_ERROR"
  | "NOT_CONNECTED"
  | "INTERNAL_ERROR";

const KNOWN_CODES: ReadonlySet<string> = new Set<OperationErrorCode>([
  "VALIDATION_ERROR",
  "TIMEOUT",
  "CANCELLED",
  "NOT_FOUND",
  "UPSTREAM_ERROR",
  "DECODE_ERROR",
  "NOT_CONNECTED",
  "INTERNAL_ERROR",
]);

export function isOperationErrorCode(code: string): code is OperationErrorCode {
  return KNOWN_CODES.has(code);
}

export class OperationError extends Error {
  public readonly code: OperationErrorCode;
  public readonly retryable: boolean;
  public readonly details?: unknown;
  public readonly cause?: unknown;

  constructor(args: {
    code: OperationErrorCode;
    message: string;
    retryable?: boolean;
    details?: unknown;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "OperationError";
    this.code = args.code;
    this.retryable = args.retryable ?? false;
    this.details = args.details;
    this.cause = args.cause;
  }
}

/** True for OperationErrors flagged retryable. Anything else is final. */
export function isRetryable(err: unknown): boolean {
  return err instanceof OperationError && err.retryable;
}

/**
 * Maps the reason a context was aborted with: a TimeoutError becomes
 * TIMEOUT, anything else CANCELLED.
 */
export function abortError(reason: unknown, source: string): OperationError {
  if (reason instanceof Error && reason.name === "TimeoutError") {
    return new OperationError({
      code: "TIMEOUT",
      message: `${source} - Deadline exceeded`,
      cause: reason,
    });
  }
  return new OperationError({
    code: "CANCELLED",
    message: `${source} - Cancelled`,
    cause: reason,
  });
}
