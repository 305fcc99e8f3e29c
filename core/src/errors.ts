/**
 * Stack error class.
 *
 * Raised synchronously by registry mutations and by steps that cannot narrow
 * the value handed to them. Errors thrown by middleware or terminal handlers
 * are never wrapped in a StackError.
 */

/**
 * Error codes for stack configuration and step narrowing failures.
 */
export type StackErrorCode =
  | "DUPLICATE_ID"
  | "ANCHOR_NOT_FOUND"
  | "NOT_FOUND"
  | "INVALID_ID"
  | "TYPE_MISMATCH";

export class StackError extends Error {
  public readonly code: StackErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(args: {
    code: StackErrorCode;
    message: string;
    details?: Record<string, unknown>;
  }) {
    super(args.message);
    this.name = "StackError";
    this.code = args.code;
    this.details = args.details;
  }
}

/** Type guard for StackError, optionally matching a code. */
export function isStackError(err: unknown, code?: StackErrorCode): err is StackError {
  return err instanceof StackError && (code === undefined || err.code === code);
}
