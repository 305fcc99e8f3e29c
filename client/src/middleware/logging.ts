/**
 * Invocation logging middleware (initialize step).
 * Logs start, finish with duration, and failure with the error code.
 * Errors are rethrown untouched.
 */

import { isStackError, type InitializeMiddleware, type Logger } from "@opstack/core";
import { OperationError } from "../errors.js";

const SERVICE_NAME = "opstack-client:logging";

export const LOGGING_MIDDLEWARE_ID = "logging";

export function createLoggingMiddleware(params: {
  operation: string;
  log: Logger;
  clock?: { now(): number };
}): InitializeMiddleware {
  const clock = params.clock ?? { now: () => Date.now() };

  return {
    id: LOGGING_MIDDLEWARE_ID,
    async handleMiddleware(ctx, input, next) {
      const startedAt = clock.now();
      params.log.info?.({ operation: params.operation }, `${SERVICE_NAME} - Invoke`);

      try {
        const out = await next.handle(ctx, input);
        params.log.info?.(
          { operation: params.operation, durationMs: clock.now() - startedAt },
          `${SERVICE_NAME} - Done`,
        );
        return out;
      } catch (err) {
        params.log.error?.(
          {
            operation: params.operation,
            durationMs: clock.now() - startedAt,
            code: errorCode(err),
            error: err instanceof Error ? err.message : String(err),
          },
          `${SERVICE_NAME} - Failed`,
        );
        throw err;
      }
    },
  };
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof OperationError || isStackError(err)) return err.code;
  return undefined;
}
