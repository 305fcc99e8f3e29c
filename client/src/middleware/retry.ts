/**
 * Retry middleware (finalize step).
 *
 * Re-runs the rest of the chain (finalize onwards, including the transport)
 * when it fails with a retryable OperationError. Stops early once the
 * context is aborted. Delays grow exponentially from baseDelayMs and are
 * capped at maxDelayMs.
 */

import type { FinalizeMiddleware, Logger } from "@opstack/core";
import { abortError, isRetryable } from "../errors.js";
import type { NatsRequest } from "../request.js";

const SERVICE_NAME = "opstack-client:retry";

export const RETRY_MIDDLEWARE_ID = "retry";
export const RETRY_ATTEMPT_HEADER = "retry-attempt";

export interface RetryPolicy {
  /** Total attempts including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** Delay before the given retry (1 = first retry). */
export function calculateDelay(policy: RetryPolicy, retry: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, retry - 1), policy.maxDelayMs);
}

/**
 * Resolves after `ms`. Rejects once the signal aborts, with TIMEOUT for a
 * deadline and CANCELLED otherwise.
 */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(abortError(signal.reason, `${SERVICE_NAME}:sleep`));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError(signal.reason, `${SERVICE_NAME}:sleep`));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export function createRetryMiddleware(params: {
  policy: RetryPolicy;
  log?: Logger;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}): FinalizeMiddleware<NatsRequest> {
  const wait = params.sleep ?? sleep;
  const maxAttempts = Math.max(1, params.policy.maxAttempts);

  return {
    id: RETRY_MIDDLEWARE_ID,
    async handleMiddleware(ctx, input, next) {
      for (let attempt = 1; ; attempt++) {
        input.request.headers.set(RETRY_ATTEMPT_HEADER, String(attempt));
        try {
          return await next.handle(ctx, input);
        } catch (err) {
          if (attempt >= maxAttempts || !isRetryable(err) || ctx.signal.aborted) {
            throw err;
          }
          const delay = calculateDelay(params.policy, attempt);
          params.log?.warn?.(
            {
              attempt,
              maxAttempts,
              delayMs: delay,
              error: err instanceof Error ? err.message : String(err),
            },
            `${SERVICE_NAME} - Retrying`,
          );
          await wait(delay, ctx.signal);
        }
      }
    },
  };
}
