/**
 * Request ID middleware (build step).
 * Stamps a `request-id` header unless one is already set.
 */

import { randomUUID } from "node:crypto";
import type { BuildMiddleware } from "@opstack/core";
import type { NatsRequest } from "../request.js";

export const REQUEST_ID_MIDDLEWARE_ID = "request-id";
export const REQUEST_ID_HEADER = "request-id";

export function createRequestIdMiddleware(params?: {
  generate?: () => string;
}): BuildMiddleware<NatsRequest> {
  const generate = params?.generate ?? randomUUID;

  return {
    id: REQUEST_ID_MIDDLEWARE_ID,
    handleMiddleware(ctx, input, next) {
      if (!input.request.headers.has(REQUEST_ID_HEADER)) {
        input.request.headers.set(REQUEST_ID_HEADER, generate());
      }
      return next.handle(ctx, input);
    },
  };
}
