/**
 * JSON serializer (serialize step).
 * Writes `{ params }` into the request body and addresses the request.
 */

import type { SerializeMiddleware } from "@opstack/core";
import type { NatsRequest } from "../request.js";

export const SERIALIZE_JSON_MIDDLEWARE_ID = "serialize-json";

export function createJsonSerializeMiddleware(params: {
  subject: string;
}): SerializeMiddleware<unknown, NatsRequest> {
  const encoder = new TextEncoder();

  return {
    id: SERIALIZE_JSON_MIDDLEWARE_ID,
    handleMiddleware(ctx, input, next) {
      const req = input.request;
      req.subject = params.subject;
      req.headers.set("content-type", "application/json");
      req.data = encoder.encode(JSON.stringify({ params: input.parameters ?? null }));
      return next.handle(ctx, input);
    },
  };
}
