/**
 * JSON deserializer (deserialize step).
 *
 * Decodes the `{ ok, data | error }` reply the transport hands back:
 * - ok: true  → result = data (validated against the output schema if given)
 * - ok: false → throws OperationError carrying the remote code
 * - anything else → DECODE_ERROR
 */

import { z, type ZodTypeAny } from "zod";
import type { DeserializeMiddleware } from "@opstack/core";
import { OperationError, isOperationErrorCode } from "../errors.js";
import { isNatsResponse, type NatsRequest } from "../request.js";

const SERVICE_NAME = "opstack-client:deserialize-json";

export const DESERIALIZE_JSON_MIDDLEWARE_ID = "deserialize-json";

const ReplySchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), data: z.unknown() }),
  z.object({
    ok: z.literal(false),
    error: z.object({
      code: z.string(),
      message: z.string(),
      retryable: z.boolean().optional(),
      details: z.unknown().optional(),
    }),
  }),
]);

export function createJsonDeserializeMiddleware(params: {
  operation: string;
  output?: ZodTypeAny;
}): DeserializeMiddleware<NatsRequest> {
  const decoder = new TextDecoder();

  return {
    id: DESERIALIZE_JSON_MIDDLEWARE_ID,
    async handleMiddleware(ctx, input, next) {
      const out = await next.handle(ctx, input);
      if (!isNatsResponse(out.rawResponse)) {
        throw new OperationError({
          code: "DECODE_ERROR",
          message: `${SERVICE_NAME}: No raw reply to decode for ${params.operation}`,
        });
      }

      let body: unknown;
      try {
        body = JSON.parse(decoder.decode(out.rawResponse.data));
      } catch (err) {
        throw new OperationError({
          code: "DECODE_ERROR",
          message: `${SERVICE_NAME}: Reply for ${params.operation} is not JSON`,
          cause: err,
        });
      }

      const reply = ReplySchema.safeParse(body);
      if (!reply.success) {
        throw new OperationError({
          code: "DECODE_ERROR",
          message: `${SERVICE_NAME}: Malformed reply for ${params.operation}`,
          details: reply.error.format(),
        });
      }

      if (!reply.data.ok) {
        const { code, message, retryable, details } = reply.data.error;
        throw new OperationError({
          code: isOperationErrorCode(code) ? code : "UPSTREAM_ERROR",
          message,
          retryable: retryable ?? false,
          details: isOperationErrorCode(code) ? details : { remoteCode: code, details },
        });
      }

      if (!params.output) {
        return { ...out, result: reply.data.data };
      }
      const parsed = params.output.safeParse(reply.data.data);
      if (!parsed.success) {
        throw new OperationError({
          code: "VALIDATION_ERROR",
          message: `${SERVICE_NAME}: Output validation failed for ${params.operation}`,
          details: parsed.error.format(),
        });
      }
      return { ...out, result: parsed.data };
    },
  };
}
