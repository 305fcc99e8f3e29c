/**
 * Input validation middleware (initialize step).
 * Parses the parameters against a zod schema and hands the parsed value on.
 */

import type { ZodTypeAny } from "zod";
import type { InitializeMiddleware } from "@opstack/core";
import { OperationError } from "../errors.js";

const SERVICE_NAME = "opstack-client:validate-input";

export const VALIDATE_INPUT_MIDDLEWARE_ID = "validate-input";

export function createInputValidateMiddleware(params: {
  operation: string;
  schema: ZodTypeAny;
}): InitializeMiddleware {
  return {
    id: VALIDATE_INPUT_MIDDLEWARE_ID,
    async handleMiddleware(ctx, input, next) {
      const parsed = params.schema.safeParse(input.parameters);
      if (!parsed.success) {
        throw new OperationError({
          code: "VALIDATION_ERROR",
          message: `${SERVICE_NAME}: Input validation failed for ${params.operation}`,
          details: parsed.error.format(),
        });
      }
      return next.handle(ctx, { ...input, parameters: parsed.data });
    },
  };
}
