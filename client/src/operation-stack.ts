/**
 * Default operation stack.
 *
 *   initialize:  logging → validate-input (when an input schema is given)
 *   serialize:   serialize-json
 *   build:       request-id
 *   finalize:    retry (when maxAttempts > 1)
 *   deserialize: deserialize-json
 *
 * Every middleware has a stable id so callers can insert around, swap or
 * remove it through stack mutators.
 */

import type { ZodTypeAny } from "zod";
import {
  RelativePosition,
  Stack,
  acceptAny,
  resolveLogger,
  type LoggerFactory,
} from "@opstack/core";
import type { ResolvedOperationClientConfig } from "./config.js";
import { createLoggingMiddleware } from "./middleware/logging.js";
import { createInputValidateMiddleware } from "./middleware/validate-input.js";
import { createJsonSerializeMiddleware } from "./middleware/serialize-json.js";
import { createRequestIdMiddleware } from "./middleware/request-id.js";
import { createRetryMiddleware } from "./middleware/retry.js";
import { createJsonDeserializeMiddleware } from "./middleware/deserialize-json.js";
import { NatsRequest, isNatsRequest } from "./request.js";

const SERVICE_NAME = "opstack-client:operation";

export type OperationStack = Stack<unknown, NatsRequest>;

/** Changes a stack before it runs (add, insert, swap or remove middleware). */
export type StackMutator = (stack: OperationStack) => void;

export interface OperationStackParams {
  operation: string;
  config: ResolvedOperationClientConfig;
  input?: ZodTypeAny;
  output?: ZodTypeAny;
  loggerFactory?: LoggerFactory;
}

export function createOperationStack(params: OperationStackParams): OperationStack {
  const { operation, config, loggerFactory } = params;
  const log = resolveLogger(loggerFactory, SERVICE_NAME);

  const stack = new Stack({
    id: operation,
    newRequest: () => new NatsRequest(),
    isParameters: acceptAny,
    isRequest: isNatsRequest,
    loggerFactory,
  });

  stack.initialize.add(createLoggingMiddleware({ operation, log }), RelativePosition.After);
  if (params.input) {
    stack.initialize.add(
      createInputValidateMiddleware({ operation, schema: params.input }),
      RelativePosition.After,
    );
  }

  stack.serialize.add(
    createJsonSerializeMiddleware({ subject: `${config.subjectPrefix}.${operation}` }),
    RelativePosition.After,
  );

  stack.build.add(createRequestIdMiddleware(), RelativePosition.After);

  if (config.maxAttempts > 1) {
    stack.finalize.add(
      createRetryMiddleware({
        policy: {
          maxAttempts: config.maxAttempts,
          baseDelayMs: config.retryBaseDelayMs,
          maxDelayMs: config.retryMaxDelayMs,
        },
        log: resolveLogger(loggerFactory, "opstack-client:retry"),
      }),
      RelativePosition.After,
    );
  }

  stack.deserialize.add(
    createJsonDeserializeMiddleware({ operation, output: params.output }),
    RelativePosition.After,
  );

  return stack;
}
