/**
 * NATS transport handler: the terminal of every operation stack.
 *
 * Runs innermost, after the deserialize step's middleware has been entered.
 * Sends the serialized request to its subject and hands the raw reply back
 * for the deserializers to decode.
 *
 * Usage:
 *   const transport = createNatsTransportHandler({ connection, timeoutMs: 30_000 });
 *   const handler = decorateHandler(transport, stack);
 */

import { ErrorCode, NatsError, type MsgHdrs } from "nats";
import {
  StackError,
  handlerFunc,
  resolveLogger,
  type Context,
  type Handler,
  type LoggerFactory,
} from "@opstack/core";
import { OperationError, abortError } from "../errors.js";
import { isNatsRequest, type NatsResponse } from "../request.js";

const SERVICE_NAME = "opstack-client:nats-transport";

/** The part of a NatsConnection the transport uses. */
export interface NatsRequester {
  request(
    subject: string,
    payload: Uint8Array,
    opts: { timeout: number; headers?: MsgHdrs },
  ): Promise<{ data: Uint8Array; headers?: MsgHdrs }>;
}

export interface NatsTransportParams {
  connection: NatsRequester;
  /** Per-request timeout handed to NATS */
  timeoutMs: number;
  loggerFactory?: LoggerFactory;
}

export function createNatsTransportHandler(params: NatsTransportParams): Handler {
  const log = resolveLogger(params.loggerFactory, SERVICE_NAME);

  return handlerFunc(async (ctx: Context, input: unknown): Promise<NatsResponse> => {
    if (!isNatsRequest(input)) {
      throw new StackError({
        code: "TYPE_MISMATCH",
        message: `${SERVICE_NAME}:handle - Expected a NatsRequest`,
        details: { received: typeof input },
      });
    }
    if (!input.subject) {
      throw new OperationError({
        code: "INTERNAL_ERROR",
        message: `${SERVICE_NAME}:handle - Request has no subject. A serializer must set it.`,
      });
    }
    if (ctx.signal.aborted) {
      throw abortError(ctx.signal.reason, `${SERVICE_NAME}:handle`);
    }

    log.debug?.({ subject: input.subject, bytes: input.data.length }, `${SERVICE_NAME}:handle - Sending`);

    try {
      const msg = await raceAbort(
        params.connection.request(input.subject, input.data, {
          timeout: params.timeoutMs,
          headers: input.headers,
        }),
        ctx.signal,
      );
      return { data: msg.data, headers: msg.headers };
    } catch (err) {
      throw toOperationError(err, input.subject, params.timeoutMs);
    }
  });
}

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortError(signal.reason, `${SERVICE_NAME}:handle`));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

function toOperationError(err: unknown, subject: string, timeoutMs: number): OperationError {
  if (err instanceof OperationError) return err;

  if (err instanceof NatsError) {
    if (err.code === ErrorCode.Timeout) {
      return new OperationError({
        code: "TIMEOUT",
        message: `${SERVICE_NAME}:handle - No reply on ${subject} within ${timeoutMs}ms`,
        retryable: true,
        cause: err,
      });
    }
    if (err.code === ErrorCode.NoResponders) {
      return new OperationError({
        code: "NOT_FOUND",
        message: `${SERVICE_NAME}:handle - No responders on ${subject}`,
        retryable: true,
        cause: err,
      });
    }
  }

  return new OperationError({
    code: "UPSTREAM_ERROR",
    message: `${SERVICE_NAME}:handle - Request on ${subject} failed`,
    retryable: true,
    cause: err,
  });
}
