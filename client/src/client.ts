/**
 * OperationClient: stack-based client for invoking operations over NATS.
 *
 * Every invocation gets a fresh operation stack:
 *   createOperationStack → client mutators → per-call mutators
 * decorated around the NATS transport handler.
 *
 * Usage:
 *   const client = new OperationClient({ config: { natsUrl } });
 *   client.use((stack) => stack.build.add(createHeadersMiddleware("auth", { authorization }), RelativePosition.After));
 *   await client.connect();
 *   const user = await client.invoke("users.get", { id: "u-1" }, { output: UserSchema });
 */

import { connect, type NatsConnection } from "nats";
import type { z, ZodTypeAny } from "zod";
import {
  background,
  decorateHandler,
  resolveLogger,
  withCancel,
  type Context,
  type Logger,
  type LoggerFactory,
} from "@opstack/core";
import {
  TimeoutMsSchema,
  loadConfigFromEnv,
  resolveConfig,
  type OperationClientConfig,
  type ResolvedOperationClientConfig,
} from "./config.js";
import { OperationError } from "./errors.js";
import { createOperationStack, type StackMutator } from "./operation-stack.js";
import { createNatsTransportHandler, type NatsRequester } from "./transport/nats-transport.js";

const SERVICE_NAME = "opstack-client";

export interface OperationClientOptions {
  config?: OperationClientConfig;
  /** Read OPSTACK_* variables beneath `config`. Default: true */
  useEnv?: boolean;
  /** Pre-created connection (optional; will connect if not provided) */
  connection?: NatsRequester;
  loggerFactory?: LoggerFactory;
}

export interface InvokeOptions {
  /** Overrides the default timeout for this call */
  timeoutMs?: number;
  signal?: AbortSignal;
  input?: ZodTypeAny;
  output?: ZodTypeAny;
  /** Applied after the client's own mutators */
  mutators?: StackMutator[];
}

export class OperationClient {
  private readonly config: ResolvedOperationClientConfig;
  private readonly loggerFactory?: LoggerFactory;
  private readonly log: Logger;
  private readonly mutators: StackMutator[] = [];

  private connection?: NatsRequester;
  private ownConnection?: NatsConnection;

  constructor(options: OperationClientOptions = {}) {
    const envConfig = options.useEnv === false ? {} : loadConfigFromEnv();
    this.config = resolveConfig(envConfig, options.config ?? {});
    this.loggerFactory = options.loggerFactory;
    this.log = resolveLogger(options.loggerFactory, SERVICE_NAME);
    this.connection = options.connection;
  }

  get resolvedConfig(): Readonly<ResolvedOperationClientConfig> {
    return this.config;
  }

  /** Registers a mutator applied to the stack of every later invocation. */
  use(mutator: StackMutator): this {
    this.mutators.push(mutator);
    return this;
  }

  async connect(): Promise<void> {
    if (this.connection) return;
    this.log.info?.({ natsUrl: this.config.natsUrl }, `${SERVICE_NAME}:connect - Connecting`);
    const nc = await connect({ servers: this.config.natsUrl, name: this.config.natsName });
    this.ownConnection = nc;
    this.connection = nc;
    this.log.info?.({}, `${SERVICE_NAME}:connect - Ready`);
  }

  /**
   * Invokes `operation` with `params`. With an `output` schema the reply is
   * validated by the deserializer and typed accordingly.
   */
  invoke<S extends ZodTypeAny>(
    operation: string,
    params: unknown,
    options: InvokeOptions & { output: S },
  ): Promise<z.output<S>>;
  invoke(operation: string, params: unknown, options?: InvokeOptions): Promise<unknown>;
  async invoke(operation: string, params: unknown, options: InvokeOptions = {}): Promise<unknown> {
    const connection = this.connection;
    if (!connection) {
      throw new OperationError({
        code: "NOT_CONNECTED",
        message: `${SERVICE_NAME}:invoke - Call connect() before invoking ${operation}`,
      });
    }

    const timeoutMs = options.timeoutMs ?? this.config.defaultTimeoutMs;
    const checkedTimeout = TimeoutMsSchema.safeParse(timeoutMs);
    if (!checkedTimeout.success) {
      throw new OperationError({
        code: "VALIDATION_ERROR",
        message: `${SERVICE_NAME}:invoke - Invalid timeoutMs for ${operation}`,
        details: checkedTimeout.error.format(),
      });
    }

    const stack = createOperationStack({
      operation,
      config: this.config,
      input: options.input,
      output: options.output,
      loggerFactory: this.loggerFactory,
    });
    for (const mutate of [...this.mutators, ...(options.mutators ?? [])]) {
      mutate(stack);
    }

    const transport = createNatsTransportHandler({
      connection,
      timeoutMs,
      loggerFactory: this.loggerFactory,
    });

    const { ctx, cancel } = this.invocationContext(options.signal);
    try {
      return await decorateHandler(transport, stack).handle(ctx, params);
    } finally {
      cancel();
    }
  }

  /** Drains the connection if this client opened it. */
  async close(): Promise<void> {
    const nc = this.ownConnection;
    if (nc) {
      this.ownConnection = undefined;
      this.connection = undefined;
      await nc.drain();
      this.log.info?.({}, `${SERVICE_NAME}:close - Closed`);
    }
  }

  /**
   * Links the caller's signal, if any. Each attempt is bounded by the NATS
   * request timeout.
   */
  private invocationContext(signal: AbortSignal | undefined): {
    ctx: Context;
    cancel: () => void;
  } {
    const { ctx, cancel } = withCancel(background());
    if (!signal) {
      return { ctx, cancel: () => cancel() };
    }
    const onAbort = () => cancel(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    return {
      ctx,
      cancel: () => {
        signal.removeEventListener("abort", onAbort);
        cancel();
      },
    };
  }
}
