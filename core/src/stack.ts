/**
 * Stack: the five steps of an operation as one middleware.
 *
 *   initialize → serialize → build → finalize → deserialize → next
 *
 * Parameters enter the initialize step; the serialize step turns them into
 * a request, which is what build, finalize and deserialize see and what
 * finally reaches the outer `next` handler (the transport).
 *
 * Usage:
 *   const stack = new Stack({ id: "get-user", newRequest, isParameters, isRequest });
 *   stack.build.add(buildMiddlewareFunc("set-foo", fn), RelativePosition.After);
 *   const handler = decorateHandler(transport, stack);
 */

import type { Context } from "./context.js";
import { decorateHandler, type Handler, type Middleware } from "./handler.js";
import type { LoggerFactory } from "./logger.js";
import type { TypeGuard } from "./step.js";
import { BuildStep } from "./step-build.js";
import { DeserializeStep } from "./step-deserialize.js";
import { FinalizeStep } from "./step-finalize.js";
import { InitializeStep } from "./step-initialize.js";
import { SerializeStep } from "./step-serialize.js";

export interface StackOptions<TParams, TRequest> {
  /** Id of the stack when it is itself used as a middleware. */
  id: string;
  /** Creates the request the serialize step fills in. */
  newRequest: () => TRequest;
  /** Checks the parameters handed to the stack. */
  isParameters: TypeGuard<TParams>;
  /** Checks the request as it enters build, finalize and deserialize. */
  isRequest: TypeGuard<TRequest>;
  loggerFactory?: LoggerFactory;
}

export class Stack<TParams = unknown, TRequest = unknown> implements Middleware {
  readonly id: string;

  readonly initialize: InitializeStep<TParams>;
  readonly serialize: SerializeStep<TParams, TRequest>;
  readonly build: BuildStep<TRequest>;
  readonly finalize: FinalizeStep<TRequest>;
  readonly deserialize: DeserializeStep<TRequest>;

  constructor(options: StackOptions<TParams, TRequest>) {
    const { loggerFactory, isParameters, isRequest } = options;
    this.id = options.id;
    this.initialize = new InitializeStep({ isParameters, loggerFactory });
    this.serialize = new SerializeStep({ isParameters, newRequest: options.newRequest, loggerFactory });
    this.build = new BuildStep({ isRequest, loggerFactory });
    this.finalize = new FinalizeStep({ isRequest, loggerFactory });
    this.deserialize = new DeserializeStep({ isRequest, loggerFactory });
  }

  /**
   * Decorates `next` with every step and invokes it. Each step snapshots its
   * own middleware order at the moment it is reached.
   */
  handleMiddleware(ctx: Context, input: unknown, next: Handler): Promise<unknown> {
    return decorateHandler(
      next,
      this.initialize,
      this.serialize,
      this.build,
      this.finalize,
      this.deserialize,
    ).handle(ctx, input);
  }

  toString(): string {
    const lines = [this.id];
    for (const step of [this.initialize, this.serialize, this.build, this.finalize, this.deserialize]) {
      lines.push(`\t${step.id}`);
      for (const id of step.list()) {
        lines.push(`\t\t${id}`);
      }
    }
    return lines.join("\n");
  }
}
