/**
 * Typed step: one ordered group of step-specific middleware presented to
 * the outer stack as a single generic middleware.
 *
 * On each invocation the step snapshots its middleware order, builds a fresh
 * terminal that hands the typed payload to the outer `next` handler, wraps
 * the generic input into the step's input envelope and unwraps the output
 * envelope on the way back. Nothing invocation-local is stored on the step.
 */

import type { ZodType, ZodTypeDef } from "zod";
import type { Context } from "./context.js";
import { StackError } from "./errors.js";
import { decorateHandler, type Handler, type Middleware } from "./handler.js";
import { resolveLogger, type Logger, type LoggerFactory } from "./logger.js";
import { OrderedIds, type RelativePosition } from "./ordered-ids.js";

const SERVICE_NAME = "opstack-core:step";

/** Narrows a generic value handed to a step. */
export type TypeGuard<T> = (value: unknown) => value is T;

/** Accepts any value. Used when a step is not given a guard. */
export function acceptAny(_value: unknown): _value is unknown {
  return true;
}

/**
 * Builds a guard from a zod schema. The schema only checks the value; the
 * original reference is what flows on, so mutations made by middleware stay
 * visible to the rest of the chain.
 */
export function guardFromSchema<T>(schema: ZodType<T, ZodTypeDef, unknown>): TypeGuard<T> {
  return (value: unknown): value is T => schema.safeParse(value).success;
}

/** Narrows `value` with `guard`, failing with TYPE_MISMATCH. */
export function narrow<T>(stepId: string, what: string, value: unknown, guard: TypeGuard<T>): T {
  if (!guard(value)) {
    throw new StackError({
      code: "TYPE_MISMATCH",
      message: `${stepId}: ${what} does not have the expected type`,
      details: { step: stepId, what, received: describe(value) },
    });
  }
  return value;
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}

export interface StepOptions {
  loggerFactory?: LoggerFactory;
}

export abstract class Step<TIn, TOut> implements Middleware {
  abstract readonly id: string;

  private readonly ids = new OrderedIds<Middleware<TIn, TOut>>();
  protected readonly log: Logger;

  constructor(options?: StepOptions) {
    this.log = resolveLogger(options?.loggerFactory, SERVICE_NAME);
  }

  /** Wraps the generic input handed to the step into its input envelope. */
  protected abstract toInput(input: unknown): TIn;

  /** Picks the payload the terminal passes on to the outer next handler. */
  protected abstract forward(input: TIn): unknown;

  /** Repackages the outer next handler's result into the output envelope. */
  protected abstract toOutput(result: unknown): TOut;

  /** Extracts the generic result from the output envelope. */
  protected abstract fromOutput(output: TOut): unknown;

  async handleMiddleware(ctx: Context, input: unknown, next: Handler): Promise<unknown> {
    const terminal: Handler<TIn, TOut> = {
      handle: async (c, stepIn) => this.toOutput(await next.handle(c, this.forward(stepIn))),
    };
    const h = decorateHandler(terminal, ...this.ids.getOrder());

    const out = await h.handle(ctx, this.toInput(input));
    return this.fromOutput(out);
  }

  /**
   * Adds the middleware in front of or behind the step's current middleware.
   * Throws DUPLICATE_ID if the id is already present.
   */
  add(m: Middleware<TIn, TOut>, pos: RelativePosition): void {
    this.ids.add(m, pos);
    this.log.debug?.({ step: this.id, id: m.id, pos }, `${SERVICE_NAME}:add`);
  }

  /**
   * Inserts the middleware relative to an existing middleware id.
   * Throws ANCHOR_NOT_FOUND or DUPLICATE_ID.
   */
  insert(m: Middleware<TIn, TOut>, relativeTo: string, pos: RelativePosition): void {
    this.ids.insert(m, relativeTo, pos);
    this.log.debug?.({ step: this.id, id: m.id, relativeTo, pos }, `${SERVICE_NAME}:insert`);
  }

  /**
   * Replaces the middleware `id` in place. Returns the middleware removed.
   */
  swap(id: string, m: Middleware<TIn, TOut>): Middleware<TIn, TOut> {
    const removed = this.ids.swap(id, m);
    this.log.debug?.({ step: this.id, id, with: m.id }, `${SERVICE_NAME}:swap`);
    return removed;
  }

  /** Removes the middleware `id`. Throws NOT_FOUND if absent. */
  remove(id: string): Middleware<TIn, TOut> {
    const removed = this.ids.remove(id);
    this.log.debug?.({ step: this.id, id }, `${SERVICE_NAME}:remove`);
    return removed;
  }

  clear(): void {
    this.ids.clear();
    this.log.debug?.({ step: this.id }, `${SERVICE_NAME}:clear`);
  }

  get(id: string): Middleware<TIn, TOut> | undefined {
    return this.ids.get(id);
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  /** Middleware ids in execution order. */
  list(): string[] {
    return this.ids.ids();
  }
}
