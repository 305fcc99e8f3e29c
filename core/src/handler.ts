/**
 * Handler and middleware contracts, and the composer that nests a terminal
 * handler inside an ordered list of middleware.
 *
 * Execution order follows list order:
 *   [mw0, mw1, mw2] + terminal  →  mw0( mw1( mw2( terminal ) ) )
 *
 * So mw0 runs first (outermost), the terminal runs last (innermost).
 */

import type { Context } from "./context.js";

/**
 * Performs the logic to obtain an output for the given input. Handlers are
 * decorated with middleware to add input specific behavior.
 */
export interface Handler<TIn = unknown, TOut = unknown> {
  handle(ctx: Context, input: TIn): Promise<TOut>;
}

export type HandlerFunc<TIn = unknown, TOut = unknown> = (
  ctx: Context,
  input: TIn,
) => Promise<TOut>;

/** Adapts a plain function to the Handler contract. */
export function handlerFunc<TIn = unknown, TOut = unknown>(
  fn: HandlerFunc<TIn, TOut>,
): Handler<TIn, TOut> {
  return { handle: fn };
}

/**
 * A named link in a handler chain.
 *
 * A middleware may:
 * - inspect or replace the input before calling next
 * - inspect or replace the output after next returns
 * - short-circuit by returning without calling next
 */
export interface Middleware<TIn = unknown, TOut = unknown> {
  /** Unique within the registry the middleware is added to. */
  readonly id: string;
  handleMiddleware(ctx: Context, input: TIn, next: Handler<TIn, TOut>): Promise<TOut>;
}

export type MiddlewareFunc<TIn = unknown, TOut = unknown> = (
  ctx: Context,
  input: TIn,
  next: Handler<TIn, TOut>,
) => Promise<TOut>;

/** Adapts a plain function to the Middleware contract under the given id. */
export function middlewareFunc<TIn = unknown, TOut = unknown>(
  id: string,
  fn: MiddlewareFunc<TIn, TOut>,
): Middleware<TIn, TOut> {
  return { id, handleMiddleware: fn };
}

/**
 * Decorates a handler with middleware. The returned handler invokes the
 * middleware in list order before reaching `terminal`.
 */
export function decorateHandler<TIn, TOut>(
  terminal: Handler<TIn, TOut>,
  ...middleware: ReadonlyArray<Middleware<TIn, TOut>>
): Handler<TIn, TOut> {
  return middleware.reduceRight<Handler<TIn, TOut>>(
    (next, mw) => ({
      handle: (ctx, input) => mw.handleMiddleware(ctx, input, next),
    }),
    terminal,
  );
}

/**
 * Groups an ordered list of middleware into a single middleware, so a whole
 * chain can occupy one position in another chain.
 */
export function composeMiddleware<TIn, TOut>(
  id: string,
  middleware: ReadonlyArray<Middleware<TIn, TOut>>,
): Middleware<TIn, TOut> {
  const list = [...middleware];
  return {
    id,
    handleMiddleware: (ctx, input, next) => decorateHandler(next, ...list).handle(ctx, input),
  };
}
