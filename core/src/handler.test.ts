/**
 * Unit tests for the chain composer.
 */

import { describe, it, expect, vi } from "vitest";
import { background } from "./context.js";
import {
  composeMiddleware,
  decorateHandler,
  handlerFunc,
  middlewareFunc,
  type Handler,
  type Middleware,
} from "./handler.js";

// ── Helpers ─────────────────────────────────────────────────────────

function recorder(id: string, order: string[]): Middleware<string, string> {
  return middlewareFunc(id, async (ctx, input, next) => {
    order.push(`${id}-before`);
    const out = await next.handle(ctx, input);
    order.push(`${id}-after`);
    return out;
  });
}

function echo(seen: string[]): Handler<string, string> {
  return handlerFunc(async (_ctx, input) => {
    seen.push(input);
    return `out:${input}`;
  });
}

// ── Tests ───────────────────────────────────────────────────────────

describe("decorateHandler", () => {
  it("returns the terminal when there is no middleware", () => {
    const terminal = echo([]);
    expect(decorateHandler(terminal)).toBe(terminal);
  });

  it("runs middleware in list order, first registered outermost", async () => {
    const order: string[] = [];
    const h = decorateHandler(echo([]), recorder("A", order), recorder("B", order));

    await h.handle(background(), "x");

    expect(order).toEqual(["A-before", "B-before", "B-after", "A-after"]);
  });

  it("delivers the input unmodified when every link delegates", async () => {
    const seen: string[] = [];
    const h = decorateHandler(echo(seen), recorder("A", []), recorder("B", []));

    const out = await h.handle(background(), "x");

    expect(seen).toEqual(["x"]);
    expect(out).toBe("out:x");
  });

  it("lets an outer middleware replace the input for later links", async () => {
    const seenByB: string[] = [];
    const seenByT: string[] = [];
    const a = middlewareFunc<string, string>("A", (ctx, input, next) =>
      next.handle(ctx, `${input}'`),
    );
    const b = middlewareFunc<string, string>("B", (ctx, input, next) => {
      seenByB.push(input);
      return next.handle(ctx, input);
    });

    await decorateHandler(echo(seenByT), a, b).handle(background(), "x");

    expect(seenByB).toEqual(["x'"]);
    expect(seenByT).toEqual(["x'"]);
  });

  it("lets a middleware replace the output on the way back", async () => {
    const wrap = middlewareFunc<string, string>("wrap", async (ctx, input, next) => {
      const out = await next.handle(ctx, input);
      return `[${out}]`;
    });

    const out = await decorateHandler(echo([]), wrap).handle(background(), "x");

    expect(out).toBe("[out:x]");
  });

  it("never reaches the terminal when a middleware short-circuits", async () => {
    const terminal = vi.fn(async (_ctx: unknown, input: string) => input);
    const order: string[] = [];
    const b = middlewareFunc<string, string>("B", async () => "short");

    const out = await decorateHandler(handlerFunc(terminal), recorder("A", order), b).handle(
      background(),
      "x",
    );

    expect(out).toBe("short");
    expect(terminal).not.toHaveBeenCalled();
    expect(order).toEqual(["A-before", "A-after"]);
  });

  it("propagates a thrown error unchanged and skips the rest of the chain", async () => {
    const failure = new Error("boom");
    const terminal = vi.fn(async (_ctx: unknown, input: string) => input);
    const a = middlewareFunc<string, string>("A", async () => {
      throw failure;
    });

    await expect(
      decorateHandler(handlerFunc(terminal), a, recorder("B", [])).handle(background(), "x"),
    ).rejects.toBe(failure);
    expect(terminal).not.toHaveBeenCalled();
  });

  it("propagates a terminal error through every middleware", async () => {
    const failure = new Error("terminal failed");
    const terminal = handlerFunc<string, string>(async () => {
      throw failure;
    });
    const order: string[] = [];

    await expect(decorateHandler(terminal, recorder("A", order)).handle(background(), "x")).rejects.toBe(
      failure,
    );
    expect(order).toEqual(["A-before"]);
  });

  it("passes the context through to every link", async () => {
    const ctx = background();
    const seen: unknown[] = [];
    const spy = middlewareFunc<string, string>("spy", (c, input, next) => {
      seen.push(c);
      return next.handle(c, input);
    });
    const terminal = handlerFunc<string, string>(async (c, input) => {
      seen.push(c);
      return input;
    });

    await decorateHandler(terminal, spy).handle(ctx, "x");

    expect(seen).toEqual([ctx, ctx]);
  });
});

describe("composeMiddleware", () => {
  it("runs a grouped list as one position in an outer chain", async () => {
    const order: string[] = [];
    const group = composeMiddleware("group", [recorder("B", order), recorder("C", order)]);

    const h = decorateHandler(echo([]), recorder("A", order), group, recorder("D", order));
    await h.handle(background(), "x");

    expect(group.id).toBe("group");
    expect(order).toEqual([
      "A-before",
      "B-before",
      "C-before",
      "D-before",
      "D-after",
      "C-after",
      "B-after",
      "A-after",
    ]);
  });
});
