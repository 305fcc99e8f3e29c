/**
 * End-to-end tests for OperationClient over an in-process fake connection.
 */

import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { ErrorCode, NatsError, type MsgHdrs } from "nats";
import { RelativePosition } from "@opstack/core";
import { OperationClient } from "./client.js";
import { OperationError } from "./errors.js";
import type { NatsRequester } from "./transport/nats-transport.js";
import { createHeadersMiddleware } from "./middleware/headers.js";

// ── Mocks ───────────────────────────────────────────────────────────

interface SentRequest {
  subject: string;
  body: string;
  headers?: MsgHdrs;
  /** retry-attempt header as it was when sent */
  attempt?: string;
  timeout: number;
}

function createFakeConnection(...replies: Array<object | Error>) {
  const sent: SentRequest[] = [];
  const request = vi.fn(
    async (subject: string, payload: Uint8Array, opts: { timeout: number; headers?: MsgHdrs }) => {
      sent.push({
        subject,
        body: new TextDecoder().decode(payload),
        headers: opts.headers,
        attempt: opts.headers?.get("retry-attempt"),
        timeout: opts.timeout,
      });
      const reply = replies[Math.min(sent.length, replies.length) - 1];
      if (reply instanceof Error) throw reply;
      return { data: new TextEncoder().encode(JSON.stringify(reply)) };
    },
  );
  return { connection: { request }, sent };
}

function createClient(connection: NatsRequester) {
  return new OperationClient({
    useEnv: false,
    connection,
    config: { retryBaseDelayMs: 0, retryMaxDelayMs: 0 },
  });
}

const UserSchema = z.object({ name: z.string() });

// ── Tests ───────────────────────────────────────────────────────────

describe("OperationClient", () => {
  it("sends the serialized parameters and returns the typed reply", async () => {
    const { connection, sent } = createFakeConnection({ ok: true, data: { name: "Ada" } });
    const client = createClient(connection);

    const user = await client.invoke("users.get", { id: "u-1" }, { output: UserSchema });

    expect(user.name).toBe("Ada");
    expect(sent).toHaveLength(1);
    expect(sent[0]?.subject).toBe("ops.users.get");
    expect(sent[0]?.body).toBe('{"params":{"id":"u-1"}}');
    expect(sent[0]?.timeout).toBe(30_000);
    expect(sent[0]?.headers?.get("content-type")).toBe("application/json");
    expect(sent[0]?.headers?.get("retry-attempt")).toBe("1");
    expect(sent[0]?.headers?.has("request-id")).toBe(true);
  });

  it("uses the per-call timeout", async () => {
    const { connection, sent } = createFakeConnection({ ok: true, data: null });
    const client = createClient(connection);

    await client.invoke("ping", undefined, { timeoutMs: 750 });

    expect(sent[0]?.timeout).toBe(750);
    expect(sent[0]?.body).toBe('{"params":null}');
  });

  it("retries a retryable transport failure", async () => {
    const { connection, sent } = createFakeConnection(
      new NatsError("503", ErrorCode.NoResponders),
      { ok: true, data: "pong" },
    );
    const client = createClient(connection);

    const out = await client.invoke("ping", {});

    expect(out).toBe("pong");
    expect(sent.map((s) => s.attempt)).toEqual(["1", "2"]);
  });

  it("runs every attempt when each one times out", async () => {
    const request = vi.fn(
      async (_subject: string, _payload: Uint8Array, opts: { timeout: number; headers?: MsgHdrs }) => {
        await new Promise((resolve) => setTimeout(resolve, opts.timeout));
        throw new NatsError("TIMEOUT", ErrorCode.Timeout);
      },
    );
    const client = new OperationClient({
      useEnv: false,
      connection: { request },
      config: { maxAttempts: 3, retryBaseDelayMs: 20, retryMaxDelayMs: 20 },
    });

    await expect(client.invoke("ping", {}, { timeoutMs: 10 })).rejects.toMatchObject({
      code: "TIMEOUT",
      retryable: true,
    });
    expect(request).toHaveBeenCalledTimes(3);
  });

  it("rejects with TIMEOUT when the caller's deadline passes", async () => {
    const request = vi.fn(() => new Promise<{ data: Uint8Array }>(() => undefined));
    const client = createClient({ request });

    await expect(
      client.invoke("ping", {}, { signal: AbortSignal.timeout(5) }),
    ).rejects.toMatchObject({ code: "TIMEOUT", retryable: false });
    expect(request).toHaveBeenCalledTimes(1);
  });

  it("rejects an invalid per-call timeout before anything is sent", async () => {
    const { connection } = createFakeConnection({ ok: true, data: null });
    const client = createClient(connection);

    await expect(client.invoke("ping", {}, { timeoutMs: 0 })).rejects.toMatchObject({
      code: "VALIDATION_ERROR",
      message: "opstack-client:invoke - Invalid timeoutMs for ping",
    });
    expect(connection.request).not.toHaveBeenCalled();
  });

  it("rejects out-of-range config at construction", () => {
    const { connection } = createFakeConnection({ ok: true, data: null });

    expect(
      () => new OperationClient({ useEnv: false, connection, config: { maxAttempts: 0 } }),
    ).toThrow(OperationError);
  });

  it("rejects with the remote error", async () => {
    const { connection } = createFakeConnection({
      ok: false,
      error: { code: "NOT_FOUND", message: "no such user" },
    });
    const client = createClient(connection);

    const err = await client.invoke("users.get", { id: "u-9" }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(OperationError);
    expect(err).toMatchObject({ code: "NOT_FOUND", message: "no such user", retryable: false });
    expect(connection.request).toHaveBeenCalledTimes(1);
  });

  it("validates input before anything is sent", async () => {
    const { connection } = createFakeConnection({ ok: true, data: null });
    const client = createClient(connection);

    await expect(
      client.invoke("users.get", { id: 1 }, { input: z.object({ id: z.string() }) }),
    ).rejects.toMatchObject({ code: "VALIDATION_ERROR" });
    expect(connection.request).not.toHaveBeenCalled();
  });

  it("applies client mutators and then per-call mutators", async () => {
    const { connection, sent } = createFakeConnection({ ok: true, data: null });
    const client = createClient(connection).use((stack) =>
      stack.build.add(
        createHeadersMiddleware("auth", { authorization: "Bearer test-token" }),
        RelativePosition.After,
      ),
    );

    await client.invoke("ping", {}, { mutators: [(stack) => stack.build.remove("request-id")] });
    await client.invoke("ping", {});

    expect(sent[0]?.headers?.get("authorization")).toBe("Bearer test-token");
    expect(sent[0]?.headers?.has("request-id")).toBe(false);
    expect(sent[1]?.headers?.get("authorization")).toBe("Bearer test-token");
    expect(sent[1]?.headers?.has("request-id")).toBe(true);
  });

  it("rejects with CANCELLED for an aborted caller signal", async () => {
    const { connection } = createFakeConnection({ ok: true, data: null });
    const client = createClient(connection);
    const controller = new AbortController();
    controller.abort();

    await expect(
      client.invoke("ping", {}, { signal: controller.signal }),
    ).rejects.toMatchObject({ code: "CANCELLED" });
    expect(connection.request).not.toHaveBeenCalled();
  });

  it("rejects with NOT_CONNECTED before connect()", async () => {
    const client = new OperationClient({ useEnv: false });

    await expect(client.invoke("ping", {})).rejects.toMatchObject({ code: "NOT_CONNECTED" });
  });

  it("resolves config over the defaults", () => {
    const client = new OperationClient({ useEnv: false, config: { subjectPrefix: "svc" } });

    expect(client.resolvedConfig.subjectPrefix).toBe("svc");
    expect(client.resolvedConfig.maxAttempts).toBe(3);
  });

  it("leaves a connection it did not open alone on close", async () => {
    const { connection } = createFakeConnection({ ok: true, data: "still here" });
    const client = createClient(connection);

    await client.close();

    await expect(client.invoke("ping", {})).resolves.toBe("still here");
  });
});
