// Tests for logging middleware

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { loggingMiddleware } from "./logging.ts";
import { Extensions } from "./middleware.ts";
import type { SendContext, OutgoingRequest, SendOutcome } from "./middleware.ts";
import { SendError } from "./errors.ts";
import { bounded } from "./pair.ts";

describe("loggingMiddleware", () => {
  let consoleLogs: Array<{ message: string; data: unknown }> = [];
  const originalConsoleLog = console.log;

  beforeEach(() => {
    consoleLogs = [];
    console.log = (message: string, data?: unknown) => {
      consoleLogs.push({ message, data });
    };
    vi.stubEnv("DEBUG", "parley:*");
  });

  afterEach(() => {
    console.log = originalConsoleLog;
    vi.unstubAllEnvs();
  });

  function newContext(): SendContext {
    return { extensions: new Extensions() };
  }

  it("logs request and reply", async () => {
    const middleware = loggingMiddleware<string, number>({ label: "lengths" });
    const ctx = newContext();
    const outgoing: OutgoingRequest<string> = { request: "hello" };

    middleware.pre?.(ctx, outgoing);
    expect(consoleLogs).toHaveLength(1);
    expect(consoleLogs[0].message).toBe("→ lengths");
    expect(consoleLogs[0].data).toEqual({ type: "request", label: "lengths", request: "hello" });

    await new Promise((resolve) => setTimeout(resolve, 10));

    const outcome: SendOutcome<number> = { ok: true, value: 5 };
    middleware.post?.(ctx, outgoing, outcome);
    expect(consoleLogs).toHaveLength(2);
    expect(consoleLogs[1].message).toMatch(/^← lengths: ✓ \d+\.\d{2}ms$/);
    expect(consoleLogs[1].data).toMatchObject({ type: "reply", label: "lengths", ok: true, reply: 5 });
  });

  it("omits request values when disabled", () => {
    const middleware = loggingMiddleware<string, number>({ logRequests: false });
    middleware.pre?.(newContext(), { request: "secret" });
    expect(consoleLogs[0].message).toBe("→ send");
    expect(consoleLogs[0].data).not.toHaveProperty("request");
  });

  it("omits reply values when disabled", () => {
    const middleware = loggingMiddleware<string, number>({ logReplies: false });
    const ctx = newContext();
    middleware.pre?.(ctx, { request: "a" });
    middleware.post?.(ctx, { request: "a" }, { ok: true, value: 1 });
    expect(consoleLogs[1].data).toMatchObject({ ok: true });
    expect(consoleLogs[1].data).not.toHaveProperty("reply");
  });

  it("logs send errors by kind", () => {
    const middleware = loggingMiddleware<string, number>();
    const ctx = newContext();
    middleware.pre?.(ctx, { request: "a" });
    middleware.post?.(ctx, { request: "a" }, { ok: false, error: SendError.ignored() });

    expect(consoleLogs[1].message).toMatch(/^← send: ✗/);
    expect(consoleLogs[1].data).toMatchObject({
      ok: false,
      error: { name: "SendError", kind: "ignored" },
    });
  });

  it("logs other errors by name and message", () => {
    const middleware = loggingMiddleware<string, number>();
    const ctx = newContext();
    middleware.pre?.(ctx, { request: "a" });
    middleware.post?.(ctx, { request: "a" }, { ok: false, error: new Error("boom") });

    expect(consoleLogs[1].data).toMatchObject({ error: { name: "Error", message: "boom" } });
  });

  it("skips the reply line for fast sends when minDuration is set", () => {
    const middleware = loggingMiddleware<string, number>({ minDuration: 1000 });
    const ctx = newContext();
    middleware.pre?.(ctx, { request: "a" });
    middleware.post?.(ctx, { request: "a" }, { ok: true, value: 1 });
    expect(consoleLogs).toHaveLength(1);
  });

  it("stays quiet when DEBUG is unset", () => {
    vi.stubEnv("DEBUG", "");
    const middleware = loggingMiddleware<string, number>();
    const ctx = newContext();
    middleware.pre?.(ctx, { request: "a" });
    middleware.post?.(ctx, { request: "a" }, { ok: true, value: 1 });
    expect(consoleLogs).toHaveLength(0);
  });

  it("respects namespace patterns", () => {
    vi.stubEnv("DEBUG", "other:*");
    const middleware = loggingMiddleware<string, number>({ namespace: "parley:send" });
    middleware.pre?.(newContext(), { request: "a" });
    expect(consoleLogs).toHaveLength(0);

    vi.stubEnv("DEBUG", "parley:send");
    middleware.pre?.(newContext(), { request: "a" });
    expect(consoleLogs).toHaveLength(1);
  });

  it("supports exclusion patterns", () => {
    vi.stubEnv("DEBUG", "*,-parley:send");
    const middleware = loggingMiddleware<string, number>();
    middleware.pre?.(newContext(), { request: "a" });
    expect(consoleLogs).toHaveLength(0);
  });

  it("logs real sends through a requester", async () => {
    const [requester, responder] = bounded<string, number>(1);
    const logged = requester.with(loggingMiddleware({ label: "lengths" }));

    const reply = logged.send("hello");
    const received = await responder.recv();
    if (received === null) throw new Error("channel closed");
    received.respond(received.request.length);

    await expect(reply).resolves.toBe(5);
    expect(consoleLogs.map((entry) => entry.message.split(":")[0])).toEqual([
      "→ lengths",
      "← lengths",
    ]);
  });
});
