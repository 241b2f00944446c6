import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WaitTimeoutError } from "../errors.js";
import { PendingWaitRegistry } from "./pending-wait-registry.js";

type TestMessage =
  | { type: "reply"; requestId: number; value: string }
  | { type: "status"; text: string };

describe("PendingWaitRegistry", () => {
  let registry: PendingWaitRegistry<TestMessage>;

  beforeEach(() => {
    vi.useFakeTimers();
    registry = new PendingWaitRegistry<TestMessage>();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves a wait with the first message of its type", async () => {
    const wait = registry.register("status", 1000);

    expect(registry.dispatch({ type: "status", text: "ready" })).toBe(true);

    await expect(wait.promise).resolves.toEqual({ type: "status", text: "ready" });
    expect(registry.size).toBe(0);
  });

  it("ignores messages of other types", () => {
    registry.register("reply", 1000);

    expect(registry.dispatch({ type: "status", text: "ready" })).toBe(false);
    expect(registry.size).toBe(1);
  });

  it("applies the content predicate", async () => {
    const wait = registry.register("reply", 1000, (m) => m.requestId === 2);

    expect(registry.dispatch({ type: "reply", requestId: 1, value: "a" })).toBe(false);
    expect(registry.dispatch({ type: "reply", requestId: 2, value: "b" })).toBe(true);

    await expect(wait.promise).resolves.toMatchObject({ requestId: 2, value: "b" });
  });

  it("fulfils only one wait per message, first registered wins", async () => {
    const first = registry.register("status", 1000);
    const second = registry.register("status", 1000);

    registry.dispatch({ type: "status", text: "one" });
    registry.dispatch({ type: "status", text: "two" });

    await expect(first.promise).resolves.toEqual({ type: "status", text: "one" });
    await expect(second.promise).resolves.toEqual({ type: "status", text: "two" });
  });

  it("rejects with WaitTimeoutError once the deadline passes", async () => {
    const wait = registry.register("reply", 1000);
    const outcome = wait.promise.catch((error: unknown) => error);

    await vi.advanceTimersByTimeAsync(999);
    expect(registry.size).toBe(1);

    await vi.advanceTimersByTimeAsync(1);
    const error = await outcome;
    expect(error).toBeInstanceOf(WaitTimeoutError);
    expect(error).toMatchObject({ messageType: "reply", timeoutMs: 1000 });
    expect(registry.size).toBe(0);
  });

  it("does not match messages after the wait has expired", async () => {
    const wait = registry.register("status", 100);
    const outcome = wait.promise.catch((error: unknown) => error);

    await vi.advanceTimersByTimeAsync(100);

    expect(registry.dispatch({ type: "status", text: "late" })).toBe(false);
    expect(await outcome).toBeInstanceOf(WaitTimeoutError);
  });

  it("a timeout affects only its own wait", async () => {
    const short = registry.register("status", 100);
    const long = registry.register("status", 5000);
    const shortOutcome = short.promise.catch((error: unknown) => error);

    await vi.advanceTimersByTimeAsync(100);
    registry.dispatch({ type: "status", text: "still listening" });

    expect(await shortOutcome).toBeInstanceOf(WaitTimeoutError);
    await expect(long.promise).resolves.toEqual({ type: "status", text: "still listening" });
  });

  it("a throwing predicate rejects only its own wait", async () => {
    const broken = registry.register("status", 1000, () => {
      throw new Error("bad predicate");
    });
    const healthy = registry.register("status", 1000);

    expect(registry.dispatch({ type: "status", text: "x" })).toBe(true);

    await expect(broken.promise).rejects.toThrow("bad predicate");
    await expect(healthy.promise).resolves.toEqual({ type: "status", text: "x" });
  });

  it("reject settles a single wait and ignores settled ids", async () => {
    const wait = registry.register("status", 1000);

    registry.reject(wait.id, new Error("send failed"));
    registry.reject(wait.id, new Error("again"));

    await expect(wait.promise).rejects.toThrow("send failed");
    expect(registry.size).toBe(0);
  });

  it("rejectAll settles every outstanding wait and clears their timers", async () => {
    const a = registry.register("status", 1000);
    const b = registry.register("reply", 1000);

    registry.rejectAll(new Error("disposed"));

    await expect(a.promise).rejects.toThrow("disposed");
    await expect(b.promise).rejects.toThrow("disposed");
    expect(registry.size).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });
});
