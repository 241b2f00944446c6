import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { withRetries } from "./retry.js";

class Transient extends Error {}

/** An attempt that fails with Transient after `ms`, like an unanswered request. */
function failAfter(ms: number, message: string): Promise<never> {
  return new Promise((_, reject) => setTimeout(() => reject(new Transient(message)), ms));
}

describe("withRetries", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the first successful result without scheduling another attempt", async () => {
    const operation = vi.fn(async () => "ok");

    await expect(withRetries(operation, [500, 500])).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(operation).toHaveBeenCalledWith(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("starts each attempt one schedule entry after the previous one started", async () => {
    const start = Date.now();
    const startedAt: number[] = [];
    const operation = vi.fn(async (attempt: number) => {
      startedAt.push(Date.now() - start);
      if (attempt < 4) return failAfter(1000, `attempt ${attempt}`);
      return attempt;
    });

    const result = withRetries(operation, [500, 500, 1500, 5000]);
    await vi.advanceTimersByTimeAsync(2500);

    await expect(result).resolves.toBe(4);
    expect(startedAt).toEqual([0, 500, 1000, 2500]);
  });

  it("keeps earlier attempts in flight and takes whichever succeeds first", async () => {
    const operation = vi.fn((attempt: number) =>
      attempt === 1
        ? new Promise<string>((resolve) => setTimeout(() => resolve("first"), 800))
        : new Promise<string>(() => {}),
    );

    const result = withRetries(operation, [500, 500]);
    await vi.advanceTimersByTimeAsync(800);

    await expect(result).resolves.toBe("first");
    expect(operation).toHaveBeenCalledTimes(2);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("waits for the schedule even when an attempt fails early", async () => {
    const operation = vi.fn(async (attempt: number) => {
      if (attempt === 1) throw new Transient("refused");
      return "second";
    });

    const result = withRetries(operation, [250]);
    await vi.advanceTimersByTimeAsync(249);
    expect(operation).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);

    await expect(result).resolves.toBe("second");
  });

  it("rethrows the last failure once every attempt has failed", async () => {
    let calls = 0;
    const operation = () => {
      calls++;
      return failAfter(100, `attempt ${calls}`);
    };

    const result = withRetries(operation, [10, 20]).catch((error: unknown) => error);
    await vi.advanceTimersByTimeAsync(129);
    expect(calls).toBe(3);
    await vi.advanceTimersByTimeAsync(1);

    const error = await result;
    expect(error).toBeInstanceOf(Transient);
    expect(error).toMatchObject({ message: "attempt 3" });
  });

  it("runs exactly once with an empty schedule", async () => {
    const operation = vi.fn(async () => {
      throw new Transient("only");
    });

    await expect(withRetries(operation, [])).rejects.toThrow("only");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("propagates failures rejected by shouldRetry immediately", async () => {
    const operation = vi.fn(async () => {
      throw new Error("fatal");
    });

    await expect(
      withRetries(operation, [500], { shouldRetry: (error) => error instanceof Transient }),
    ).rejects.toThrow("fatal");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("abandons attempts still in flight when a later one fails fatally", async () => {
    const operation = vi.fn((attempt: number) =>
      attempt === 1 ? new Promise<string>(() => {}) : Promise.reject(new Error("fatal")),
    );

    const result = withRetries(operation, [100, 100], {
      shouldRetry: (error) => error instanceof Transient,
    }).catch((error: unknown) => error);
    await vi.advanceTimersByTimeAsync(100);

    expect(await result).toMatchObject({ message: "fatal" });
    await vi.advanceTimersByTimeAsync(1000);
    expect(operation).toHaveBeenCalledTimes(2);
  });
});
