import { describe, expect, it, vi } from "vitest";
import { DisposedError } from "../errors.js";
import { AsyncLazy } from "./async-lazy.js";

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("AsyncLazy", () => {
  it("does not run the factory until first use", () => {
    const factory = vi.fn(async () => "value");
    const lazy = new AsyncLazy(factory);

    expect(factory).not.toHaveBeenCalled();
    expect(lazy.isStarted).toBe(false);
  });

  it("shares one creation between concurrent callers", async () => {
    const gate = deferred<{ id: number }>();
    const factory = vi.fn(() => gate.promise);
    const lazy = new AsyncLazy(factory);

    const callers = Array.from({ length: 5 }, () => lazy.get());
    gate.resolve({ id: 1 });
    const values = await Promise.all(callers);

    expect(factory).toHaveBeenCalledTimes(1);
    expect(new Set(values).size).toBe(1);
    expect(await lazy.get()).toBe(values[0]);
  });

  it("retries after a failed creation", async () => {
    const factory = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("open failed"))
      .mockResolvedValueOnce("second");
    const lazy = new AsyncLazy(factory);

    await expect(lazy.get()).rejects.toThrow("open failed");
    expect(lazy.isStarted).toBe(false);
    await expect(lazy.get()).resolves.toBe("second");
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it("does not cache a factory that throws synchronously", async () => {
    let calls = 0;
    const lazy = new AsyncLazy<number>(() => {
      calls++;
      if (calls === 1) throw new Error("sync failure");
      return Promise.resolve(calls);
    });

    await expect(lazy.get()).rejects.toThrow("sync failure");
    await expect(lazy.get()).resolves.toBe(2);
  });

  describe("dispose", () => {
    it("never starts the factory", async () => {
      const factory = vi.fn(async () => "value");
      const release = vi.fn();
      const lazy = new AsyncLazy(factory);

      await lazy.dispose(release);

      expect(factory).not.toHaveBeenCalled();
      expect(release).not.toHaveBeenCalled();
    });

    it("releases a created value once", async () => {
      const lazy = new AsyncLazy(async () => "value");
      const release = vi.fn();
      await lazy.get();

      await lazy.dispose(release);
      await lazy.dispose(release);

      expect(release).toHaveBeenCalledTimes(1);
      expect(release).toHaveBeenCalledWith("value");
    });

    it("waits for an in-flight creation before releasing it", async () => {
      const gate = deferred<string>();
      const lazy = new AsyncLazy(() => gate.promise);
      const release = vi.fn();
      const inFlight = lazy.get();

      const disposing = lazy.dispose(release);
      expect(release).not.toHaveBeenCalled();
      gate.resolve("late");
      await disposing;

      expect(release).toHaveBeenCalledWith("late");
      await expect(inFlight).resolves.toBe("late");
    });

    it("has nothing to release when the in-flight creation fails", async () => {
      const gate = deferred<string>();
      const lazy = new AsyncLazy(() => gate.promise);
      const release = vi.fn();
      const inFlight = lazy.get().catch((e: unknown) => e);

      const disposing = lazy.dispose(release);
      gate.reject(new Error("open failed"));

      await expect(disposing).resolves.toBeUndefined();
      expect(release).not.toHaveBeenCalled();
      expect(await inFlight).toBeInstanceOf(Error);
    });

    it("propagates a release failure", async () => {
      const lazy = new AsyncLazy(async () => "value");
      await lazy.get();

      await expect(
        lazy.dispose(() => {
          throw new Error("release failed");
        }),
      ).rejects.toThrow("release failed");
    });

    it("rejects get() afterwards", async () => {
      const lazy = new AsyncLazy(async () => "value", "Input channel");

      await lazy.dispose(() => {});

      await expect(lazy.get()).rejects.toThrow(new DisposedError("Input channel").message);
    });
  });
});
