/**
 * AsyncLazy: a value created on first use by an async factory.
 *
 * Concurrent callers share one in-flight creation. A failed creation is not
 * cached: the next `get()` starts over. Disposal waits for an in-flight
 * creation to settle and then releases whatever it produced.
 */

import { DisposedError } from "../errors.js";

export class AsyncLazy<T> {
  private pending: Promise<T> | null = null;
  private disposed = false;

  constructor(
    private readonly factory: () => Promise<T>,
    private readonly label = "AsyncLazy",
  ) {}

  /** True once a creation has been started and has not failed. */
  get isStarted(): boolean {
    return this.pending !== null;
  }

  get(): Promise<T> {
    if (this.disposed) return Promise.reject(new DisposedError(this.label));
    if (this.pending) return this.pending;

    const creation: Promise<T> = Promise.resolve()
      .then(() => this.factory())
      .catch((err: unknown) => {
        if (this.pending === creation) this.pending = null;
        throw err;
      });
    this.pending = creation;
    return creation;
  }

  /**
   * Release the value if one was ever created. Never starts the factory.
   * A creation that failed has nothing to release.
   */
  async dispose(release: (value: T) => void | Promise<void>): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    const pending = this.pending;
    this.pending = null;
    if (!pending) return;

    let value: T;
    try {
      value = await pending;
    } catch {
      return;
    }
    await release(value);
  }
}
