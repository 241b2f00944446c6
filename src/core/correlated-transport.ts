/**
 * CorrelatedTransport: send messages and await specific replies.
 *
 * Wraps an outbound `transmit` function and an inbound feed (`dispatch`) that
 * offers each message to the pending waits. The owning transport broadcasts
 * the same message to its own subscribers, so a reply that satisfies a wait is
 * still seen by them.
 *
 * `sendAndWait` registers its wait before running the send action, so a reply
 * that arrives while the send is still in flight is never missed.
 */

import { DisposedError } from "../errors.js";
import type { MessageOfType } from "../types/messages.js";
import { type MessagePredicate, PendingWaitRegistry } from "./pending-wait-registry.js";

export type SendAction = () => Promise<void> | void;

export class CorrelatedTransport<TOut, TIn extends { type: string }> {
  private readonly waits = new PendingWaitRegistry<TIn>();
  private disposed = false;

  constructor(
    private readonly transmit: (message: TOut) => Promise<void>,
    private readonly label = "CorrelatedTransport",
  ) {}

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Number of waits still outstanding. */
  get pendingWaitCount(): number {
    return this.waits.size;
  }

  async send(message: TOut): Promise<void> {
    if (this.disposed) throw new DisposedError(this.label);
    await this.transmit(message);
  }

  /**
   * Run `sendAction` and resolve with the first `type` message satisfying
   * `predicate` that arrives within `timeoutMs` of this call. Rejects with
   * WaitTimeoutError on expiry, or with the send action's own error.
   */
  sendAndWait<K extends TIn["type"]>(
    type: K,
    timeoutMs: number,
    sendAction: SendAction,
    predicate?: MessagePredicate<MessageOfType<TIn, K>>,
  ): Promise<MessageOfType<TIn, K>> {
    if (this.disposed) return Promise.reject(new DisposedError(this.label));

    const wait = this.waits.register(type, timeoutMs, predicate);
    try {
      const sent = sendAction();
      if (sent) {
        void sent.catch((error: unknown) => this.waits.reject(wait.id, toError(error)));
      }
    } catch (error) {
      this.waits.reject(wait.id, toError(error));
    }
    return wait.promise;
  }

  /** Send `message` and await the matching reply. */
  request<K extends TIn["type"]>(
    message: TOut,
    replyType: K,
    timeoutMs: number,
    predicate?: MessagePredicate<MessageOfType<TIn, K>>,
  ): Promise<MessageOfType<TIn, K>> {
    return this.sendAndWait(replyType, timeoutMs, () => this.send(message), predicate);
  }

  /** Await a message without sending anything first. */
  waitFor<K extends TIn["type"]>(
    type: K,
    timeoutMs: number,
    predicate?: MessagePredicate<MessageOfType<TIn, K>>,
  ): Promise<MessageOfType<TIn, K>> {
    return this.sendAndWait(type, timeoutMs, () => {}, predicate);
  }

  /**
   * Offer an inbound message to the pending waits. Runs synchronously.
   * Returns true when a wait took it.
   */
  dispatch(message: TIn): boolean {
    if (this.disposed) return false;
    return this.waits.dispatch(message);
  }

  /** Reject outstanding waits. Idempotent. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.waits.rejectAll(new DisposedError(this.label));
  }
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
