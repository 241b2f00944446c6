/**
 * PendingWaitRegistry: outstanding "wait for a reply" records.
 *
 * Each wait has a message type selector, an optional content predicate and a
 * deadline measured from registration. Inbound messages are offered to the
 * live waits in registration order; the first wait that matches consumes the
 * message, so one message fulfils at most one wait. Expired waits are removed
 * by their own timer and reject with WaitTimeoutError.
 */

import { WaitTimeoutError } from "../errors.js";
import type { MessageOfType } from "../types/messages.js";

export type MessagePredicate<T> = (message: T) => boolean;

export interface RegisteredWait<T> {
  readonly id: number;
  readonly promise: Promise<T>;
}

interface PendingWait<T> {
  /** Returns true when the message was consumed by this wait. */
  offer(message: T): boolean;
  reject(error: Error): void;
}

function isOfType<T extends { type: string }, K extends T["type"]>(
  message: T,
  type: K,
): message is MessageOfType<T, K> {
  return message.type === type;
}

export class PendingWaitRegistry<T extends { type: string }> {
  private nextWaitId = 1;
  private readonly waits = new Map<number, PendingWait<T>>();

  get size(): number {
    return this.waits.size;
  }

  register<K extends T["type"]>(
    type: K,
    timeoutMs: number,
    predicate?: MessagePredicate<MessageOfType<T, K>>,
  ): RegisteredWait<MessageOfType<T, K>> {
    const id = this.nextWaitId++;

    const promise = new Promise<MessageOfType<T, K>>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waits.delete(id);
        reject(new WaitTimeoutError(type, timeoutMs));
      }, timeoutMs);

      const settle = () => {
        clearTimeout(timer);
        this.waits.delete(id);
      };

      this.waits.set(id, {
        offer: (message) => {
          if (!isOfType(message, type)) return false;

          let matched: boolean;
          try {
            matched = predicate ? predicate(message) : true;
          } catch (error) {
            settle();
            reject(error instanceof Error ? error : new Error(String(error)));
            return false;
          }

          if (!matched) return false;
          settle();
          resolve(message);
          return true;
        },
        reject: (error) => {
          settle();
          reject(error);
        },
      });
    });

    return { id, promise };
  }

  /** Offer an inbound message to the live waits. Returns true if one consumed it. */
  dispatch(message: T): boolean {
    for (const wait of this.waits.values()) {
      if (wait.offer(message)) return true;
    }
    return false;
  }

  /** Reject a single wait. No-op when it has already settled. */
  reject(id: number, error: Error): void {
    this.waits.get(id)?.reject(error);
  }

  /** Reject every outstanding wait, e.g. when the owning transport is disposed. */
  rejectAll(error: Error): void {
    for (const wait of [...this.waits.values()]) {
      wait.reject(error);
    }
  }
}
