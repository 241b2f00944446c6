import type { RawTransport } from "../interfaces/raw-transport.js";
import type { TransportMessage } from "../types/messages.js";

/**
 * In-process RawTransport. Records everything sent and lets a test (or a
 * simulated console) deliver inbound messages.
 */
export class MemoryTransport implements RawTransport {
  readonly sent: TransportMessage[] = [];
  private readonly listeners = new Set<(message: TransportMessage) => void>();
  private closed = false;
  private sendFailure: Error | null = null;

  constructor(private readonly onSend?: (message: TransportMessage) => void) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  /** Make every following send reject with `error`. */
  failSends(error: Error): void {
    this.sendFailure = error;
  }

  async send(message: TransportMessage): Promise<void> {
    if (this.closed) throw new Error("Transport is closed");
    if (this.sendFailure) throw this.sendFailure;
    this.sent.push(message);
    this.onSend?.(message);
  }

  onMessage(listener: (message: TransportMessage) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Deliver an inbound message to every subscriber. Ignored once closed. */
  deliver(message: TransportMessage): void {
    if (this.closed) return;
    for (const listener of [...this.listeners]) {
      listener(message);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.listeners.clear();
  }
}
