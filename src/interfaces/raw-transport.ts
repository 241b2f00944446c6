import type { TransportMessage } from "../types/messages.js";
import type { CryptoContext } from "./crypto-context.js";

/**
 * Physical transport to a console. Accepts pre-built message objects and
 * delivers decoded inbound messages; framing and encryption live behind it.
 */
export interface RawTransport {
  send(message: TransportMessage): Promise<void>;
  /** Subscribe to decoded inbound messages. Returns an unsubscribe function. */
  onMessage(listener: (message: TransportMessage) => void): () => void;
  close(): Promise<void>;
}

/** Opens a transport to `address` that encrypts with `crypto`. */
export type RawTransportFactory = (address: string, crypto: CryptoContext) => RawTransport;
