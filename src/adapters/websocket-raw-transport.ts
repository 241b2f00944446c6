/**
 * WebSocketRawTransport: RawTransport over a WebSocket to a protocol bridge.
 *
 * The bridge owns the console's UDP framing; this side speaks one JSON text
 * frame per message (see json-codec). Given a crypto context, session
 * payloads are encrypted on the way out and decrypted on the way in (see
 * session-sealing); without one they travel in the clear and the bridge
 * encrypts. Inbound frames are validated against `inboundMessageSchema`;
 * frames that fail are logged and dropped so the session keeps reading.
 *
 * The socket starts opening on construction. Sends wait for it to open, which
 * lets the synchronous RawTransportFactory contract hand out a transport
 * before the connection is up.
 */

import WebSocket from "ws";
import { ConsoleLinkError, errorMessage, MessageValidationError } from "../errors.js";
import type { CryptoContext } from "../interfaces/crypto-context.js";
import type { Logger } from "../interfaces/logger.js";
import type { RawTransport, RawTransportFactory } from "../interfaces/raw-transport.js";
import { inboundMessageSchema } from "../types/message-schema.js";
import type { TransportMessage } from "../types/messages.js";
import { decodeFrame, encodeFrame } from "../utils/json-codec.js";
import { openFrame, sealMessage } from "../utils/session-sealing.js";
import { noopLogger } from "./noop-logger.js";

export interface WebSocketRawTransportOptions {
  logger?: Logger;
  /** How long to wait for the socket to open. Default: 5000ms. */
  openTimeoutMs?: number;
  /** Encrypts session payloads. */
  crypto?: CryptoContext;
}

const DEFAULT_OPEN_TIMEOUT_MS = 5000;

export class WebSocketRawTransport implements RawTransport {
  /** Open a socket to `url`; resolves once it is ready to send. */
  static async connect(
    url: string,
    options: WebSocketRawTransportOptions = {},
  ): Promise<WebSocketRawTransport> {
    const transport = new WebSocketRawTransport(url, options);
    await transport.opened;
    return transport;
  }

  private readonly ws: WebSocket;
  private readonly opened: Promise<void>;
  private readonly logger: Logger;
  private readonly crypto: CryptoContext | undefined;
  private readonly listeners = new Set<(message: TransportMessage) => void>();

  constructor(
    readonly url: string,
    options: WebSocketRawTransportOptions = {},
  ) {
    this.logger = options.logger ?? noopLogger;
    this.crypto = options.crypto;
    this.ws = new WebSocket(url, { perMessageDeflate: false });
    this.opened = this.waitForOpen(options.openTimeoutMs ?? DEFAULT_OPEN_TIMEOUT_MS);
    // Callers observe open failures through send(); this only records them.
    void this.opened.catch((err: unknown) => {
      this.logger.debug?.(`WebSocket to ${url} did not open`, { error: errorMessage(err) });
    });

    this.ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) {
        this.logger.warn("Dropped binary frame");
        return;
      }
      this.handleFrame(data.toString());
    });
    this.ws.on("close", (code: number) => {
      this.logger.debug?.("WebSocket closed", { code });
      this.listeners.clear();
    });
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  async send(message: TransportMessage): Promise<void> {
    await this.opened;
    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new ConsoleLinkError("WebSocket is not open", "TRANSPORT_CLOSED");
    }
    const frame = encodeFrame(this.crypto ? sealMessage(message, this.crypto) : message);
    await new Promise<void>((resolve, reject) => {
      this.ws.send(frame, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  onMessage(listener: (message: TransportMessage) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.ws.once("close", () => resolve());
      if (this.ws.readyState === WebSocket.CONNECTING) {
        this.ws.terminate();
      } else if (this.ws.readyState === WebSocket.OPEN) {
        this.ws.close(1000);
      }
    });
  }

  private waitForOpen(timeoutMs: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        cleanup();
        this.ws.terminate();
        reject(new ConsoleLinkError(`Timed out opening ${this.url}`, "TRANSPORT_OPEN_TIMEOUT"));
      }, timeoutMs);

      const onOpen = () => {
        cleanup();
        resolve();
      };

      const onError = (err: Error) => {
        cleanup();
        reject(
          new ConsoleLinkError(`Failed to open ${this.url}`, "TRANSPORT_OPEN_FAILED", {
            cause: err,
          }),
        );
      };

      const onClose = () => {
        cleanup();
        reject(new ConsoleLinkError(`Closed before opening ${this.url}`, "TRANSPORT_CLOSED"));
      };

      const cleanup = () => {
        clearTimeout(timer);
        this.ws.removeListener("open", onOpen);
        this.ws.removeListener("error", onError);
        this.ws.removeListener("close", onClose);
        this.ws.on("error", this.onSocketError);
      };

      this.ws.on("open", onOpen);
      this.ws.on("error", onError);
      this.ws.on("close", onClose);
    });
  }

  private readonly onSocketError = (err: Error): void => {
    this.logger.warn("WebSocket error", { error: errorMessage(err) });
  };

  private handleFrame(text: string): void {
    let message: TransportMessage;
    try {
      const decoded = decodeFrame(text);
      const frame = this.crypto ? openFrame(decoded, this.crypto) : decoded;
      const parsed = inboundMessageSchema.safeParse(frame);
      if (!parsed.success) {
        throw new MessageValidationError(`Invalid message: ${parsed.error.message}`);
      }
      message = parsed.data;
    } catch (err) {
      this.logger.warn("Dropped invalid frame", { error: errorMessage(err) });
      return;
    }

    for (const listener of [...this.listeners]) {
      listener(message);
    }
  }
}

/**
 * RawTransportFactory that opens one bridge socket per transport, encrypting
 * session payloads with the console's crypto context. `urlFor` maps the
 * discovered console address to the bridge endpoint.
 */
export function createWebSocketTransportFactory(
  urlFor: (address: string) => string,
  options: Omit<WebSocketRawTransportOptions, "crypto"> = {},
): RawTransportFactory {
  return (address, crypto) => new WebSocketRawTransport(urlFor(address), { ...options, crypto });
}
