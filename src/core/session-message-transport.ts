/**
 * SessionMessageTransport: the established session over one raw transport.
 *
 * Outbound session messages are wrapped in `session` packets stamped with the
 * participant id and a channel id. Inbound packets are unwrapped and fanned out
 * synchronously, in arrival order. Core-channel packets are offered to the
 * session-level waits first; every packet is then emitted as `packet` (with
 * its channel id) and `message`. Console status and disconnect notifications
 * are interpreted on the same path.
 *
 * Announces itself with a local join on construction. The join is
 * fire-and-forget: a lost join only shows up as later timeouts.
 *
 * @module SessionControl
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { DisposedError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { RawTransport } from "../interfaces/raw-transport.js";
import {
  CORE_CHANNEL_ID,
  type ConsoleStatus,
  type DisconnectMessage,
  type MessageOfType,
  type SessionMessage,
  type TransportMessage,
} from "../types/messages.js";
import { CorrelatedTransport, type SendAction } from "./correlated-transport.js";
import type { MessagePredicate } from "./pending-wait-registry.js";
import { TypedEventEmitter } from "./typed-emitter.js";

/** Identity of an established session. */
export interface SessionInfo {
  /** Assigned by the console during the handshake. */
  participantId: number;
  /** Generated locally for this connection. */
  deviceId: string;
}

export interface SessionPacketEvent {
  channelId: number;
  message: SessionMessage;
}

export interface SessionTransportEvents {
  packet: SessionPacketEvent;
  message: SessionMessage;
  consoleStatusChanged: ConsoleStatus;
  disconnected: DisconnectMessage;
  disposed: SessionInfo;
}

export interface SessionMessageTransportOptions {
  logger?: Logger;
}

export class SessionMessageTransport extends TypedEventEmitter<SessionTransportEvents> {
  private readonly correlator: CorrelatedTransport<SessionMessage, SessionMessage>;
  private readonly unsubscribe: () => void;
  private readonly logger: Logger;
  private latestStatus: ConsoleStatus | null = null;
  private disposed = false;

  constructor(
    private readonly transport: RawTransport,
    readonly info: SessionInfo,
    options: SessionMessageTransportOptions = {},
  ) {
    super();
    this.logger = options.logger ?? noopLogger;
    this.correlator = new CorrelatedTransport<SessionMessage, SessionMessage>(
      (message) => this.send(message),
      "SessionMessageTransport",
    );
    this.unsubscribe = transport.onMessage((message) => this.handleTransportMessage(message));

    void this.send({ type: "local_join" }).catch((error: unknown) => {
      this.logger.debug?.("Local join announcement failed", { error });
    });
  }

  /** Latest console status snapshot, or null before the first status message. */
  get consoleStatus(): ConsoleStatus | null {
    return this.latestStatus;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  async send(message: SessionMessage, channelId = CORE_CHANNEL_ID): Promise<void> {
    if (this.disposed) throw new DisposedError("SessionMessageTransport");
    await this.transport.send({
      type: "session",
      participantId: this.info.participantId,
      channelId,
      payload: message,
    });
  }

  sendAndWait<K extends SessionMessage["type"]>(
    type: K,
    timeoutMs: number,
    sendAction: SendAction,
    predicate?: MessagePredicate<MessageOfType<SessionMessage, K>>,
  ): Promise<MessageOfType<SessionMessage, K>> {
    return this.correlator.sendAndWait(type, timeoutMs, sendAction, predicate);
  }

  /** Send `message` on the core channel and await the matching reply. */
  request<K extends SessionMessage["type"]>(
    message: SessionMessage,
    replyType: K,
    timeoutMs: number,
    predicate?: MessagePredicate<MessageOfType<SessionMessage, K>>,
  ): Promise<MessageOfType<SessionMessage, K>> {
    return this.correlator.request(message, replyType, timeoutMs, predicate);
  }

  waitFor<K extends SessionMessage["type"]>(
    type: K,
    timeoutMs: number,
    predicate?: MessagePredicate<MessageOfType<SessionMessage, K>>,
  ): Promise<MessageOfType<SessionMessage, K>> {
    return this.correlator.waitFor(type, timeoutMs, predicate);
  }

  /**
   * Detach from the raw transport and reject outstanding waits. Channels
   * layered on this session are told through the `disposed` event. The raw
   * transport itself stays open; its owner closes it. No message is sent.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.unsubscribe();
    this.correlator.dispose();
    this.emit("disposed", this.info);
    this.removeAllListeners();
  }

  private handleTransportMessage(message: TransportMessage): void {
    if (this.disposed || message.type !== "session") return;

    const payload = message.payload;
    if (message.channelId === CORE_CHANNEL_ID) this.correlator.dispatch(payload);
    this.emit("packet", { channelId: message.channelId, message: payload });
    this.emit("message", payload);

    switch (payload.type) {
      case "console_status":
        this.latestStatus = {
          configuration: payload.configuration,
          activeTitles: payload.activeTitles,
        };
        this.emit("consoleStatusChanged", this.latestStatus);
        break;
      case "disconnect":
        this.logger.info("Console ended the session", {
          reason: payload.reason,
          errorCode: payload.errorCode,
        });
        this.emit("disconnected", payload);
        break;
    }
  }
}
