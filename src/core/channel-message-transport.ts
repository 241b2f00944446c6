/**
 * ChannelMessageTransport: a logical channel inside an established session.
 *
 * Shares the session's raw transport: outbound messages carry this channel's
 * id, and only inbound packets with the same id reach this channel's
 * subscribers and waits. Disposing detaches from the session without telling
 * the console; there is no channel close message.
 */

import { DisposedError } from "../errors.js";
import type { MessageOfType, SessionMessage } from "../types/messages.js";
import { CorrelatedTransport, type SendAction } from "./correlated-transport.js";
import type { MessagePredicate } from "./pending-wait-registry.js";
import type { SessionMessageTransport, SessionPacketEvent } from "./session-message-transport.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export interface ChannelTransportEvents {
  message: SessionMessage;
}

export class ChannelMessageTransport extends TypedEventEmitter<ChannelTransportEvents> {
  private readonly correlator: CorrelatedTransport<SessionMessage, SessionMessage>;
  private disposed = false;

  constructor(
    readonly channelId: number,
    private readonly session: SessionMessageTransport,
  ) {
    super();
    this.correlator = new CorrelatedTransport<SessionMessage, SessionMessage>(
      (message) => this.send(message),
      `Channel ${channelId}`,
    );
    session.on("packet", this.onPacket);
    session.on("disposed", this.onSessionDisposed);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  async send(message: SessionMessage): Promise<void> {
    if (this.disposed) throw new DisposedError(`Channel ${this.channelId}`);
    await this.session.send(message, this.channelId);
  }

  sendAndWait<K extends SessionMessage["type"]>(
    type: K,
    timeoutMs: number,
    sendAction: SendAction,
    predicate?: MessagePredicate<MessageOfType<SessionMessage, K>>,
  ): Promise<MessageOfType<SessionMessage, K>> {
    return this.correlator.sendAndWait(type, timeoutMs, sendAction, predicate);
  }

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

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.session.off("packet", this.onPacket);
    this.session.off("disposed", this.onSessionDisposed);
    this.correlator.dispose();
    this.removeAllListeners();
  }

  private readonly onPacket = (event: SessionPacketEvent): void => {
    if (event.channelId !== this.channelId) return;
    this.emit("message", event.message);
    this.correlator.dispatch(event.message);
  };

  private readonly onSessionDisposed = (): void => {
    this.dispose();
  };
}
