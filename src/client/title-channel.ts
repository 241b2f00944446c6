import type { ChannelMessageTransport } from "../core/channel-message-transport.js";
import type { AuxiliaryStreamMessage, SessionMessage } from "../types/messages.js";

/** A channel bound to one running title. */
export class TitleChannel {
  constructor(
    private readonly transport: ChannelMessageTransport,
    /** The auxiliary-stream hello received while opening, or null if none arrived in time. */
    readonly auxiliaryHello: AuxiliaryStreamMessage | null,
  ) {}

  get channelId(): number {
    return this.transport.channelId;
  }

  get isDisposed(): boolean {
    return this.transport.isDisposed;
  }

  send(message: SessionMessage): Promise<void> {
    return this.transport.send(message);
  }

  /** Subscribe to messages on this channel; returns an unsubscribe function. */
  onMessage(listener: (message: SessionMessage) => void): () => void {
    this.transport.on("message", listener);
    return () => this.transport.off("message", listener);
  }

  dispose(): void {
    this.transport.dispose();
  }
}
