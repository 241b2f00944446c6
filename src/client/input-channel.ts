import type { ChannelMessageTransport } from "../core/channel-message-transport.js";
import type { GamepadState } from "../types/messages.js";

/** Controller input over a `SystemInput` channel. */
export class InputChannel {
  constructor(
    private readonly transport: ChannelMessageTransport,
    private readonly now: () => number = () => Date.now(),
  ) {}

  get channelId(): number {
    return this.transport.channelId;
  }

  get isDisposed(): boolean {
    return this.transport.isDisposed;
  }

  sendGamepadState(state: GamepadState): Promise<void> {
    return this.transport.send({ type: "gamepad", timestamp: this.now(), ...state });
  }

  dispose(): void {
    this.transport.dispose();
  }
}
