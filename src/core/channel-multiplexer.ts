/**
 * ChannelMultiplexer: opens logical channels over a session.
 *
 * A start-channel request carries a locally allocated request id; the reply is
 * matched on that id alone, since the channel id is unknown until the console
 * answers. Request ids start at 1 and are never reused, so concurrent opens
 * cannot pick up each other's responses. No retry: a timeout or a non-zero
 * result fails that open only.
 *
 * @module SessionControl
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { ChannelOpenError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import type { ServiceType } from "../types/messages.js";
import { ChannelMessageTransport } from "./channel-message-transport.js";
import type { SessionMessageTransport } from "./session-message-transport.js";

export interface ChannelMultiplexerOptions {
  channelOpenTimeoutMs?: number;
  logger?: Logger;
}

export class ChannelMultiplexer {
  private nextRequestId = 1;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly session: SessionMessageTransport,
    options: ChannelMultiplexerOptions = {},
  ) {
    this.timeoutMs = options.channelOpenTimeoutMs ?? DEFAULT_CONFIG.channelOpenTimeoutMs;
    this.logger = options.logger ?? noopLogger;
  }

  async openChannel(serviceType: ServiceType, titleId = 0): Promise<ChannelMessageTransport> {
    const channelRequestId = this.nextRequestId++;

    const response = await this.session.request(
      { type: "start_channel_request", channelRequestId, serviceType, titleId },
      "start_channel_response",
      this.timeoutMs,
      (m) => m.channelRequestId === channelRequestId,
    );

    if (response.result !== 0) {
      throw new ChannelOpenError(response.result);
    }

    this.logger.debug?.(`Opened channel ${response.channelId}`, {
      channelRequestId,
      serviceType,
      titleId,
    });
    return new ChannelMessageTransport(response.channelId, this.session);
  }
}
