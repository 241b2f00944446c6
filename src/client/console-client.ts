/**
 * ConsoleClient: the public entry point.
 *
 * `ConsoleClient.connect()` runs discovery and the handshake, then layers a
 * session over a fresh raw transport. The client forwards console status and
 * disconnect notifications, sends the fire-and-forget commands, and opens
 * channels on demand. The input channel is created at most once, on first use.
 *
 * @module ClientFacade
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { AsyncLazy } from "../core/async-lazy.js";
import type { ChannelMessageTransport } from "../core/channel-message-transport.js";
import { ChannelMultiplexer } from "../core/channel-multiplexer.js";
import { type Credentials, ConnectionEstablisher } from "../core/connection-establisher.js";
import { type ReleaseFailure, releaseInOrder } from "../core/release-chain.js";
import { SessionMessageTransport } from "../core/session-message-transport.js";
import { TypedEventEmitter } from "../core/typed-emitter.js";
import { WaitTimeoutError } from "../errors.js";
import type { CryptoContextFactory } from "../interfaces/crypto-context.js";
import type { Device, DeviceLocator } from "../interfaces/discovery.js";
import type { Logger } from "../interfaces/logger.js";
import type { RawTransport, RawTransportFactory } from "../interfaces/raw-transport.js";
import { type ClientConfig, type ResolvedConfig, resolveConfig } from "../types/config.js";
import {
  ActiveTitleLocation,
  type AuxiliaryStreamMessage,
  type ConsoleStatus,
  type DisconnectMessage,
  type PairingState,
  ServiceType,
} from "../types/messages.js";
import { componentLogger } from "../utils/component-logger.js";
import { InputChannel } from "./input-channel.js";
import { TitleChannel } from "./title-channel.js";
import { buildTitleUri } from "./title-uri.js";

export interface ConsoleClientEvents {
  consoleStatusChanged: ConsoleStatus;
  disconnected: DisconnectMessage;
}

export interface ConsoleClientOptions {
  locator: DeviceLocator;
  createCryptoContext: CryptoContextFactory;
  createTransport: RawTransportFactory;
  credentials?: Credentials;
  config?: ClientConfig;
  logger?: Logger;
  /** Override the per-connection device id (a random UUID by default). */
  generateDeviceId?: () => string;
}

interface ConsoleClientParts {
  device: Device;
  pairingState: PairingState;
  transport: RawTransport;
  session: SessionMessageTransport;
  config: ResolvedConfig;
  logger: Logger;
}

export class ConsoleClient extends TypedEventEmitter<ConsoleClientEvents> {
  /** Discover the console at `addressOrHostname` and establish a session with it. */
  static async connect(
    addressOrHostname: string,
    options: ConsoleClientOptions,
  ): Promise<ConsoleClient> {
    const config = resolveConfig(options.config);
    const logger = options.logger ?? noopLogger;

    const establisher = new ConnectionEstablisher({
      locator: options.locator,
      createCryptoContext: options.createCryptoContext,
      createTransport: options.createTransport,
      config,
      logger: componentLogger(logger, "connection-establisher"),
      generateDeviceId: options.generateDeviceId,
    });
    const established = await establisher.connect(addressOrHostname, options.credentials);

    const transport = options.createTransport(established.device.address, established.crypto);
    const session = new SessionMessageTransport(
      transport,
      { participantId: established.participantId, deviceId: established.deviceId },
      { logger: componentLogger(logger, "session-transport") },
    );

    return new ConsoleClient({
      device: established.device,
      pairingState: established.pairingState,
      transport,
      session,
      config,
      logger,
    });
  }

  readonly device: Device;
  readonly pairingState: PairingState;

  private readonly transport: RawTransport;
  private readonly session: SessionMessageTransport;
  private readonly multiplexer: ChannelMultiplexer;
  private readonly inputChannel: AsyncLazy<InputChannel>;
  private readonly config: ResolvedConfig;
  private readonly logger: Logger;
  private disposal: Promise<ReleaseFailure[]> | null = null;

  private constructor(parts: ConsoleClientParts) {
    super();
    this.device = parts.device;
    this.pairingState = parts.pairingState;
    this.transport = parts.transport;
    this.session = parts.session;
    this.config = parts.config;
    this.logger = componentLogger(parts.logger, "console-client");

    this.multiplexer = new ChannelMultiplexer(this.session, {
      channelOpenTimeoutMs: this.config.channelOpenTimeoutMs,
      logger: componentLogger(parts.logger, "channel-multiplexer"),
    });
    this.inputChannel = new AsyncLazy(
      async () => new InputChannel(await this.multiplexer.openChannel(ServiceType.SystemInput)),
      "Input channel",
    );

    this.session.on("consoleStatusChanged", (status) => this.emit("consoleStatusChanged", status));
    this.session.on("disconnected", (message) => this.emit("disconnected", message));
  }

  get participantId(): number {
    return this.session.info.participantId;
  }

  get deviceId(): string {
    return this.session.info.deviceId;
  }

  /** Latest console status, or null until the console has reported one. */
  get consoleStatus(): ConsoleStatus | null {
    return this.session.consoleStatus;
  }

  get isDisposed(): boolean {
    return this.disposal !== null;
  }

  /** Ask the console to launch a title. No reply is awaited. */
  async launchTitle(
    titleId: number,
    launchParams?: string,
    location: ActiveTitleLocation = ActiveTitleLocation.Default,
  ): Promise<void> {
    const uri = buildTitleUri(titleId, launchParams);
    await this.session.send({ type: "title_launch", uri, location });
  }

  /** Record the last `lastSeconds` of gameplay. No reply is awaited. */
  startDvrRecording(lastSeconds = this.config.dvrRecordSeconds): Promise<void> {
    return this.session.send({ type: "game_dvr_record", startTimeDelta: -lastSeconds });
  }

  /** Open a channel for any service. The caller owns the returned channel. */
  openChannel(serviceType: ServiceType, titleId = 0): Promise<ChannelMessageTransport> {
    return this.multiplexer.openChannel(serviceType, titleId);
  }

  /** The shared input channel, opened on first call. */
  getInputChannel(): Promise<InputChannel> {
    return this.inputChannel.get();
  }

  /**
   * Open a channel bound to `titleId` and give the console a short window to
   * send its auxiliary-stream hello. A missing hello is not an error.
   */
  async startTitleChannel(titleId: number): Promise<TitleChannel> {
    const channel = await this.multiplexer.openChannel(ServiceType.None, titleId);

    let hello: AuxiliaryStreamMessage | null = null;
    if (this.config.auxiliaryHelloTimeoutMs > 0) {
      try {
        hello = await channel.waitFor("auxiliary_stream", this.config.auxiliaryHelloTimeoutMs);
      } catch (error) {
        if (!(error instanceof WaitTimeoutError)) {
          channel.dispose();
          throw error;
        }
        this.logger.debug?.(`No auxiliary stream hello on channel ${channel.channelId}`);
      }
    }

    return new TitleChannel(channel, hello);
  }

  /**
   * Release the input channel, the session and the raw transport, in that
   * order. Every step runs even when an earlier one fails; failures are
   * logged and returned, never thrown. Later calls return the first result.
   */
  dispose(): Promise<ReleaseFailure[]> {
    if (!this.disposal) {
      this.disposal = releaseInOrder(
        [
          {
            name: "input channel",
            release: () => this.inputChannel.dispose((channel) => channel.dispose()),
          },
          { name: "session", release: () => this.session.dispose() },
          { name: "transport", release: () => this.transport.close() },
        ],
        this.logger,
      ).then((failures) => {
        this.removeAllListeners();
        this.logger.debug?.("Console client disposed", { failures: failures.length });
        return failures;
      });
    }
    return this.disposal;
  }
}
