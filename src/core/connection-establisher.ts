/**
 * ConnectionEstablisher: discovery plus the connect handshake.
 *
 * Each attempt sends a freshly built connect request and waits one
 * `connectTimeoutMs` window for the connect response. Attempt i + 1 is sent
 * `connectRetryScheduleMs[i - 1]` after attempt i, while earlier windows are
 * still open, and the first connect response to arrive completes the
 * handshake. Only timeouts are retried; any other failure ends it. The
 * init vector and device id identify the whole `connect` call and are reused
 * by every attempt, while the sequence counter advances by two per attempt.
 *
 * @module SessionControl
 */

import { randomUUID } from "node:crypto";
import { noopLogger } from "../adapters/noop-logger.js";
import {
  ConnectionFailedError,
  ConnectionRejectedError,
  DiscoveryError,
  WaitTimeoutError,
} from "../errors.js";
import type { CryptoContext, CryptoContextFactory } from "../interfaces/crypto-context.js";
import type { Device, DeviceLocator } from "../interfaces/discovery.js";
import type { Logger } from "../interfaces/logger.js";
import type { RawTransportFactory } from "../interfaces/raw-transport.js";
import { DEFAULT_CONFIG, type ResolvedConfig } from "../types/config.js";
import type {
  ConnectRequestMessage,
  PairingState,
  TransportMessage,
} from "../types/messages.js";
import { CorrelatedTransport } from "./correlated-transport.js";
import { withRetries } from "./retry.js";

/** Signed-in user material forwarded with the connect request. */
export interface Credentials {
  userHash: string;
  authorization: string;
}

/** Result of a successful handshake, handed to the long-lived session. */
export interface EstablishedSession {
  device: Device;
  crypto: CryptoContext;
  participantId: number;
  deviceId: string;
  pairingState: PairingState;
}

export interface ConnectionEstablisherDeps {
  locator: DeviceLocator;
  createCryptoContext: CryptoContextFactory;
  createTransport: RawTransportFactory;
  config?: Pick<ResolvedConfig, "connectTimeoutMs" | "connectRetryScheduleMs">;
  logger?: Logger;
  generateDeviceId?: () => string;
}

export class ConnectionEstablisher {
  private sequenceNumber = 0;
  private readonly config: Pick<ResolvedConfig, "connectTimeoutMs" | "connectRetryScheduleMs">;
  private readonly logger: Logger;
  private readonly generateDeviceId: () => string;

  constructor(private readonly deps: ConnectionEstablisherDeps) {
    this.config = deps.config ?? DEFAULT_CONFIG;
    this.logger = deps.logger ?? noopLogger;
    this.generateDeviceId = deps.generateDeviceId ?? randomUUID;
  }

  /** Next sequence number a connect request will carry. */
  get nextSequenceNumber(): number {
    return this.sequenceNumber;
  }

  async connect(addressOrHostname: string, credentials?: Credentials): Promise<EstablishedSession> {
    let device: Device;
    try {
      device = await this.deps.locator.ping(addressOrHostname);
    } catch (error) {
      throw new DiscoveryError(addressOrHostname, { cause: error });
    }

    const crypto = this.deps.createCryptoContext(device.certificate);
    const initVector = crypto.generateInitVector();
    const deviceId = this.generateDeviceId();

    const transport = this.deps.createTransport(device.address, crypto);
    const handshake = new CorrelatedTransport<TransportMessage, TransportMessage>(
      (message) => transport.send(message),
      "Handshake transport",
    );
    const unsubscribe = transport.onMessage((message) => handshake.dispatch(message));

    const schedule = this.config.connectRetryScheduleMs;
    const timeoutMs = this.config.connectTimeoutMs;

    try {
      const response = await withRetries(
        (attempt) => {
          const request = this.buildConnectRequest(initVector, deviceId, credentials);
          this.logger.debug?.(`Connect attempt ${attempt} to ${device.address}`, {
            sequenceNumber: request.sequenceNumber,
          });
          return handshake.request(request, "connect_response", timeoutMs);
        },
        schedule,
        { shouldRetry: (error) => error instanceof WaitTimeoutError },
      ).catch((error: unknown) => {
        if (error instanceof WaitTimeoutError) {
          throw new ConnectionFailedError(addressOrHostname, schedule.length + 1, {
            cause: error,
          });
        }
        throw error;
      });

      if (response.result !== 0) {
        throw new ConnectionRejectedError(addressOrHostname, response.result);
      }

      this.logger.info(`Connected to ${device.address}`, {
        participantId: response.participantId,
      });

      return {
        device,
        crypto,
        participantId: response.participantId,
        deviceId,
        pairingState: response.pairingState,
      };
    } finally {
      unsubscribe();
      handshake.dispose();
      await transport.close().catch((error: unknown) => {
        this.logger.warn("Failed to close handshake transport", { error });
      });
    }
  }

  private buildConnectRequest(
    initVector: Uint8Array,
    deviceId: string,
    credentials?: Credentials,
  ): ConnectRequestMessage {
    const sequenceNumber = this.sequenceNumber;
    this.sequenceNumber += 2;

    return {
      type: "connect_request",
      initVector,
      deviceId,
      userHash: credentials?.userHash,
      authorization: credentials?.authorization,
      sequenceNumber,
      sequenceBegin: sequenceNumber + 1,
      sequenceEnd: sequenceNumber + 1,
    };
  }
}
