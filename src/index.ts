/**
 * consolelink public API barrel.
 * @module
 */

// Adapters
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export { NoopLogger, noopLogger } from "./adapters/noop-logger.js";
export type { WebSocketRawTransportOptions } from "./adapters/websocket-raw-transport.js";
export {
  createWebSocketTransportFactory,
  WebSocketRawTransport,
} from "./adapters/websocket-raw-transport.js";
// Client
export type { ConsoleClientEvents, ConsoleClientOptions } from "./client/console-client.js";
export { ConsoleClient } from "./client/console-client.js";
export { InputChannel } from "./client/input-channel.js";
export { TitleChannel } from "./client/title-channel.js";
export { buildTitleUri, encodeLaunchParams } from "./client/title-uri.js";
// Core
export { AsyncLazy } from "./core/async-lazy.js";
export type { ChannelTransportEvents } from "./core/channel-message-transport.js";
export { ChannelMessageTransport } from "./core/channel-message-transport.js";
export type { ChannelMultiplexerOptions } from "./core/channel-multiplexer.js";
export { ChannelMultiplexer } from "./core/channel-multiplexer.js";
export type {
  ConnectionEstablisherDeps,
  Credentials,
  EstablishedSession,
} from "./core/connection-establisher.js";
export { ConnectionEstablisher } from "./core/connection-establisher.js";
export type { SendAction } from "./core/correlated-transport.js";
export { CorrelatedTransport } from "./core/correlated-transport.js";
export type { MessagePredicate, RegisteredWait } from "./core/pending-wait-registry.js";
export { PendingWaitRegistry } from "./core/pending-wait-registry.js";
export type { ReleaseFailure, ReleaseStep } from "./core/release-chain.js";
export { releaseInOrder } from "./core/release-chain.js";
export type { RetryOptions } from "./core/retry.js";
export { withRetries } from "./core/retry.js";
export type {
  SessionInfo,
  SessionMessageTransportOptions,
  SessionPacketEvent,
  SessionTransportEvents,
} from "./core/session-message-transport.js";
export { SessionMessageTransport } from "./core/session-message-transport.js";
export { TypedEventEmitter } from "./core/typed-emitter.js";
// Config
export { clientConfigSchema } from "./config/config-schema.js";
export type { ClientConfig, ResolvedConfig } from "./types/config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./types/config.js";
// Errors
export {
  ChannelOpenError,
  ConnectionFailedError,
  ConnectionRejectedError,
  ConsoleLinkError,
  DiscoveryError,
  DisposedError,
  errorMessage,
  MessageValidationError,
  toConsoleLinkError,
  WaitTimeoutError,
} from "./errors.js";
// Interfaces
export type { CryptoContext, CryptoContextFactory } from "./interfaces/crypto-context.js";
export type { Device, DeviceLocator } from "./interfaces/discovery.js";
export type { Logger } from "./interfaces/logger.js";
export type { RawTransport, RawTransportFactory } from "./interfaces/raw-transport.js";
// Messages
export type { InboundMessage, SealedSessionFrame } from "./types/message-schema.js";
export {
  inboundMessageSchema,
  sealedSessionFrameSchema,
  sessionMessageSchema,
} from "./types/message-schema.js";
export type {
  ActiveTitle,
  AuxiliaryStreamEndpoint,
  AuxiliaryStreamMessage,
  ConnectRequestMessage,
  ConnectResponseMessage,
  ConsoleConfiguration,
  ConsoleStatus,
  ConsoleStatusMessage,
  DisconnectMessage,
  GameDvrRecordMessage,
  GamepadMessage,
  GamepadState,
  LocalJoinMessage,
  MessageOfType,
  SessionMessage,
  SessionMessageType,
  SessionPacket,
  StartChannelRequestMessage,
  StartChannelResponseMessage,
  TitleLaunchMessage,
  TransportMessage,
  TransportMessageType,
} from "./types/messages.js";
export { ActiveTitleLocation, CORE_CHANNEL_ID, PairingState, ServiceType } from "./types/messages.js";
// Utilities
export { decodeFrame, encodeFrame } from "./utils/json-codec.js";
export { openFrame, sealMessage } from "./utils/session-sealing.js";
