/**
 * Message model for the console protocol.
 *
 * Two layers: connection-level messages exchanged during the handshake, and
 * session messages carried inside a `session` packet once a participant id has
 * been assigned. Field encoding and framing belong to the transport.
 * @module
 */

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export const ServiceType = {
  None: 0,
  SystemInput: 1,
  SystemInputTvRemote: 2,
  SystemMedia: 3,
  SystemText: 4,
  SystemBroadcast: 5,
} as const;
export type ServiceType = (typeof ServiceType)[keyof typeof ServiceType];

export const ActiveTitleLocation = {
  Full: 0,
  Fill: 1,
  Snapped: 2,
  StartView: 3,
  SystemUi: 4,
  Default: 5,
} as const;
export type ActiveTitleLocation = (typeof ActiveTitleLocation)[keyof typeof ActiveTitleLocation];

export const PairingState = {
  Paired: 0,
  NotPaired: 1,
} as const;
export type PairingState = (typeof PairingState)[keyof typeof PairingState];

/** Channel id used for session-level traffic that belongs to no opened channel. */
export const CORE_CHANNEL_ID = 0;

// ---------------------------------------------------------------------------
// Session messages (payload of a `session` packet)
// ---------------------------------------------------------------------------

export interface LocalJoinMessage {
  type: "local_join";
}

export interface ActiveTitle {
  titleId: number;
  hasFocus: boolean;
  location: ActiveTitleLocation;
  productId?: string;
  aumId?: string;
}

export interface ConsoleConfiguration {
  liveTvProvider: number;
  majorVersion: number;
  minorVersion: number;
  buildNumber: number;
  locale: string;
}

export interface ConsoleStatusMessage {
  type: "console_status";
  configuration: ConsoleConfiguration;
  activeTitles: ActiveTitle[];
}

export interface TitleLaunchMessage {
  type: "title_launch";
  uri: string;
  location: ActiveTitleLocation;
}

export interface GameDvrRecordMessage {
  type: "game_dvr_record";
  /** Seconds relative to now; negative values reach into the past. */
  startTimeDelta: number;
  endTimeDelta?: number;
}

export interface StartChannelRequestMessage {
  type: "start_channel_request";
  channelRequestId: number;
  serviceType: ServiceType;
  titleId: number;
  activityId?: number;
}

export interface StartChannelResponseMessage {
  type: "start_channel_response";
  channelRequestId: number;
  channelId: number;
  result: number;
}

export interface AuxiliaryStreamEndpoint {
  host: string;
  port: number;
}

export interface AuxiliaryStreamMessage {
  type: "auxiliary_stream";
  connectionInfo?: {
    cryptoKey: Uint8Array;
    serverInitVector: Uint8Array;
    clientInitVector: Uint8Array;
    signHash: Uint8Array;
    endpoints: AuxiliaryStreamEndpoint[];
  };
}

export interface GamepadState {
  buttons: number;
  leftTrigger: number;
  rightTrigger: number;
  leftThumbstickX: number;
  leftThumbstickY: number;
  rightThumbstickX: number;
  rightThumbstickY: number;
}

export interface GamepadMessage extends GamepadState {
  type: "gamepad";
  timestamp: number;
}

export interface DisconnectMessage {
  type: "disconnect";
  reason: number;
  errorCode: number;
}

export type SessionMessage =
  | LocalJoinMessage
  | ConsoleStatusMessage
  | TitleLaunchMessage
  | GameDvrRecordMessage
  | StartChannelRequestMessage
  | StartChannelResponseMessage
  | AuxiliaryStreamMessage
  | GamepadMessage
  | DisconnectMessage;

export type SessionMessageType = SessionMessage["type"];

// ---------------------------------------------------------------------------
// Connection-level messages
// ---------------------------------------------------------------------------

export interface ConnectRequestMessage {
  type: "connect_request";
  initVector: Uint8Array;
  deviceId: string;
  userHash?: string;
  authorization?: string;
  sequenceNumber: number;
  sequenceBegin: number;
  sequenceEnd: number;
}

export interface ConnectResponseMessage {
  type: "connect_response";
  result: number;
  pairingState: PairingState;
  participantId: number;
}

export interface SessionPacket {
  type: "session";
  participantId: number;
  channelId: number;
  payload: SessionMessage;
}

export type TransportMessage = ConnectRequestMessage | ConnectResponseMessage | SessionPacket;

export type TransportMessageType = TransportMessage["type"];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Narrow a union member by its `type` discriminator. */
export type MessageOfType<TMessage extends { type: string }, K extends TMessage["type"]> = Extract<
  TMessage,
  { type: K }
>;

/** Snapshot of the console derived from the latest `console_status` message. */
export interface ConsoleStatus {
  configuration: ConsoleConfiguration;
  activeTitles: ActiveTitle[];
}
