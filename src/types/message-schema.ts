import { z } from "zod";
import { ActiveTitleLocation, PairingState, ServiceType } from "./messages.js";

const bytes = z.instanceof(Uint8Array);
const int = z.number().int();

const activeTitleSchema = z.object({
  titleId: int.nonnegative(),
  hasFocus: z.boolean(),
  location: z.nativeEnum(ActiveTitleLocation),
  productId: z.string().optional(),
  aumId: z.string().optional(),
});

const consoleConfigurationSchema = z.object({
  liveTvProvider: int,
  majorVersion: int,
  minorVersion: int,
  buildNumber: int,
  locale: z.string(),
});

const gamepadStateShape = {
  buttons: int.nonnegative(),
  leftTrigger: z.number(),
  rightTrigger: z.number(),
  leftThumbstickX: z.number(),
  leftThumbstickY: z.number(),
  rightThumbstickX: z.number(),
  rightThumbstickY: z.number(),
};

export const sessionMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("local_join") }),
  z.object({
    type: z.literal("console_status"),
    configuration: consoleConfigurationSchema,
    activeTitles: z.array(activeTitleSchema),
  }),
  z.object({
    type: z.literal("title_launch"),
    uri: z.string(),
    location: z.nativeEnum(ActiveTitleLocation),
  }),
  z.object({
    type: z.literal("game_dvr_record"),
    startTimeDelta: int,
    endTimeDelta: int.optional(),
  }),
  z.object({
    type: z.literal("start_channel_request"),
    channelRequestId: int.nonnegative(),
    serviceType: z.nativeEnum(ServiceType),
    titleId: int.nonnegative(),
    activityId: int.optional(),
  }),
  z.object({
    type: z.literal("start_channel_response"),
    channelRequestId: int.nonnegative(),
    channelId: int.nonnegative(),
    result: int,
  }),
  z.object({
    type: z.literal("auxiliary_stream"),
    connectionInfo: z
      .object({
        cryptoKey: bytes,
        serverInitVector: bytes,
        clientInitVector: bytes,
        signHash: bytes,
        endpoints: z.array(z.object({ host: z.string(), port: int.min(0).max(65535) })),
      })
      .optional(),
  }),
  z.object({ type: z.literal("gamepad"), timestamp: z.number(), ...gamepadStateShape }),
  z.object({ type: z.literal("disconnect"), reason: int, errorCode: int }),
]);

/** Messages a console (or a bridge in front of it) may send to the client. */
export const inboundMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("connect_response"),
    result: int,
    pairingState: z.nativeEnum(PairingState),
    participantId: int.nonnegative(),
  }),
  z.object({
    type: z.literal("session"),
    participantId: int.nonnegative(),
    channelId: int.nonnegative(),
    payload: sessionMessageSchema,
  }),
]);

export type InboundMessage = z.infer<typeof inboundMessageSchema>;

/** A session packet whose payload was encrypted by the sender. */
export const sealedSessionFrameSchema = z.object({
  type: z.literal("session"),
  participantId: int.nonnegative(),
  channelId: int.nonnegative(),
  initVector: bytes,
  sealedPayload: bytes,
});

export type SealedSessionFrame = z.infer<typeof sealedSessionFrameSchema>;
