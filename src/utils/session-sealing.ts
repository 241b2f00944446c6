/**
 * Payload encryption for session packets on a JSON bridge connection.
 *
 * The payload of an outbound session packet is written as a JSON frame,
 * encrypted under a fresh init vector and carried as `sealedPayload` next to
 * that vector. Connect requests and responses travel unchanged. Inbound
 * session frames must be sealed; a plain one is rejected.
 */

import { MessageValidationError } from "../errors.js";
import type { CryptoContext } from "../interfaces/crypto-context.js";
import { type SealedSessionFrame, sealedSessionFrameSchema } from "../types/message-schema.js";
import type { TransportMessage } from "../types/messages.js";
import { decodeFrame, encodeFrame } from "./json-codec.js";

/** Encrypt the payload of a session packet; other messages pass through. */
export function sealMessage(
  message: TransportMessage,
  crypto: CryptoContext,
): TransportMessage | SealedSessionFrame {
  if (message.type !== "session") return message;

  const initVector = crypto.generateInitVector();
  const plaintext = Buffer.from(encodeFrame(message.payload), "utf8");
  return {
    type: "session",
    participantId: message.participantId,
    channelId: message.channelId,
    initVector,
    sealedPayload: crypto.encrypt(plaintext, initVector),
  };
}

/**
 * Decrypt a decoded inbound frame back into a plain session packet. Frames of
 * other types are returned as they are, for the caller to validate.
 */
export function openFrame(frame: unknown, crypto: CryptoContext): unknown {
  if (!isSessionFrame(frame)) return frame;

  const sealed = sealedSessionFrameSchema.safeParse(frame);
  if (!sealed.success) {
    throw new MessageValidationError("Session frame is not sealed");
  }

  const { participantId, channelId, initVector, sealedPayload } = sealed.data;
  const plaintext = crypto.decrypt(sealedPayload, initVector);
  const payload = decodeFrame(
    Buffer.from(plaintext.buffer, plaintext.byteOffset, plaintext.byteLength).toString("utf8"),
  );
  return { type: "session", participantId, channelId, payload };
}

function isSessionFrame(frame: unknown): boolean {
  return typeof frame === "object" && frame !== null && Reflect.get(frame, "type") === "session";
}
