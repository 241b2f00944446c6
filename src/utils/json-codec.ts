/**
 * JSON text framing for protocol messages.
 *
 * Byte fields (init vectors, keys) are written as `{"$bytes": "<base64>"}`
 * and read back as Uint8Array. Everything else is plain JSON.
 */

import { MessageValidationError } from "../errors.js";

const BYTES_KEY = "$bytes";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBytesEnvelope(value: unknown): value is { [BYTES_KEY]: string } {
  if (!isRecord(value)) return false;
  const keys = Object.keys(value);
  return keys.length === 1 && keys[0] === BYTES_KEY && typeof value[BYTES_KEY] === "string";
}

/** Serialize a message to one JSON text frame. */
export function encodeFrame(message: unknown): string {
  // The replacer reads the raw property because Buffer.toJSON runs first
  return JSON.stringify(message, function (this: unknown, key: string, value: unknown) {
    const raw: unknown = typeof this === "object" && this !== null ? Reflect.get(this, key) : value;
    if (raw instanceof Uint8Array) {
      return { [BYTES_KEY]: Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength).toString("base64") };
    }
    return value;
  });
}

/** Parse one JSON text frame. Throws MessageValidationError on malformed JSON. */
export function decodeFrame(text: string): unknown {
  try {
    return JSON.parse(text, (_key: string, value: unknown): unknown =>
      isBytesEnvelope(value) ? new Uint8Array(Buffer.from(value[BYTES_KEY], "base64")) : value,
    );
  } catch (err) {
    throw new MessageValidationError("Frame is not valid JSON", { cause: err });
  }
}
