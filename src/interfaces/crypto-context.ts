/**
 * Per-console encryption capability, derived from the console's certificate.
 * The handshake draws its init vector from it; transports use it to encrypt
 * and decrypt session payloads. The session layer never looks inside.
 * @module
 */

export interface CryptoContext {
  generateInitVector(): Uint8Array;
  encrypt(plaintext: Uint8Array, initVector: Uint8Array): Uint8Array;
  decrypt(ciphertext: Uint8Array, initVector: Uint8Array): Uint8Array;
}

export type CryptoContextFactory = (certificate: Uint8Array) => CryptoContext;
