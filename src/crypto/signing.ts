/**
 * Ed25519 Sign / Verify
 */

import * as ed from '@noble/ed25519';

/**
 * Sign a message using an Ed25519 secret key.
 *
 * @param message  Arbitrary-length message bytes
 * @param secretKey  Secret key (32 bytes) from generateKeyPair()
 * @returns Signature bytes (64 bytes)
 */
export async function sign(
  message: Uint8Array,
  secretKey: Uint8Array,
): Promise<Uint8Array> {
  return ed.sign(message, secretKey);
}

/**
 * Verify an Ed25519 signature against a message and public key.
 * Throws for malformed keys; callers decide how to treat that.
 */
export async function verify(
  message: Uint8Array,
  signature: Uint8Array,
  publicKey: Uint8Array,
): Promise<boolean> {
  return ed.verify(signature, message, publicKey);
}
