/**
 * Ed25519 Keypair Generation
 *
 * Keys for both the ephemeral chain identity and long-lived external
 * identities held in identity key files.
 */

import * as ed from '@noble/ed25519';

export interface KeyPair {
  publicKey: Uint8Array;  // 32 bytes
  secretKey: Uint8Array;  // 32 bytes
}

/**
 * Generate an Ed25519 keypair.
 *
 * The secret key must be kept confidential.
 */
export async function generateKeyPair(): Promise<KeyPair> {
  const secretKey = ed.utils.randomPrivateKey();
  const publicKey = await ed.getPublicKey(secretKey);
  return { publicKey, secretKey };
}

/** Rebuild a keypair from its secret key (e.g. when loading a key file). */
export async function keyPairFromSecret(secretKey: Uint8Array): Promise<KeyPair> {
  const publicKey = await ed.getPublicKey(secretKey);
  return { publicKey, secretKey };
}
