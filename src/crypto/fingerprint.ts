/**
 * Fingerprint Derivation from Public Key
 *
 * Algorithm: SHA-256(publicKey) → first 20 bytes → upper-case hex.
 * Result: 40-character string, the same shape as an OpenPGP v4 fingerprint,
 * so fingerprints from either backend share one format.
 */

import { computeHash } from '../persistence/canonicalSerialize';

const FINGERPRINT_BYTES = 20;

export function deriveFingerprint(publicKey: Uint8Array): string {
  return computeHash(publicKey).slice(0, FINGERPRINT_BYTES * 2).toUpperCase();
}

export function normalizeFingerprint(fingerprint: string): string {
  return fingerprint.replace(/\s+/g, '').toUpperCase();
}
