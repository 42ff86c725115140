/**
 * Chain builder: builds registration entries, computes their chain hashes
 * and walks a ledger to find the first broken link.
 *
 * The exclusion sets below are the only definition of what each hash and
 * signature covers. Signing and verification both go through the payload
 * helpers in this file.
 */

import { canonicalBytes } from '../persistence/canonicalSerialize';
import { SignatureVerifier } from '../crypto/types';
import { computeChainHash } from './chainLink';
import {
  GENESIS_HASH,
  ChainSignedEntry,
  ChainVerification,
  DraftEntry,
  ProofPayload,
  RegistrationEntry,
} from './types';

// ---------------------------------------------------------------------------
// Exclusion sets
// ---------------------------------------------------------------------------

/**
 * Fields outside the chain signature. At signing time the entry holds only
 * the draft fields and chain_public_key; this set rebuilds that view from a
 * finished entry.
 */
export const CHAIN_SIGNATURE_EXCLUDED = [
  'chain_signature',
  'chain_hash',
  'identity_fingerprint',
  'identity_signature',
  'identity_public_key',
] as const;

/** Identity fields stay outside the hash so attaching them never re-chains. */
export const CHAIN_HASH_EXCLUDED = CHAIN_SIGNATURE_EXCLUDED;

/** identity_fingerprint and chain_hash are covered; both signatures and the key are not. */
export const IDENTITY_SIGNATURE_EXCLUDED = [
  'chain_signature',
  'identity_signature',
  'identity_public_key',
] as const;

// ---------------------------------------------------------------------------
// Payloads and hashes
// ---------------------------------------------------------------------------

export function chainSignaturePayload(entry: DraftEntry): Uint8Array {
  return canonicalBytes(entry, CHAIN_SIGNATURE_EXCLUDED);
}

export function identitySignaturePayload(entry: RegistrationEntry): Uint8Array {
  return canonicalBytes(entry, IDENTITY_SIGNATURE_EXCLUDED);
}

export function computeEntryChainHash(entry: DraftEntry): string {
  return computeChainHash(entry.prev_chain_hash, canonicalBytes(entry, CHAIN_HASH_EXCLUDED));
}

// ---------------------------------------------------------------------------
// Entry construction
// ---------------------------------------------------------------------------

/**
 * Build a draft entry. Returns it unsigned; the caller signs
 * chainSignaturePayload(draft) with the chain identity.
 */
export function buildDraft(opts: {
  proofName: string;
  payload: ProofPayload;
  chainPublicKey: string;
  prevChainHash?: string;
  timestamp?: number;
}): DraftEntry {
  return {
    proof_name: opts.proofName,
    payload: opts.payload,
    timestamp: opts.timestamp ?? Math.floor(Date.now() / 1000),
    prev_chain_hash: opts.prevChainHash ?? GENESIS_HASH,
    chain_public_key: opts.chainPublicKey,
  };
}

/** Seal a chain-signed entry with its chain hash. */
export function chainEntry(signed: ChainSignedEntry): RegistrationEntry {
  return { ...signed, chain_hash: computeEntryChainHash(signed) };
}

// ---------------------------------------------------------------------------
// Chain verification
// ---------------------------------------------------------------------------

/** Verify the chain hash of a single entry */
export function verifyEntryHash(entry: RegistrationEntry): boolean {
  return computeEntryChainHash(entry) === entry.chain_hash;
}

/**
 * Walk entries in append order. Stops at the first entry whose hash, link
 * or (when a verifier is given) chain signature fails. Never repairs.
 */
export async function verifyRegistrationChain(
  entries: RegistrationEntry[],
  verifier?: SignatureVerifier,
): Promise<ChainVerification> {
  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];

    const computed = computeEntryChainHash(entry);
    if (computed !== entry.chain_hash) {
      return {
        valid: false,
        length: entries.length,
        brokenAt: i,
        reason: 'hash_mismatch',
        computedHash: computed,
        storedHash: entry.chain_hash,
        error: `Entry ${i} hash mismatch: computed ${computed}, stored ${entry.chain_hash}`,
      };
    }

    const expectedPrev = i === 0 ? GENESIS_HASH : entries[i - 1].chain_hash;
    if (entry.prev_chain_hash !== expectedPrev) {
      return {
        valid: false,
        length: entries.length,
        brokenAt: i,
        reason: i === 0 ? 'genesis_mismatch' : 'link_mismatch',
        computedHash: expectedPrev,
        storedHash: entry.prev_chain_hash,
        error: i === 0
          ? `Entry 0 does not reference the genesis hash`
          : `Entry ${i} does not link to entry ${i - 1}: expected ${expectedPrev}, got ${entry.prev_chain_hash}`,
      };
    }

    if (verifier) {
      const outcome = await verifier.verify(
        chainSignaturePayload(entry),
        entry.chain_signature,
        entry.chain_public_key,
      );
      if (!outcome.valid) {
        return {
          valid: false,
          length: entries.length,
          brokenAt: i,
          reason: 'signature_invalid',
          error: `Entry ${i} chain signature invalid: ${outcome.reason}`,
        };
      }
    }
  }

  return { valid: true, length: entries.length };
}
