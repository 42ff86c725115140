/**
 * Registration ledger entry types.
 *
 * Lifecycle: Draft → ChainSigned → Chained (RegistrationEntry) → Persisted
 *            → optionally IdentitySigned (identity_* fields present).
 *
 * Field names are snake_case because they are part of the canonical bytes
 * that get hashed and signed; renaming one invalidates every stored entry.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ProofPayload = { [key: string]: JsonValue };

/** Stands in for "no predecessor". Not hex, so no digest can equal it. */
export const GENESIS_HASH = 'GENESIS';

export interface DraftEntry {
  proof_name: string;
  payload: ProofPayload;
  timestamp: number;          // unix seconds, advisory
  prev_chain_hash: string;
  chain_public_key: string;   // hex Ed25519 key of the ledger's chain identity
}

export interface ChainSignedEntry extends DraftEntry {
  chain_signature: string;
}

export interface IdentityFields {
  identity_fingerprint: string;
  identity_signature: string;
  identity_public_key: string;
}

export interface RegistrationEntry extends ChainSignedEntry, Partial<IdentityFields> {
  chain_hash: string;
}

export type IdentitySignedEntry = RegistrationEntry & IdentityFields;

export function isIdentitySigned(entry: RegistrationEntry): entry is IdentitySignedEntry {
  return (
    typeof entry.identity_fingerprint === 'string' &&
    typeof entry.identity_signature === 'string' &&
    typeof entry.identity_public_key === 'string'
  );
}

export type ChainBreakReason =
  | 'genesis_mismatch'
  | 'hash_mismatch'
  | 'link_mismatch'
  | 'signature_invalid';

export type ChainVerification =
  | { valid: true; length: number }
  | {
      valid: false;
      length: number;
      brokenAt: number;
      reason: ChainBreakReason;
      computedHash?: string;
      storedHash?: string;
      error: string;
    };
