/**
 * Contract between the ledger and an external signature backend.
 *
 * Signatures and key material are opaque strings: the ledger stores them and
 * hands them back, it never inspects their format.
 */

export type VerificationOutcome =
  | { valid: true; signerFingerprint?: string }
  | { valid: false; reason: string };

export interface SignatureVerifier {
  verify(payload: Uint8Array, signature: string, identity: string): Promise<VerificationOutcome>;
}

export interface SigningBackend extends SignatureVerifier {
  readonly name: string;
  /** Throws when the key is unknown or the backend is unavailable. */
  sign(payload: Uint8Array, keyRef: string): Promise<string>;
  exportPublicKey(keyRef: string): Promise<string>;
  fingerprintOf(keyRef: string): Promise<string>;
}
