/**
 * Identity verification with a positive-result cache.
 *
 * A fingerprint is verified when its registration record carries an identity
 * signature over the record's canonical bytes that checks out against the
 * embedded public key (or the fingerprint itself when no key is embedded).
 * Failures are returned, never thrown, and never cached.
 */

import { identitySignaturePayload } from '../chain/chainBuilder';
import { RegistrationEntry } from '../chain/types';
import { normalizeFingerprint } from '../crypto/fingerprint';
import { SignatureVerifier, VerificationOutcome } from '../crypto/types';
import { errorMessage } from '../errors';
import { IRegistrationStore } from '../persistence/interfaces';

interface CacheEntry {
  entry: RegistrationEntry;
  verifiedAt: number;
}

export interface IdentityVerifierOptions {
  /** 0 keeps cached results until invalidated. */
  cacheTtlMs?: number;
  now?: () => number;
}

/**
 * Check a registration record's identity signature for `claimedFingerprint`.
 * Does not touch any store or cache.
 */
export async function verifyIdentityRecord(
  entry: RegistrationEntry,
  claimedFingerprint: string,
  verifier: SignatureVerifier,
): Promise<VerificationOutcome> {
  const claimed = normalizeFingerprint(claimedFingerprint);

  if (!entry.identity_signature) {
    return { valid: false, reason: 'Record has no identity signature' };
  }
  if (!entry.identity_fingerprint || normalizeFingerprint(entry.identity_fingerprint) !== claimed) {
    return {
      valid: false,
      reason: `Fingerprint mismatch: claimed ${claimed}, record has ${entry.identity_fingerprint ?? 'none'}`,
    };
  }

  let outcome: VerificationOutcome;
  try {
    outcome = await verifier.verify(
      identitySignaturePayload(entry),
      entry.identity_signature,
      entry.identity_public_key ?? claimed,
    );
  } catch (err) {
    return { valid: false, reason: `Verification failed: ${errorMessage(err)}` };
  }
  if (!outcome.valid) return outcome;

  if (outcome.signerFingerprint && normalizeFingerprint(outcome.signerFingerprint) !== claimed) {
    return {
      valid: false,
      reason: `Signed by ${outcome.signerFingerprint}, not ${claimed}`,
    };
  }
  return { valid: true, signerFingerprint: claimed };
}

export class IdentityVerifier {
  private cache = new Map<string, CacheEntry>();
  // Bumped by invalidate/clear; a check that started under an older
  // generation does not write its result back.
  private generations = new Map<string, number>();
  private epoch = 0;
  private cacheTtlMs: number;
  private now: () => number;

  constructor(
    private registrations: IRegistrationStore,
    private verifier: SignatureVerifier,
    options: IdentityVerifierOptions = {},
  ) {
    this.cacheTtlMs = options.cacheTtlMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  async verify(fingerprint: string): Promise<boolean> {
    return (await this.check(fingerprint)).valid;
  }

  /** Like verify, but keeps the reason for a failure. */
  async check(fingerprint: string): Promise<VerificationOutcome> {
    const claimed = normalizeFingerprint(fingerprint);
    if (this.cachedEntry(claimed)) {
      return { valid: true, signerFingerprint: claimed };
    }

    const generation = this.generationOf(claimed);
    let entry: RegistrationEntry | undefined;
    try {
      entry = await this.registrations.get(claimed);
    } catch (err) {
      return { valid: false, reason: `Registration lookup failed: ${errorMessage(err)}` };
    }
    if (!entry) {
      return { valid: false, reason: `No registration for ${claimed}` };
    }

    const outcome = await verifyIdentityRecord(entry, claimed, this.verifier);
    if (outcome.valid && this.generationOf(claimed) === generation) {
      this.cache.set(claimed, { entry, verifiedAt: this.now() });
    }
    return outcome;
  }

  /** Verify a record that is not (yet) in the registration store. Uncached. */
  checkRecord(entry: RegistrationEntry, fingerprint: string): Promise<VerificationOutcome> {
    return verifyIdentityRecord(entry, fingerprint, this.verifier);
  }

  /** Record for a verified fingerprint, if cached and not expired. */
  cachedEntry(fingerprint: string): RegistrationEntry | undefined {
    const key = normalizeFingerprint(fingerprint);
    const hit = this.cache.get(key);
    if (!hit) return undefined;
    if (this.cacheTtlMs > 0 && this.now() - hit.verifiedAt >= this.cacheTtlMs) {
      this.cache.delete(key);
      return undefined;
    }
    return hit.entry;
  }

  invalidate(fingerprint: string): boolean {
    const key = normalizeFingerprint(fingerprint);
    this.generations.set(key, (this.generations.get(key) ?? 0) + 1);
    return this.cache.delete(key);
  }

  clear(): void {
    this.epoch++;
    this.generations.clear();
    this.cache.clear();
  }

  private generationOf(key: string): string {
    return `${this.epoch}:${this.generations.get(key) ?? 0}`;
  }

  get cacheSize(): number {
    return this.cache.size;
  }
}
