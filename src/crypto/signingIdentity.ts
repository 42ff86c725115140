/**
 * A named key-holder over a signing backend.
 *
 * Two instances exist per running registry: the chain identity (ephemeral
 * Ed25519 key generated per ledger) and the external identity (a long-lived
 * registrant key from a key file or the GnuPG keyring).
 *
 * `sign` and `exportPublicKey` surface every backend failure as a
 * SigningBackendError. `verify` never throws: failures, malformed input and
 * timeouts all come back as `{ valid: false, reason }`.
 */

import { SigningBackendError, errorMessage } from '../errors';
import { Ed25519Backend, isEd25519PublicKey } from './ed25519Backend';
import { KeyPair } from './keys';
import { SignatureVerifier, SigningBackend, VerificationOutcome } from './types';

export const DEFAULT_SIGNING_TIMEOUT_MS = 10_000;

export interface SigningIdentityOptions {
  timeoutMs?: number;
}

export class SigningIdentity implements SignatureVerifier {
  private timeoutMs: number;

  constructor(
    readonly backend: SigningBackend,
    readonly keyRef: string,
    options: SigningIdentityOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SIGNING_TIMEOUT_MS;
  }

  async sign(payload: Uint8Array): Promise<string> {
    const signature = await this.call('sign', () => this.backend.sign(payload, this.keyRef));
    if (!signature) {
      throw new SigningBackendError(this.backend.name, 'sign returned an empty signature');
    }
    return signature;
  }

  async verify(payload: Uint8Array, signature: string, identity: string): Promise<VerificationOutcome> {
    try {
      return await withTimeout(
        this.backend.verify(payload, signature, identity),
        this.timeoutMs,
        `${this.backend.name} verify`,
      );
    } catch (err) {
      return { valid: false, reason: `${this.backend.name}: ${errorMessage(err)}` };
    }
  }

  exportPublicKey(): Promise<string> {
    return this.call('exportPublicKey', () => this.backend.exportPublicKey(this.keyRef));
  }

  fingerprint(): Promise<string> {
    return this.call('fingerprintOf', () => this.backend.fingerprintOf(this.keyRef));
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn(), this.timeoutMs, `${this.backend.name} ${operation}`);
    } catch (err) {
      if (err instanceof SigningBackendError) throw err;
      throw new SigningBackendError(this.backend.name, `${operation} failed: ${errorMessage(err)}`, err);
    }
  }
}

/**
 * Create the ephemeral chain identity for one ledger instance.
 */
export async function createChainIdentity(options: SigningIdentityOptions = {}): Promise<SigningIdentity> {
  const backend = new Ed25519Backend();
  const fingerprint = await backend.createKey();
  return new SigningIdentity(backend, fingerprint, options);
}

/**
 * Wrap a long-lived Ed25519 keypair (e.g. from an identity key file) as an
 * external identity.
 */
export function ed25519Identity(keyPair: KeyPair, options: SigningIdentityOptions = {}): SigningIdentity {
  const backend = new Ed25519Backend();
  const fingerprint = backend.addKey(keyPair);
  return new SigningIdentity(backend, fingerprint, options);
}

/**
 * Routes each verification by the shape of the identity it names: a hex
 * Ed25519 public key is checked by `ed25519`, anything else (an OpenPGP
 * fingerprint or armored key) by `fallback`. Lets a GnuPG-backed registry
 * still accept members who signed with an Ed25519 key file.
 */
export class KeyShapeVerifier implements SignatureVerifier {
  constructor(
    private ed25519: SignatureVerifier,
    private fallback: SignatureVerifier,
  ) {}

  verify(payload: Uint8Array, signature: string, identity: string): Promise<VerificationOutcome> {
    const target = isEd25519PublicKey(identity) ? this.ed25519 : this.fallback;
    return target.verify(payload, signature, identity);
  }
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
