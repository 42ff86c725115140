/**
 * Ed25519 signing backend with an in-process keyring.
 *
 * Keys are addressed by fingerprint. `verify` accepts either a hex public
 * key (self-contained offline verification) or a fingerprint the keyring
 * already holds.
 */

import { KeyPair, generateKeyPair } from './keys';
import { sign, verify } from './signing';
import { deriveFingerprint, normalizeFingerprint } from './fingerprint';
import { SigningBackend, VerificationOutcome } from './types';
import { errorMessage } from '../errors';

const PUBLIC_KEY_HEX = /^[0-9a-f]{64}$/i;
const SIGNATURE_HEX = /^[0-9a-f]{128}$/i;

export function isEd25519PublicKey(identity: string): boolean {
  return PUBLIC_KEY_HEX.test(identity);
}

export class Ed25519Backend implements SigningBackend {
  readonly name = 'ed25519';
  private keys = new Map<string, KeyPair>();

  /** Generate a fresh key, add it to the keyring and return its fingerprint. */
  async createKey(): Promise<string> {
    return this.addKey(await generateKeyPair());
  }

  addKey(keyPair: KeyPair): string {
    const fingerprint = deriveFingerprint(keyPair.publicKey);
    this.keys.set(fingerprint, keyPair);
    return fingerprint;
  }

  async sign(payload: Uint8Array, keyRef: string): Promise<string> {
    const keyPair = this.requireKey(keyRef);
    const signature = await sign(payload, keyPair.secretKey);
    return Buffer.from(signature).toString('hex');
  }

  async verify(payload: Uint8Array, signature: string, identity: string): Promise<VerificationOutcome> {
    const publicKey = this.resolvePublicKey(identity);
    if (!publicKey) {
      return { valid: false, reason: `Unknown identity ${identity.slice(0, 16)}` };
    }
    if (!SIGNATURE_HEX.test(signature)) {
      return { valid: false, reason: 'Malformed signature' };
    }

    let valid: boolean;
    try {
      valid = await verify(payload, Buffer.from(signature, 'hex'), publicKey);
    } catch (err) {
      return { valid: false, reason: `Malformed key or signature: ${errorMessage(err)}` };
    }

    return valid
      ? { valid: true, signerFingerprint: deriveFingerprint(publicKey) }
      : { valid: false, reason: 'Signature does not match payload' };
  }

  async exportPublicKey(keyRef: string): Promise<string> {
    return Buffer.from(this.requireKey(keyRef).publicKey).toString('hex');
  }

  async fingerprintOf(keyRef: string): Promise<string> {
    this.requireKey(keyRef);
    return normalizeFingerprint(keyRef);
  }

  private requireKey(keyRef: string): KeyPair {
    const keyPair = this.keys.get(normalizeFingerprint(keyRef));
    if (!keyPair) {
      throw new Error(`Key ${keyRef} not found in keyring`);
    }
    return keyPair;
  }

  private resolvePublicKey(identity: string): Uint8Array | undefined {
    if (isEd25519PublicKey(identity)) {
      return new Uint8Array(Buffer.from(identity, 'hex'));
    }
    return this.keys.get(normalizeFingerprint(identity))?.publicKey;
  }
}
