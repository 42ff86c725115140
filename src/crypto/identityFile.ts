/**
 * External identity key files.
 *
 * A long-lived registrant identity is kept on disk as JSON:
 *   { fingerprint, publicKey, secretKey, algorithm, createdAt }
 * with hex-encoded keys. Files are written with owner-only permissions.
 */

import * as fs from 'fs';
import * as path from 'path';
import { KeyPair, keyPairFromSecret } from './keys';
import { deriveFingerprint } from './fingerprint';

export interface IdentityFile {
  fingerprint: string;
  publicKey: string;
  secretKey: string;
  algorithm: 'Ed25519';
  createdAt: string;
  name?: string;
}

export function toIdentityFile(keyPair: KeyPair, name?: string): IdentityFile {
  return {
    fingerprint: deriveFingerprint(keyPair.publicKey),
    publicKey: Buffer.from(keyPair.publicKey).toString('hex'),
    secretKey: Buffer.from(keyPair.secretKey).toString('hex'),
    algorithm: 'Ed25519',
    createdAt: new Date().toISOString(),
    ...(name ? { name } : {}),
  };
}

export function writeIdentityFile(filePath: string, identity: IdentityFile): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(identity, null, 2) + '\n', { mode: 0o600 });
}

/**
 * Load a key file and check that the stored fingerprint and public key
 * match the secret key.
 */
export async function readIdentityFile(filePath: string): Promise<KeyPair> {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (!isIdentityFile(raw)) {
    throw new Error(`Invalid identity file: ${filePath}`);
  }

  const keyPair = await keyPairFromSecret(new Uint8Array(Buffer.from(raw.secretKey, 'hex')));
  if (Buffer.from(keyPair.publicKey).toString('hex') !== raw.publicKey.toLowerCase()) {
    throw new Error(`Identity file ${filePath}: public key does not match secret key`);
  }
  if (deriveFingerprint(keyPair.publicKey) !== raw.fingerprint.toUpperCase()) {
    throw new Error(`Identity file ${filePath}: fingerprint does not match public key`);
  }
  return keyPair;
}

function isIdentityFile(value: unknown): value is IdentityFile {
  return (
    typeof value === 'object' &&
    value !== null &&
    'fingerprint' in value &&
    typeof value.fingerprint === 'string' &&
    'publicKey' in value &&
    typeof value.publicKey === 'string' &&
    'secretKey' in value &&
    typeof value.secretKey === 'string' &&
    /^[0-9a-f]{64}$/i.test(value.secretKey)
  );
}
