/**
 * Crypto Module Tests
 *
 * 1. Fingerprint derivation from a public key
 * 2. Ed25519 sign / verify, including after a hex round-trip
 * 3. Ed25519Backend keyring and verification outcomes
 * 4. Identity key files
 */

import * as nodeCrypto from 'crypto';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { generateKeyPair, KeyPair } from '../keys';
import { sign, verify } from '../signing';
import { deriveFingerprint, normalizeFingerprint } from '../fingerprint';
import { Ed25519Backend } from '../ed25519Backend';
import { readIdentityFile, toIdentityFile, writeIdentityFile } from '../identityFile';

const encode = (s: string) => new TextEncoder().encode(s);

let keyPair: KeyPair;

beforeAll(async () => {
  keyPair = await generateKeyPair();
});

describe('deriveFingerprint', () => {
  it('is the upper-case hex of the first 20 bytes of SHA-256(publicKey)', () => {
    const expected = nodeCrypto
      .createHash('sha256')
      .update(keyPair.publicKey)
      .digest('hex')
      .slice(0, 40)
      .toUpperCase();
    expect(deriveFingerprint(keyPair.publicKey)).toBe(expected);
  });

  it('produces different fingerprints for different keys', async () => {
    const other = await generateKeyPair();
    expect(deriveFingerprint(other.publicKey)).not.toBe(deriveFingerprint(keyPair.publicKey));
  });

  it('normalizes spacing and case', () => {
    expect(normalizeFingerprint('ab12 cd34\nef')).toBe('AB12CD34EF');
  });
});

describe('sign / verify', () => {
  const message = encode('registration payload');

  it('verifies a signature after a hex round-trip', async () => {
    const sigHex = Buffer.from(await sign(message, keyPair.secretKey)).toString('hex');
    const pubHex = Buffer.from(keyPair.publicKey).toString('hex');

    const valid = await verify(
      message,
      new Uint8Array(Buffer.from(sigHex, 'hex')),
      new Uint8Array(Buffer.from(pubHex, 'hex')),
    );
    expect(valid).toBe(true);
  });

  it('rejects a signature for a different message', async () => {
    const signature = await sign(message, keyPair.secretKey);
    expect(await verify(encode('other payload'), signature, keyPair.publicKey)).toBe(false);
  });

  it('rejects a signature from a different key', async () => {
    const other = await generateKeyPair();
    const signature = await sign(message, other.secretKey);
    expect(await verify(message, signature, keyPair.publicKey)).toBe(false);
  });
});

describe('Ed25519Backend', () => {
  let backend: Ed25519Backend;
  let fingerprint: string;
  const payload = encode('{"proof_name":"model-a"}');

  beforeEach(() => {
    backend = new Ed25519Backend();
    fingerprint = backend.addKey(keyPair);
  });

  it('addKey returns the derived fingerprint', async () => {
    expect(fingerprint).toBe(deriveFingerprint(keyPair.publicKey));
    expect(await backend.fingerprintOf(fingerprint.toLowerCase())).toBe(fingerprint);
  });

  it('signs with a keyring key and verifies against the hex public key', async () => {
    const signature = await backend.sign(payload, fingerprint);
    expect(signature).toMatch(/^[0-9a-f]{128}$/);

    const publicKey = await backend.exportPublicKey(fingerprint);
    expect(publicKey).toBe(Buffer.from(keyPair.publicKey).toString('hex'));

    const outcome = await backend.verify(payload, signature, publicKey);
    expect(outcome).toEqual({ valid: true, signerFingerprint: fingerprint });
  });

  it('verifies against a fingerprint held in the keyring', async () => {
    const signature = await backend.sign(payload, fingerprint);
    const outcome = await backend.verify(payload, signature, fingerprint);
    expect(outcome.valid).toBe(true);
  });

  it('reports an unknown identity without throwing', async () => {
    const signature = await backend.sign(payload, fingerprint);
    const outcome = await backend.verify(payload, signature, 'FP2');
    expect(outcome).toEqual({ valid: false, reason: 'Unknown identity FP2' });
  });

  it('reports a malformed signature without throwing', async () => {
    const outcome = await backend.verify(payload, 'not-hex', fingerprint);
    expect(outcome).toEqual({ valid: false, reason: 'Malformed signature' });
  });

  it('reports a signature over other bytes as not matching', async () => {
    const signature = await backend.sign(encode('other'), fingerprint);
    const outcome = await backend.verify(payload, signature, fingerprint);
    expect(outcome).toEqual({ valid: false, reason: 'Signature does not match payload' });
  });

  it('throws when signing with a key it does not hold', async () => {
    await expect(backend.sign(payload, 'FP2')).rejects.toThrow('Key FP2 not found in keyring');
  });

  it('createKey adds a fresh key', async () => {
    const created = await backend.createKey();
    expect(created).not.toBe(fingerprint);
    expect(await backend.fingerprintOf(created)).toBe(created);
  });
});

describe('identity files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-identity-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes and reads back the same keypair', async () => {
    const filePath = path.join(dir, 'alice.identity.json');
    const identity = toIdentityFile(keyPair, 'alice');
    writeIdentityFile(filePath, identity);

    expect(identity.fingerprint).toBe(deriveFingerprint(keyPair.publicKey));
    expect(identity.name).toBe('alice');

    const loaded = await readIdentityFile(filePath);
    expect(Buffer.from(loaded.publicKey).toString('hex')).toBe(identity.publicKey);
    expect(Buffer.from(loaded.secretKey).toString('hex')).toBe(identity.secretKey);
  });

  it('rejects a file whose fingerprint does not match its key', async () => {
    const filePath = path.join(dir, 'bad.identity.json');
    writeIdentityFile(filePath, { ...toIdentityFile(keyPair), fingerprint: 'FP1' });
    await expect(readIdentityFile(filePath)).rejects.toThrow('fingerprint does not match public key');
  });

  it('rejects a file without a secret key', async () => {
    const filePath = path.join(dir, 'empty.identity.json');
    fs.writeFileSync(filePath, JSON.stringify({ fingerprint: 'FP1', publicKey: 'ab' }));
    await expect(readIdentityFile(filePath)).rejects.toThrow(`Invalid identity file: ${filePath}`);
  });
});
