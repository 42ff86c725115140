import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RegistrationLedger } from '../registrationLedger';
import { identitySignaturePayload } from '../../chain/chainBuilder';
import { GENESIS_HASH, RegistrationEntry } from '../../chain/types';
import { SigningIdentity, createChainIdentity, ed25519Identity } from '../../crypto/signingIdentity';
import { generateKeyPair } from '../../crypto/keys';
import { deriveFingerprint } from '../../crypto/fingerprint';
import { SigningBackend, VerificationOutcome } from '../../crypto/types';
import {
  ChainIntegrityError,
  EntryNotFoundError,
  LedgerPersistenceError,
  SigningBackendError,
} from '../../errors';
import { InMemoryLedgerStore } from '../../persistence/inMemoryStores';
import { FileLedgerStore } from '../../persistence/file/FileLedgerStore';

class FlakyLedgerStore extends InMemoryLedgerStore {
  failNextAppend = false;

  async appendEntry(entry: RegistrationEntry): Promise<void> {
    if (this.failNextAppend) {
      this.failNextAppend = false;
      throw new Error('disk full');
    }
    return super.appendEntry(entry);
  }
}

class UnreachableBackend implements SigningBackend {
  readonly name = 'offline';
  async sign(): Promise<string> {
    throw new Error('connection refused');
  }
  async verify(): Promise<VerificationOutcome> {
    return { valid: false, reason: 'offline' };
  }
  async exportPublicKey(): Promise<string> {
    return 'ab'.repeat(32);
  }
  async fingerprintOf(keyRef: string): Promise<string> {
    return keyRef;
  }
}

let chainIdentity: SigningIdentity;

beforeAll(async () => {
  chainIdentity = await createChainIdentity();
});

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('RegistrationLedger.append', () => {
  it('links the first entry to genesis and advances the tip', async () => {
    const ledger = new RegistrationLedger(new InMemoryLedgerStore(), chainIdentity, { clock: () => 1772352000 });
    expect(await ledger.tip()).toBe(GENESIS_HASH);

    const entry = await ledger.append({ v: 1 }, 'model-a');

    expect(entry.prev_chain_hash).toBe(GENESIS_HASH);
    expect(entry.timestamp).toBe(1772352000);
    expect(entry.proof_name).toBe('model-a');
    expect(entry.chain_public_key).toBe(await chainIdentity.exportPublicKey());
    expect(await ledger.tip()).toBe(entry.chain_hash);
    expect(await ledger.load()).toEqual([entry]);
  });

  it('chains consecutive entries', async () => {
    const ledger = new RegistrationLedger(new InMemoryLedgerStore(), chainIdentity);
    const e0 = await ledger.append({ v: 1 }, 'p');
    const e1 = await ledger.append({ v: 2 }, 'p');
    expect(e1.prev_chain_hash).toBe(e0.chain_hash);
  });

  it('serializes concurrent appends into one linear chain', async () => {
    const ledger = new RegistrationLedger(new InMemoryLedgerStore(), chainIdentity);
    const appended = await Promise.all(
      Array.from({ length: 10 }, (_, i) => ledger.append({ v: i }, 'concurrent'))
    );

    const prevHashes = new Set(appended.map(e => e.prev_chain_hash));
    expect(prevHashes.size).toBe(10);
    expect(appended.map(e => e.payload.v)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(await ledger.verifyChain()).toEqual({ valid: true, length: 10 });
  });

  it('does not advance the tip when persisting fails', async () => {
    const store = new FlakyLedgerStore();
    const ledger = new RegistrationLedger(store, chainIdentity);
    const first = await ledger.append({ v: 1 }, 'p');

    store.failNextAppend = true;
    await expect(ledger.append({ v: 2 }, 'p')).rejects.toBeInstanceOf(LedgerPersistenceError);
    expect(await ledger.tip()).toBe(first.chain_hash);

    const next = await ledger.append({ v: 3 }, 'p');
    expect(next.prev_chain_hash).toBe(first.chain_hash);
    expect(await ledger.verifyChain()).toEqual({ valid: true, length: 2 });
  });

  it('persists nothing when the chain identity cannot sign', async () => {
    const store = new InMemoryLedgerStore();
    const offline = new SigningIdentity(new UnreachableBackend(), 'FP1');
    const ledger = new RegistrationLedger(store, offline);

    await expect(ledger.append({ v: 1 }, 'p')).rejects.toBeInstanceOf(SigningBackendError);
    expect(await store.loadEntries()).toEqual([]);
    expect(await ledger.tip()).toBe(GENESIS_HASH);
  });

  it('resumes from the tip of an existing store', async () => {
    const store = new InMemoryLedgerStore();
    const before = await new RegistrationLedger(store, chainIdentity).append({ v: 1 }, 'p');

    // A restarted process gets a new chain identity.
    const restarted = new RegistrationLedger(store, await createChainIdentity());
    expect(await restarted.init()).toBe(before.chain_hash);

    const after = await restarted.append({ v: 2 }, 'p');
    expect(after.prev_chain_hash).toBe(before.chain_hash);
    expect(after.chain_public_key).not.toBe(before.chain_public_key);
    expect(await restarted.verifyChain()).toEqual({ valid: true, length: 2 });
  });
});

describe('RegistrationLedger.verifyChain', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-chain-'));
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it('detects a payload edited in storage at its index', async () => {
    const store = new FileLedgerStore(dataDir);
    const ledger = new RegistrationLedger(store, chainIdentity);
    await ledger.append({ v: 1 }, 'p');
    await ledger.append({ v: 2 }, 'p');
    await ledger.append({ v: 3 }, 'p');
    expect(await ledger.verifyChain()).toEqual({ valid: true, length: 3 });

    const stored = JSON.parse(fs.readFileSync(store.filePath, 'utf-8'));
    stored[1].payload.v = 4;
    fs.writeFileSync(store.filePath, JSON.stringify(stored));

    const result = await ledger.verifyChain();
    expect(result).toMatchObject({ valid: false, length: 3, brokenAt: 1, reason: 'hash_mismatch' });
  });

  it('assertChain throws ChainIntegrityError with the index', async () => {
    const store = new FileLedgerStore(dataDir);
    const ledger = new RegistrationLedger(store, chainIdentity);
    await ledger.append({ v: 1 }, 'p');
    await ledger.append({ v: 2 }, 'p');
    expect(await ledger.assertChain()).toBe(2);

    const stored = JSON.parse(fs.readFileSync(store.filePath, 'utf-8'));
    stored[0].proof_name = 'forged';
    fs.writeFileSync(store.filePath, JSON.stringify(stored));

    const err = await ledger.assertChain().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ChainIntegrityError);
    expect(err).toHaveProperty('index', 0);
    expect(err).toHaveProperty('storedHash', stored[0].chain_hash);
  });
});

describe('RegistrationLedger.attachIdentitySignature', () => {
  it('signs the entry with the external identity without changing its chain hash', async () => {
    const keyPair = await generateKeyPair();
    const external = ed25519Identity(keyPair);
    const fingerprint = deriveFingerprint(keyPair.publicKey);

    const ledger = new RegistrationLedger(new InMemoryLedgerStore(), chainIdentity);
    const entry = await ledger.append({ v: 1 }, 'model-a');
    const second = await ledger.append({ v: 2 }, 'model-a');

    const signed = await ledger.attachIdentitySignature(entry, external);

    expect(signed.chain_hash).toBe(entry.chain_hash);
    expect(signed.identity_fingerprint).toBe(fingerprint);
    expect(signed.identity_public_key).toBe(Buffer.from(keyPair.publicKey).toString('hex'));
    expect(await ledger.load()).toEqual([signed, second]);
    expect(await ledger.verifyChain()).toEqual({ valid: true, length: 2 });

    const outcome = await external.verify(
      identitySignaturePayload(signed),
      signed.identity_signature,
      signed.identity_public_key,
    );
    expect(outcome).toEqual({ valid: true, signerFingerprint: fingerprint });
  });

  it('rejects an entry that is not in the ledger', async () => {
    const ledger = new RegistrationLedger(new InMemoryLedgerStore(), chainIdentity);
    const other = new RegistrationLedger(new InMemoryLedgerStore(), chainIdentity);
    const foreign = await other.append({ v: 1 }, 'p');

    const external = ed25519Identity(await generateKeyPair());
    await expect(ledger.attachIdentitySignature(foreign, external)).rejects.toBeInstanceOf(EntryNotFoundError);
  });
});
