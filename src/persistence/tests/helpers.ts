/**
 * Shared fixtures and store contract suites. Entries here are structurally
 * valid but not signed; store tests do not check signatures.
 */

import { GENESIS_HASH, IdentitySignedEntry, RegistrationEntry } from '../../chain/types';
import { ProposalRecord } from '../../governance/types';
import { DuplicateProposalError, EntryNotFoundError } from '../../errors';
import { ILedgerStore, IProposalStore, IRegistrationStore } from '../interfaces';

export const FP1 = 'A1B2C3D4E5F60718293A4B5C6D7E8F9012345678';
export const FP2 = 'B1B2C3D4E5F60718293A4B5C6D7E8F9012345678';

export function makeEntry(n: number, prev: string = GENESIS_HASH): RegistrationEntry {
  return {
    proof_name: `model-${n}`,
    payload: { v: n, layers: [n, n + 1] },
    timestamp: 1772352000 + n,
    prev_chain_hash: prev,
    chain_public_key: 'ab'.repeat(32),
    chain_signature: 'cd'.repeat(64),
    chain_hash: `${n}`.padStart(64, '0'),
  };
}

export function makeSignedEntry(n: number, fingerprint: string): IdentitySignedEntry {
  return {
    ...makeEntry(n),
    identity_fingerprint: fingerprint,
    identity_signature: 'ef'.repeat(64),
    identity_public_key: '12'.repeat(32),
  };
}

export function makeProposal(id: string, timestamp: number): ProposalRecord {
  return {
    proposal_id: id,
    submitted_by: FP1,
    timestamp,
    proposal: { title: `Proposal ${id}`, description: 'Raise the quorum' },
  };
}

export function describeLedgerStore(name: string, create: () => ILedgerStore): void {
  describe(`${name} (ledger contract)`, () => {
    let store: ILedgerStore;

    beforeEach(() => {
      store = create();
    });

    it('starts empty', async () => {
      expect(await store.loadEntries()).toEqual([]);
    });

    it('returns entries in append order', async () => {
      const e1 = makeEntry(1);
      const e2 = makeEntry(2, e1.chain_hash);
      const e3 = makeEntry(3, e2.chain_hash);
      await store.appendEntry(e1);
      await store.appendEntry(e2);
      await store.appendEntry(e3);

      expect(await store.loadEntries()).toEqual([e1, e2, e3]);
    });

    it('replaces an entry by chain hash in place', async () => {
      const e1 = makeEntry(1);
      const e2 = makeEntry(2, e1.chain_hash);
      await store.appendEntry(e1);
      await store.appendEntry(e2);

      const signed = { ...e1, identity_fingerprint: FP1, identity_signature: 'ef', identity_public_key: '12' };
      await store.replaceEntry(e1.chain_hash, signed);

      expect(await store.loadEntries()).toEqual([signed, e2]);
    });

    it('rejects replacing an unknown entry', async () => {
      await store.appendEntry(makeEntry(1));
      await expect(store.replaceEntry('missing', makeEntry(9))).rejects.toBeInstanceOf(EntryNotFoundError);
    });

    it('does not share stored objects with callers', async () => {
      const e1 = makeEntry(1);
      await store.appendEntry(e1);
      e1.payload.v = 99;

      const [loaded] = await store.loadEntries();
      expect(loaded.payload.v).toBe(1);
    });
  });
}

export function describeRegistrationStore(name: string, create: () => IRegistrationStore): void {
  describe(`${name} (registration contract)`, () => {
    let store: IRegistrationStore;

    beforeEach(() => {
      store = create();
    });

    it('returns undefined for an unknown fingerprint', async () => {
      expect(await store.get(FP1)).toBeUndefined();
    });

    it('stores one record per fingerprint, latest wins', async () => {
      await store.put(makeSignedEntry(1, FP1));
      await store.put(makeSignedEntry(2, FP1));
      await store.put(makeSignedEntry(3, FP2));

      expect(await store.get(FP1)).toEqual(makeSignedEntry(2, FP1));
      expect((await store.list()).map(e => e.identity_fingerprint)).toEqual([FP1, FP2]);
    });
  });
}

export function describeProposalStore(name: string, create: () => IProposalStore): void {
  describe(`${name} (proposal contract)`, () => {
    let store: IProposalStore;

    beforeEach(() => {
      store = create();
    });

    it('stores and returns a proposal', async () => {
      const record = makeProposal('0123456789abcdef', 100);
      await store.insert(record);
      expect(await store.get('0123456789abcdef')).toEqual(record);
    });

    it('is write-once', async () => {
      await store.insert(makeProposal('0123456789abcdef', 100));
      await expect(store.insert(makeProposal('0123456789abcdef', 200))).rejects.toBeInstanceOf(DuplicateProposalError);
      expect((await store.get('0123456789abcdef'))?.timestamp).toBe(100);
    });

    it('lists proposals by submission time', async () => {
      await store.insert(makeProposal('bbbbbbbbbbbbbbbb', 300));
      await store.insert(makeProposal('aaaaaaaaaaaaaaaa', 100));
      await store.insert(makeProposal('cccccccccccccccc', 200));

      expect((await store.list()).map(p => p.proposal_id)).toEqual([
        'aaaaaaaaaaaaaaaa',
        'cccccccccccccccc',
        'bbbbbbbbbbbbbbbb',
      ]);
    });

    it('returns undefined for an unknown id', async () => {
      expect(await store.get('ffffffffffffffff')).toBeUndefined();
    });
  });
}
