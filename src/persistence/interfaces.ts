import { IdentitySignedEntry, RegistrationEntry } from '../chain/types';
import { ProposalRecord } from '../governance/types';

/**
 * Ordered, append-only ledger. Every write replaces the stored document or
 * commits a transaction, so readers see the state before or after a write,
 * never a partial entry.
 */
export interface ILedgerStore {
  loadEntries(): Promise<RegistrationEntry[]>;
  appendEntry(entry: RegistrationEntry): Promise<void>;
  /** Throws EntryNotFoundError when no stored entry has `chainHash`. */
  replaceEntry(chainHash: string, entry: RegistrationEntry): Promise<void>;
}

/** Per-fingerprint registration records. */
export interface IRegistrationStore {
  get(fingerprint: string): Promise<RegistrationEntry | undefined>;
  put(entry: IdentitySignedEntry): Promise<void>;
  list(): Promise<RegistrationEntry[]>;
}

/** Write-once proposal records keyed by proposal id. */
export interface IProposalStore {
  /** Throws DuplicateProposalError when the id is already stored. */
  insert(record: ProposalRecord): Promise<void>;
  get(proposalId: string): Promise<ProposalRecord | undefined>;
  list(): Promise<ProposalRecord[]>;
}

export interface RegistryStores {
  ledger: ILedgerStore;
  registrations: IRegistrationStore;
  proposals: IProposalStore;
}
