import { IdentitySignedEntry, RegistrationEntry } from '../chain/types';
import { ProposalRecord } from '../governance/types';
import { DuplicateProposalError, EntryNotFoundError } from '../errors';
import { ILedgerStore, IProposalStore, IRegistrationStore, RegistryStores } from './interfaces';

// Stored values are cloned on the way in and out so callers cannot mutate them.

export class InMemoryLedgerStore implements ILedgerStore {
  private entries: RegistrationEntry[] = [];

  async loadEntries(): Promise<RegistrationEntry[]> {
    return structuredClone(this.entries);
  }

  async appendEntry(entry: RegistrationEntry): Promise<void> {
    this.entries.push(structuredClone(entry));
  }

  async replaceEntry(chainHash: string, entry: RegistrationEntry): Promise<void> {
    const index = this.entries.findIndex(e => e.chain_hash === chainHash);
    if (index < 0) throw new EntryNotFoundError(chainHash);
    this.entries[index] = structuredClone(entry);
  }

  clear(): void {
    this.entries = [];
  }
}

export class InMemoryRegistrationStore implements IRegistrationStore {
  private registrations = new Map<string, RegistrationEntry>();

  async get(fingerprint: string): Promise<RegistrationEntry | undefined> {
    const entry = this.registrations.get(fingerprint);
    return entry ? structuredClone(entry) : undefined;
  }

  async put(entry: IdentitySignedEntry): Promise<void> {
    this.registrations.set(entry.identity_fingerprint, structuredClone(entry));
  }

  async list(): Promise<RegistrationEntry[]> {
    return [...this.registrations.keys()]
      .sort()
      .flatMap(fp => {
        const entry = this.registrations.get(fp);
        return entry ? [structuredClone(entry)] : [];
      });
  }
}

export class InMemoryProposalStore implements IProposalStore {
  private proposals = new Map<string, ProposalRecord>();

  async insert(record: ProposalRecord): Promise<void> {
    if (this.proposals.has(record.proposal_id)) {
      throw new DuplicateProposalError(record.proposal_id);
    }
    this.proposals.set(record.proposal_id, structuredClone(record));
  }

  async get(proposalId: string): Promise<ProposalRecord | undefined> {
    const record = this.proposals.get(proposalId);
    return record ? structuredClone(record) : undefined;
  }

  async list(): Promise<ProposalRecord[]> {
    return [...this.proposals.values()]
      .map(r => structuredClone(r))
      .sort((a, b) => a.timestamp - b.timestamp || a.proposal_id.localeCompare(b.proposal_id));
  }
}

export function createInMemoryStores(): RegistryStores {
  return {
    ledger: new InMemoryLedgerStore(),
    registrations: new InMemoryRegistrationStore(),
    proposals: new InMemoryProposalStore(),
  };
}
