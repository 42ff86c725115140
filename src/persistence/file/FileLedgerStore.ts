import * as fs from 'fs';
import * as path from 'path';
import { RegistrationEntry } from '../../chain/types';
import { isRegistrationEntry } from '../../chain/validate';
import { EntryNotFoundError, LedgerPersistenceError } from '../../errors';
import { ILedgerStore } from '../interfaces';
import { readJson, writeJsonAtomic } from './atomicFile';

/**
 * Ledger kept as one JSON array in append order:
 *   <dataDir>/ledger/registrations.json
 */
export class FileLedgerStore implements ILedgerStore {
  readonly filePath: string;

  constructor(dataDir: string) {
    const ledgerDir = path.join(dataDir, 'ledger');
    fs.mkdirSync(ledgerDir, { recursive: true });
    this.filePath = path.join(ledgerDir, 'registrations.json');
  }

  private readAll(): RegistrationEntry[] {
    if (!fs.existsSync(this.filePath)) return [];
    const raw = readJson(this.filePath);
    if (!Array.isArray(raw)) {
      throw new LedgerPersistenceError(`${this.filePath} is not a JSON array`);
    }
    return raw.map((item: unknown, i) => {
      if (!isRegistrationEntry(item)) {
        throw new LedgerPersistenceError(`${this.filePath}: entry ${i} is malformed`);
      }
      return item;
    });
  }

  async loadEntries(): Promise<RegistrationEntry[]> {
    return this.readAll();
  }

  async appendEntry(entry: RegistrationEntry): Promise<void> {
    const entries = this.readAll();
    entries.push(entry);
    writeJsonAtomic(this.filePath, entries);
  }

  async replaceEntry(chainHash: string, entry: RegistrationEntry): Promise<void> {
    const entries = this.readAll();
    const index = entries.findIndex(e => e.chain_hash === chainHash);
    if (index < 0) throw new EntryNotFoundError(chainHash);
    entries[index] = entry;
    writeJsonAtomic(this.filePath, entries);
  }
}
