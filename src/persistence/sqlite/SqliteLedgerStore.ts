import type Database from 'better-sqlite3';
import { RegistrationEntry } from '../../chain/types';
import { isRegistrationEntry } from '../../chain/validate';
import { EntryNotFoundError, LedgerPersistenceError } from '../../errors';
import { ILedgerStore } from '../interfaces';

interface EntryRow {
  seq: number;
  chain_hash: string;
  entry_json: string;
}

export class SqliteLedgerStore implements ILedgerStore {
  private stmtInsert: Database.Statement;
  private stmtAll: Database.Statement;
  private stmtReplace: Database.Statement;

  constructor(db: Database.Database) {
    this.stmtInsert = db.prepare(
      `INSERT INTO ledger_entries (chain_hash, entry_json) VALUES (?, ?)`
    );
    this.stmtAll = db.prepare(
      `SELECT * FROM ledger_entries ORDER BY seq ASC`
    );
    this.stmtReplace = db.prepare(
      `UPDATE ledger_entries SET chain_hash = ?, entry_json = ? WHERE chain_hash = ?`
    );
  }

  async loadEntries(): Promise<RegistrationEntry[]> {
    const rows = this.stmtAll.all() as EntryRow[];
    return rows.map(toEntry);
  }

  async appendEntry(entry: RegistrationEntry): Promise<void> {
    this.stmtInsert.run(entry.chain_hash, JSON.stringify(entry));
  }

  async replaceEntry(chainHash: string, entry: RegistrationEntry): Promise<void> {
    const result = this.stmtReplace.run(entry.chain_hash, JSON.stringify(entry), chainHash);
    if (result.changes === 0) throw new EntryNotFoundError(chainHash);
  }
}

function toEntry(row: EntryRow): RegistrationEntry {
  const parsed: unknown = JSON.parse(row.entry_json);
  if (!isRegistrationEntry(parsed)) {
    throw new LedgerPersistenceError(`ledger_entries row ${row.seq} is malformed`);
  }
  return parsed;
}
