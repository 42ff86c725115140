import type Database from 'better-sqlite3';
import { IdentitySignedEntry, RegistrationEntry } from '../../chain/types';
import { isRegistrationEntry } from '../../chain/validate';
import { IRegistrationStore } from '../interfaces';

interface RegistrationRow {
  fingerprint: string;
  entry_json: string;
}

export class SqliteRegistrationStore implements IRegistrationStore {
  private stmtUpsert: Database.Statement;
  private stmtGet: Database.Statement;
  private stmtAll: Database.Statement;

  constructor(db: Database.Database) {
    this.stmtUpsert = db.prepare(
      `INSERT INTO registrations (fingerprint, proof_name, chain_hash, entry_json)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(fingerprint) DO UPDATE SET
         proof_name = excluded.proof_name,
         chain_hash = excluded.chain_hash,
         entry_json = excluded.entry_json`
    );
    this.stmtGet = db.prepare(`SELECT * FROM registrations WHERE fingerprint = ?`);
    this.stmtAll = db.prepare(`SELECT * FROM registrations ORDER BY fingerprint ASC`);
  }

  async get(fingerprint: string): Promise<RegistrationEntry | undefined> {
    const row = this.stmtGet.get(fingerprint) as RegistrationRow | undefined;
    return row ? toEntry(row) : undefined;
  }

  async put(entry: IdentitySignedEntry): Promise<void> {
    this.stmtUpsert.run(
      entry.identity_fingerprint,
      entry.proof_name,
      entry.chain_hash,
      JSON.stringify(entry),
    );
  }

  async list(): Promise<RegistrationEntry[]> {
    const rows = this.stmtAll.all() as RegistrationRow[];
    return rows.map(toEntry).filter((e): e is RegistrationEntry => e !== undefined);
  }
}

function toEntry(row: RegistrationRow): RegistrationEntry | undefined {
  const parsed: unknown = JSON.parse(row.entry_json);
  if (!isRegistrationEntry(parsed)) {
    console.error(`Registrar: registration row ${row.fingerprint} is malformed`);
    return undefined;
  }
  return parsed;
}
