/**
 * SQLite database initialization.
 * Opens the database, enables WAL mode, and runs schema migrations.
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';

const SCHEMA_SQL = `
-- ledger_entries (ILedgerStore), seq is append order
CREATE TABLE IF NOT EXISTS ledger_entries (
  seq         INTEGER PRIMARY KEY AUTOINCREMENT,
  chain_hash  TEXT NOT NULL UNIQUE,
  entry_json  TEXT NOT NULL
);

-- registrations (IRegistrationStore), latest identity-signed entry per fingerprint
CREATE TABLE IF NOT EXISTS registrations (
  fingerprint  TEXT PRIMARY KEY,
  proof_name   TEXT NOT NULL,
  chain_hash   TEXT NOT NULL,
  entry_json   TEXT NOT NULL
);

-- proposals (IProposalStore), write-once
CREATE TABLE IF NOT EXISTS proposals (
  proposal_id   TEXT PRIMARY KEY,
  submitted_by  TEXT NOT NULL,
  timestamp     INTEGER NOT NULL,
  record_json   TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_proposals_submitter ON proposals(submitted_by);
`;

export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = dbPath ?? path.join(process.cwd(), 'data', 'registry.db');

  if (resolvedPath !== ':memory:') {
    fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
  }

  const db = new Database(resolvedPath);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA_SQL);

  return db;
}
