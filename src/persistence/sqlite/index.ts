export { openDatabase } from './database';
export { SqliteLedgerStore } from './SqliteLedgerStore';
export { SqliteRegistrationStore } from './SqliteRegistrationStore';
export { SqliteProposalStore } from './SqliteProposalStore';

import type Database from 'better-sqlite3';
import { openDatabase } from './database';
import { SqliteLedgerStore } from './SqliteLedgerStore';
import { SqliteRegistrationStore } from './SqliteRegistrationStore';
import { SqliteProposalStore } from './SqliteProposalStore';

export interface SqliteStores {
  db: Database.Database;
  ledger: SqliteLedgerStore;
  registrations: SqliteRegistrationStore;
  proposals: SqliteProposalStore;
}

export function createSqliteStores(dbPath?: string): SqliteStores {
  const db = openDatabase(dbPath);
  return {
    db,
    ledger: new SqliteLedgerStore(db),
    registrations: new SqliteRegistrationStore(db),
    proposals: new SqliteProposalStore(db),
  };
}
