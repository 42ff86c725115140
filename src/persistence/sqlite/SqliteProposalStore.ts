import type Database from 'better-sqlite3';
import { ProposalRecord, isProposalRecord } from '../../governance/types';
import { DuplicateProposalError, LedgerPersistenceError } from '../../errors';
import { IProposalStore } from '../interfaces';

interface ProposalRow {
  proposal_id: string;
  record_json: string;
}

export class SqliteProposalStore implements IProposalStore {
  private stmtInsert: Database.Statement;
  private stmtGet: Database.Statement;
  private stmtAll: Database.Statement;

  constructor(db: Database.Database) {
    this.stmtInsert = db.prepare(
      `INSERT OR IGNORE INTO proposals (proposal_id, submitted_by, timestamp, record_json)
       VALUES (?, ?, ?, ?)`
    );
    this.stmtGet = db.prepare(`SELECT * FROM proposals WHERE proposal_id = ?`);
    this.stmtAll = db.prepare(`SELECT * FROM proposals ORDER BY timestamp ASC, proposal_id ASC`);
  }

  async insert(record: ProposalRecord): Promise<void> {
    const result = this.stmtInsert.run(
      record.proposal_id,
      record.submitted_by,
      record.timestamp,
      JSON.stringify(record),
    );
    if (result.changes === 0) throw new DuplicateProposalError(record.proposal_id);
  }

  async get(proposalId: string): Promise<ProposalRecord | undefined> {
    const row = this.stmtGet.get(proposalId) as ProposalRow | undefined;
    return row ? toRecord(row) : undefined;
  }

  async list(): Promise<ProposalRecord[]> {
    const rows = this.stmtAll.all() as ProposalRow[];
    return rows.map(toRecord);
  }
}

function toRecord(row: ProposalRow): ProposalRecord {
  const parsed: unknown = JSON.parse(row.record_json);
  if (!isProposalRecord(parsed)) {
    throw new LedgerPersistenceError(`proposals row ${row.proposal_id} is malformed`);
  }
  return parsed;
}
