import * as fs from 'fs';
import * as path from 'path';
import { ProposalRecord, isProposalRecord } from '../../governance/types';
import { DuplicateProposalError } from '../../errors';
import { IProposalStore } from '../interfaces';
import { readJson, writeJsonExclusive } from './atomicFile';

const PROPOSAL_ID = /^[0-9a-f]{1,64}$/;

/**
 * Write-once proposals:
 *   <dataDir>/proposals/proposal_<id>.json
 */
export class FileProposalStore implements IProposalStore {
  private proposalsDir: string;

  constructor(dataDir: string) {
    this.proposalsDir = path.join(dataDir, 'proposals');
    fs.mkdirSync(this.proposalsDir, { recursive: true });
  }

  private filePath(proposalId: string): string {
    return path.join(this.proposalsDir, `proposal_${proposalId}.json`);
  }

  private readFile(filePath: string): ProposalRecord | undefined {
    if (!fs.existsSync(filePath)) return undefined;
    const raw = readJson(filePath);
    return isProposalRecord(raw) ? raw : undefined;
  }

  async insert(record: ProposalRecord): Promise<void> {
    if (!PROPOSAL_ID.test(record.proposal_id)) {
      throw new Error(`Invalid proposal id: ${record.proposal_id}`);
    }
    if (!writeJsonExclusive(this.filePath(record.proposal_id), record)) {
      throw new DuplicateProposalError(record.proposal_id);
    }
  }

  async get(proposalId: string): Promise<ProposalRecord | undefined> {
    if (!PROPOSAL_ID.test(proposalId)) return undefined;
    return this.readFile(this.filePath(proposalId));
  }

  async list(): Promise<ProposalRecord[]> {
    return fs.readdirSync(this.proposalsDir)
      .filter(f => f.startsWith('proposal_') && f.endsWith('.json'))
      .map(f => this.readFile(path.join(this.proposalsDir, f)))
      .filter((p): p is ProposalRecord => p !== undefined)
      .sort((a, b) => a.timestamp - b.timestamp || a.proposal_id.localeCompare(b.proposal_id));
  }
}
