/**
 * Governance records gated by identity verification.
 *
 * Proposals are not chained. Each is identified by a truncated content hash
 * of its canonical bytes and stored write-once.
 */

export const PROPOSAL_ID_LENGTH = 16;

export interface ProposalInput {
  title: string;
  description: string;
  rationale?: string;
  proposed_by?: string;
}

export interface ProposalRecord {
  proposal_id: string;
  submitted_by: string;   // fingerprint of the verified submitter
  timestamp: number;      // unix seconds
  proposal: ProposalInput;
}

export interface MemberSummary {
  proof_name: string;
  fingerprint: string;
  timestamp: number;
  verified: boolean;
  reason?: string;
}

export function isProposalInput(value: unknown): value is ProposalInput {
  if (typeof value !== 'object' || value === null) return false;
  if (!('title' in value) || typeof value.title !== 'string' || value.title.trim() === '') return false;
  if (!('description' in value) || typeof value.description !== 'string') return false;
  if ('rationale' in value && value.rationale !== undefined && typeof value.rationale !== 'string') return false;
  if ('proposed_by' in value && value.proposed_by !== undefined && typeof value.proposed_by !== 'string') return false;
  return true;
}

export function isProposalRecord(value: unknown): value is ProposalRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'proposal_id' in value &&
    typeof value.proposal_id === 'string' &&
    'submitted_by' in value &&
    typeof value.submitted_by === 'string' &&
    'timestamp' in value &&
    typeof value.timestamp === 'number' &&
    'proposal' in value &&
    isProposalInput(value.proposal)
  );
}
