import { normalizeFingerprint } from '../crypto/fingerprint';
import { PROPOSAL_ID_LENGTH, ProposalInput, ProposalRecord } from '../governance/types';
import { gate } from '../identity/accessGate';
import { IdentityVerifier } from '../identity/identityVerifier';
import { canonicalStringify, computeHash } from '../persistence/canonicalSerialize';
import { IProposalStore } from '../persistence/interfaces';

/** Truncated SHA-256 of the proposal's canonical JSON. */
export function computeProposalId(proposal: ProposalInput): string {
  return computeHash(canonicalStringify(proposal)).slice(0, PROPOSAL_ID_LENGTH);
}

export class ProposalService {
  constructor(
    private proposals: IProposalStore,
    private verifier: IdentityVerifier,
  ) {}

  /**
   * Store a proposal on behalf of a verified member.
   * Rejects with PermissionDeniedError before anything is written when
   * `fingerprint` does not verify, and with DuplicateProposalError when the
   * same proposal was already submitted.
   */
  submitProposal(
    proposal: ProposalInput,
    fingerprint: string,
    now: number = Math.floor(Date.now() / 1000),
  ): Promise<ProposalRecord> {
    const store = gate(this.verifier, fingerprint, async (): Promise<ProposalRecord> => {
      const record: ProposalRecord = {
        proposal_id: computeProposalId(proposal),
        submitted_by: normalizeFingerprint(fingerprint),
        timestamp: now,
        proposal,
      };
      await this.proposals.insert(record);
      console.log(`Registrar: proposal ${record.proposal_id} submitted by ${record.submitted_by}`);
      return record;
    });
    return store();
  }

  getProposal(proposalId: string): Promise<ProposalRecord | undefined> {
    return this.proposals.get(proposalId);
  }

  listProposals(): Promise<ProposalRecord[]> {
    return this.proposals.list();
  }
}
