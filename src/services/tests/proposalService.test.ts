import { ProposalService, computeProposalId } from '../proposalService';
import { IdentityVerifier } from '../../identity/identityVerifier';
import { createChainIdentity } from '../../crypto/signingIdentity';
import { DuplicateProposalError, PermissionDeniedError } from '../../errors';
import { InMemoryProposalStore, InMemoryRegistrationStore } from '../../persistence/inMemoryStores';
import { computeHash } from '../../persistence/canonicalSerialize';
import { makeMember, TestMember } from '../../identity/tests/helpers';

const proposal = { title: 'Raise quorum', description: 'Require 3 of 5 signatures', rationale: 'Fewer forks' };

let member: TestMember;

beforeAll(async () => {
  jest.spyOn(console, 'log').mockImplementation(() => {});
  member = await makeMember();
});

afterAll(() => {
  jest.restoreAllMocks();
});

describe('computeProposalId', () => {
  it('is the first 16 hex chars of the canonical JSON hash', () => {
    const expected = computeHash(
      '{"description":"Require 3 of 5 signatures","rationale":"Fewer forks","title":"Raise quorum"}'
    ).slice(0, 16);
    expect(computeProposalId(proposal)).toBe(expected);
  });

  it('ignores key order', () => {
    expect(computeProposalId({ description: 'd', title: 't' })).toBe(computeProposalId({ title: 't', description: 'd' }));
  });
});

describe('ProposalService', () => {
  let store: InMemoryProposalStore;
  let service: ProposalService;

  beforeEach(async () => {
    const registrations = new InMemoryRegistrationStore();
    await registrations.put(member.entry);
    store = new InMemoryProposalStore();
    service = new ProposalService(store, new IdentityVerifier(registrations, await createChainIdentity()));
  });

  it('stores a proposal from a verified member', async () => {
    const record = await service.submitProposal(proposal, member.fingerprint.toLowerCase(), 1772352000);

    expect(record).toEqual({
      proposal_id: computeProposalId(proposal),
      submitted_by: member.fingerprint,
      timestamp: 1772352000,
      proposal,
    });
    expect(await service.getProposal(record.proposal_id)).toEqual(record);
    expect(await service.listProposals()).toEqual([record]);
  });

  it('denies an unregistered fingerprint and stores nothing', async () => {
    await expect(service.submitProposal(proposal, 'FP2')).rejects.toBeInstanceOf(PermissionDeniedError);
    expect(await store.list()).toEqual([]);
  });

  it('rejects the same proposal twice', async () => {
    await service.submitProposal(proposal, member.fingerprint, 1);
    await expect(service.submitProposal(proposal, member.fingerprint, 2)).rejects.toBeInstanceOf(DuplicateProposalError);
  });
});
