export { MemberService } from './memberService';
export type { RegisterMemberResult } from './memberService';
export { ProposalService, computeProposalId } from './proposalService';
