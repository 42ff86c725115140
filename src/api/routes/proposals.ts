import { Router, Request, Response, NextFunction } from 'express';
import { RegistryContext } from '../../context';
import { ProposalInput, isProposalInput } from '../../governance/types';
import { IDENTITY_HEADER, requireVerifiedIdentity } from '../middleware/identityAuth';
import { ErrorCodes } from '../types';

/**
 * Create router for proposal endpoints. Submitting requires a verified
 * X-Identity-Fingerprint.
 */
export function createProposalsRouter(ctx: RegistryContext): Router {
  const router = Router();

  /** POST /proposals */
  router.post(
    '/',
    requireVerifiedIdentity(ctx.verifier),
    async (req: Request, res: Response, next: NextFunction) => {
      const body: unknown = req.body;
      if (!isProposalInput(body)) {
        res.status(400).json({
          success: false,
          error: 'Proposal requires a non-empty title and a description',
          code: ErrorCodes.INVALID_REQUEST,
        });
        return;
      }

      const proposal: ProposalInput = { title: body.title, description: body.description };
      if (body.rationale !== undefined) proposal.rationale = body.rationale;
      if (body.proposed_by !== undefined) proposal.proposed_by = body.proposed_by;

      try {
        const record = await ctx.proposals.submitProposal(proposal, req.header(IDENTITY_HEADER) ?? '');
        res.status(201).json({ success: true, proposal: record });
      } catch (err) {
        next(err);
      }
    },
  );

  /** GET /proposals */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const proposals = await ctx.proposals.listProposals();
      res.json({ success: true, proposals });
    } catch (err) {
      next(err);
    }
  });

  /** GET /proposals/:id */
  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const proposal = await ctx.proposals.getProposal(req.params.id);
      if (!proposal) {
        res.status(404).json({
          success: false,
          error: `Proposal ${req.params.id} not found`,
          code: ErrorCodes.PROPOSAL_NOT_FOUND,
        });
        return;
      }
      res.json({ success: true, proposal });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
