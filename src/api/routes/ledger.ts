import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { isProofPayload } from '../../chain/validate';
import { RegistryContext } from '../../context';
import { requireAdminKey } from '../middleware/adminAuth';
import { ErrorCodes } from '../types';

/**
 * Create router for ledger endpoints.
 */
export function createLedgerRouter(ctx: RegistryContext, adminKey?: string): Router {
  const router = Router();

  /** GET /ledger/entries */
  router.get('/entries', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const entries = await ctx.ledger.load();
      res.json({ success: true, length: entries.length, entries });
    } catch (err) {
      next(err);
    }
  });

  /** POST /ledger/entries (admin) */
  const append: RequestHandler = async (req, res, next) => {
    const { proofName, payload, signWithIdentity } = req.body ?? {};

    if (typeof proofName !== 'string' || proofName.trim() === '') {
      res.status(400).json({
        success: false,
        error: 'proofName must be a non-empty string',
        code: ErrorCodes.INVALID_REQUEST,
      });
      return;
    }
    if (!isProofPayload(payload)) {
      res.status(400).json({
        success: false,
        error: 'payload must be a JSON object',
        code: ErrorCodes.INVALID_REQUEST,
      });
      return;
    }
    const externalIdentity = ctx.externalIdentity;
    if (signWithIdentity === true && !externalIdentity) {
      res.status(400).json({
        success: false,
        error: 'No external identity is configured',
        code: ErrorCodes.IDENTITY_NOT_CONFIGURED,
      });
      return;
    }

    try {
      const entry = await ctx.ledger.append(payload, proofName);
      if (signWithIdentity !== true || !externalIdentity) {
        res.status(201).json({ success: true, entry });
        return;
      }

      const signed = await ctx.ledger.attachIdentitySignature(entry, externalIdentity);
      const registration = await ctx.members.registerMember(signed);
      res.status(201).json({
        success: true,
        entry: signed,
        registered: registration.registered,
      });
    } catch (err) {
      next(err);
    }
  };
  router.post('/entries', requireAdminKey(adminKey), append);

  /** GET /ledger/verify */
  router.get('/verify', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await ctx.ledger.verifyChain();
      if (result.valid) {
        res.json({ success: true, ...result });
      } else {
        res.status(409).json({
          success: false,
          ...result,
          code: ErrorCodes.CHAIN_INTEGRITY,
        });
      }
    } catch (err) {
      next(err);
    }
  });

  return router;
}
