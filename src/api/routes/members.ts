import { Router, Request, Response, NextFunction } from 'express';
import { isRegistrationEntry } from '../../chain/validate';
import { RegistryContext } from '../../context';
import { requireAdminKey } from '../middleware/adminAuth';
import { ErrorCodes } from '../types';

/**
 * Create router for member registry endpoints.
 */
export function createMembersRouter(ctx: RegistryContext, adminKey?: string): Router {
  const router = Router();

  /** POST /members/register */
  router.post('/register', async (req: Request, res: Response, next: NextFunction) => {
    const entry: unknown = req.body?.entry;
    if (!isRegistrationEntry(entry)) {
      res.status(400).json({
        success: false,
        error: 'entry must be a registration entry',
        code: ErrorCodes.INVALID_REQUEST,
      });
      return;
    }

    try {
      const result = await ctx.members.registerMember(entry);
      if (!result.registered) {
        res.status(400).json({
          success: false,
          error: result.reason,
          code: ErrorCodes.INVALID_SIGNATURE,
        });
        return;
      }
      res.status(201).json({ success: true, fingerprint: result.fingerprint });
    } catch (err) {
      next(err);
    }
  });

  /** GET /members */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const members = await ctx.members.listMembers();
      res.json({ success: true, members });
    } catch (err) {
      next(err);
    }
  });

  /** GET /members/:fingerprint/verify */
  router.get('/:fingerprint/verify', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await ctx.verifier.check(req.params.fingerprint);
      res.json({
        success: true,
        fingerprint: req.params.fingerprint,
        verified: outcome.valid,
        ...(outcome.valid ? {} : { reason: outcome.reason }),
      });
    } catch (err) {
      next(err);
    }
  });

  /** POST /members/:fingerprint/invalidate (admin) */
  router.post('/:fingerprint/invalidate', requireAdminKey(adminKey), (req: Request, res: Response) => {
    const invalidated = ctx.verifier.invalidate(req.params.fingerprint);
    res.json({ success: true, invalidated });
  });

  return router;
}
