import { Request, Response, NextFunction, RequestHandler } from 'express';
import { PermissionDeniedError } from '../../errors';
import { IdentityVerifier } from '../../identity/identityVerifier';
import { ErrorCodes } from '../types';

export const IDENTITY_HEADER = 'x-identity-fingerprint';

/**
 * Middleware form of the access gate: the request only reaches the handler
 * when the X-Identity-Fingerprint header names a verified identity.
 */
export function requireVerifiedIdentity(verifier: IdentityVerifier): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const fingerprint = req.header(IDENTITY_HEADER);
    if (!fingerprint) {
      res.status(401).json({
        success: false,
        error: 'Missing X-Identity-Fingerprint header',
        code: ErrorCodes.MISSING_IDENTITY,
      });
      return;
    }

    try {
      const outcome = await verifier.check(fingerprint);
      if (!outcome.valid) {
        console.log(`Gate: denied ${fingerprint}: ${outcome.reason}`);
        const denied = new PermissionDeniedError(fingerprint, outcome.reason);
        res.status(403).json({ success: false, error: denied.message, code: denied.code });
        return;
      }
      next();
    } catch (err) {
      next(err);
    }
  };
}
