import { Request, Response, NextFunction, RequestHandler } from 'express';
import { DEFAULT_ADMIN_KEY } from '../../config';
import { ErrorCodes } from '../types';

const ADMIN_KEY_HEADER = 'x-admin-key';

/**
 * Middleware to validate X-Admin-Key header for admin endpoints
 */
export function requireAdminKey(adminKey: string = DEFAULT_ADMIN_KEY): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const providedKey = req.header(ADMIN_KEY_HEADER);

    if (!providedKey) {
      res.status(401).json({
        success: false,
        error: 'Missing X-Admin-Key header',
        code: ErrorCodes.MISSING_ADMIN_KEY,
      });
      return;
    }

    if (providedKey !== adminKey) {
      res.status(401).json({
        success: false,
        error: 'Invalid admin key',
        code: ErrorCodes.INVALID_ADMIN_KEY,
      });
      return;
    }

    next();
  };
}
