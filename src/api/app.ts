import express, { Express, Request, Response, NextFunction } from 'express';
import { RegistryContext } from '../context';
import {
  CanonicalizationError,
  ChainIntegrityError,
  DuplicateProposalError,
  EntryNotFoundError,
  LedgerError,
  PermissionDeniedError,
  SigningBackendError,
} from '../errors';
import { createLedgerRouter } from './routes/ledger';
import { createMembersRouter } from './routes/members';
import { createProposalsRouter } from './routes/proposals';
import { ErrorCodes } from './types';

export interface AppOptions {
  adminKey?: string;
}

function statusFor(err: LedgerError): number {
  if (err instanceof PermissionDeniedError) return 403;
  if (err instanceof DuplicateProposalError) return 409;
  if (err instanceof ChainIntegrityError) return 409;
  if (err instanceof EntryNotFoundError) return 404;
  if (err instanceof CanonicalizationError) return 400;
  if (err instanceof SigningBackendError) return 502;
  return 500;
}

/**
 * Create an Express app with all routes configured
 */
export function createApp(ctx: RegistryContext, options: AppOptions = {}): Express {
  const app = express();

  // Parse JSON bodies
  app.use(express.json());

  // Health check endpoint
  app.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const entries = await ctx.ledger.load();
      res.json({
        status: 'ok',
        ledgerLength: entries.length,
        tip: await ctx.ledger.tip(),
        cachedIdentities: ctx.verifier.cacheSize,
        externalIdentity: ctx.externalIdentity ? await ctx.externalIdentity.fingerprint() : null,
      });
    } catch (err) {
      next(err);
    }
  });

  // Mount routes
  app.use('/ledger', createLedgerRouter(ctx, options.adminKey));
  app.use('/members', createMembersRouter(ctx, options.adminKey));
  app.use('/proposals', createProposalsRouter(ctx));

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof LedgerError) {
      const status = statusFor(err);
      if (status >= 500) console.error(`${err.name}:`, err);
      res.status(status).json({ success: false, error: err.message, code: err.code });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({
        success: false,
        error: 'Malformed JSON body',
        code: ErrorCodes.INVALID_REQUEST,
      });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({
      success: false,
      error: 'Internal server error',
      code: ErrorCodes.INTERNAL_ERROR,
    });
  });

  return app;
}
