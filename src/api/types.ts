import { LedgerErrorCodes } from '../errors';

/**
 * Error codes returned in `{ success: false, error, code }` bodies.
 */
export const ErrorCodes = {
  ...LedgerErrorCodes,
  INVALID_REQUEST: 'INVALID_REQUEST',
  INVALID_SIGNATURE: 'INVALID_SIGNATURE',
  IDENTITY_NOT_CONFIGURED: 'IDENTITY_NOT_CONFIGURED',
  MISSING_IDENTITY: 'MISSING_IDENTITY',
  PROPOSAL_NOT_FOUND: 'PROPOSAL_NOT_FOUND',
  MISSING_ADMIN_KEY: 'MISSING_ADMIN_KEY',
  INVALID_ADMIN_KEY: 'INVALID_ADMIN_KEY',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ErrorResponse {
  success: false;
  error: string;
  code: ErrorCode;
}

// ============================================================================
// Ledger
// ============================================================================

export interface AppendEntryRequest {
  proofName: string;
  payload: Record<string, unknown>;
  signWithIdentity?: boolean;
}

// ============================================================================
// Proposals
// ============================================================================

export interface SubmitProposalRequest {
  title: string;
  description: string;
  rationale?: string;
  proposed_by?: string;
}
