/**
 * Error taxonomy for the registration ledger.
 *
 * Structural failures (canonicalization, signing backend, chain integrity,
 * persistence) are thrown and propagate to the caller. Verification results
 * are never thrown: see VerificationOutcome in crypto/types.
 */

export const LedgerErrorCodes = {
  CANONICALIZATION_FAILED: 'CANONICALIZATION_FAILED',
  SIGNING_BACKEND_ERROR: 'SIGNING_BACKEND_ERROR',
  CHAIN_INTEGRITY: 'CHAIN_INTEGRITY',
  PERSISTENCE_FAILED: 'PERSISTENCE_FAILED',
  ENTRY_NOT_FOUND: 'ENTRY_NOT_FOUND',
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  DUPLICATE_PROPOSAL: 'DUPLICATE_PROPOSAL',
} as const;

export type LedgerErrorCode = (typeof LedgerErrorCodes)[keyof typeof LedgerErrorCodes];

export class LedgerError extends Error {
  constructor(
    readonly code: LedgerErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Non-serializable or cyclic input to the canonical codec. Never retried. */
export class CanonicalizationError extends LedgerError {
  constructor(message: string, readonly path: string) {
    super(LedgerErrorCodes.CANONICALIZATION_FAILED, `${message} at ${path}`);
  }
}

/** Backend unreachable, key unknown, or call timed out. */
export class SigningBackendError extends LedgerError {
  constructor(readonly backend: string, message: string, cause?: unknown) {
    super(LedgerErrorCodes.SIGNING_BACKEND_ERROR, `${backend}: ${message}`, { cause });
  }
}

export class ChainIntegrityError extends LedgerError {
  constructor(
    readonly index: number,
    readonly reason: string,
    readonly computedHash?: string,
    readonly storedHash?: string,
  ) {
    super(
      LedgerErrorCodes.CHAIN_INTEGRITY,
      computedHash !== undefined
        ? `Chain broken at entry ${index} (${reason}): computed ${computedHash}, stored ${storedHash}`
        : `Chain broken at entry ${index} (${reason})`,
    );
  }
}

export class LedgerPersistenceError extends LedgerError {
  constructor(message: string, cause?: unknown) {
    super(LedgerErrorCodes.PERSISTENCE_FAILED, message, { cause });
  }
}

export class EntryNotFoundError extends LedgerError {
  constructor(readonly chainHash: string) {
    super(LedgerErrorCodes.ENTRY_NOT_FOUND, `No ledger entry with chain hash ${chainHash}`);
  }
}

/** Raised by the access gate; the only error a protected operation's caller sees. */
export class PermissionDeniedError extends LedgerError {
  constructor(readonly fingerprint: string, readonly reason?: string) {
    super(
      LedgerErrorCodes.PERMISSION_DENIED,
      `Identity ${fingerprint} not verified - operation denied`,
    );
  }
}

export class DuplicateProposalError extends LedgerError {
  constructor(readonly proposalId: string) {
    super(LedgerErrorCodes.DUPLICATE_PROPOSAL, `Proposal ${proposalId} already exists`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
