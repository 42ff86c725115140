// Errors
export * from './errors';

// Chain
export { computeChainHash } from './chain/chainLink';
export {
  CHAIN_SIGNATURE_EXCLUDED,
  CHAIN_HASH_EXCLUDED,
  IDENTITY_SIGNATURE_EXCLUDED,
  buildDraft,
  chainEntry,
  chainSignaturePayload,
  identitySignaturePayload,
  computeEntryChainHash,
  verifyEntryHash,
  verifyRegistrationChain,
} from './chain/chainBuilder';
export { GENESIS_HASH, isIdentitySigned } from './chain/types';
export type {
  DraftEntry,
  ChainSignedEntry,
  RegistrationEntry,
  IdentitySignedEntry,
  ChainVerification,
  ProofPayload,
} from './chain/types';

// Signing
export * from './crypto';

// Ledger, identity and access control
export { RegistrationLedger } from './ledger/registrationLedger';
export type { RegistrationLedgerOptions } from './ledger/registrationLedger';
export { SerialLock } from './ledger/serialLock';
export { IdentityVerifier, verifyIdentityRecord } from './identity/identityVerifier';
export type { IdentityVerifierOptions } from './identity/identityVerifier';
export { gate } from './identity/accessGate';

// Services
export * from './services';
export type { ProposalInput, ProposalRecord, MemberSummary } from './governance/types';

// Persistence
export * from './persistence';

// Wiring
export { loadConfig } from './config';
export type { RegistryConfig } from './config';
export { createRegistryContext, createContextFromConfig } from './context';
export type { RegistryContext } from './context';
export { createApp } from './api/app';
