/**
 * Crypto Module
 *
 * Single entry point for signing:
 * - Ed25519 keypair generation, sign / verify
 * - Fingerprint derivation from public key
 * - Signing backends (Ed25519 keyring, GnuPG) and SigningIdentity
 */

export { generateKeyPair, keyPairFromSecret } from './keys';
export type { KeyPair } from './keys';
export { sign, verify } from './signing';
export { deriveFingerprint, normalizeFingerprint } from './fingerprint';
export type { SigningBackend, SignatureVerifier, VerificationOutcome } from './types';
export { Ed25519Backend, isEd25519PublicKey } from './ed25519Backend';
export { GpgBackend, execFileRunner, parseGpgStatus } from './gpgBackend';
export type { CommandRunner, CommandResult, GpgStatus } from './gpgBackend';
export {
  SigningIdentity,
  KeyShapeVerifier,
  createChainIdentity,
  ed25519Identity,
  DEFAULT_SIGNING_TIMEOUT_MS,
} from './signingIdentity';
export { toIdentityFile, writeIdentityFile, readIdentityFile } from './identityFile';
export type { IdentityFile } from './identityFile';
