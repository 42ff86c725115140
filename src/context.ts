/**
 * RegistryContext: the long-lived objects one process shares.
 *
 * Built once at startup and passed explicitly to the API routers, the
 * scheduler and the scripts.
 */

import { RegistryConfig } from './config';
import { GpgBackend } from './crypto/gpgBackend';
import { readIdentityFile } from './crypto/identityFile';
import {
  KeyShapeVerifier,
  SigningIdentity,
  createChainIdentity,
  ed25519Identity,
} from './crypto/signingIdentity';
import { IdentityVerifier } from './identity/identityVerifier';
import { RegistrationLedger } from './ledger/registrationLedger';
import { createFileStores } from './persistence/file';
import { createInMemoryStores } from './persistence/inMemoryStores';
import { RegistryStores } from './persistence/interfaces';
import { createSqliteStores } from './persistence/sqlite';
import { MemberService } from './services/memberService';
import { ProposalService } from './services/proposalService';

export interface RegistryContext {
  stores: RegistryStores;
  ledger: RegistrationLedger;
  /** Long-lived registrant identity; absent when none is configured. */
  externalIdentity?: SigningIdentity;
  verifier: IdentityVerifier;
  members: MemberService;
  proposals: ProposalService;
  close(): void;
}

export interface RegistryContextOptions {
  stores: RegistryStores;
  chainIdentity?: SigningIdentity;
  externalIdentity?: SigningIdentity;
  signingTimeoutMs?: number;
  verifyCacheTtlMs?: number;
  close?: () => void;
}

export async function createRegistryContext(options: RegistryContextOptions): Promise<RegistryContext> {
  const timeoutMs = options.signingTimeoutMs;
  const chainIdentity = options.chainIdentity ?? (await createChainIdentity({ timeoutMs }));
  const ledger = new RegistrationLedger(options.stores.ledger, chainIdentity);
  await ledger.init();

  // Records with an embedded Ed25519 key verify in process whatever the
  // external backend is; the rest go to the external identity's backend.
  const verifier = new IdentityVerifier(
    options.stores.registrations,
    new KeyShapeVerifier(chainIdentity, options.externalIdentity ?? chainIdentity),
    { cacheTtlMs: options.verifyCacheTtlMs },
  );

  return {
    stores: options.stores,
    ledger,
    externalIdentity: options.externalIdentity,
    verifier,
    members: new MemberService(options.stores.registrations, verifier),
    proposals: new ProposalService(options.stores.proposals, verifier),
    close: options.close ?? (() => {}),
  };
}

/** Build stores and identities from environment configuration. */
export async function createContextFromConfig(config: RegistryConfig): Promise<RegistryContext> {
  let stores: RegistryStores;
  let close: (() => void) | undefined;

  switch (config.storeBackend) {
    case 'file':
      stores = createFileStores(config.dataDir);
      break;
    case 'sqlite': {
      const sqlite = createSqliteStores(config.dbPath);
      stores = sqlite;
      close = () => sqlite.db.close();
      break;
    }
    case 'memory':
      stores = createInMemoryStores();
      break;
  }

  return createRegistryContext({
    stores,
    externalIdentity: await loadExternalIdentity(config),
    signingTimeoutMs: config.signingTimeoutMs,
    verifyCacheTtlMs: config.verifyCacheTtlMs,
    close,
  });
}

async function loadExternalIdentity(config: RegistryConfig): Promise<SigningIdentity | undefined> {
  const timeoutMs = config.signingTimeoutMs;

  if (config.signingBackend === 'gpg') {
    if (!config.identityFingerprint) return undefined;
    const backend = new GpgBackend({ binary: config.gpgBinary, timeoutMs });
    return new SigningIdentity(backend, config.identityFingerprint, { timeoutMs });
  }

  if (!config.identityKeyFile) return undefined;
  return ed25519Identity(await readIdentityFile(config.identityKeyFile), { timeoutMs });
}
