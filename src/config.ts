/**
 * Environment configuration, read once at startup.
 */

import * as path from 'path';
import { DEFAULT_SIGNING_TIMEOUT_MS } from './crypto/signingIdentity';

export type StoreBackend = 'file' | 'sqlite' | 'memory';
export type SigningBackendName = 'ed25519' | 'gpg';

export interface RegistryConfig {
  port: number;
  storeBackend: StoreBackend;
  dataDir: string;
  dbPath: string;
  adminKey: string;
  signingBackend: SigningBackendName;
  identityKeyFile?: string;
  identityFingerprint?: string;
  gpgBinary: string;
  signingTimeoutMs: number;
  verifyCacheTtlMs: number;
  chainAudit: {
    enabled: boolean;
    cron: string;
    timezone: string;
  };
}

export const DEFAULT_ADMIN_KEY = 'test-admin-key';

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): RegistryConfig {
  const dataDir = path.resolve(env.DATA_DIR || 'data');

  return {
    port: intVar(env, 'PORT', 3000),
    storeBackend: oneOf(env, 'STORE_BACKEND', ['file', 'sqlite', 'memory'], 'file'),
    dataDir,
    dbPath: env.DB_PATH || path.join(dataDir, 'registry.db'),
    adminKey: env.ADMIN_KEY || DEFAULT_ADMIN_KEY,
    signingBackend: oneOf(env, 'SIGNING_BACKEND', ['ed25519', 'gpg'], 'ed25519'),
    identityKeyFile: env.IDENTITY_KEY_FILE || undefined,
    identityFingerprint: env.IDENTITY_FINGERPRINT || undefined,
    gpgBinary: env.GPG_BINARY || 'gpg',
    signingTimeoutMs: intVar(env, 'SIGNING_TIMEOUT_MS', DEFAULT_SIGNING_TIMEOUT_MS),
    verifyCacheTtlMs: intVar(env, 'VERIFY_CACHE_TTL_SECS', 0) * 1000,
    chainAudit: {
      enabled: env.CHAIN_AUDIT_ENABLED === 'true',
      cron: env.CHAIN_AUDIT_CRON || '*/15 * * * *',
      timezone: env.CHAIN_AUDIT_TIMEZONE || 'UTC',
    },
  };
}

function intVar(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 0 || String(value) !== raw.trim()) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const match = allowed.find(a => a === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}
