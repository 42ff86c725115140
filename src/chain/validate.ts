/**
 * Runtime guards for data read from disk or received over HTTP.
 */

import { JsonValue, ProofPayload, RegistrationEntry } from './types';

export function isJsonValue(value: unknown, depth = 0): value is JsonValue {
  if (depth > 64) return false;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (value === null) return true;
      if (Array.isArray(value)) return value.every(v => isJsonValue(v, depth + 1));
      return Object.values(value).every(v => isJsonValue(v, depth + 1));
    default:
      return false;
  }
}

export function isProofPayload(value: unknown): value is ProofPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isJsonValue(value);
}

const REQUIRED_STRINGS = [
  'proof_name',
  'prev_chain_hash',
  'chain_public_key',
  'chain_signature',
  'chain_hash',
] as const;

const OPTIONAL_STRINGS = [
  'identity_fingerprint',
  'identity_signature',
  'identity_public_key',
] as const;

export function isRegistrationEntry(value: unknown): value is RegistrationEntry {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const fields = new Map<string, unknown>(Object.entries(value));

  for (const key of REQUIRED_STRINGS) {
    if (typeof fields.get(key) !== 'string') return false;
  }
  for (const key of OPTIONAL_STRINGS) {
    const v = fields.get(key);
    if (v !== undefined && typeof v !== 'string') return false;
  }
  const timestamp = fields.get('timestamp');
  if (typeof timestamp !== 'number' || !Number.isInteger(timestamp)) return false;
  return isProofPayload(fields.get('payload'));
}
