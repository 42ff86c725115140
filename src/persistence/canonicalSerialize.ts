import * as crypto from 'crypto';
import { CanonicalizationError } from '../errors';

/**
 * Canonical JSON serialization: the exact byte input to every hash and
 * signature in the ledger.
 *
 * Rules:
 * 1. Object keys sorted recursively (code-unit order)
 * 2. Date → ISO string
 * 3. Map → sorted entries array (by key)
 * 4. Set → sorted array
 * 5. BigInt → decimal string
 * 6. Arrays preserved in order
 * 7. undefined object members → omitted
 * 8. null, finite number, boolean, string → as-is
 * 9. "__proto__" is an ordinary key, serialized like any other
 *
 * Cycles, non-finite numbers, functions and symbols throw CanonicalizationError.
 */
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value, '$', new Set()));
}

/**
 * Canonical bytes of a record with the named top-level fields removed.
 * Signing and verification must pass the same `exclude` set.
 */
export function canonicalBytes(
  record: object,
  exclude: ReadonlySet<string> | readonly string[] = [],
): Uint8Array {
  if (record === null || typeof record !== 'object' || Array.isArray(record)) {
    throw new CanonicalizationError('Top-level record must be a plain object', '$');
  }
  const excluded = new Set(exclude);
  const kept: Record<string, unknown> = Object.create(null);
  for (const [key, v] of Object.entries(record)) {
    if (!excluded.has(key)) kept[key] = v;
  }
  return new TextEncoder().encode(canonicalStringify(kept));
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function canonicalize(value: unknown, path: string, ancestors: Set<object>): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new CanonicalizationError(`Non-finite number ${value}`, path);
      }
      return value;
    case 'bigint':
      return value.toString();
    case 'function':
    case 'symbol':
      throw new CanonicalizationError(`Cannot serialize ${typeof value}`, path);
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new CanonicalizationError('Invalid date', path);
    }
    return value.toISOString();
  }

  if (typeof value !== 'object') {
    throw new CanonicalizationError(`Cannot serialize ${typeof value}`, path);
  }
  const obj = value;
  if (ancestors.has(obj)) {
    throw new CanonicalizationError('Cyclic reference', path);
  }
  ancestors.add(obj);
  try {
    if (obj instanceof Map) {
      const entries = [...obj.entries()].sort((a, b) => compareKeys(String(a[0]), String(b[0])));
      return entries.map(([k, v]) => [
        canonicalize(k, `${path}<key>`, ancestors),
        canonicalize(v, `${path}[${String(k)}]`, ancestors),
      ]);
    }

    if (obj instanceof Set) {
      return [...obj]
        .map((v, i) => canonicalize(v, `${path}{${i}}`, ancestors))
        .sort((a, b) => compareKeys(JSON.stringify(a), JSON.stringify(b)));
    }

    if (Array.isArray(obj)) {
      return obj.map((v, i) => {
        const c = canonicalize(v, `${path}[${i}]`, ancestors);
        return c === undefined ? null : c;
      });
    }

    const fields: Array<[string, unknown]> = Object.entries(obj);
    fields.sort((a, b) => compareKeys(a[0], b[0]));
    // Null prototype: a "__proto__" member stays an ordinary field.
    const sorted: Record<string, unknown> = Object.create(null);
    for (const [key, field] of fields) {
      const v = canonicalize(field, `${path}.${key}`, ancestors);
      if (v !== undefined) {
        sorted[key] = v;
      }
    }
    return sorted;
  } finally {
    ancestors.delete(obj);
  }
}

export function computeHash(data: string | Uint8Array): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}
