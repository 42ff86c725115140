import * as crypto from 'crypto';

/**
 * Chain hash for one ledger entry: SHA-256 over the previous chain hash
 * (UTF-8) followed by the entry's canonical bytes, as lowercase hex.
 */
export function computeChainHash(prevHash: string, canonical: Uint8Array): string {
  return crypto
    .createHash('sha256')
    .update(Buffer.from(prevHash, 'utf-8'))
    .update(canonical)
    .digest('hex');
}
