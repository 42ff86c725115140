/**
 * Registration ledger.
 *
 * Entries move Draft → ChainSigned → Chained → Persisted, and optionally
 * IdentitySigned. Writers are serialized through one SerialLock so no two
 * appends observe the same tip. Readers go straight to the store.
 */

import {
  buildDraft,
  chainEntry,
  chainSignaturePayload,
  identitySignaturePayload,
  verifyRegistrationChain,
} from '../chain/chainBuilder';
import {
  GENESIS_HASH,
  ChainVerification,
  IdentitySignedEntry,
  ProofPayload,
  RegistrationEntry,
} from '../chain/types';
import { SigningIdentity } from '../crypto/signingIdentity';
import {
  ChainIntegrityError,
  EntryNotFoundError,
  LedgerError,
  LedgerPersistenceError,
  errorMessage,
} from '../errors';
import { ILedgerStore } from '../persistence/interfaces';
import { SerialLock } from './serialLock';

export interface RegistrationLedgerOptions {
  /** Unix seconds. Defaults to the wall clock. */
  clock?: () => number;
}

export class RegistrationLedger {
  private lock = new SerialLock();
  private tipHash: string | undefined;
  private clock: () => number;

  constructor(
    private store: ILedgerStore,
    readonly chainIdentity: SigningIdentity,
    options: RegistrationLedgerOptions = {},
  ) {
    this.clock = options.clock ?? (() => Math.floor(Date.now() / 1000));
  }

  /** Load the tip from the store. Called lazily by the first write. */
  async init(): Promise<string> {
    const entries = await this.load();
    this.tipHash = entries.length > 0 ? entries[entries.length - 1].chain_hash : GENESIS_HASH;
    return this.tipHash;
  }

  /** Hash the next append will link to. */
  async tip(): Promise<string> {
    return this.tipHash ?? this.init();
  }

  append(payload: ProofPayload, proofName: string): Promise<RegistrationEntry> {
    return this.lock.run(async () => {
      const prevChainHash = await this.tip();

      const draft = buildDraft({
        proofName,
        payload,
        prevChainHash,
        chainPublicKey: await this.chainIdentity.exportPublicKey(),
        timestamp: this.clock(),
      });
      const chainSignature = await this.chainIdentity.sign(chainSignaturePayload(draft));
      const entry = chainEntry({ ...draft, chain_signature: chainSignature });

      try {
        await this.store.appendEntry(entry);
      } catch (err) {
        throw new LedgerPersistenceError(`Failed to persist entry ${entry.chain_hash}: ${errorMessage(err)}`, err);
      }
      this.tipHash = entry.chain_hash;

      console.log(`Ledger: appended ${proofName} (${entry.chain_hash.slice(0, 12)})`);
      return entry;
    });
  }

  /**
   * Sign an already chained entry with a long-lived identity and replace the
   * stored copy. The chain hash is unchanged.
   */
  attachIdentitySignature(
    entry: RegistrationEntry,
    externalIdentity: SigningIdentity,
  ): Promise<IdentitySignedEntry> {
    return this.lock.run(async () => {
      const stored = (await this.load()).find(e => e.chain_hash === entry.chain_hash);
      if (!stored) throw new EntryNotFoundError(entry.chain_hash);

      const identityFingerprint = await externalIdentity.fingerprint();
      const identitySignature = await externalIdentity.sign(
        identitySignaturePayload({ ...stored, identity_fingerprint: identityFingerprint }),
      );
      const signed: IdentitySignedEntry = {
        ...stored,
        identity_fingerprint: identityFingerprint,
        identity_signature: identitySignature,
        identity_public_key: await externalIdentity.exportPublicKey(),
      };

      try {
        await this.store.replaceEntry(stored.chain_hash, signed);
      } catch (err) {
        if (err instanceof LedgerError) throw err;
        throw new LedgerPersistenceError(`Failed to replace entry ${stored.chain_hash}: ${errorMessage(err)}`, err);
      }

      console.log(`Ledger: identity ${identityFingerprint} attached to ${stored.chain_hash.slice(0, 12)}`);
      return signed;
    });
  }

  /** Entries in append order. */
  async load(): Promise<RegistrationEntry[]> {
    try {
      return await this.store.loadEntries();
    } catch (err) {
      if (err instanceof LedgerError) throw err;
      throw new LedgerPersistenceError(`Failed to load ledger: ${errorMessage(err)}`, err);
    }
  }

  async verifyChain(): Promise<ChainVerification> {
    const result = await verifyRegistrationChain(await this.load(), this.chainIdentity);
    if (!result.valid) {
      console.error(`Ledger: ${result.error}`);
    }
    return result;
  }

  /** verifyChain, throwing ChainIntegrityError at the first broken link. */
  async assertChain(): Promise<number> {
    const result = await this.verifyChain();
    if (!result.valid) {
      throw new ChainIntegrityError(result.brokenAt, result.reason, result.computedHash, result.storedHash);
    }
    return result.length;
  }
}
