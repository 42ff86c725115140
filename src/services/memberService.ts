import { isIdentitySigned, RegistrationEntry } from '../chain/types';
import { normalizeFingerprint } from '../crypto/fingerprint';
import { MemberSummary } from '../governance/types';
import { IdentityVerifier } from '../identity/identityVerifier';
import { IRegistrationStore } from '../persistence/interfaces';

export type RegisterMemberResult =
  | { registered: true; fingerprint: string; entry: RegistrationEntry }
  | { registered: false; reason: string };

/**
 * Member registry: per-fingerprint registration records, each accepted only
 * with a valid identity signature.
 */
export class MemberService {
  constructor(
    private registrations: IRegistrationStore,
    private verifier: IdentityVerifier,
  ) {}

  async registerMember(entry: RegistrationEntry): Promise<RegisterMemberResult> {
    if (!isIdentitySigned(entry)) {
      return { registered: false, reason: 'Entry is not identity-signed' };
    }
    const fingerprint = normalizeFingerprint(entry.identity_fingerprint);
    // The fingerprint is signed, so the stored record keeps it byte for byte.
    if (entry.identity_fingerprint !== fingerprint) {
      return { registered: false, reason: `Fingerprint ${entry.identity_fingerprint} is not in normalized form` };
    }

    const outcome = await this.verifier.checkRecord(entry, fingerprint);
    if (!outcome.valid) {
      console.log(`Registrar: rejected ${fingerprint}: ${outcome.reason}`);
      return { registered: false, reason: outcome.reason };
    }

    await this.registrations.put(entry);
    this.verifier.invalidate(fingerprint);

    console.log(`Registrar: registered ${entry.proof_name} as ${fingerprint}`);
    return { registered: true, fingerprint, entry };
  }

  async listMembers(): Promise<MemberSummary[]> {
    const entries = await this.registrations.list();
    const members: MemberSummary[] = [];

    for (const entry of entries) {
      const fingerprint = entry.identity_fingerprint ?? '';
      const outcome = fingerprint
        ? await this.verifier.checkRecord(entry, fingerprint)
        : { valid: false as const, reason: 'Record has no identity fingerprint' };

      if (!outcome.valid) {
        console.error(`Registrar: stored record ${fingerprint || entry.chain_hash} does not verify: ${outcome.reason}`);
      }
      members.push({
        proof_name: entry.proof_name,
        fingerprint,
        timestamp: entry.timestamp,
        verified: outcome.valid,
        ...(outcome.valid ? {} : { reason: outcome.reason }),
      });
    }

    return members.sort((a, b) => (a.fingerprint < b.fingerprint ? -1 : a.fingerprint > b.fingerprint ? 1 : 0));
  }
}
