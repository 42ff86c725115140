/**
 * Builds real, self-signed registration records: chained by a ledger and
 * identity-signed with a fresh Ed25519 key.
 */

import { IdentitySignedEntry } from '../../chain/types';
import { deriveFingerprint } from '../../crypto/fingerprint';
import { generateKeyPair, KeyPair } from '../../crypto/keys';
import { SigningIdentity, createChainIdentity, ed25519Identity } from '../../crypto/signingIdentity';
import { RegistrationLedger } from '../../ledger/registrationLedger';
import { InMemoryLedgerStore } from '../../persistence/inMemoryStores';

export interface TestMember {
  fingerprint: string;
  keyPair: KeyPair;
  identity: SigningIdentity;
  entry: IdentitySignedEntry;
}

export async function makeMember(proofName = 'model-a', ledger?: RegistrationLedger): Promise<TestMember> {
  const chain = ledger ?? new RegistrationLedger(new InMemoryLedgerStore(), await createChainIdentity());
  const keyPair = await generateKeyPair();
  const identity = ed25519Identity(keyPair);

  const chained = await chain.append({ proof: proofName, accuracy: 0.91 }, proofName);
  const entry = await chain.attachIdentitySignature(chained, identity);

  return { fingerprint: deriveFingerprint(keyPair.publicKey), keyPair, identity, entry };
}
