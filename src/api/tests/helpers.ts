/**
 * Test context: in-memory stores and a fresh Ed25519 external identity.
 */

import { createApp } from '../app';
import { createRegistryContext, RegistryContext } from '../../context';
import { deriveFingerprint } from '../../crypto/fingerprint';
import { generateKeyPair } from '../../crypto/keys';
import { SigningIdentity, ed25519Identity } from '../../crypto/signingIdentity';
import { createInMemoryStores } from '../../persistence/inMemoryStores';

export const ADMIN_KEY = 'test-admin-key';

export interface TestApp {
  ctx: RegistryContext;
  app: ReturnType<typeof createApp>;
  identityFingerprint?: string;
}

export async function makeTestApp(options: { withIdentity?: boolean } = {}): Promise<TestApp> {
  let identityFingerprint: string | undefined;
  let externalIdentity: SigningIdentity | undefined;
  if (options.withIdentity !== false) {
    const keyPair = await generateKeyPair();
    identityFingerprint = deriveFingerprint(keyPair.publicKey);
    externalIdentity = ed25519Identity(keyPair);
  }

  const ctx = await createRegistryContext({ stores: createInMemoryStores(), externalIdentity });
  return { ctx, app: createApp(ctx, { adminKey: ADMIN_KEY }), identityFingerprint };
}
