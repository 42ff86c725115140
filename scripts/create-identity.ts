#!/usr/bin/env ts-node
/**
 * Identity Generator
 *
 * Generates a long-lived Ed25519 registrant identity and saves it as a JSON
 * key file for IDENTITY_KEY_FILE.
 *
 * Usage:
 *   npm run create-identity
 *   npm run create-identity -- --name alice
 *   npm run create-identity -- --out identities/
 */

import * as path from 'path';
import { generateKeyPair } from '../src/crypto/keys';
import { toIdentityFile, writeIdentityFile } from '../src/crypto/identityFile';

async function main() {
  const args = process.argv.slice(2);
  const nameIdx = args.indexOf('--name');
  const outIdx = args.indexOf('--out');

  const name = nameIdx >= 0 ? args[nameIdx + 1] : undefined;
  const outDir = outIdx >= 0 ? args[outIdx + 1] : 'identities';

  console.log('Generating Ed25519 keypair...');
  const identity = toIdentityFile(await generateKeyPair(), name);
  console.log(`  Fingerprint: ${identity.fingerprint}`);

  const fileName = `${name ?? identity.fingerprint.slice(0, 16)}.identity.json`;
  const filePath = path.join(path.resolve(outDir), fileName);
  writeIdentityFile(filePath, identity);

  console.log(`\n  Identity saved to: ${filePath}`);
  console.log(`  Start the API with IDENTITY_KEY_FILE=${filePath} to sign registrations with it.\n`);
}

main().catch(err => {
  console.error('Error:', err);
  process.exit(1);
});
