#!/usr/bin/env ts-node
/**
 * Ledger Verifier
 *
 * Walks the configured ledger (same environment variables as the API
 * server) and reports the first broken link. Exits 1 when the chain is
 * broken, 2 when it cannot be read.
 *
 * Usage:
 *   npm run verify-ledger
 *   STORE_BACKEND=sqlite npm run verify-ledger
 */

import { loadConfig } from '../src/config';
import { createContextFromConfig } from '../src/context';
import { ChainIntegrityError } from '../src/errors';

async function main() {
  const config = loadConfig();
  const ctx = await createContextFromConfig(config);

  try {
    const length = await ctx.ledger.assertChain();
    console.log(`Ledger OK: ${length} entries, tip ${await ctx.ledger.tip()}`);

    const members = await ctx.members.listMembers();
    const unverified = members.filter(m => !m.verified);
    console.log(`Members: ${members.length} registered, ${unverified.length} failing verification`);
    for (const m of unverified) {
      console.log(`  ${m.fingerprint}: ${m.reason}`);
    }
  } catch (err) {
    if (err instanceof ChainIntegrityError) {
      console.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  } finally {
    ctx.close();
  }
}

main().catch(err => {
  console.error('Error:', err);
  process.exit(2);
});
