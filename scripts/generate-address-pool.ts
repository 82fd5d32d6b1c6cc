/**
 * Pre-generate the deposit address pool.
 *
 * Usage:
 *   npx tsx scripts/generate-address-pool.ts [count] [chain]
 *   npx tsx scripts/generate-address-pool.ts 100          # 100 per token on every chain
 *   npx tsx scripts/generate-address-pool.ts 200 tron     # 200 per token on TRON only
 */

import { db, closeDb } from '../src/db/index.js';
import { DrizzleStore } from '../src/db/store.js';
import { CHAINS, isChain, type Chain } from '../src/chains/catalog.js';
import { fillPool, getPoolStatus } from '../src/services/address-pool.js';

async function main() {
  const countArg = parseInt(process.argv[2] ?? '100', 10);
  const chainArg = process.argv[3];

  if (isNaN(countArg) || countArg < 1) {
    console.error('Usage: npx tsx scripts/generate-address-pool.ts [count] [chain]');
    process.exit(1);
  }

  if (chainArg !== undefined && !isChain(chainArg)) {
    console.error(`Invalid chain "${chainArg}". Valid: ${CHAINS.join(', ')}`);
    process.exit(1);
  }

  const chains: Chain[] = chainArg !== undefined && isChain(chainArg) ? [chainArg] : [...CHAINS];
  const store = new DrizzleStore(db);

  console.log(`\nGenerating ${countArg} address(es) per token for: ${chains.join(', ')}\n`);

  for (const chain of chains) {
    const created = await fillPool(store, chain, countArg);
    console.log(`  ${chain}: ${created} created ✓`);
  }

  console.log('\n── Pool Status ──────────────────────────');
  for (const s of await getPoolStatus(store)) {
    console.log(`  ${s.chain.padEnd(10)} ${s.token.padEnd(5)} ${s.available} available`);
  }
  console.log('');

  await closeDb();
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
