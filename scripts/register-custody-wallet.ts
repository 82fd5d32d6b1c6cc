/**
 * Register the custody wallets a chain needs: a hot wallet (derived from the
 * HD seed, pays withdrawals and gas top-ups) and a cold wallet (address only,
 * receives sweeps).
 *
 * Usage:
 *   npx tsx scripts/register-custody-wallet.ts hot <chain> <hdIndex>
 *   npx tsx scripts/register-custody-wallet.ts cold <chain> <address>
 */

import { db, closeDb } from '../src/db/index.js';
import { DrizzleStore } from '../src/db/store.js';
import { CHAINS, isChain } from '../src/chains/catalog.js';
import { createChainRegistry } from '../src/chains/registry.js';
import { deriveWallet } from '../src/services/wallet.js';

const USAGE = 'Usage: npx tsx scripts/register-custody-wallet.ts <hot|cold> <chain> <hdIndex|address>';

async function main() {
  const [role, chain, arg] = process.argv.slice(2);

  if ((role !== 'hot' && role !== 'cold') || !chain || !arg) {
    console.error(USAGE);
    process.exit(1);
  }
  if (!isChain(chain)) {
    console.error(`Invalid chain "${chain}". Valid: ${CHAINS.join(', ')}`);
    process.exit(1);
  }

  const store = new DrizzleStore(db);
  const existing = await store.custody.findActive(chain, role);
  if (existing) {
    console.error(`An active ${role} wallet already exists on ${chain}: ${existing.address}`);
    process.exit(1);
  }

  if (role === 'hot') {
    const index = parseInt(arg, 10);
    if (isNaN(index) || index < 0) {
      console.error(USAGE);
      process.exit(1);
    }
    const derived = deriveWallet(chain, index);
    await store.custody.insert({
      chain,
      role,
      address: derived.address,
      encryptedPrivateKey: derived.encryptedPrivateKey,
      isActive: true,
    });
    console.log(`\n  ${chain} hot wallet: ${derived.address} (${derived.derivationPath})\n`);
  } else {
    if (!createChainRegistry().adapter(chain).validateAddress(arg)) {
      console.error(`"${arg}" is not a valid ${chain} address`);
      process.exit(1);
    }
    await store.custody.insert({ chain, role, address: arg, encryptedPrivateKey: null, isActive: true });
    console.log(`\n  ${chain} cold wallet: ${arg}\n`);
  }

  await closeDb();
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
