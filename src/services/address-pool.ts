import type { DepositAddress } from '../db/schema.js';
import type { Store } from '../repositories/types.js';
import { CHAINS, tokensForChain, type Chain, type Token } from '../chains/catalog.js';
import { logger } from '../config/logger.js';
import { deriveWallet } from './wallet.js';

// ─── Deposit Address Allocation ─────────────────────────────────────────────
// A merchant holds exactly one address per (chain, token). The first request
// claims a pre-generated pool entry; an empty pool falls back to on-demand
// derivation from the HD seed. Addresses are never reassigned.

export type Deriver = typeof deriveWallet;

export async function allocateDepositAddress(
  store: Store,
  merchantId: string,
  chain: Chain,
  token: Token,
  now: Date,
  derive: Deriver = deriveWallet,
): Promise<DepositAddress> {
  return store.transaction(async (tx) => {
    const existing = await tx.addresses.findAssigned(merchantId, chain, token);
    if (existing) return existing;

    // FOR UPDATE SKIP LOCKED: concurrent claims each get a different row
    const claimed = await tx.addresses.claimFromPool(merchantId, chain, token, now);
    if (claimed) {
      logger.info({ merchantId, chain, token, address: claimed.address }, 'deposit address claimed from pool');
      return claimed;
    }

    logger.warn({ merchantId, chain, token }, 'address pool exhausted, deriving on demand');
    const index = await tx.addresses.allocateIndex(chain);
    const derived = derive(chain, index);

    return tx.addresses.insert({
      merchantId,
      chain,
      token,
      address: derived.address,
      derivationPath: derived.derivationPath,
      encryptedPrivateKey: derived.encryptedPrivateKey,
      status: 'assigned',
      totalReceived: '0',
      lastActivityAt: null,
      assignedAt: now,
    });
  });
}

/** Pre-generate unassigned pool entries for every token of a chain. */
export async function fillPool(
  store: Store,
  chain: Chain,
  count: number,
  derive: Deriver = deriveWallet,
): Promise<number> {
  let created = 0;
  for (const spec of tokensForChain(chain)) {
    for (let i = 0; i < count; i++) {
      await store.transaction(async (tx) => {
        const index = await tx.addresses.allocateIndex(chain);
        const derived = derive(chain, index);
        await tx.addresses.insert({
          merchantId: null,
          chain,
          token: spec.token,
          address: derived.address,
          derivationPath: derived.derivationPath,
          encryptedPrivateKey: derived.encryptedPrivateKey,
          status: 'available',
          totalReceived: '0',
          lastActivityAt: null,
          assignedAt: null,
        });
      });
      created++;
    }
  }
  logger.info({ chain, created }, 'address pool filled');
  return created;
}

// ─── Pool Status (for admin monitoring) ─────────────────────────────────────

export async function getPoolStatus(store: Store): Promise<Array<{ chain: Chain; token: Token; available: number }>> {
  const rows = await store.addresses.poolStatus();

  // Every payment method is represented, even at zero
  return CHAINS.flatMap((chain) => tokensForChain(chain).map((spec) => ({
    chain,
    token: spec.token,
    available: rows.find((r) => r.chain === chain && r.token === spec.token)?.available ?? 0,
  })));
}
