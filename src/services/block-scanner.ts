import type { ChainCursor } from '../db/schema.js';
import type { Store } from '../repositories/types.js';
import type { ChainAdapter, FinalityPolicy } from '../chains/types.js';
import type { Chain } from '../chains/catalog.js';
import { logger } from '../config/logger.js';
import { failReorgedDeposit, recordDepositTransfer, updateDepositConfirmations } from './deposit-orders.js';
import { observeWithdrawal } from './withdrawal-orders.js';
import type { SuffixStore } from './amount-suffix.js';
import { RpcUnavailableError } from './errors.js';

// ═════════════════════════════════════════════════════════════════════════════
//  BLOCK SCANNER — one cursor per chain, advanced only after a clean pass
// ═════════════════════════════════════════════════════════════════════════════

export interface ScannerDeps {
  store: Store;
  adapter: ChainAdapter;
  policy: FinalityPolicy;
  maxBlocksPerTick: number;
  maxWaitCycles: number;
  suffixes?: SuffixStore;
}

export type ScanResult =
  | { status: 'idle'; height: number; cursor: number }
  | { status: 'rpc_unavailable'; error: string }
  | {
    status: 'scanned';
    from: number;
    to: number;
    transfers: number;
    reorged: number;
    withdrawalsObserved: number;
  };

/**
 * One tick of the scanner for `deps.adapter.chain`. Re-running a tick over the
 * same range is harmless: detection is keyed by transaction hash and the
 * ledger by idempotency key.
 */
export async function scanTick(deps: ScannerDeps, now: Date = new Date()): Promise<ScanResult> {
  try {
    return await runTick(deps, now);
  } catch (err) {
    if (err instanceof RpcUnavailableError) {
      logger.warn({ chain: deps.adapter.chain, err: err.message }, 'scan tick aborted, cursor unchanged');
      return { status: 'rpc_unavailable', error: err.message };
    }
    throw err;
  }
}

async function runTick(deps: ScannerDeps, now: Date): Promise<ScanResult> {
  const { store, adapter, policy } = deps;
  const chain = adapter.chain;

  const height = await adapter.currentHeight();
  const target = height - policy.safetyLag;
  const saved = await store.cursors.get(chain);
  const cursor = saved?.lastScannedHeight ?? target - 1;

  if (target - cursor < 1) return { status: 'idle', height, cursor };

  const from = cursor + 1;
  const to = Math.min(target, cursor + deps.maxBlocksPerTick);

  // ── 1. Incoming transfers on every assigned address ──
  let transfers = 0;
  const addresses = await store.addresses.listAssigned(chain);
  for (const depositAddress of addresses) {
    for await (const transfer of adapter.scanAddress(depositAddress.address, depositAddress.token, from, to)) {
      const result = await recordDepositTransfer(store, {
        chain,
        token: depositAddress.token,
        depositAddress,
        transfer,
        requiredConfirmations: policy.requiredConfirmations,
      }, now, deps.suffixes);
      if (result) transfers++;
    }
  }

  // ── 2. Open deposits: confirmations, or gone from the chain ──
  let reorged = 0;
  for (const order of await store.orders.listOpenDeposits(chain)) {
    if (!order.txHash) continue;
    const status = await adapter.getTransfer(order.txHash);

    if (status) {
      await updateDepositConfirmations(store, order.id, status.confirmations, now);
      continue;
    }

    // A missing transaction gets reorgTolerance blocks to reappear
    const observedAt = order.blockHeight ?? to;
    if (target - observedAt > policy.reorgTolerance) {
      await failReorgedDeposit(store, order.id, now);
      reorged++;
    }
  }

  // ── 3. Outstanding withdrawals ──
  let withdrawalsObserved = 0;
  for (const order of await store.orders.listProcessingWithdrawals(chain)) {
    const status = order.txHash ? await adapter.getTransfer(order.txHash) : null;
    await observeWithdrawal(store, order.id, status, deps.maxWaitCycles, now);
    withdrawalsObserved++;
  }

  // ── 4. Advance ──
  await store.cursors.save({ chain, lastScannedHeight: to, lastScanAt: now, scanLag: height - to });

  if (transfers > 0 || reorged > 0) {
    logger.info({ chain, from, to, transfers, reorged }, 'scan tick');
  } else {
    logger.debug({ chain, from, to, lag: height - to }, 'scan tick');
  }

  return { status: 'scanned', from, to, transfers, reorged, withdrawalsObserved };
}

// ─── Recovery ───────────────────────────────────────────────────────────────

/**
 * Move a chain's cursor back so the next tick rescans from `height + 1`.
 * Never moves it forward.
 */
export async function rewindCursor(store: Store, chain: Chain, height: number, now: Date = new Date()): Promise<ChainCursor> {
  const current = await store.cursors.get(chain);
  if (current && current.lastScannedHeight <= height) return current;

  const rewound = await store.cursors.save({
    chain,
    lastScannedHeight: height,
    lastScanAt: current?.lastScanAt ?? null,
    scanLag: current?.scanLag ?? 0,
  });
  logger.warn({ chain, from: current?.lastScannedHeight ?? null, to: height, at: now.toISOString() }, 'chain cursor rewound');
  return rewound;
}
