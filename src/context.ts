import type { Store } from './repositories/types.js';
import type { ChainRegistry } from './chains/registry.js';
import type { KeyHandle } from './chains/types.js';
import type { Env } from './config/env.js';
import type { HttpPoster } from './services/notifications.js';
import type { SuffixStore } from './services/amount-suffix.js';
import type { ExchangeRateProvider } from './services/exchange-rate.js';
import type { Deriver } from './services/address-pool.js';
import type { FeePolicy } from './services/fees.js';
import type { DepositContext } from './services/deposit-orders.js';
import type { WithdrawalContext } from './services/withdrawal-orders.js';

/**
 * Everything the HTTP layer and the workers share. Built once in index.ts;
 * tests assemble it from in-memory parts.
 */
export interface AppContext {
  config: Env;
  store: Store;
  chains: ChainRegistry;
  poster: HttpPoster;
  suffixes?: SuffixStore;
  rates?: ExchangeRateProvider;
  derive?: Deriver;
  keyFor?: (encryptedPrivateKey: string) => KeyHandle;
}

export function depositContext(ctx: AppContext): DepositContext {
  return {
    store: ctx.store,
    requiredConfirmations: (chain) => ctx.chains.policy(chain).requiredConfirmations,
    rates: ctx.rates,
    suffixes: ctx.suffixes,
    derive: ctx.derive,
    expiryMinutes: ctx.config.DEPOSIT_EXPIRY_MINUTES,
    fees: feePolicy(ctx.config),
  };
}

export function withdrawalContext(ctx: AppContext): WithdrawalContext {
  return {
    store: ctx.store,
    chains: ctx.chains,
    keyFor: ctx.keyFor,
    fees: feePolicy(ctx.config),
  };
}

function feePolicy(config: Env): FeePolicy {
  return {
    depositPercent: config.DEPOSIT_FEE_PERCENT,
    withdrawPercent: config.WITHDRAW_FEE_PERCENT,
    withdrawFixed: config.WITHDRAW_FIXED_FEE,
  };
}
