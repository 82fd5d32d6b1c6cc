import { CHAINS, type Chain } from './catalog.js';
import type { ChainAdapter, FinalityPolicy } from './types.js';
import { EthereumAdapter } from './ethereum.js';
import { TronAdapter } from './tron.js';
import { SolanaAdapter } from './solana.js';
import { env, type Env } from '../config/env.js';
import { ErrorCode } from '../config/error-codes.js';
import { ValidationError } from '../services/errors.js';

// ─── Chain Registry ─────────────────────────────────────────────────────────
// Everything above the adapters looks chains up here. Adding a chain means one
// adapter plus one entry in each map below.

export interface ChainRegistry {
  adapter(chain: Chain): ChainAdapter;
  policy(chain: Chain): FinalityPolicy;
  chains(): Chain[];
}

export function finalityPolicies(config: Env = env): Record<Chain, FinalityPolicy> {
  return {
    ethereum: {
      requiredConfirmations: config.ETH_REQUIRED_CONFIRMATIONS,
      safetyLag: config.ETH_SAFETY_LAG,
      reorgTolerance: config.ETH_REORG_TOLERANCE,
      scanIntervalMs: config.ETH_SCAN_INTERVAL_MS,
    },
    tron: {
      requiredConfirmations: config.TRON_REQUIRED_CONFIRMATIONS,
      safetyLag: config.TRON_SAFETY_LAG,
      reorgTolerance: config.TRON_REORG_TOLERANCE,
      scanIntervalMs: config.TRON_SCAN_INTERVAL_MS,
    },
    solana: {
      requiredConfirmations: config.SOL_REQUIRED_CONFIRMATIONS,
      safetyLag: config.SOL_SAFETY_LAG,
      reorgTolerance: config.SOL_REORG_TOLERANCE,
      scanIntervalMs: config.SOL_SCAN_INTERVAL_MS,
    },
  };
}

export function registryOf(
  adapters: Partial<Record<Chain, ChainAdapter>>,
  policies: Record<Chain, FinalityPolicy> = finalityPolicies(),
): ChainRegistry {
  return {
    adapter(chain) {
      const adapter = adapters[chain];
      if (!adapter) throw new ValidationError(ErrorCode.VALIDATION_ERROR, `${chain} is not enabled on this gateway`);
      return adapter;
    },
    policy(chain) {
      return policies[chain];
    },
    chains() {
      return CHAINS.filter((chain) => adapters[chain] !== undefined);
    },
  };
}

export function createChainRegistry(config: Env = env): ChainRegistry {
  const policies = finalityPolicies(config);

  return registryOf({
    ethereum: new EthereumAdapter({
      rpcUrl: config.ETH_RPC_URL,
      usdtContract: config.ETH_USDT_CONTRACT,
      timeoutMs: config.RPC_TIMEOUT_MS,
      requiredConfirmations: policies.ethereum.requiredConfirmations,
    }),
    tron: new TronAdapter({
      apiUrl: config.TRON_API_URL,
      apiKey: config.TRON_API_KEY,
      usdtContract: config.TRON_USDT_CONTRACT,
      timeoutMs: config.RPC_TIMEOUT_MS,
      requiredConfirmations: policies.tron.requiredConfirmations,
    }),
    solana: new SolanaAdapter({
      rpcUrl: config.SOL_RPC_URL,
      timeoutMs: config.RPC_TIMEOUT_MS,
      requiredConfirmations: policies.solana.requiredConfirmations,
    }),
  }, policies);
}
