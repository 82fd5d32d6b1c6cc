import type { Merchant } from '../../src/db/schema.js';
import type { Store, NewMerchant } from '../../src/repositories/types.js';
import type { Chain, Token } from '../../src/chains/catalog.js';
import type { FinalityPolicy } from '../../src/chains/types.js';
import type { AppContext } from '../../src/context.js';
import type { HttpPoster } from '../../src/services/notifications.js';
import type { SuffixStore } from '../../src/services/amount-suffix.js';
import type { Deriver } from '../../src/services/address-pool.js';
import { registryOf } from '../../src/chains/registry.js';
import { env } from '../../src/config/env.js';
import { adjustBalance, ensureAccount } from '../../src/services/ledger.js';
import { fixedRates } from '../../src/services/exchange-rate.js';
import { MemoryStore } from './memory-store.js';
import { FakeChain, fakeKeys } from './fake-chain.js';

export const TEST_TOTP_SECRET = 'JBSWY3DPEHPK3PXP';
export const ADMIN_ID = 'admin-test';
export const DEPOSIT_KEY = 'test-deposit-key';
export const WITHDRAW_KEY = 'test-withdraw-key';

export const RECIPIENT = 'TXYZopYRdj2D9XRtbG411XZZ3kM5VkAeBf';
export const HOT_ADDRESS = 'THotWa11etAddressForTestsXXXXXXXXX';
export const COLD_ADDRESS = 'TCo1dWa11etAddressForTestsXXXXXXXX';

export const TEST_POLICY: FinalityPolicy = {
  requiredConfirmations: 3,
  safetyLag: 1,
  reorgTolerance: 4,
  scanIntervalMs: 1_000,
};

export function testPolicies(policy: FinalityPolicy = TEST_POLICY): Record<Chain, FinalityPolicy> {
  return { ethereum: policy, tron: policy, solana: policy };
}

/** Derives predictable fake addresses instead of touching the HD seed. */
export const stubDeriver: Deriver = (chain, index) => ({
  address: `${chain}-deposit-${index}`,
  encryptedPrivateKey: `enc-${chain}-${index}`,
  derivationPath: `m/test/${index}`,
});

export async function seedMerchant(store: Store, overrides: Partial<NewMerchant> = {}): Promise<Merchant> {
  return store.merchants.insert({
    merchantNo: 'M10001',
    name: 'Test Merchant',
    depositKey: DEPOSIT_KEY,
    withdrawKey: WITHDRAW_KEY,
    depositFeePercent: '0.01',
    withdrawFeePercent: '0.005',
    withdrawFixedFee: '1',
    isActive: true,
    ...overrides,
  });
}

/** Gives a merchant an opening balance through a manual adjustment. */
export async function fund(store: Store, merchantId: string, token: Token, amount: string): Promise<string> {
  const account = await ensureAccount(store, merchantId, token);
  await adjustBalance(store, {
    accountId: account.id,
    direction: 'credit',
    amount,
    reference: `opening-${amount}`,
    note: 'opening balance',
    operatorId: ADMIN_ID,
  });
  return account.id;
}

export async function seedCustody(store: Store, chain: Chain = 'tron'): Promise<void> {
  await store.custody.insert({ chain, role: 'hot', address: HOT_ADDRESS, encryptedPrivateKey: 'enc-hot', isActive: true });
  await store.custody.insert({ chain, role: 'cold', address: COLD_ADDRESS, encryptedPrivateKey: null, isActive: true });
}

// ─── In-process Stand-ins ───────────────────────────────────────────────────

export function memorySuffixes(): SuffixStore & { held: Map<string, Set<number>> } {
  const held = new Map<string, Set<number>>();
  return {
    held,
    async reserve(key, suffix) {
      const set = held.get(key) ?? new Set<number>();
      held.set(key, set);
      if (set.has(suffix)) return false;
      set.add(suffix);
      return true;
    },
    async release(key, suffix) {
      return held.get(key)?.delete(suffix) ?? false;
    },
  };
}

export interface RecordingPoster extends HttpPoster {
  calls: Array<{ url: string; body: Record<string, unknown> }>;
}

/** Answers with `statuses` in order, repeating the last one. An Error entry is thrown. */
export function recordingPoster(statuses: Array<number | Error> = [200]): RecordingPoster {
  const calls: RecordingPoster['calls'] = [];
  return {
    calls,
    async post(url, body) {
      calls.push({ url, body });
      const next = statuses[Math.min(calls.length - 1, statuses.length - 1)] ?? 200;
      if (next instanceof Error) throw next;
      return { status: next };
    },
  };
}

export interface TestHarness {
  ctx: AppContext;
  store: MemoryStore;
  chain: FakeChain;
  poster: RecordingPoster;
  suffixes: ReturnType<typeof memorySuffixes>;
  keys: ReturnType<typeof fakeKeys>;
}

export function testHarness(): TestHarness {
  const store = new MemoryStore();
  const chain = new FakeChain('tron', TEST_POLICY.requiredConfirmations);
  const poster = recordingPoster();
  const suffixes = memorySuffixes();
  const keys = fakeKeys();

  const ctx: AppContext = {
    config: {
      ...env,
      NODE_ENV: 'test',
      JWT_SECRET: 'test-secret',
      ADMIN_USER_IDS: ADMIN_ID,
      ADMIN_TOTP_SECRET: TEST_TOTP_SECRET,
      DEPOSIT_EXPIRY_MINUTES: 30,
      DEPOSIT_FEE_PERCENT: '0.01',
      WITHDRAW_FEE_PERCENT: '0.005',
      WITHDRAW_FIXED_FEE: '1',
    },
    store,
    chains: registryOf({ tron: chain }, testPolicies()),
    poster,
    suffixes,
    rates: fixedRates({ 'USDT:CNY': '7.2', 'TRX:USD': '0.25' }),
    derive: stubDeriver,
    keyFor: keys.keyFor,
  };

  return { ctx, store, chain, poster, suffixes, keys };
}
