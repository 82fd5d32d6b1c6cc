import type { Redis } from 'ioredis';
import { KEYS } from './redis.js';
import { logger } from '../config/logger.js';
import { ErrorCode } from '../config/error-codes.js';
import { Decimal, fmt } from './amount.js';
import { GatewayError } from './errors.js';

// ─── Unique Payment Amounts ─────────────────────────────────────────────────
// Several pending deposits on one address are told apart by amount: the
// requested amount is truncated to 3dp and 0.001..0.009 is added. Carry-over
// is fine (100.999 + 0.001 = 101.000).

export const SUFFIX_MIN = 1;
export const SUFFIX_MAX = 9;

export interface SuffixStore {
  /** true when the suffix was free and is now held. */
  reserve(key: string, suffix: number, ttlSeconds: number): Promise<boolean>;
  release(key: string, suffix: number): Promise<boolean>;
}

export function redisSuffixStore(redis: Redis): SuffixStore {
  return {
    async reserve(key, suffix, ttlSeconds) {
      const added = await redis.sadd(key, String(suffix));
      await redis.expire(key, ttlSeconds);
      return added === 1;
    },
    async release(key, suffix) {
      return (await redis.srem(key, String(suffix))) === 1;
    },
  };
}

export interface UniqueAmount {
  amount: string;
  suffix: number;
}

function baseAmount(amount: Decimal.Value): Decimal {
  return new Decimal(amount).toDecimalPlaces(3, Decimal.ROUND_DOWN);
}

/**
 * Reserve a suffixed amount on `address`. The TTL should outlive the order's
 * expiry window.
 *
 * @throws GatewayError(AMOUNT_UNAVAILABLE) when all nine suffixes are taken
 */
export async function reserveUniqueAmount(
  suffixes: SuffixStore,
  address: string,
  amount: string,
  ttlSeconds: number,
): Promise<UniqueAmount> {
  const base = baseAmount(amount);
  const key = KEYS.amountSuffixes(address, fmt(base));

  for (let suffix = SUFFIX_MIN; suffix <= SUFFIX_MAX; suffix++) {
    if (await suffixes.reserve(key, suffix, ttlSeconds)) {
      return { amount: fmt(base.plus(new Decimal(suffix).div(1000))), suffix };
    }
  }

  throw new GatewayError(
    ErrorCode.AMOUNT_UNAVAILABLE,
    `No free amount suffix for ${fmt(base)} on ${address}; retry later or change the amount`,
    { address, base: fmt(base) },
  );
}

/** Frees the suffix held by a reserved amount. */
export async function releaseUniqueAmount(
  suffixes: SuffixStore,
  address: string,
  amount: string,
  suffix: number,
): Promise<boolean> {
  const base = new Decimal(amount).minus(new Decimal(suffix).div(1000));
  const released = await suffixes.release(KEYS.amountSuffixes(address, fmt(base)), suffix);
  logger.debug({ address, amount, suffix, released }, 'amount suffix released');
  return released;
}
