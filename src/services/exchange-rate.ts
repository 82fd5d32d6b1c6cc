import axios from 'axios';
import { z } from 'zod';
import type { Token } from '../chains/catalog.js';
import { env } from '../config/env.js';
import { logger } from '../config/logger.js';
import { ErrorCode } from '../config/error-codes.js';
import { Decimal, fmt } from './amount.js';
import { ValidationError } from './errors.js';

// ─── Exchange Rates ─────────────────────────────────────────────────────────
// Fiat-denominated deposits are converted to a token amount at creation time.
// The gateway only consumes a resolved rate; where it comes from is pluggable.

export interface ExchangeRateProvider {
  /** Fiat units per one token. */
  rate(token: Token, currency: string): Promise<string>;
}

const COINGECKO_IDS: Record<Token, string> = {
  USDT: 'tether',
  ETH: 'ethereum',
  TRX: 'tron',
  SOL: 'solana',
};

const simplePriceSchema = z.record(z.record(z.number().positive()));

const CACHE_TTL_MS = 60_000;

export function coingeckoRates(baseUrl: string = env.COINGECKO_API_URL): ExchangeRateProvider {
  const cache = new Map<string, { rate: string; fetchedAt: number }>();

  return {
    async rate(token, currency) {
      const vs = currency.toLowerCase();
      const key = `${token}:${vs}`;
      const cached = cache.get(key);
      if (cached && Date.now() - cached.fetchedAt < CACHE_TTL_MS) return cached.rate;

      const id = COINGECKO_IDS[token];
      const { data } = await axios.get(`${baseUrl}/simple/price`, {
        params: { ids: id, vs_currencies: vs },
        timeout: 5000,
      });

      const price = simplePriceSchema.parse(data)[id]?.[vs];
      if (price === undefined) {
        throw new ValidationError(ErrorCode.VALIDATION_ERROR, `No ${token}/${currency.toUpperCase()} rate available`);
      }

      const rate = fmt(price);
      cache.set(key, { rate, fetchedAt: Date.now() });
      logger.debug({ token, currency: vs, rate }, 'exchange rate fetched');
      return rate;
    },
  };
}

/** A provider with fixed rates, keyed "TOKEN:CURRENCY". */
export function fixedRates(rates: Record<string, string>): ExchangeRateProvider {
  return {
    async rate(token, currency) {
      const rate = rates[`${token}:${currency.toUpperCase()}`];
      if (!rate) throw new ValidationError(ErrorCode.VALIDATION_ERROR, `No ${token}/${currency.toUpperCase()} rate available`);
      return rate;
    },
  };
}

/** Token amount for a fiat amount, rounded up so the merchant is never short. */
export function fiatToToken(fiatAmount: string, rate: string, decimals: number): string {
  return fmt(new Decimal(fiatAmount).div(rate).toDecimalPlaces(decimals, Decimal.ROUND_UP));
}
