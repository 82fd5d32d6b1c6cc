import { describe, it, expect } from 'vitest';
import { amountsEqual, fmt, fromBaseUnits, isPositiveAmount, toBaseUnits } from '../src/services/amount.js';
import { depositFee, feePolicyFor, withdrawalFee, type FeePolicy } from '../src/services/fees.js';
import { fiatToToken, fixedRates } from '../src/services/exchange-rate.js';
import { releaseUniqueAmount, reserveUniqueAmount } from '../src/services/amount-suffix.js';
import { memorySuffixes } from './support/fixtures.js';

const POLICY: FeePolicy = { depositPercent: '0.01', withdrawPercent: '0.005', withdrawFixed: '1' };

describe('amount helpers', () => {
  it('formats without exponent or trailing zeros', () => {
    expect(fmt('100.500')).toBe('100.5');
    expect(fmt('0.0000001')).toBe('0.0000001');
    expect(fmt('1e21')).toBe('1000000000000000000000');
  });

  it('only accepts finite amounts above zero', () => {
    expect(isPositiveAmount('0.000001')).toBe(true);
    expect(isPositiveAmount('0')).toBe(false);
    expect(isPositiveAmount('-5')).toBe(false);
    expect(isPositiveAmount('Infinity')).toBe(false);
    expect(isPositiveAmount('twelve')).toBe(false);
  });

  it('converts to base units truncating dust', () => {
    expect(toBaseUnits('1.5', 6)).toBe(1_500_000n);
    expect(toBaseUnits('0.0000019', 6)).toBe(1n);
    expect(toBaseUnits('1', 18)).toBe(1_000_000_000_000_000_000n);
  });

  it('converts from base units', () => {
    expect(fromBaseUnits(1_500_000n, 6)).toBe('1.5');
    expect(fromBaseUnits('1000000000000000000', 18)).toBe('1');
    expect(fromBaseUnits(1, 9)).toBe('0.000000001');
  });

  it('compares numerically', () => {
    expect(amountsEqual('1.0', '1')).toBe(true);
    expect(amountsEqual('0.1', '0.10000001')).toBe(false);
  });
});

describe('fees', () => {
  it('takes the deposit fee out of the received amount', () => {
    expect(depositFee('100', 6, POLICY)).toEqual({ fee: '1', net: '99' });
  });

  it('rounds the deposit fee half-up to the token precision', () => {
    expect(depositFee('12.35', 2, { ...POLICY, depositPercent: '0.1' })).toEqual({ fee: '1.24', net: '11.11' });
    expect(depositFee('0.0000015', 6, { ...POLICY, depositPercent: '0.5' })).toEqual({ fee: '0.000001', net: '0.0000005' });
  });

  it('adds the withdrawal fee on top of the amount sent', () => {
    expect(withdrawalFee('50', 6, POLICY)).toEqual({ fee: '1.25', net: '50', total: '51.25' });
  });

  it('falls back to defaults for fees a merchant does not override', () => {
    const policy = feePolicyFor({ depositFeePercent: '0.02', withdrawFeePercent: null, withdrawFixedFee: null }, POLICY);
    expect(policy).toEqual({ depositPercent: '0.02', withdrawPercent: '0.005', withdrawFixed: '1' });
  });
});

describe('exchange rates', () => {
  it('converts fiat to token rounding up', () => {
    expect(fiatToToken('720', '7.2', 6)).toBe('100');
    expect(fiatToToken('100', '7.3', 6)).toBe('13.698631');
  });

  it('reports a missing pair as a validation error', async () => {
    const rates = fixedRates({ 'USDT:CNY': '7.2' });
    expect(await rates.rate('USDT', 'cny')).toBe('7.2');
    await expect(rates.rate('USDT', 'EUR')).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
  });
});

describe('unique amounts', () => {
  it('truncates to three places and adds the first free suffix', async () => {
    const suffixes = memorySuffixes();

    expect(await reserveUniqueAmount(suffixes, 'addr-1', '100.0049', 60)).toEqual({ amount: '100.005', suffix: 1 });
    expect(await reserveUniqueAmount(suffixes, 'addr-1', '100.004', 60)).toEqual({ amount: '100.006', suffix: 2 });
    // another address has its own suffixes
    expect(await reserveUniqueAmount(suffixes, 'addr-2', '100.004', 60)).toEqual({ amount: '100.005', suffix: 1 });
  });

  it('carries into the next whole unit', async () => {
    expect(await reserveUniqueAmount(memorySuffixes(), 'addr-1', '100.999', 60)).toEqual({ amount: '101', suffix: 1 });
  });

  it('releases a suffix once', async () => {
    const suffixes = memorySuffixes();
    const held = await reserveUniqueAmount(suffixes, 'addr-1', '50', 60);

    expect(await releaseUniqueAmount(suffixes, 'addr-1', held.amount, held.suffix)).toBe(true);
    expect(await releaseUniqueAmount(suffixes, 'addr-1', held.amount, held.suffix)).toBe(false);
    expect(await reserveUniqueAmount(suffixes, 'addr-1', '50', 60)).toEqual({ amount: '50.001', suffix: 1 });
  });
});
