import { Decimal } from 'decimal.js';

// Configure decimal.js for financial precision
Decimal.set({ precision: 36, rounding: Decimal.ROUND_HALF_EVEN });

export { Decimal };

/** Canonical string form for persisted amounts: no exponent, no trailing zeros. */
export function fmt(value: Decimal.Value): string {
  return new Decimal(value).toFixed();
}

export function isPositiveAmount(value: string): boolean {
  try {
    const d = new Decimal(value);
    return d.isFinite() && d.isPositive() && !d.isZero();
  } catch {
    return false;
  }
}

/** Whole base units (wei, sun, lamports) for an amount; fractional dust is truncated. */
export function toBaseUnits(amount: Decimal.Value, decimals: number): bigint {
  return BigInt(new Decimal(amount).times(new Decimal(10).pow(decimals)).toDecimalPlaces(0, Decimal.ROUND_DOWN).toFixed(0));
}

export function fromBaseUnits(units: bigint | string | number, decimals: number): string {
  return fmt(new Decimal(units.toString()).div(new Decimal(10).pow(decimals)));
}

export function amountsEqual(a: Decimal.Value, b: Decimal.Value): boolean {
  return new Decimal(a).eq(b);
}
