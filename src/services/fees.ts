import type { Merchant } from '../db/schema.js';
import { env } from '../config/env.js';
import { Decimal, fmt } from './amount.js';

// ─── Fee Policy ─────────────────────────────────────────────────────────────
// Percentages are fractions ('0.01' = 1%). Fixed fees are in token units.
// Fees always apply to the settlement (token) amount, never a fiat input.

export interface FeePolicy {
  depositPercent: string;
  withdrawPercent: string;
  withdrawFixed: string;
}

export const DEFAULT_FEE_POLICY: FeePolicy = {
  depositPercent: env.DEPOSIT_FEE_PERCENT,
  withdrawPercent: env.WITHDRAW_FEE_PERCENT,
  withdrawFixed: env.WITHDRAW_FIXED_FEE,
};

export function feePolicyFor(
  merchant: Pick<Merchant, 'depositFeePercent' | 'withdrawFeePercent' | 'withdrawFixedFee'>,
  defaults: FeePolicy = DEFAULT_FEE_POLICY,
): FeePolicy {
  return {
    depositPercent: merchant.depositFeePercent ?? defaults.depositPercent,
    withdrawPercent: merchant.withdrawFeePercent ?? defaults.withdrawPercent,
    withdrawFixed: merchant.withdrawFixedFee ?? defaults.withdrawFixed,
  };
}

export interface DepositFee {
  fee: string;
  net: string;
}

/** fee = amount × percent, rounded half-up to the token's decimals; net = amount − fee. */
export function depositFee(amount: string, decimals: number, policy: FeePolicy): DepositFee {
  const gross = new Decimal(amount);
  const fee = gross.times(policy.depositPercent).toDecimalPlaces(decimals, Decimal.ROUND_HALF_UP);
  return { fee: fmt(fee), net: fmt(gross.minus(fee)) };
}

export interface WithdrawalFee {
  fee: string;
  /** What the recipient receives: the requested amount. */
  net: string;
  /** What the merchant's balance gives up: amount + fee. */
  total: string;
}

/** fee = amount × percent + fixed. The fee is charged on top of the amount sent. */
export function withdrawalFee(amount: string, decimals: number, policy: FeePolicy): WithdrawalFee {
  const gross = new Decimal(amount);
  const fee = gross
    .times(policy.withdrawPercent)
    .plus(policy.withdrawFixed)
    .toDecimalPlaces(decimals, Decimal.ROUND_HALF_UP);
  return { fee: fmt(fee), net: fmt(gross), total: fmt(gross.plus(fee)) };
}
