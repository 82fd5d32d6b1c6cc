import { createHmac, timingSafeEqual } from 'node:crypto';

// ─── Field Orders ───────────────────────────────────────────────────────────
// sign = hex(HMAC-SHA256(values concatenated in this order, secret)).
// Missing optional values contribute an empty string.

export const SIGN_FIELDS = {
  depositCreate: ['merchant_no', 'timestamp', 'nonce', 'out_trade_no', 'token', 'chain', 'amount', 'callback_url'],
  withdrawCreate: ['merchant_no', 'timestamp', 'nonce', 'out_trade_no', 'token', 'chain', 'amount', 'to_address', 'callback_url'],
  query: ['merchant_no', 'timestamp', 'nonce', 'order_no'],
  queryByOutTradeNo: ['merchant_no', 'timestamp', 'nonce', 'out_trade_no', 'order_type'],
  callback: ['merchant_no', 'order_no', 'status', 'amount'],
} as const;

export type SignOperation = keyof typeof SIGN_FIELDS;

export type SignableParams = Record<string, string | number | boolean | null | undefined>;

export function buildSignString(params: SignableParams, fields: readonly string[]): string {
  return fields.map((field) => {
    const value = params[field];
    return value === null || value === undefined ? '' : String(value);
  }).join('');
}

export function sign(params: SignableParams, fields: readonly string[], secret: string): string {
  return createHmac('sha256', secret).update(buildSignString(params, fields), 'utf8').digest('hex');
}

export function verifySignature(
  params: SignableParams,
  fields: readonly string[],
  secret: string,
  provided: string,
): boolean {
  const expected = Buffer.from(sign(params, fields, secret), 'utf8');
  const actual = Buffer.from(provided.toLowerCase(), 'utf8');
  if (expected.length !== actual.length) return false;
  return timingSafeEqual(expected, actual);
}

/** Request timestamps are milliseconds and must sit within ±window of server time. */
export function isTimestampFresh(timestampMs: number, nowMs: number, windowMinutes: number): boolean {
  return Math.abs(nowMs - timestampMs) <= windowMinutes * 60_000;
}
