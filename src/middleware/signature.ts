import type { Merchant } from '../db/schema.js';
import type { Store } from '../repositories/types.js';
import { ErrorCode } from '../config/error-codes.js';
import { logger } from '../config/logger.js';
import { SIGN_FIELDS, isTimestampFresh, verifySignature, type SignOperation, type SignableParams } from '../services/signature.js';
import { SignatureError } from '../services/errors.js';

export interface SignedRequest extends SignableParams {
  merchant_no: string;
  timestamp: number;
  sign: string;
}

export interface VerifyOptions {
  now: Date;
  windowMinutes: number;
}

/**
 * Authenticate a merchant API call: known active merchant, timestamp inside
 * the window, HMAC over the operation's fields. Deposit operations sign with
 * the deposit key; everything touching withdrawals signs with the withdraw key.
 * A query by order number does not know the kind up front and takes either.
 */
export async function verifyMerchantRequest(
  store: Store,
  body: SignedRequest,
  operation: SignOperation,
  keyKind: 'deposit' | 'withdraw' | 'either',
  options: VerifyOptions,
): Promise<Merchant> {
  const merchant = await store.merchants.findByNo(body.merchant_no);
  if (!merchant || !merchant.isActive) {
    throw new SignatureError(ErrorCode.INVALID_MERCHANT, 'Unknown or inactive merchant');
  }

  if (!isTimestampFresh(body.timestamp, options.now.getTime(), options.windowMinutes)) {
    throw new SignatureError(ErrorCode.TIMESTAMP_EXPIRED, `Timestamp outside the ${options.windowMinutes} minute window`);
  }

  const secrets = keyKind === 'either'
    ? [merchant.depositKey, merchant.withdrawKey]
    : [keyKind === 'deposit' ? merchant.depositKey : merchant.withdrawKey];
  if (!secrets.some((secret) => verifySignature(body, SIGN_FIELDS[operation], secret, body.sign))) {
    logger.warn({ merchantNo: body.merchant_no, operation }, 'signature mismatch');
    throw new SignatureError(ErrorCode.INVALID_SIGNATURE, 'Signature verification failed');
  }

  return merchant;
}
