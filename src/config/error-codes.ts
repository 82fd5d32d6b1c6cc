// ─── Reason / Error Codes ───────────────────────────────────────────────────
// Surfaced to merchants in API responses and recorded on orders as failure reasons.

export const ErrorCode = {
  RPC_UNAVAILABLE: 'RPC_UNAVAILABLE',
  BROADCAST_REJECTED: 'BROADCAST_REJECTED',
  REORGED: 'REORGED',
  INSUFFICIENT_BALANCE: 'INSUFFICIENT_BALANCE',
  DELIVERY_FAILED: 'DELIVERY_FAILED',
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  INVALID_ADDRESS: 'INVALID_ADDRESS',
  INVALID_SIGNATURE: 'INVALID_SIGNATURE',
  TIMESTAMP_EXPIRED: 'TIMESTAMP_EXPIRED',
  INVALID_MERCHANT: 'INVALID_MERCHANT',
  UNSUPPORTED_TOKEN: 'UNSUPPORTED_TOKEN',
  DUPLICATE_ORDER: 'DUPLICATE_ORDER',
  ORDER_NOT_FOUND: 'ORDER_NOT_FOUND',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_2FA: 'INVALID_2FA',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  AMOUNT_UNAVAILABLE: 'AMOUNT_UNAVAILABLE',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export const HTTP_STATUS: Record<ErrorCode, number> = {
  RPC_UNAVAILABLE: 503,
  BROADCAST_REJECTED: 502,
  REORGED: 409,
  INSUFFICIENT_BALANCE: 422,
  DELIVERY_FAILED: 502,
  INVALID_TRANSITION: 409,
  INVALID_ADDRESS: 400,
  INVALID_SIGNATURE: 401,
  TIMESTAMP_EXPIRED: 401,
  INVALID_MERCHANT: 401,
  UNSUPPORTED_TOKEN: 400,
  DUPLICATE_ORDER: 409,
  ORDER_NOT_FOUND: 404,
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  INVALID_2FA: 403,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  INTERNAL_ERROR: 500,
  AMOUNT_UNAVAILABLE: 409,
};

export function apiError(code: ErrorCode, message: string) {
  return {
    success: false as const,
    error_code: code,
    error_message: message,
  };
}
