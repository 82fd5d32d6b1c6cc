import { ErrorCode } from '../config/error-codes.js';

export class GatewayError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Chain RPC unreachable or timed out. Transient: never a negative answer. */
export class RpcUnavailableError extends GatewayError {
  constructor(chain: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(ErrorCode.RPC_UNAVAILABLE, `${chain} RPC unavailable: ${detail}`, { chain });
  }
}

/**
 * The node refused the transaction. The transaction may still have been
 * accepted elsewhere, so callers reconcile through later scans.
 */
export class BroadcastRejectedError extends GatewayError {
  readonly chainDetail: string;

  constructor(chain: string, chainDetail: string) {
    super(ErrorCode.BROADCAST_REJECTED, `${chain} broadcast rejected: ${chainDetail}`, { chain, chainDetail });
    this.chainDetail = chainDetail;
  }
}

export class ReorgedError extends GatewayError {
  constructor(orderNo: string, txHash: string) {
    super(ErrorCode.REORGED, `Transaction ${txHash} for order ${orderNo} is no longer on chain`, { orderNo, txHash });
  }
}

export class InsufficientBalanceError extends GatewayError {
  constructor(accountId: string, required: string, available: string) {
    super(
      ErrorCode.INSUFFICIENT_BALANCE,
      `Insufficient balance on account ${accountId}: required=${required}, available=${available}`,
      { accountId, required, available },
    );
  }
}

export class DeliveryFailedError extends GatewayError {
  constructor(url: string, status: number | null, reason: string) {
    super(ErrorCode.DELIVERY_FAILED, `Webhook delivery to ${url} failed: ${reason}`, { url, status });
  }
}

export class InvalidTransitionError extends GatewayError {
  constructor(orderNo: string, from: string, to: string) {
    super(ErrorCode.INVALID_TRANSITION, `Cannot transition order ${orderNo} from ${from} to ${to}`, { orderNo, from, to });
  }
}

export class NotFoundError extends GatewayError {
  constructor(what: string, id: string) {
    super(what === 'order' ? ErrorCode.ORDER_NOT_FOUND : ErrorCode.NOT_FOUND, `${what} ${id} not found`, { id });
  }
}

export class ValidationError extends GatewayError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
  }
}

export class InvalidAddressError extends GatewayError {
  constructor(chain: string, address: string) {
    super(ErrorCode.INVALID_ADDRESS, `${address} is not a valid ${chain} address`, { chain, address });
  }
}

/** Merchant request authentication failed: unknown merchant, stale timestamp or bad signature. */
export class SignatureError extends GatewayError {
  constructor(code: typeof ErrorCode.INVALID_MERCHANT | typeof ErrorCode.TIMESTAMP_EXPIRED | typeof ErrorCode.INVALID_SIGNATURE, message: string) {
    super(code, message);
  }
}
