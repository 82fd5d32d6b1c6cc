import axios from 'axios';
import type { Order, WebhookDelivery } from '../db/schema.js';
import type { Store } from '../repositories/types.js';
import { env } from '../config/env.js';
import { logger } from '../config/logger.js';
import { ErrorCode } from '../config/error-codes.js';
import { SIGN_FIELDS, sign } from './signature.js';
import { DeliveryFailedError, NotFoundError, ValidationError } from './errors.js';

// ─── Retry Schedule ─────────────────────────────────────────────────────────
// The first attempt is immediate; each failure waits the next step. After the
// last step fails the delivery is marked failed and waits for a manual resend.

export const RETRY_SCHEDULE_MS = [
  60_000,          // 1 minute
  5 * 60_000,      // 5 minutes
  15 * 60_000,     // 15 minutes
  60 * 60_000,     // 1 hour
  6 * 60 * 60_000, // 6 hours
] as const;

export const MAX_ATTEMPTS = RETRY_SCHEDULE_MS.length + 1;

// ─── Transport ──────────────────────────────────────────────────────────────

export interface HttpPoster {
  post(url: string, body: Record<string, unknown>, timeoutMs: number): Promise<{ status: number }>;
}

export const axiosPoster: HttpPoster = {
  async post(url, body, timeoutMs) {
    const res = await axios.post(url, body, {
      timeout: timeoutMs,
      headers: { 'Content-Type': 'application/json' },
      // Non-2xx is a normal outcome here, not an exception
      validateStatus: () => true,
      maxRedirects: 0,
    });
    return { status: res.status };
  },
};

// ─── Payload ────────────────────────────────────────────────────────────────

export type CallbackPayload = Record<string, string | number | null>;

export function buildCallbackPayload(order: Order, merchantNo: string, secret: string, now: Date): CallbackPayload {
  const payload: CallbackPayload = {
    merchant_no: merchantNo,
    order_no: order.orderNo,
    out_trade_no: order.outTradeNo,
    order_type: order.kind,
    token: order.token,
    chain: order.chain,
    amount: order.settledAmount ?? order.requestedAmount,
    fee: order.fee,
    net_amount: order.netAmount,
    status: order.status,
    wallet_address: order.kind === 'deposit' ? order.walletAddress : order.toAddress,
    tx_hash: order.txHash,
    confirmations: order.confirmations,
    completed_at: order.completedAt ? order.completedAt.toISOString() : null,
    failure_reason: order.failureReason,
    extra_data: order.extraData,
    timestamp: now.getTime(),
  };
  payload.sign = sign(payload, SIGN_FIELDS.callback, secret);
  return payload;
}

// ─── Scheduling ─────────────────────────────────────────────────────────────

/**
 * Queue the notification for the order's current status. Idempotent per
 * (order, status); call it inside the transaction that made the transition.
 */
export async function scheduleOrderWebhook(store: Store, order: Order, now: Date): Promise<WebhookDelivery | null> {
  if (!order.callbackUrl) {
    logger.debug({ orderNo: order.orderNo }, 'no callback_url, webhook skipped');
    return null;
  }

  const merchant = await store.merchants.findById(order.merchantId);
  if (!merchant) throw new NotFoundError('merchant', order.merchantId);

  const secret = order.kind === 'deposit' ? merchant.depositKey : merchant.withdrawKey;
  const payload = buildCallbackPayload(order, merchant.merchantNo, secret, now);

  const delivery = await store.webhooks.insertIfAbsent({
    orderId: order.id,
    event: order.status,
    url: order.callbackUrl,
    payload,
    signature: String(payload.sign),
    attempts: 0,
    nextAttemptAt: now,
    lastResponseStatus: null,
    lastError: null,
    outcome: 'pending',
    deliveredAt: null,
  });

  if (delivery) {
    logger.info({ orderNo: order.orderNo, event: order.status, deliveryId: delivery.id }, 'webhook scheduled');
  }
  return delivery;
}

// ─── Delivery ───────────────────────────────────────────────────────────────

export interface DeliveryOptions {
  limit?: number;
  timeoutMs?: number;
  requireHttps?: boolean;
}

export interface DeliveryRun {
  attempted: number;
  delivered: number;
  rescheduled: number;
  failed: number;
}

export async function deliverDue(
  store: Store,
  poster: HttpPoster,
  now: Date,
  options: DeliveryOptions = {},
): Promise<DeliveryRun> {
  const due = await store.webhooks.listDue(now, options.limit ?? 50);
  const run: DeliveryRun = { attempted: 0, delivered: 0, rescheduled: 0, failed: 0 };

  for (const delivery of due) {
    const result = await attemptDelivery(store, poster, delivery, now, options);
    run.attempted++;
    if (result.outcome === 'delivered') run.delivered++;
    else if (result.outcome === 'failed') run.failed++;
    else run.rescheduled++;
  }

  return run;
}

export async function attemptDelivery(
  store: Store,
  poster: HttpPoster,
  delivery: WebhookDelivery,
  now: Date,
  options: DeliveryOptions = {},
): Promise<WebhookDelivery> {
  const requireHttps = options.requireHttps ?? env.NODE_ENV === 'production';
  const attempts = delivery.attempts + 1;

  if (requireHttps && !delivery.url.startsWith('https://')) {
    const err = new DeliveryFailedError(delivery.url, null, 'callback URL is not HTTPS');
    logger.warn({ deliveryId: delivery.id, url: delivery.url }, err.message);
    return store.webhooks.update(delivery.id, {
      attempts,
      outcome: 'failed',
      nextAttemptAt: null,
      lastError: err.message,
    });
  }

  // timestamp is outside the signed fields; each attempt carries its own
  const body = { ...delivery.payload, timestamp: now.getTime() };

  let status: number | null = null;
  let reason = '';
  try {
    const res = await poster.post(delivery.url, body, options.timeoutMs ?? env.WEBHOOK_TIMEOUT_MS);
    status = res.status;
    reason = `HTTP ${res.status}`;
  } catch (err) {
    reason = err instanceof Error ? err.message : String(err);
  }

  if (status === 200) {
    logger.info({ deliveryId: delivery.id, url: delivery.url, attempts }, 'webhook delivered');
    return store.webhooks.update(delivery.id, {
      attempts,
      outcome: 'delivered',
      deliveredAt: now,
      nextAttemptAt: null,
      lastResponseStatus: status,
      lastError: null,
    });
  }

  const failure = new DeliveryFailedError(delivery.url, status, reason);

  if (attempts >= MAX_ATTEMPTS) {
    logger.error({ deliveryId: delivery.id, url: delivery.url, attempts, status }, 'webhook permanently failed');
    return store.webhooks.update(delivery.id, {
      attempts,
      outcome: 'failed',
      nextAttemptAt: null,
      lastResponseStatus: status,
      lastError: failure.message,
    });
  }

  const delay = RETRY_SCHEDULE_MS[attempts - 1] ?? RETRY_SCHEDULE_MS[RETRY_SCHEDULE_MS.length - 1];
  logger.warn({ deliveryId: delivery.id, url: delivery.url, attempts, status, retryInMs: delay }, 'webhook attempt failed');
  return store.webhooks.update(delivery.id, {
    attempts,
    nextAttemptAt: new Date(now.getTime() + delay),
    lastResponseStatus: status,
    lastError: failure.message,
  });
}

// ─── Manual Resend ──────────────────────────────────────────────────────────

/** Puts a finished delivery back in the queue with a fresh retry schedule. */
export async function resendDelivery(store: Store, deliveryId: string, now: Date): Promise<WebhookDelivery> {
  const delivery = await store.webhooks.findById(deliveryId);
  if (!delivery) throw new NotFoundError('webhook delivery', deliveryId);
  if (delivery.outcome === 'pending') {
    throw new ValidationError(ErrorCode.VALIDATION_ERROR, `Delivery ${deliveryId} is already queued`);
  }

  logger.info({ deliveryId, previousOutcome: delivery.outcome }, 'webhook resend requested');
  return store.webhooks.update(deliveryId, {
    attempts: 0,
    outcome: 'pending',
    nextAttemptAt: now,
    lastError: null,
  });
}
