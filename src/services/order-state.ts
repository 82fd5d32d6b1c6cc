import { randomInt } from 'node:crypto';
import type { Order, OrderKind, OrderStatus } from '../db/schema.js';
import type { Store, OrderPatch, LockOptions } from '../repositories/types.js';
import { logger } from '../config/logger.js';
import { InvalidTransitionError, NotFoundError } from './errors.js';

// ─── State Machine Definitions ──────────────────────────────────────────────

const DEPOSIT_TRANSITIONS: Record<OrderStatus, OrderStatus[]> = {
  pending: ['detected', 'expired', 'failed'],
  detected: ['confirming', 'success', 'failed'],
  confirming: ['success', 'failed'],
  processing: [],
  success: [],
  expired: [],
  failed: [],
};

const WITHDRAWAL_TRANSITIONS: Record<OrderStatus, OrderStatus[]> = {
  pending: ['processing', 'failed'],
  processing: ['success', 'failed'],
  detected: [],
  confirming: [],
  success: [],
  expired: [],
  failed: [],
};

const TERMINAL: ReadonlySet<OrderStatus> = new Set(['success', 'expired', 'failed']);

/** Reason codes recorded on failed/expired orders and surfaced to merchants. */
export const FailureReason = {
  REORGED: 'reorged',
  EXPIRED: 'expired',
  INSUFFICIENT_BALANCE: 'insufficient_balance',
  BROADCAST_REJECTED: 'broadcast_rejected',
  STUCK: 'stuck',
  REJECTED_ON_CHAIN: 'rejected_on_chain',
} as const;

export function isTerminal(status: OrderStatus): boolean {
  return TERMINAL.has(status);
}

export function canTransition(kind: OrderKind, from: OrderStatus, to: OrderStatus): boolean {
  const table = kind === 'deposit' ? DEPOSIT_TRANSITIONS : WITHDRAWAL_TRANSITIONS;
  return table[from].includes(to);
}

// ─── Transitions ─────────────────────────────────────────────────────────────

/** Locks the order row for the rest of the transaction. */
export async function lockOrder(tx: Store, orderId: string, options?: LockOptions): Promise<Order> {
  const order = await tx.orders.lock(orderId, options);
  if (!order) throw new NotFoundError('order', orderId);
  return order;
}

/**
 * Move a locked order to `to`, validated against the fixed transition table.
 * Callers hold the order lock (see lockOrder).
 */
export async function transition(tx: Store, order: Order, to: OrderStatus, patch: OrderPatch = {}): Promise<Order> {
  if (!canTransition(order.kind, order.status, to)) {
    throw new InvalidTransitionError(order.orderNo, order.status, to);
  }

  const updated = await tx.orders.update(order.id, { ...patch, status: to });

  logger.info({
    orderNo: order.orderNo,
    kind: order.kind,
    chain: order.chain,
    from: order.status,
    to,
    txHash: updated.txHash,
    reason: updated.failureReason ?? undefined,
  }, 'order transition');

  return updated;
}

/** Audit notes are the only change allowed after a terminal state. */
export async function annotate(tx: Store, order: Order, note: string): Promise<Order> {
  return tx.orders.update(order.id, { annotations: [...order.annotations, note] });
}

// ─── Order Numbers ───────────────────────────────────────────────────────────

const ORDER_NO_CHARS = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';

/** D/W + UTC yyyyMMddHHmmss + 6 random characters. */
export function generateOrderNo(kind: OrderKind, now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:T]/g, '').slice(0, 14);
  let suffix = '';
  for (let i = 0; i < 6; i++) suffix += ORDER_NO_CHARS[randomInt(ORDER_NO_CHARS.length)];
  return `${kind === 'deposit' ? 'D' : 'W'}${stamp}${suffix}`;
}
