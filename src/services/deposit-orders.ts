import type { Merchant, Order, DepositAddress } from '../db/schema.js';
import type { Store } from '../repositories/types.js';
import type { IncomingTransfer } from '../chains/types.js';
import { getTokenSpec, type Chain, type Token } from '../chains/catalog.js';
import { env } from '../config/env.js';
import { logger } from '../config/logger.js';
import { ErrorCode } from '../config/error-codes.js';
import { Decimal, amountsEqual, fmt, isPositiveAmount } from './amount.js';
import { depositFee, feePolicyFor, DEFAULT_FEE_POLICY, type FeePolicy } from './fees.js';
import { LedgerKeys, ensureAccount, post } from './ledger.js';
import { FailureReason, generateOrderNo, isTerminal, lockOrder, transition } from './order-state.js';
import { scheduleOrderWebhook } from './notifications.js';
import { allocateDepositAddress, type Deriver } from './address-pool.js';
import { reserveUniqueAmount, releaseUniqueAmount, type SuffixStore } from './amount-suffix.js';
import { fiatToToken, type ExchangeRateProvider } from './exchange-rate.js';
import { NotFoundError, ReorgedError, ValidationError } from './errors.js';

// ─── Deposit Order Lifecycle ────────────────────────────────────────────────
//
//   pending ──▶ detected ──▶ confirming ──▶ success
//      │            │             │
//      ▼            └─────────────┴──▶ failed (reorged)
//   expired
//
// success posts exactly one credit of the net amount. Every transition runs
// under the order's row lock.

export interface DepositContext {
  store: Store;
  requiredConfirmations(chain: Chain): number;
  rates?: ExchangeRateProvider;
  suffixes?: SuffixStore;
  derive?: Deriver;
  expiryMinutes?: number;
  fees?: FeePolicy;
}

export interface CreateDepositInput {
  outTradeNo: string;
  chain: Chain;
  token: Token;
  /** Token amount, or a fiat amount when `currency` is given. */
  amount: string;
  currency?: string | null;
  callbackUrl?: string | null;
  extraData?: string | null;
  /** Add a 0.001..0.009 suffix so concurrent deposits on one address stay distinguishable. */
  uniqueAmount?: boolean;
}

// ─── Create ─────────────────────────────────────────────────────────────────

export async function createDepositOrder(
  ctx: DepositContext,
  merchant: Merchant,
  input: CreateDepositInput,
  now: Date = new Date(),
): Promise<Order> {
  const spec = getTokenSpec(input.chain, input.token);
  if (!spec) {
    throw new ValidationError(ErrorCode.UNSUPPORTED_TOKEN, `${input.token} is not supported on ${input.chain}`);
  }
  if (!isPositiveAmount(input.amount)) {
    throw new ValidationError(ErrorCode.VALIDATION_ERROR, 'Amount must be a positive number');
  }

  const { store } = ctx;
  if (await store.orders.findByOutTradeNo(merchant.id, 'deposit', input.outTradeNo)) {
    throw new ValidationError(ErrorCode.DUPLICATE_ORDER, `Deposit ${input.outTradeNo} already exists`);
  }

  // Foreign-currency input is converted once, at creation
  let tokenAmount = fmt(input.amount);
  let fiat: Pick<Order, 'fiatAmount' | 'fiatCurrency' | 'exchangeRate'> = {
    fiatAmount: null,
    fiatCurrency: null,
    exchangeRate: null,
  };
  if (input.currency) {
    if (!ctx.rates) {
      throw new ValidationError(ErrorCode.VALIDATION_ERROR, 'Fiat-denominated deposits are not enabled');
    }
    const rate = await ctx.rates.rate(input.token, input.currency);
    tokenAmount = fiatToToken(input.amount, rate, spec.decimals);
    fiat = { fiatAmount: fmt(input.amount), fiatCurrency: input.currency.toUpperCase(), exchangeRate: rate };
  }

  const address = await allocateDepositAddress(store, merchant.id, input.chain, input.token, now, ctx.derive);

  const expiryMinutes = ctx.expiryMinutes ?? env.DEPOSIT_EXPIRY_MINUTES;
  let requestedAmount = tokenAmount;
  let amountSuffix: number | null = null;
  if (input.uniqueAmount) {
    if (!ctx.suffixes) {
      throw new ValidationError(ErrorCode.VALIDATION_ERROR, 'Unique amounts are not enabled');
    }
    // Held a little longer than the order can stay pending
    const reserved = await reserveUniqueAmount(ctx.suffixes, address.address, tokenAmount, expiryMinutes * 60 + 300);
    requestedAmount = reserved.amount;
    amountSuffix = reserved.suffix;
  }

  const { fee, net } = depositFee(requestedAmount, spec.decimals, feePolicyFor(merchant, ctx.fees ?? DEFAULT_FEE_POLICY));

  try {
    const order = await store.orders.insert({
      orderNo: generateOrderNo('deposit', now),
      merchantId: merchant.id,
      outTradeNo: input.outTradeNo,
      kind: 'deposit',
      chain: input.chain,
      token: input.token,
      requestedAmount,
      settledAmount: null,
      fee,
      netAmount: net,
      amountSuffix,
      ...fiat,
      walletAddress: address.address,
      toAddress: null,
      txHash: null,
      blockHeight: null,
      confirmations: 0,
      requiredConfirmations: ctx.requiredConfirmations(input.chain),
      waitCycles: 0,
      status: 'pending',
      failureReason: null,
      callbackUrl: input.callbackUrl ?? null,
      extraData: input.extraData ?? null,
      annotations: [],
      expiresAt: new Date(now.getTime() + expiryMinutes * 60_000),
      detectedAt: null,
      completedAt: null,
    });

    logger.info({
      orderNo: order.orderNo,
      merchantNo: merchant.merchantNo,
      chain: order.chain,
      token: order.token,
      amount: order.requestedAmount,
      address: order.walletAddress,
    }, 'deposit order created');

    return order;
  } catch (err) {
    if (ctx.suffixes && amountSuffix !== null) {
      await releaseUniqueAmount(ctx.suffixes, address.address, requestedAmount, amountSuffix);
    }
    throw err;
  }
}

// ─── Detection ──────────────────────────────────────────────────────────────

export interface DetectedTransfer {
  chain: Chain;
  token: Token;
  depositAddress: DepositAddress;
  transfer: IncomingTransfer;
  requiredConfirmations: number;
}

export type DetectionOutcome = 'known' | 'matched' | 'unsolicited';

export interface DetectionResult {
  order: Order;
  outcome: DetectionOutcome;
}

/**
 * Record a transfer seen on chain. Idempotent per (chain, address, txHash):
 * a transfer that already has an order only refreshes its confirmations.
 */
export async function recordDepositTransfer(
  store: Store,
  detected: DetectedTransfer,
  now: Date,
  suffixes?: SuffixStore,
): Promise<DetectionResult | null> {
  const { chain, token, depositAddress, transfer } = detected;
  const merchantId = depositAddress.merchantId;
  if (!merchantId) {
    logger.warn({ chain, address: depositAddress.address, txHash: transfer.txHash }, 'transfer to unassigned address ignored');
    return null;
  }

  const result = await store.transaction(async (tx): Promise<DetectionResult> => {
    const refresh = async (orderId: string): Promise<DetectionResult> => ({
      order: await updateDepositConfirmations(tx, orderId, transfer.confirmations, now),
      outcome: 'known',
    });

    const known = await tx.orders.findByTx(chain, depositAddress.address, transfer.txHash);
    if (known) return refresh(known.id);

    const pending = await tx.orders.listPendingDeposits(chain, depositAddress.address, token);
    const candidate = pending.find((o) => amountsEqual(o.requestedAmount, transfer.amount))
      ?? (pending.length === 1 ? pending[0] : undefined);

    if (candidate) {
      const order = await lockOrder(tx, candidate.id);
      if (order.status === 'pending') {
        const detectedOrder = await markDetected(tx, order, transfer, now);
        await recordReceipt(tx, depositAddress.id, transfer.amount, now);
        return { order: await updateDepositConfirmations(tx, detectedOrder.id, transfer.confirmations, now), outcome: 'matched' };
      }
      // Matched concurrently; this transfer may be the one that matched it
      const raced = await tx.orders.findByTx(chain, depositAddress.address, transfer.txHash);
      if (raced) return refresh(raced.id);
    }

    const order = await insertUnsolicited(tx, merchantId, detected, now);
    await recordReceipt(tx, depositAddress.id, transfer.amount, now);
    return { order: await updateDepositConfirmations(tx, order.id, transfer.confirmations, now), outcome: 'unsolicited' };
  });

  // Suffixes live outside the database; free them only once the match is committed
  if (result.outcome === 'matched' && suffixes) await releaseOrderSuffix(suffixes, result.order);

  return result;
}

async function recordReceipt(tx: Store, addressId: string, amount: string, now: Date): Promise<void> {
  const address = await tx.addresses.findById(addressId);
  if (!address) throw new NotFoundError('deposit address', addressId);
  await tx.addresses.update(addressId, {
    totalReceived: fmt(new Decimal(address.totalReceived).plus(amount)),
    lastActivityAt: now,
  });
}

async function markDetected(tx: Store, order: Order, transfer: IncomingTransfer, now: Date): Promise<Order> {
  const spec = getTokenSpec(order.chain, order.token);
  const merchant = await tx.merchants.findById(order.merchantId);
  if (!spec || !merchant) throw new NotFoundError('merchant', order.merchantId);

  // The fee follows what actually arrived, not what was requested
  const { fee, net } = depositFee(transfer.amount, spec.decimals, feePolicyFor(merchant));
  if (!amountsEqual(order.requestedAmount, transfer.amount)) {
    logger.warn({
      orderNo: order.orderNo,
      requested: order.requestedAmount,
      received: fmt(transfer.amount),
    }, 'deposit amount differs from request');
  }

  return transition(tx, order, 'detected', {
    settledAmount: fmt(transfer.amount),
    fee,
    netAmount: net,
    txHash: transfer.txHash,
    blockHeight: transfer.blockHeight,
    detectedAt: now,
  });
}

async function insertUnsolicited(tx: Store, merchantId: string, detected: DetectedTransfer, now: Date): Promise<Order> {
  const { chain, token, depositAddress, transfer } = detected;
  const spec = getTokenSpec(chain, token);
  const merchant = await tx.merchants.findById(merchantId);
  if (!spec || !merchant) throw new NotFoundError('merchant', merchantId);

  const { fee, net } = depositFee(transfer.amount, spec.decimals, feePolicyFor(merchant));
  const order = await tx.orders.insert({
    orderNo: generateOrderNo('deposit', now),
    merchantId,
    outTradeNo: null,
    kind: 'deposit',
    chain,
    token,
    requestedAmount: fmt(transfer.amount),
    settledAmount: fmt(transfer.amount),
    fee,
    netAmount: net,
    amountSuffix: null,
    fiatAmount: null,
    fiatCurrency: null,
    exchangeRate: null,
    walletAddress: depositAddress.address,
    toAddress: null,
    txHash: transfer.txHash,
    blockHeight: transfer.blockHeight,
    confirmations: 0,
    requiredConfirmations: detected.requiredConfirmations,
    waitCycles: 0,
    status: 'detected',
    failureReason: null,
    callbackUrl: null,
    extraData: null,
    annotations: [],
    expiresAt: null,
    detectedAt: now,
    completedAt: null,
  });

  logger.info({
    orderNo: order.orderNo,
    chain,
    token,
    amount: order.settledAmount,
    txHash: transfer.txHash,
  }, 'unsolicited deposit recorded');

  return order;
}

// ─── Confirmation ───────────────────────────────────────────────────────────

/** Apply the latest confirmation count. Terminal orders are left untouched. */
export async function updateDepositConfirmations(
  store: Store,
  orderId: string,
  confirmations: number,
  now: Date,
): Promise<Order> {
  return store.transaction(async (tx) => {
    const order = await lockOrder(tx, orderId);
    if (isTerminal(order.status) || order.status === 'pending') return order;

    if (confirmations >= order.requiredConfirmations) {
      return creditDeposit(tx, order, confirmations, now);
    }

    if (confirmations > 0 && order.status === 'detected') {
      return transition(tx, order, 'confirming', { confirmations });
    }

    if (confirmations === order.confirmations) return order;
    return tx.orders.update(order.id, { confirmations });
  });
}

async function creditDeposit(tx: Store, order: Order, confirmations: number, now: Date): Promise<Order> {
  const account = await ensureAccount(tx, order.merchantId, order.token);

  if (isPositiveAmount(order.netAmount)) {
    await post(tx, {
      accountId: account.id,
      orderId: order.id,
      direction: 'credit',
      amount: order.netAmount,
      kind: 'principal',
      tag: 'deposit_credit',
      idempotencyKey: LedgerKeys.depositCredit(order.id),
    });
  }

  const completed = await transition(tx, order, 'success', { confirmations, completedAt: now });
  await scheduleOrderWebhook(tx, completed, now);
  return completed;
}

// ─── Expiry ─────────────────────────────────────────────────────────────────

/**
 * Expire pending deposits whose deadline has passed (deadline == now counts).
 * Returns the number of orders expired.
 */
export async function expireDueDeposits(
  store: Store,
  now: Date,
  options: { limit?: number; suffixes?: SuffixStore } = {},
): Promise<number> {
  const due = await store.orders.listDueExpiry(now, options.limit ?? 200);
  let expired = 0;

  for (const candidate of due) {
    const order = await store.transaction(async (tx) => {
      const locked = await lockOrder(tx, candidate.id);
      if (locked.status !== 'pending' || !locked.expiresAt || locked.expiresAt.getTime() > now.getTime()) {
        return null;
      }
      const updated = await transition(tx, locked, 'expired', { failureReason: FailureReason.EXPIRED, completedAt: now });
      await scheduleOrderWebhook(tx, updated, now);
      return updated;
    });

    if (!order) continue;
    expired++;
    if (options.suffixes) await releaseOrderSuffix(options.suffixes, order);
  }

  if (expired > 0) logger.info({ expired }, 'deposit orders expired');
  return expired;
}

async function releaseOrderSuffix(suffixes: SuffixStore, order: Order): Promise<void> {
  if (order.amountSuffix === null) return;
  await releaseUniqueAmount(suffixes, order.walletAddress, order.requestedAmount, order.amountSuffix);
}

// ─── Reorg ──────────────────────────────────────────────────────────────────

/**
 * The order's transaction is gone from the chain. Fails the order and, when a
 * credit was already posted, appends the compensating debit.
 */
export async function failReorgedDeposit(store: Store, orderId: string, now: Date): Promise<Order> {
  return store.transaction(async (tx) => {
    const order = await lockOrder(tx, orderId);
    if (isTerminal(order.status)) return order;

    const failed = await transition(tx, order, 'failed', { failureReason: FailureReason.REORGED, completedAt: now });
    const reorg = new ReorgedError(order.orderNo, order.txHash ?? 'unknown');

    const credit = await tx.ledger.findByKey(LedgerKeys.depositCredit(order.id));
    if (credit && !(await tx.ledger.findByKey(LedgerKeys.reorgReversal(order.id)))) {
      await post(tx, {
        accountId: credit.accountId,
        orderId: order.id,
        direction: 'debit',
        amount: credit.amount,
        kind: 'principal',
        tag: 'reorg_reversal',
        idempotencyKey: LedgerKeys.reorgReversal(order.id),
        note: reorg.message,
      });
    }

    logger.warn({ err: reorg, blockHeight: order.blockHeight }, 'deposit reorged');
    await scheduleOrderWebhook(tx, failed, now);
    return failed;
  });
}
