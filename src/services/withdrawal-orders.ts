import type { Merchant, Order } from '../db/schema.js';
import type { Store } from '../repositories/types.js';
import type { ChainAdapter, KeyHandle, SignedTransfer, TransferStatus } from '../chains/types.js';
import type { ChainRegistry } from '../chains/registry.js';
import { getTokenSpec, type Chain, type Token } from '../chains/catalog.js';
import { logger } from '../config/logger.js';
import { ErrorCode } from '../config/error-codes.js';
import { Decimal, fmt, isPositiveAmount } from './amount.js';
import { withdrawalFee, feePolicyFor, DEFAULT_FEE_POLICY, type FeePolicy } from './fees.js';
import { LedgerKeys, ensureAccount, getBalance, post } from './ledger.js';
import { FailureReason, annotate, generateOrderNo, lockOrder, transition } from './order-state.js';
import { scheduleOrderWebhook } from './notifications.js';
import { verifyTotp } from './totp.js';
import { keyHandle } from './wallet.js';
import {
  BroadcastRejectedError,
  InsufficientBalanceError,
  InvalidAddressError,
  RpcUnavailableError,
  ValidationError,
} from './errors.js';

// ─── Withdrawal Order Lifecycle ─────────────────────────────────────────────
//
//   pending ──▶ processing ──▶ success
//      │             │
//      └─────────────┴──▶ failed
//
// The reservation (amount + fee) is debited when the order enters processing;
// a failure after that credits the same amount back. success changes nothing
// in the ledger.

export interface WithdrawalContext {
  store: Store;
  chains: ChainRegistry;
  keyFor?: (encryptedPrivateKey: string) => KeyHandle;
  fees?: FeePolicy;
}

export interface CreateWithdrawalInput {
  outTradeNo: string;
  chain: Chain;
  token: Token;
  amount: string;
  toAddress: string;
  callbackUrl?: string | null;
  extraData?: string | null;
}

// ─── Create ─────────────────────────────────────────────────────────────────

export async function createWithdrawalOrder(
  ctx: WithdrawalContext,
  merchant: Merchant,
  input: CreateWithdrawalInput,
  now: Date = new Date(),
): Promise<Order> {
  const spec = getTokenSpec(input.chain, input.token);
  if (!spec) {
    throw new ValidationError(ErrorCode.UNSUPPORTED_TOKEN, `${input.token} is not supported on ${input.chain}`);
  }
  if (!isPositiveAmount(input.amount)) {
    throw new ValidationError(ErrorCode.VALIDATION_ERROR, 'Amount must be a positive number');
  }

  const adapter = ctx.chains.adapter(input.chain);
  if (!adapter.validateAddress(input.toAddress)) {
    throw new InvalidAddressError(input.chain, input.toAddress);
  }

  const { store } = ctx;
  if (await store.orders.findByOutTradeNo(merchant.id, 'withdrawal', input.outTradeNo)) {
    throw new ValidationError(ErrorCode.DUPLICATE_ORDER, `Withdrawal ${input.outTradeNo} already exists`);
  }

  const amount = fmt(input.amount);
  const { fee, net, total } = withdrawalFee(amount, spec.decimals, feePolicyFor(merchant, ctx.fees ?? DEFAULT_FEE_POLICY));

  // Early rejection only; the binding check is the reservation at dispatch
  const account = await ensureAccount(store, merchant.id, input.token);
  const available = await getBalance(store, account.id);
  if (new Decimal(available).lt(total)) {
    throw new InsufficientBalanceError(account.id, total, available);
  }

  const hot = await store.custody.findActive(input.chain, 'hot');
  if (!hot) {
    throw new ValidationError(ErrorCode.VALIDATION_ERROR, `Withdrawals are not available on ${input.chain}`);
  }

  const order = await store.orders.insert({
    orderNo: generateOrderNo('withdrawal', now),
    merchantId: merchant.id,
    outTradeNo: input.outTradeNo,
    kind: 'withdrawal',
    chain: input.chain,
    token: input.token,
    requestedAmount: amount,
    settledAmount: null,
    fee,
    netAmount: net,
    amountSuffix: null,
    fiatAmount: null,
    fiatCurrency: null,
    exchangeRate: null,
    walletAddress: hot.address,
    toAddress: input.toAddress,
    txHash: null,
    blockHeight: null,
    confirmations: 0,
    requiredConfirmations: ctx.chains.policy(input.chain).requiredConfirmations,
    waitCycles: 0,
    status: 'pending',
    failureReason: null,
    callbackUrl: input.callbackUrl ?? null,
    extraData: input.extraData ?? null,
    annotations: [],
    expiresAt: null,
    detectedAt: null,
    completedAt: null,
  });

  logger.info({
    orderNo: order.orderNo,
    merchantNo: merchant.merchantNo,
    chain: order.chain,
    token: order.token,
    amount,
    fee,
    toAddress: order.toAddress,
  }, 'withdrawal order created');

  return order;
}

// ─── Dispatch ───────────────────────────────────────────────────────────────

export interface DispatchRun {
  claimed: number;
  broadcast: number;
  failed: number;
}

/**
 * Reserve funds for due withdrawals and broadcast them. Rows another
 * dispatcher holds are skipped.
 */
export async function dispatchWithdrawals(ctx: WithdrawalContext, now: Date, limit: number): Promise<DispatchRun> {
  const due = await ctx.store.orders.listPendingWithdrawals(limit);
  const run: DispatchRun = { claimed: 0, broadcast: 0, failed: 0 };

  for (const candidate of due) {
    try {
      const result = await dispatchOne(ctx, candidate.id, now);
      if (result === 'skipped') continue;
      run.claimed++;
      if (result === 'broadcast') run.broadcast++;
      if (result === 'failed') run.failed++;
    } catch (err) {
      logger.error({ err, orderNo: candidate.orderNo }, 'withdrawal dispatch error');
    }
  }

  return run;
}

type DispatchResult = 'skipped' | 'failed' | 'broadcast' | 'unconfirmed';

async function dispatchOne(ctx: WithdrawalContext, orderId: string, now: Date): Promise<DispatchResult> {
  const reserved = await ctx.store.transaction(async (tx): Promise<Order | 'skipped' | 'failed'> => {
    const order = await tx.orders.lock(orderId, { skipLocked: true });
    if (!order || order.status !== 'pending') return 'skipped';

    const account = await ensureAccount(tx, order.merchantId, order.token);
    const total = fmt(new Decimal(order.requestedAmount).plus(order.fee));

    try {
      await post(tx, {
        accountId: account.id,
        orderId: order.id,
        direction: 'debit',
        amount: total,
        kind: 'principal',
        tag: 'withdrawal_reserve',
        idempotencyKey: LedgerKeys.withdrawalReserve(order.id),
      });
    } catch (err) {
      if (!(err instanceof InsufficientBalanceError)) throw err;
      const failed = await transition(tx, order, 'failed', {
        failureReason: FailureReason.INSUFFICIENT_BALANCE,
        completedAt: now,
      });
      await scheduleOrderWebhook(tx, failed, now);
      return 'failed';
    }

    return transition(tx, order, 'processing');
  });

  if (typeof reserved === 'string') return reserved;
  return broadcastWithdrawal(ctx, reserved, now);
}

async function broadcastWithdrawal(ctx: WithdrawalContext, order: Order, now: Date): Promise<DispatchResult> {
  const { store } = ctx;
  const hot = await store.custody.findActive(order.chain, 'hot');

  let adapter: ChainAdapter;
  let signed: SignedTransfer;
  try {
    if (!hot?.encryptedPrivateKey || !order.toAddress) {
      throw new BroadcastRejectedError(order.chain, 'no signing hot wallet configured');
    }

    adapter = ctx.chains.adapter(order.chain);
    const key = (ctx.keyFor ?? keyHandle)(hot.encryptedPrivateKey);
    signed = await adapter.signTransfer(
      { from: hot.address, to: order.toAddress, token: order.token, amount: order.netAmount },
      key,
    );
  } catch (err) {
    // Nothing was submitted
    return rejectWithdrawal(store, order, err, now);
  }

  // The hash is stored before submission; the confirmation watcher reconciles from it
  const { txHash } = signed;
  await store.transaction(async (tx) => {
    await lockOrder(tx, order.id);
    await tx.orders.update(order.id, { txHash });
  });

  try {
    await adapter.broadcast(signed);
  } catch (err) {
    if (err instanceof RpcUnavailableError) {
      logger.warn({ orderNo: order.orderNo, txHash, err: err.message }, 'withdrawal broadcast outcome unknown');
      return 'unconfirmed';
    }
    if (await mayHaveLanded(adapter, txHash)) {
      logger.warn({ orderNo: order.orderNo, txHash, err }, 'withdrawal broadcast rejected but transaction is known, left to confirmation watch');
      return 'unconfirmed';
    }
    return rejectWithdrawal(store, order, err, now);
  }

  logger.info({ orderNo: order.orderNo, chain: order.chain, txHash, amount: order.netAmount }, 'withdrawal broadcast');
  return 'broadcast';
}

async function rejectWithdrawal(store: Store, order: Order, err: unknown, now: Date): Promise<DispatchResult> {
  const detail = err instanceof BroadcastRejectedError
    ? err.chainDetail
    : err instanceof Error ? err.message : String(err);
  logger.error({ orderNo: order.orderNo, chain: order.chain, detail }, 'withdrawal broadcast rejected');
  await failWithdrawal(store, order.id, `${FailureReason.BROADCAST_REJECTED}: ${detail}`, now);
  return 'failed';
}

/** A rejected submission can still be on chain (resubmitted duplicate). Unknown counts as landed. */
async function mayHaveLanded(adapter: ChainAdapter, txHash: string): Promise<boolean> {
  try {
    return (await adapter.getTransfer(txHash)) !== null;
  } catch (err) {
    if (err instanceof RpcUnavailableError) return true;
    throw err;
  }
}

// ─── Completion ─────────────────────────────────────────────────────────────

export interface ObservedConfirmation {
  confirmations: number;
  blockHeight: number;
}

export async function completeWithdrawal(
  store: Store,
  orderId: string,
  now: Date,
  observed?: ObservedConfirmation,
): Promise<Order> {
  return store.transaction(async (tx) => {
    const order = await lockOrder(tx, orderId);
    if (order.status === 'success') return order;

    const reserve = await tx.ledger.findByKey(LedgerKeys.withdrawalReserve(order.id));
    if (!reserve) {
      logger.error({ orderNo: order.orderNo }, 'completing withdrawal without a reservation entry');
    }

    const completed = await transition(tx, order, 'success', { ...observed, completedAt: now });
    await scheduleOrderWebhook(tx, completed, now);
    return completed;
  });
}

/** Fail a processing withdrawal and credit its reservation back. */
export async function failWithdrawal(store: Store, orderId: string, reason: string, now: Date): Promise<Order> {
  return store.transaction(async (tx) => {
    const order = await lockOrder(tx, orderId);
    if (order.status === 'failed') return order;

    const failed = await transition(tx, order, 'failed', { failureReason: reason, completedAt: now });

    const reserve = await tx.ledger.findByKey(LedgerKeys.withdrawalReserve(order.id));
    if (reserve) {
      try {
        await post(tx, {
          accountId: reserve.accountId,
          orderId: order.id,
          direction: 'credit',
          amount: reserve.amount,
          kind: 'principal',
          tag: 'withdrawal_release',
          idempotencyKey: LedgerKeys.withdrawalRelease(order.id),
          note: reason,
        });
      } catch (err) {
        logger.fatal({ err, orderNo: order.orderNo, amount: reserve.amount, reason }, 'withdrawal refund failed, manual intervention required');
        throw err;
      }
    }

    await scheduleOrderWebhook(tx, failed, now);
    return failed;
  });
}

// ─── Admin ──────────────────────────────────────────────────────────────────

export interface ForceCompleteRequest {
  operatorId: string;
  totpCode: string;
  note?: string;
}

/**
 * Operator override for a withdrawal confirmed out of band. Runs the normal
 * completion path after the TOTP check.
 */
export async function forceCompleteWithdrawal(
  store: Store,
  orderId: string,
  request: ForceCompleteRequest,
  totpSecret: string,
  now: Date = new Date(),
): Promise<Order> {
  if (!verifyTotp(totpSecret, request.totpCode, now.getTime())) {
    throw new ValidationError(ErrorCode.INVALID_2FA, 'Invalid verification code');
  }

  return store.transaction(async (tx) => {
    const completed = await completeWithdrawal(tx, orderId, now);
    const note = `force-completed by ${request.operatorId} at ${now.toISOString()}${request.note ? `: ${request.note}` : ''}`;
    const annotated = await annotate(tx, completed, note);
    logger.warn({ orderNo: completed.orderNo, operatorId: request.operatorId }, 'withdrawal force-completed');
    return annotated;
  });
}

// ─── Confirmation Watch ─────────────────────────────────────────────────────

type Observation =
  | { kind: 'unchanged'; order: Order }
  | { kind: 'stuck' }
  | { kind: 'confirmed'; status: TransferStatus };

/**
 * Apply one observation of a processing withdrawal's transaction. `status` is
 * null when the chain does not (yet) know it, or no hash was ever recorded.
 */
export async function observeWithdrawal(
  store: Store,
  orderId: string,
  status: TransferStatus | null,
  maxWaitCycles: number,
  now: Date,
): Promise<Order> {
  if (status && !status.success) {
    return failWithdrawal(store, orderId, FailureReason.REJECTED_ON_CHAIN, now);
  }

  const observation = await store.transaction(async (tx): Promise<Observation> => {
    const order = await lockOrder(tx, orderId);
    if (order.status !== 'processing') return { kind: 'unchanged', order };

    if (!status) {
      const waitCycles = order.waitCycles + 1;
      if (waitCycles > maxWaitCycles) return { kind: 'stuck' };
      return { kind: 'unchanged', order: await tx.orders.update(order.id, { waitCycles }) };
    }

    if (status.confirmations >= order.requiredConfirmations) return { kind: 'confirmed', status };
    return {
      kind: 'unchanged',
      order: await tx.orders.update(order.id, { confirmations: status.confirmations, blockHeight: status.blockHeight }),
    };
  });

  switch (observation.kind) {
    case 'unchanged':
      return observation.order;
    case 'stuck':
      logger.warn({ orderId, maxWaitCycles }, 'withdrawal never confirmed, failing');
      return failWithdrawal(store, orderId, FailureReason.STUCK, now);
    case 'confirmed':
      return completeWithdrawal(store, orderId, now, {
        confirmations: observation.status.confirmations,
        blockHeight: observation.status.blockHeight,
      });
  }
}
