import type { LedgerEntry, LedgerDirection, LedgerKind, Account } from '../db/schema.js';
import type { Store, Page } from '../repositories/types.js';
import type { Token } from '../chains/catalog.js';
import { logger } from '../config/logger.js';
import { ErrorCode } from '../config/error-codes.js';
import { Decimal, fmt, isPositiveAmount } from './amount.js';
import { InsufficientBalanceError, NotFoundError, ValidationError } from './errors.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type LedgerTag =
  | 'deposit_credit'
  | 'withdrawal_reserve'
  | 'withdrawal_release'
  | 'reorg_reversal'
  | 'manual_adjustment';

export interface Posting {
  accountId: string;
  orderId: string | null;
  direction: LedgerDirection;
  /** Always positive; direction carries the sign. */
  amount: string;
  kind: LedgerKind;
  tag: LedgerTag;
  /** Format: "{subject}:{referenceId}:{step}" */
  idempotencyKey: string;
  note?: string | null;
  operatorId?: string | null;
}

// ─── Idempotency Keys ────────────────────────────────────────────────────────

export const LedgerKeys = {
  depositCredit: (orderId: string) => `deposit:${orderId}:credit`,
  reorgReversal: (orderId: string) => `deposit:${orderId}:reorg_reversal`,
  withdrawalReserve: (orderId: string) => `withdrawal:${orderId}:reserve`,
  withdrawalRelease: (orderId: string) => `withdrawal:${orderId}:release`,
  adjustment: (accountId: string, reference: string) => `adjustment:${accountId}:${reference}`,
} as const;

// ─── Core Posting ────────────────────────────────────────────────────────────
//
// EVERY balance change MUST flow through post(). It provides:
//   1. Row-level locking on the account, serializing postings per account
//   2. Idempotency via the unique key on ledger_entries
//   3. Negative balance rejection (no entry kind permits overdraft)
//   4. decimal.js arithmetic, never JS Number for money
//

/**
 * Append one entry to an account's ledger. Joins the caller's transaction when
 * given one.
 *
 * @returns the new entry, or null if the idempotency key was already posted
 * @throws InsufficientBalanceError if a debit would take the balance below zero
 */
export async function post(store: Store, posting: Posting): Promise<LedgerEntry | null> {
  if (!isPositiveAmount(posting.amount)) {
    throw new ValidationError(ErrorCode.VALIDATION_ERROR, `Ledger amount must be positive, got ${posting.amount}`);
  }

  return store.transaction(async (tx) => {
    // 1. Lock the account FIRST so the idempotency check below is race-free.
    const account = await tx.accounts.lock(posting.accountId);
    if (!account) throw new NotFoundError('account', posting.accountId);

    // 2. Check idempotency
    if (await tx.ledger.findByKey(posting.idempotencyKey)) {
      logger.debug({ idempotencyKey: posting.idempotencyKey }, 'ledger posting already applied');
      return null;
    }

    const latest = await tx.ledger.latest(posting.accountId);
    const before = new Decimal(latest?.balanceAfter ?? '0');
    const amount = new Decimal(posting.amount);
    const after = posting.direction === 'credit' ? before.plus(amount) : before.minus(amount);

    // 3. Reject overdraft
    if (after.isNegative()) {
      throw new InsufficientBalanceError(posting.accountId, fmt(amount), fmt(before));
    }

    const entry = await tx.ledger.insert({
      accountId: posting.accountId,
      orderId: posting.orderId,
      direction: posting.direction,
      amount: fmt(amount),
      balanceBefore: fmt(before),
      balanceAfter: fmt(after),
      kind: posting.kind,
      tag: posting.tag,
      idempotencyKey: posting.idempotencyKey,
      note: posting.note ?? null,
      operatorId: posting.operatorId ?? null,
    });

    logger.info({
      accountId: posting.accountId,
      orderId: posting.orderId,
      direction: posting.direction,
      amount: entry.amount,
      balanceAfter: entry.balanceAfter,
      tag: posting.tag,
    }, 'ledger posting');

    return entry;
  });
}

// ─── Accounts ────────────────────────────────────────────────────────────────

export async function ensureAccount(store: Store, merchantId: string, token: Token): Promise<Account> {
  return (await store.accounts.find(merchantId, token)) ?? store.accounts.upsert(merchantId, token);
}

// ─── Query Helpers ───────────────────────────────────────────────────────────

export async function getBalance(store: Store, accountId: string): Promise<string> {
  const latest = await store.ledger.latest(accountId);
  return fmt(latest?.balanceAfter ?? '0');
}

export async function getMerchantBalance(store: Store, merchantId: string, token: Token): Promise<string> {
  const account = await store.accounts.find(merchantId, token);
  return account ? getBalance(store, account.id) : '0';
}

export async function listEntries(store: Store, accountId: string, page: Page = {}): Promise<LedgerEntry[]> {
  return store.ledger.listByAccount(accountId, { limit: Math.min(page.limit ?? 50, 200), offset: page.offset ?? 0 });
}

// ─── Audit ───────────────────────────────────────────────────────────────────

export interface ReplayResult {
  accountId: string;
  /** Sum of signed entry amounts in sequence order. */
  replayedBalance: string;
  /** balanceAfter of the latest entry. */
  recordedBalance: string;
  entryCount: number;
  /** Sequence numbers of entries whose arithmetic or chaining does not hold. */
  brokenSeqs: number[];
  consistent: boolean;
}

/**
 * Recompute an account's balance from its full history and verify that every
 * entry satisfies balanceAfter = balanceBefore ± amount and chains onto the
 * previous entry.
 */
export async function replayBalance(store: Store, accountId: string): Promise<ReplayResult> {
  const entries = await store.ledger.history(accountId);
  let running = new Decimal(0);
  const brokenSeqs: number[] = [];

  for (const entry of entries) {
    const amount = new Decimal(entry.amount);
    const expectedAfter = entry.direction === 'credit'
      ? new Decimal(entry.balanceBefore).plus(amount)
      : new Decimal(entry.balanceBefore).minus(amount);

    if (!new Decimal(entry.balanceBefore).eq(running) || !expectedAfter.eq(entry.balanceAfter)) {
      brokenSeqs.push(entry.seq);
    }
    running = entry.direction === 'credit' ? running.plus(amount) : running.minus(amount);
  }

  const recorded = entries.at(-1)?.balanceAfter ?? '0';
  const result: ReplayResult = {
    accountId,
    replayedBalance: fmt(running),
    recordedBalance: fmt(recorded),
    entryCount: entries.length,
    brokenSeqs,
    consistent: brokenSeqs.length === 0 && running.eq(recorded),
  };

  if (!result.consistent) {
    logger.error({ ...result }, 'ledger replay mismatch');
  }
  return result;
}

// ─── Manual Adjustment ───────────────────────────────────────────────────────

export interface Adjustment {
  accountId: string;
  direction: LedgerDirection;
  amount: string;
  /** Caller-supplied reference that makes the adjustment idempotent. */
  reference: string;
  note: string;
  operatorId: string;
}

export async function adjustBalance(store: Store, adjustment: Adjustment): Promise<LedgerEntry | null> {
  const entry = await post(store, {
    accountId: adjustment.accountId,
    orderId: null,
    direction: adjustment.direction,
    amount: adjustment.amount,
    kind: 'adjustment',
    tag: 'manual_adjustment',
    idempotencyKey: LedgerKeys.adjustment(adjustment.accountId, adjustment.reference),
    note: adjustment.note,
    operatorId: adjustment.operatorId,
  });

  logger.warn({
    accountId: adjustment.accountId,
    direction: adjustment.direction,
    amount: adjustment.amount,
    operatorId: adjustment.operatorId,
    applied: entry !== null,
  }, 'manual ledger adjustment');

  return entry;
}
