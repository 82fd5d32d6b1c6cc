import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { LedgerEntry } from '../db/schema.js';
import { CHAINS } from '../chains/catalog.js';
import type { AppContext } from '../context.js';
import { ErrorCode } from '../config/error-codes.js';
import { adminGuard, parseAdminIds } from '../middleware/auth.js';
import { forceCompleteWithdrawal } from '../services/withdrawal-orders.js';
import { resendDelivery } from '../services/notifications.js';
import { adjustBalance, getBalance, listEntries, replayBalance } from '../services/ledger.js';
import { collectionStats, requeueSkippedTask } from '../services/sweep.js';
import { rewindCursor } from '../services/block-scanner.js';
import { getPoolStatus } from '../services/address-pool.js';
import { isPositiveAmount } from '../services/amount.js';
import { NotFoundError, ValidationError } from '../services/errors.js';
import { orderView } from './payment.js';

const orderNoParamSchema = z.object({ orderNo: z.string().min(1).max(32) });
const uuidParamSchema = z.object({ id: z.string().uuid() });
const accountParamSchema = z.object({ accountId: z.string().uuid() });
const chainParamSchema = z.object({ chain: z.enum(CHAINS) });

const forceCompleteSchema = z.object({
  totp_code: z.string().regex(/^\d{6}$/, 'totp_code must be 6 digits'),
  note: z.string().max(2000).optional(),
});

const adjustSchema = z.object({
  account_id: z.string().uuid(),
  direction: z.enum(['credit', 'debit']),
  amount: z.string().refine(isPositiveAmount, 'Amount must be a positive number'),
  reference: z.string().min(1).max(64),
  note: z.string().min(1).max(2000),
});

const pageSchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const rewindSchema = z.object({ height: z.number().int().nonnegative() });

function entryView(entry: LedgerEntry) {
  return {
    seq: entry.seq,
    order_id: entry.orderId,
    direction: entry.direction,
    amount: entry.amount,
    balance_before: entry.balanceBefore,
    balance_after: entry.balanceAfter,
    kind: entry.kind,
    tag: entry.tag,
    idempotency_key: entry.idempotencyKey,
    note: entry.note,
    operator_id: entry.operatorId,
    created_at: entry.createdAt.toISOString(),
  };
}

export async function adminRoutes(app: FastifyInstance, opts: { ctx: AppContext }) {
  const { ctx } = opts;
  const { store } = ctx;
  const guard = { preHandler: [adminGuard(parseAdminIds(ctx.config.ADMIN_USER_IDS))] };

  // ─── Force-Complete Withdrawal (TOTP) ───────────────────────────────
  app.post('/api/admin/withdrawals/:orderNo/force-complete', guard, async (request) => {
    const { orderNo } = orderNoParamSchema.parse(request.params);
    const body = forceCompleteSchema.parse(request.body);

    if (!ctx.config.ADMIN_TOTP_SECRET) {
      throw new ValidationError(ErrorCode.INVALID_2FA, 'Force-complete is disabled: no TOTP secret configured');
    }

    const order = await store.orders.findByNo(orderNo);
    if (!order || order.kind !== 'withdrawal') throw new NotFoundError('order', orderNo);

    const completed = await forceCompleteWithdrawal(store, order.id, {
      operatorId: request.operatorId,
      totpCode: body.totp_code,
      note: body.note,
    }, ctx.config.ADMIN_TOTP_SECRET);

    return { success: true, data: orderView(completed) };
  });

  // ─── Webhook Resend ─────────────────────────────────────────────────
  app.post('/api/admin/webhooks/:id/resend', guard, async (request) => {
    const { id } = uuidParamSchema.parse(request.params);
    const delivery = await resendDelivery(store, id, new Date());
    return {
      success: true,
      data: { id: delivery.id, outcome: delivery.outcome, next_attempt_at: delivery.nextAttemptAt?.toISOString() ?? null },
    };
  });

  // ─── Ledger ─────────────────────────────────────────────────────────
  app.post('/api/admin/ledger/adjust', guard, async (request) => {
    const body = adjustSchema.parse(request.body);
    if (!(await store.accounts.findById(body.account_id))) throw new NotFoundError('account', body.account_id);

    const entry = await adjustBalance(store, {
      accountId: body.account_id,
      direction: body.direction,
      amount: body.amount,
      reference: body.reference,
      note: body.note,
      operatorId: request.operatorId,
    });

    return {
      success: true,
      data: {
        applied: entry !== null,
        entry: entry ? entryView(entry) : null,
        balance: await getBalance(store, body.account_id),
      },
    };
  });

  app.get('/api/admin/ledger/:accountId', guard, async (request) => {
    const { accountId } = accountParamSchema.parse(request.params);
    const page = pageSchema.parse(request.query);

    const account = await store.accounts.findById(accountId);
    if (!account) throw new NotFoundError('account', accountId);

    const [entries, replay] = await Promise.all([
      listEntries(store, accountId, page),
      replayBalance(store, accountId),
    ]);

    return {
      success: true,
      data: {
        account_id: account.id,
        token: account.token,
        balance: replay.recordedBalance,
        consistent: replay.consistent,
        broken_seqs: replay.brokenSeqs,
        entries: entries.map(entryView),
      },
    };
  });

  // ─── Collection ─────────────────────────────────────────────────────
  app.post('/api/admin/collect-tasks/:id/requeue', guard, async (request) => {
    const { id } = uuidParamSchema.parse(request.params);
    const task = await requeueSkippedTask(store, id);
    return { success: true, data: { id: task.id, status: task.status, previous_task_id: task.previousTaskId } };
  });

  app.get('/api/admin/collect-stats/:chain', guard, async (request) => {
    const { chain } = chainParamSchema.parse(request.params);
    return { success: true, data: { chain, ...(await collectionStats(store, chain)) } };
  });

  // ─── Chain Cursors / Address Pool ───────────────────────────────────
  app.post('/api/admin/chains/:chain/rewind', guard, async (request) => {
    const { chain } = chainParamSchema.parse(request.params);
    const { height } = rewindSchema.parse(request.body);
    const cursor = await rewindCursor(store, chain, height);
    return { success: true, data: { chain, last_scanned_height: cursor.lastScannedHeight } };
  });

  app.get('/api/admin/address-pool', guard, async () => {
    return { success: true, data: await getPoolStatus(store) };
  });
}
