import { and, asc, count, desc, eq, inArray, isNotNull, isNull, lte, sql } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import * as schema from './schema.js';
import {
  merchants,
  accounts,
  ledgerEntries,
  orders,
  depositAddresses,
  addressCounters,
  custodyWallets,
  chainCursors,
  collectTasks,
  webhookDeliveries,
  type CollectStatus,
} from './schema.js';
import type {
  Store,
  MerchantRepository,
  AccountRepository,
  LedgerRepository,
  OrderRepository,
  DepositAddressRepository,
  CustodyWalletRepository,
  CursorRepository,
  CollectTaskRepository,
  WebhookRepository,
} from '../repositories/types.js';
import { NotFoundError } from '../services/errors.js';

// Both the root database handle and a transaction handle satisfy this.
type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

function first<T>(rows: T[]): T | null {
  return rows[0] ?? null;
}

function required<T>(rows: T[], what: string, id: string): T {
  const row = rows[0];
  if (!row) throw new NotFoundError(what, id);
  return row;
}

// ─── Merchants ──────────────────────────────────────────────────────────────

function merchantRepository(db: Executor): MerchantRepository {
  return {
    async findById(id) {
      return first(await db.select().from(merchants).where(eq(merchants.id, id)));
    },
    async findByNo(merchantNo) {
      return first(await db.select().from(merchants).where(eq(merchants.merchantNo, merchantNo)));
    },
    async insert(row) {
      return required(await db.insert(merchants).values(row).returning(), 'merchant', row.merchantNo);
    },
  };
}

// ─── Accounts ───────────────────────────────────────────────────────────────

function accountRepository(db: Executor): AccountRepository {
  const find = async (merchantId: string, token: schema.Account['token']) =>
    first(await db.select().from(accounts).where(and(eq(accounts.merchantId, merchantId), eq(accounts.token, token))));

  return {
    async findById(id) {
      return first(await db.select().from(accounts).where(eq(accounts.id, id)));
    },
    find,
    async upsert(merchantId, token) {
      await db.insert(accounts).values({ merchantId, token }).onConflictDoNothing();
      const row = await find(merchantId, token);
      if (!row) throw new NotFoundError('account', `${merchantId}/${token}`);
      return row;
    },
    async lock(id) {
      return first(await db.select().from(accounts).where(eq(accounts.id, id)).for('update'));
    },
  };
}

// ─── Ledger ─────────────────────────────────────────────────────────────────

function ledgerRepository(db: Executor): LedgerRepository {
  return {
    async latest(accountId) {
      return first(
        await db.select().from(ledgerEntries)
          .where(eq(ledgerEntries.accountId, accountId))
          .orderBy(desc(ledgerEntries.seq))
          .limit(1),
      );
    },
    async findByKey(idempotencyKey) {
      return first(await db.select().from(ledgerEntries).where(eq(ledgerEntries.idempotencyKey, idempotencyKey)));
    },
    async insert(row) {
      return required(await db.insert(ledgerEntries).values(row).returning(), 'ledger entry', row.idempotencyKey);
    },
    async listByAccount(accountId, page = {}) {
      return db.select().from(ledgerEntries)
        .where(eq(ledgerEntries.accountId, accountId))
        .orderBy(desc(ledgerEntries.seq))
        .limit(page.limit ?? 50)
        .offset(page.offset ?? 0);
    },
    async history(accountId) {
      return db.select().from(ledgerEntries)
        .where(eq(ledgerEntries.accountId, accountId))
        .orderBy(asc(ledgerEntries.seq));
    },
    async listByOrder(orderId) {
      return db.select().from(ledgerEntries)
        .where(eq(ledgerEntries.orderId, orderId))
        .orderBy(asc(ledgerEntries.seq));
    },
  };
}

// ─── Orders ─────────────────────────────────────────────────────────────────

function orderRepository(db: Executor): OrderRepository {
  return {
    async insert(row) {
      return required(await db.insert(orders).values(row).returning(), 'order', row.orderNo);
    },
    async findById(id) {
      return first(await db.select().from(orders).where(eq(orders.id, id)));
    },
    async findByNo(orderNo) {
      return first(await db.select().from(orders).where(eq(orders.orderNo, orderNo)));
    },
    async findByOutTradeNo(merchantId, kind, outTradeNo) {
      return first(
        await db.select().from(orders).where(and(
          eq(orders.merchantId, merchantId),
          eq(orders.kind, kind),
          eq(orders.outTradeNo, outTradeNo),
        )),
      );
    },
    async findByTx(chain, walletAddress, txHash) {
      return first(
        await db.select().from(orders).where(and(
          eq(orders.chain, chain),
          eq(orders.walletAddress, walletAddress),
          eq(orders.txHash, txHash),
        )),
      );
    },
    async lock(id, options = {}) {
      const query = db.select().from(orders).where(eq(orders.id, id));
      const rows = options.skipLocked
        ? await query.for('update', { skipLocked: true })
        : await query.for('update');
      return first(rows);
    },
    async update(id, patch) {
      return required(
        await db.update(orders).set({ ...patch, updatedAt: new Date() }).where(eq(orders.id, id)).returning(),
        'order',
        id,
      );
    },
    async listPendingDeposits(chain, walletAddress, token) {
      return db.select().from(orders)
        .where(and(
          eq(orders.kind, 'deposit'),
          eq(orders.status, 'pending'),
          eq(orders.chain, chain),
          eq(orders.token, token),
          eq(orders.walletAddress, walletAddress),
        ))
        .orderBy(asc(orders.createdAt));
    },
    async listOpenDeposits(chain) {
      return db.select().from(orders)
        .where(and(
          eq(orders.kind, 'deposit'),
          eq(orders.chain, chain),
          inArray(orders.status, ['detected', 'confirming']),
          isNotNull(orders.txHash),
        ))
        .orderBy(asc(orders.blockHeight));
    },
    async listDueExpiry(now, limit) {
      return db.select().from(orders)
        .where(and(
          eq(orders.kind, 'deposit'),
          eq(orders.status, 'pending'),
          lte(orders.expiresAt, now),
        ))
        .orderBy(asc(orders.expiresAt))
        .limit(limit);
    },
    async listPendingWithdrawals(limit) {
      return db.select().from(orders)
        .where(and(eq(orders.kind, 'withdrawal'), eq(orders.status, 'pending')))
        .orderBy(asc(orders.createdAt))
        .limit(limit);
    },
    async listProcessingWithdrawals(chain) {
      return db.select().from(orders)
        .where(and(eq(orders.kind, 'withdrawal'), eq(orders.status, 'processing'), eq(orders.chain, chain)))
        .orderBy(asc(orders.createdAt));
    },
  };
}

// ─── Deposit Addresses ──────────────────────────────────────────────────────

function depositAddressRepository(db: Executor): DepositAddressRepository {
  return {
    async findById(id) {
      return first(await db.select().from(depositAddresses).where(eq(depositAddresses.id, id)));
    },
    async findAssigned(merchantId, chain, token) {
      return first(
        await db.select().from(depositAddresses).where(and(
          eq(depositAddresses.merchantId, merchantId),
          eq(depositAddresses.chain, chain),
          eq(depositAddresses.token, token),
        )),
      );
    },
    async findByAddress(chain, token, address) {
      return first(
        await db.select().from(depositAddresses).where(and(
          eq(depositAddresses.chain, chain),
          eq(depositAddresses.token, token),
          eq(depositAddresses.address, address),
        )),
      );
    },
    async claimFromPool(merchantId, chain, token, now) {
      // SKIP LOCKED so concurrent allocations never queue on the same pool row.
      const candidate = first(
        await db.select({ id: depositAddresses.id }).from(depositAddresses)
          .where(and(
            isNull(depositAddresses.merchantId),
            eq(depositAddresses.status, 'available'),
            eq(depositAddresses.chain, chain),
            eq(depositAddresses.token, token),
          ))
          .orderBy(asc(depositAddresses.createdAt))
          .limit(1)
          .for('update', { skipLocked: true }),
      );
      if (!candidate) return null;

      return first(
        await db.update(depositAddresses)
          .set({ merchantId, status: 'assigned', assignedAt: now })
          .where(eq(depositAddresses.id, candidate.id))
          .returning(),
      );
    },
    async insert(row) {
      return required(await db.insert(depositAddresses).values(row).returning(), 'deposit address', row.address);
    },
    async update(id, patch) {
      return required(
        await db.update(depositAddresses).set(patch).where(eq(depositAddresses.id, id)).returning(),
        'deposit address',
        id,
      );
    },
    async listAssigned(chain) {
      return db.select().from(depositAddresses)
        .where(and(eq(depositAddresses.chain, chain), eq(depositAddresses.status, 'assigned')))
        .orderBy(asc(depositAddresses.assignedAt));
    },
    async allocateIndex(chain) {
      const [row] = await db.insert(addressCounters)
        .values({ chain, nextIndex: 1 })
        .onConflictDoUpdate({
          target: addressCounters.chain,
          set: { nextIndex: sql`${addressCounters.nextIndex} + 1` },
        })
        .returning({ nextIndex: addressCounters.nextIndex });
      if (!row) throw new NotFoundError('address counter', chain);
      return row.nextIndex - 1;
    },
    async poolStatus() {
      return db.select({
        chain: depositAddresses.chain,
        token: depositAddresses.token,
        available: count(),
      })
        .from(depositAddresses)
        .where(and(isNull(depositAddresses.merchantId), eq(depositAddresses.status, 'available')))
        .groupBy(depositAddresses.chain, depositAddresses.token)
        .orderBy(asc(depositAddresses.chain));
    },
  };
}

// ─── Custody Wallets ────────────────────────────────────────────────────────

function custodyWalletRepository(db: Executor): CustodyWalletRepository {
  return {
    async findActive(chain, role) {
      return first(
        await db.select().from(custodyWallets)
          .where(and(eq(custodyWallets.chain, chain), eq(custodyWallets.role, role), eq(custodyWallets.isActive, true)))
          .orderBy(asc(custodyWallets.createdAt))
          .limit(1),
      );
    },
    async insert(row) {
      return required(await db.insert(custodyWallets).values(row).returning(), 'custody wallet', row.address);
    },
  };
}

// ─── Chain Cursors ──────────────────────────────────────────────────────────

function cursorRepository(db: Executor): CursorRepository {
  return {
    async get(chain) {
      return first(await db.select().from(chainCursors).where(eq(chainCursors.chain, chain)));
    },
    async save(cursor) {
      const values = { ...cursor, updatedAt: new Date() };
      return required(
        await db.insert(chainCursors)
          .values(values)
          .onConflictDoUpdate({ target: chainCursors.chain, set: values })
          .returning(),
        'chain cursor',
        cursor.chain,
      );
    },
  };
}

// ─── Collect Tasks ──────────────────────────────────────────────────────────

function collectTaskRepository(db: Executor): CollectTaskRepository {
  return {
    async insert(row) {
      return required(await db.insert(collectTasks).values(row).returning(), 'collect task', row.sourceAddress);
    },
    async findById(id) {
      return first(await db.select().from(collectTasks).where(eq(collectTasks.id, id)));
    },
    async update(id, patch) {
      return required(
        await db.update(collectTasks).set(patch).where(eq(collectTasks.id, id)).returning(),
        'collect task',
        id,
      );
    },
    async hasInFlight(depositAddressId) {
      const rows = await db.select({ id: collectTasks.id }).from(collectTasks)
        .where(and(
          eq(collectTasks.depositAddressId, depositAddressId),
          inArray(collectTasks.status, ['pending', 'processing']),
        ))
        .limit(1);
      return rows.length > 0;
    },
    async latestFor(depositAddressId) {
      return first(await db.select().from(collectTasks)
        .where(eq(collectTasks.depositAddressId, depositAddressId))
        .orderBy(desc(collectTasks.createdAt))
        .limit(1));
    },
    async findRetryOf(taskId) {
      return first(await db.select().from(collectTasks).where(eq(collectTasks.previousTaskId, taskId)).limit(1));
    },
    async listByStatus(chain, status, limit) {
      return db.select().from(collectTasks)
        .where(and(eq(collectTasks.chain, chain), eq(collectTasks.status, status)))
        .orderBy(asc(collectTasks.createdAt))
        .limit(limit);
    },
    async countByStatus(chain) {
      const rows = await db.select({ status: collectTasks.status, total: count() })
        .from(collectTasks)
        .where(eq(collectTasks.chain, chain))
        .groupBy(collectTasks.status);

      const result: Partial<Record<CollectStatus, number>> = {};
      for (const row of rows) result[row.status] = row.total;
      return result;
    },
  };
}

// ─── Webhook Deliveries ─────────────────────────────────────────────────────

function webhookRepository(db: Executor): WebhookRepository {
  return {
    async insertIfAbsent(row) {
      return first(
        await db.insert(webhookDeliveries)
          .values(row)
          .onConflictDoNothing({ target: [webhookDeliveries.orderId, webhookDeliveries.event] })
          .returning(),
      );
    },
    async findById(id) {
      return first(await db.select().from(webhookDeliveries).where(eq(webhookDeliveries.id, id)));
    },
    async update(id, patch) {
      return required(
        await db.update(webhookDeliveries).set(patch).where(eq(webhookDeliveries.id, id)).returning(),
        'webhook delivery',
        id,
      );
    },
    async listDue(now, limit) {
      return db.select().from(webhookDeliveries)
        .where(and(eq(webhookDeliveries.outcome, 'pending'), lte(webhookDeliveries.nextAttemptAt, now)))
        .orderBy(asc(webhookDeliveries.nextAttemptAt))
        .limit(limit);
    },
    async listByOrder(orderId) {
      return db.select().from(webhookDeliveries)
        .where(eq(webhookDeliveries.orderId, orderId))
        .orderBy(asc(webhookDeliveries.createdAt));
    },
  };
}

// ─── Store ──────────────────────────────────────────────────────────────────

export class DrizzleStore implements Store {
  readonly merchants: MerchantRepository;
  readonly accounts: AccountRepository;
  readonly ledger: LedgerRepository;
  readonly orders: OrderRepository;
  readonly addresses: DepositAddressRepository;
  readonly custody: CustodyWalletRepository;
  readonly cursors: CursorRepository;
  readonly collectTasks: CollectTaskRepository;
  readonly webhooks: WebhookRepository;

  constructor(
    private readonly db: Executor,
    private readonly inTransaction = false,
  ) {
    this.merchants = merchantRepository(db);
    this.accounts = accountRepository(db);
    this.ledger = ledgerRepository(db);
    this.orders = orderRepository(db);
    this.addresses = depositAddressRepository(db);
    this.custody = custodyWalletRepository(db);
    this.cursors = cursorRepository(db);
    this.collectTasks = collectTaskRepository(db);
    this.webhooks = webhookRepository(db);
  }

  async transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T> {
    if (this.inTransaction) return fn(this);
    return this.db.transaction((tx) => fn(new DrizzleStore(tx, true)));
  }
}
