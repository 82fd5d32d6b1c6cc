import { randomUUID } from 'node:crypto';
import type {
  Merchant,
  Account,
  Order,
  LedgerEntry,
  DepositAddress,
  CustodyWallet,
  ChainCursor,
  CollectTask,
  CollectStatus,
  WebhookDelivery,
} from '../../src/db/schema.js';
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
} from '../../src/repositories/types.js';
import type { Chain, Token } from '../../src/chains/catalog.js';
import { NotFoundError } from '../../src/services/errors.js';

// In-process Store for tests. Row locks are keyed async mutexes held until the
// owning transaction settles; a failed transaction replays its undo log.

interface TxContext {
  owner: symbol;
  undo: Array<() => void>;
}

class KeyedLocks {
  private holders = new Map<string, { owner: symbol; waiters: Array<() => void> }>();

  async acquire(key: string, owner: symbol): Promise<void> {
    for (;;) {
      const held = this.holders.get(key);
      if (!held) {
        this.holders.set(key, { owner, waiters: [] });
        return;
      }
      if (held.owner === owner) return;
      await new Promise<void>((resolve) => held.waiters.push(resolve));
    }
  }

  tryAcquire(key: string, owner: symbol): boolean {
    const held = this.holders.get(key);
    if (!held) {
      this.holders.set(key, { owner, waiters: [] });
      return true;
    }
    return held.owner === owner;
  }

  releaseAll(owner: symbol): void {
    for (const [key, held] of [...this.holders]) {
      if (held.owner !== owner) continue;
      this.holders.delete(key);
      for (const wake of held.waiters) wake();
    }
  }
}

class Table<T extends { id: string }> {
  readonly rows = new Map<string, T>();

  constructor(private readonly name: string) {}

  insert(ctx: TxContext | null, row: T): T {
    this.rows.set(row.id, row);
    ctx?.undo.push(() => this.rows.delete(row.id));
    return structuredClone(row);
  }

  update(ctx: TxContext | null, id: string, patch: Partial<T>): T {
    const current = this.rows.get(id);
    if (!current) throw new NotFoundError(this.name, id);
    const next = { ...current, ...patch };
    this.rows.set(id, next);
    ctx?.undo.push(() => this.rows.set(id, current));
    return structuredClone(next);
  }

  get(id: string): T | null {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : null;
  }

  find(predicate: (row: T) => boolean): T | null {
    for (const row of this.rows.values()) {
      if (predicate(row)) return structuredClone(row);
    }
    return null;
  }

  filter(predicate: (row: T) => boolean): T[] {
    return [...this.rows.values()].filter(predicate).map((row) => structuredClone(row));
  }
}

export class MemoryState {
  readonly locks = new KeyedLocks();
  readonly merchants = new Table<Merchant>('merchant');
  readonly accounts = new Table<Account>('account');
  readonly ledger = new Table<LedgerEntry>('ledger entry');
  readonly orders = new Table<Order>('order');
  readonly addresses = new Table<DepositAddress>('deposit address');
  readonly custody = new Table<CustodyWallet>('custody wallet');
  readonly collectTasks = new Table<CollectTask>('collect task');
  readonly webhooks = new Table<WebhookDelivery>('webhook delivery');
  readonly cursors = new Map<Chain, ChainCursor>();
  readonly counters = new Map<Chain, number>();
  ledgerSeq = 0;
}

function unique(violated: boolean, constraint: string): void {
  if (violated) throw new Error(`duplicate key value violates unique constraint "${constraint}"`);
}

function page<T>(rows: T[], limit = 50, offset = 0): T[] {
  return rows.slice(offset, offset + limit);
}

// ─── Repositories ───────────────────────────────────────────────────────────

function merchantRepository(s: MemoryState, ctx: TxContext | null): MerchantRepository {
  return {
    async findById(id) {
      return s.merchants.get(id);
    },
    async findByNo(merchantNo) {
      return s.merchants.find((m) => m.merchantNo === merchantNo);
    },
    async insert(row) {
      unique(s.merchants.find((m) => m.merchantNo === row.merchantNo) !== null, 'merchants_merchant_no_unique');
      return s.merchants.insert(ctx, { ...row, id: randomUUID(), createdAt: new Date() });
    },
  };
}

function accountRepository(s: MemoryState, ctx: TxContext | null): AccountRepository {
  const find = async (merchantId: string, token: Token) =>
    s.accounts.find((a) => a.merchantId === merchantId && a.token === token);

  return {
    async findById(id) {
      return s.accounts.get(id);
    },
    find,
    async upsert(merchantId, token) {
      const existing = await find(merchantId, token);
      if (existing) return existing;
      return s.accounts.insert(ctx, { id: randomUUID(), merchantId, token, createdAt: new Date() });
    },
    async lock(id) {
      if (ctx) await s.locks.acquire(`account:${id}`, ctx.owner);
      return s.accounts.get(id);
    },
  };
}

function ledgerRepository(s: MemoryState, ctx: TxContext | null): LedgerRepository {
  const history = (accountId: string) =>
    s.ledger.filter((e) => e.accountId === accountId).sort((a, b) => a.seq - b.seq);

  return {
    async latest(accountId) {
      return history(accountId).at(-1) ?? null;
    },
    async findByKey(idempotencyKey) {
      return s.ledger.find((e) => e.idempotencyKey === idempotencyKey);
    },
    async insert(row) {
      unique(s.ledger.find((e) => e.idempotencyKey === row.idempotencyKey) !== null, 'ledger_entries_idempotency_key_unique');
      s.ledgerSeq += 1;
      return s.ledger.insert(ctx, { ...row, id: randomUUID(), seq: s.ledgerSeq, createdAt: new Date() });
    },
    async listByAccount(accountId, p = {}) {
      return page(history(accountId).reverse(), p.limit, p.offset);
    },
    async history(accountId) {
      return history(accountId);
    },
    async listByOrder(orderId) {
      return s.ledger.filter((e) => e.orderId === orderId).sort((a, b) => a.seq - b.seq);
    },
  };
}

function orderRepository(s: MemoryState, ctx: TxContext | null): OrderRepository {
  return {
    async insert(row) {
      unique(
        row.outTradeNo !== null &&
          s.orders.find((o) => o.merchantId === row.merchantId && o.kind === row.kind && o.outTradeNo === row.outTradeNo) !== null,
        'orders_merchant_out_trade_no_idx',
      );
      unique(
        row.txHash !== null &&
          s.orders.find((o) => o.chain === row.chain && o.walletAddress === row.walletAddress && o.txHash === row.txHash) !== null,
        'orders_chain_address_tx_idx',
      );
      const now = new Date();
      return s.orders.insert(ctx, { ...row, id: randomUUID(), createdAt: now, updatedAt: now });
    },
    async findById(id) {
      return s.orders.get(id);
    },
    async findByNo(orderNo) {
      return s.orders.find((o) => o.orderNo === orderNo);
    },
    async findByOutTradeNo(merchantId, kind, outTradeNo) {
      return s.orders.find((o) => o.merchantId === merchantId && o.kind === kind && o.outTradeNo === outTradeNo);
    },
    async findByTx(chain, walletAddress, txHash) {
      return s.orders.find((o) => o.chain === chain && o.walletAddress === walletAddress && o.txHash === txHash);
    },
    async lock(id, options = {}) {
      if (ctx) {
        const key = `order:${id}`;
        if (options.skipLocked) {
          if (!s.locks.tryAcquire(key, ctx.owner)) return null;
        } else {
          await s.locks.acquire(key, ctx.owner);
        }
      }
      return s.orders.get(id);
    },
    async update(id, patch) {
      return s.orders.update(ctx, id, { ...patch, updatedAt: new Date() });
    },
    async listPendingDeposits(chain, walletAddress, token) {
      return s.orders.filter((o) =>
        o.kind === 'deposit' && o.status === 'pending' && o.chain === chain && o.token === token && o.walletAddress === walletAddress);
    },
    async listOpenDeposits(chain) {
      return s.orders
        .filter((o) => o.kind === 'deposit' && o.chain === chain && (o.status === 'detected' || o.status === 'confirming') && o.txHash !== null)
        .sort((a, b) => (a.blockHeight ?? 0) - (b.blockHeight ?? 0));
    },
    async listDueExpiry(now, limit) {
      return s.orders
        .filter((o) => o.kind === 'deposit' && o.status === 'pending' && o.expiresAt !== null && o.expiresAt.getTime() <= now.getTime())
        .slice(0, limit);
    },
    async listPendingWithdrawals(limit) {
      return s.orders.filter((o) => o.kind === 'withdrawal' && o.status === 'pending').slice(0, limit);
    },
    async listProcessingWithdrawals(chain) {
      return s.orders.filter((o) => o.kind === 'withdrawal' && o.status === 'processing' && o.chain === chain);
    },
  };
}

function depositAddressRepository(s: MemoryState, ctx: TxContext | null): DepositAddressRepository {
  return {
    async findById(id) {
      return s.addresses.get(id);
    },
    async findAssigned(merchantId, chain, token) {
      return s.addresses.find((a) => a.merchantId === merchantId && a.chain === chain && a.token === token);
    },
    async findByAddress(chain, token, address) {
      return s.addresses.find((a) => a.chain === chain && a.token === token && a.address === address);
    },
    async claimFromPool(merchantId, chain, token, now) {
      const candidate = s.addresses.find((a) =>
        a.merchantId === null && a.status === 'available' && a.chain === chain && a.token === token);
      if (!candidate) return null;
      return s.addresses.update(ctx, candidate.id, { merchantId, status: 'assigned', assignedAt: now });
    },
    async insert(row) {
      unique(
        s.addresses.find((a) => a.chain === row.chain && a.token === row.token && a.address === row.address) !== null,
        'deposit_addresses_chain_token_address_idx',
      );
      return s.addresses.insert(ctx, { ...row, id: randomUUID(), createdAt: new Date() });
    },
    async update(id, patch) {
      return s.addresses.update(ctx, id, patch);
    },
    async listAssigned(chain) {
      return s.addresses.filter((a) => a.chain === chain && a.status === 'assigned');
    },
    async allocateIndex(chain) {
      const next = s.counters.get(chain) ?? 0;
      s.counters.set(chain, next + 1);
      return next;
    },
    async poolStatus() {
      const counts = new Map<string, { chain: Chain; token: Token; available: number }>();
      for (const a of s.addresses.filter((row) => row.merchantId === null && row.status === 'available')) {
        const key = `${a.chain}:${a.token}`;
        const entry = counts.get(key) ?? { chain: a.chain, token: a.token, available: 0 };
        entry.available += 1;
        counts.set(key, entry);
      }
      return [...counts.values()];
    },
  };
}

function custodyWalletRepository(s: MemoryState, ctx: TxContext | null): CustodyWalletRepository {
  return {
    async findActive(chain, role) {
      return s.custody.find((w) => w.chain === chain && w.role === role && w.isActive);
    },
    async insert(row) {
      return s.custody.insert(ctx, { ...row, id: randomUUID(), createdAt: new Date() });
    },
  };
}

function cursorRepository(s: MemoryState, ctx: TxContext | null): CursorRepository {
  return {
    async get(chain) {
      const cursor = s.cursors.get(chain);
      return cursor ? structuredClone(cursor) : null;
    },
    async save(cursor) {
      const previous = s.cursors.get(cursor.chain);
      const next = { ...cursor, updatedAt: new Date() };
      s.cursors.set(cursor.chain, next);
      ctx?.undo.push(() => {
        if (previous) s.cursors.set(cursor.chain, previous);
        else s.cursors.delete(cursor.chain);
      });
      return structuredClone(next);
    },
  };
}

function collectTaskRepository(s: MemoryState, ctx: TxContext | null): CollectTaskRepository {
  return {
    async insert(row) {
      return s.collectTasks.insert(ctx, { ...row, id: randomUUID(), createdAt: new Date() });
    },
    async findById(id) {
      return s.collectTasks.get(id);
    },
    async update(id, patch) {
      return s.collectTasks.update(ctx, id, patch);
    },
    async hasInFlight(depositAddressId) {
      return s.collectTasks.find((t) =>
        t.depositAddressId === depositAddressId && (t.status === 'pending' || t.status === 'processing')) !== null;
    },
    async latestFor(depositAddressId) {
      return s.collectTasks.filter((t) => t.depositAddressId === depositAddressId).at(-1) ?? null;
    },
    async findRetryOf(taskId) {
      return s.collectTasks.find((t) => t.previousTaskId === taskId);
    },
    async listByStatus(chain, status, limit) {
      return s.collectTasks.filter((t) => t.chain === chain && t.status === status).slice(0, limit);
    },
    async countByStatus(chain) {
      const result: Partial<Record<CollectStatus, number>> = {};
      for (const t of s.collectTasks.filter((row) => row.chain === chain)) {
        result[t.status] = (result[t.status] ?? 0) + 1;
      }
      return result;
    },
  };
}

function webhookRepository(s: MemoryState, ctx: TxContext | null): WebhookRepository {
  return {
    async insertIfAbsent(row) {
      if (s.webhooks.find((w) => w.orderId === row.orderId && w.event === row.event)) return null;
      return s.webhooks.insert(ctx, { ...row, id: randomUUID(), createdAt: new Date() });
    },
    async findById(id) {
      return s.webhooks.get(id);
    },
    async update(id, patch) {
      return s.webhooks.update(ctx, id, patch);
    },
    async listDue(now, limit) {
      return s.webhooks
        .filter((w) => w.outcome === 'pending' && w.nextAttemptAt !== null && w.nextAttemptAt.getTime() <= now.getTime())
        .sort((a, b) => (a.nextAttemptAt?.getTime() ?? 0) - (b.nextAttemptAt?.getTime() ?? 0))
        .slice(0, limit);
    },
    async listByOrder(orderId) {
      return s.webhooks.filter((w) => w.orderId === orderId);
    },
  };
}

// ─── Store ──────────────────────────────────────────────────────────────────

export class MemoryStore implements Store {
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
    readonly state: MemoryState = new MemoryState(),
    private readonly ctx: TxContext | null = null,
  ) {
    this.merchants = merchantRepository(state, ctx);
    this.accounts = accountRepository(state, ctx);
    this.ledger = ledgerRepository(state, ctx);
    this.orders = orderRepository(state, ctx);
    this.addresses = depositAddressRepository(state, ctx);
    this.custody = custodyWalletRepository(state, ctx);
    this.cursors = cursorRepository(state, ctx);
    this.collectTasks = collectTaskRepository(state, ctx);
    this.webhooks = webhookRepository(state, ctx);
  }

  async transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T> {
    if (this.ctx) return fn(this);

    const ctx: TxContext = { owner: Symbol('tx'), undo: [] };
    try {
      return await fn(new MemoryStore(this.state, ctx));
    } catch (err) {
      for (const undo of ctx.undo.reverse()) undo();
      throw err;
    } finally {
      this.state.locks.releaseAll(ctx.owner);
    }
  }
}
