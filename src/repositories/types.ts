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
  OrderKind,
  CustodyRole,
} from '../db/schema.js';
import type { Chain, Token } from '../chains/catalog.js';

// ─── Insert Shapes ──────────────────────────────────────────────────────────
// Every column is explicit on insert; the store fills ids, sequence numbers and
// creation timestamps.

export type NewMerchant = Omit<Merchant, 'id' | 'createdAt'>;
export type NewOrder = Omit<Order, 'id' | 'createdAt' | 'updatedAt'>;
export type NewLedgerEntry = Omit<LedgerEntry, 'id' | 'seq' | 'createdAt'>;
export type NewDepositAddress = Omit<DepositAddress, 'id' | 'createdAt'>;
export type NewCustodyWallet = Omit<CustodyWallet, 'id' | 'createdAt'>;
export type NewCollectTask = Omit<CollectTask, 'id' | 'createdAt'>;
export type NewWebhookDelivery = Omit<WebhookDelivery, 'id' | 'createdAt'>;

export type OrderPatch = Partial<Omit<Order, 'id' | 'orderNo' | 'merchantId' | 'kind' | 'createdAt'>>;
export type DepositAddressPatch = Partial<Pick<DepositAddress, 'merchantId' | 'status' | 'totalReceived' | 'lastActivityAt' | 'assignedAt'>>;
export type CollectTaskPatch = Partial<Omit<CollectTask, 'id' | 'depositAddressId' | 'createdAt'>>;
export type WebhookDeliveryPatch = Partial<Omit<WebhookDelivery, 'id' | 'orderId' | 'event' | 'createdAt'>>;

export interface Page {
  limit?: number;
  offset?: number;
}

export interface LockOptions {
  /** Return null instead of waiting when another transaction holds the row. */
  skipLocked?: boolean;
}

// ─── Repositories ───────────────────────────────────────────────────────────

export interface MerchantRepository {
  findById(id: string): Promise<Merchant | null>;
  findByNo(merchantNo: string): Promise<Merchant | null>;
  insert(row: NewMerchant): Promise<Merchant>;
}

export interface AccountRepository {
  findById(id: string): Promise<Account | null>;
  find(merchantId: string, token: Token): Promise<Account | null>;
  /** Creates the account unless it exists; returns the stored row either way. */
  upsert(merchantId: string, token: Token): Promise<Account>;
  /** Exclusive row lock held until the enclosing transaction ends. */
  lock(id: string): Promise<Account | null>;
}

export interface LedgerRepository {
  latest(accountId: string): Promise<LedgerEntry | null>;
  findByKey(idempotencyKey: string): Promise<LedgerEntry | null>;
  insert(row: NewLedgerEntry): Promise<LedgerEntry>;
  /** Newest first. */
  listByAccount(accountId: string, page?: Page): Promise<LedgerEntry[]>;
  /** Oldest first, the full history. */
  history(accountId: string): Promise<LedgerEntry[]>;
  listByOrder(orderId: string): Promise<LedgerEntry[]>;
}

export interface OrderRepository {
  insert(row: NewOrder): Promise<Order>;
  findById(id: string): Promise<Order | null>;
  findByNo(orderNo: string): Promise<Order | null>;
  findByOutTradeNo(merchantId: string, kind: OrderKind, outTradeNo: string): Promise<Order | null>;
  findByTx(chain: Chain, walletAddress: string, txHash: string): Promise<Order | null>;
  lock(id: string, options?: LockOptions): Promise<Order | null>;
  update(id: string, patch: OrderPatch): Promise<Order>;

  listPendingDeposits(chain: Chain, walletAddress: string, token: Token): Promise<Order[]>;
  /** Deposits in detected/confirming that carry a transaction hash. */
  listOpenDeposits(chain: Chain): Promise<Order[]>;
  listDueExpiry(now: Date, limit: number): Promise<Order[]>;
  listPendingWithdrawals(limit: number): Promise<Order[]>;
  listProcessingWithdrawals(chain: Chain): Promise<Order[]>;
}

export interface DepositAddressRepository {
  findById(id: string): Promise<DepositAddress | null>;
  findAssigned(merchantId: string, chain: Chain, token: Token): Promise<DepositAddress | null>;
  findByAddress(chain: Chain, token: Token, address: string): Promise<DepositAddress | null>;
  /** Claims the oldest unassigned pool entry, skipping rows other claims hold. */
  claimFromPool(merchantId: string, chain: Chain, token: Token, now: Date): Promise<DepositAddress | null>;
  insert(row: NewDepositAddress): Promise<DepositAddress>;
  update(id: string, patch: DepositAddressPatch): Promise<DepositAddress>;
  listAssigned(chain: Chain): Promise<DepositAddress[]>;
  /** Next HD index for on-demand derivation on a chain. */
  allocateIndex(chain: Chain): Promise<number>;
  poolStatus(): Promise<Array<{ chain: Chain; token: Token; available: number }>>;
}

export interface CustodyWalletRepository {
  findActive(chain: Chain, role: CustodyRole): Promise<CustodyWallet | null>;
  insert(row: NewCustodyWallet): Promise<CustodyWallet>;
}

export interface CursorRepository {
  get(chain: Chain): Promise<ChainCursor | null>;
  save(cursor: Omit<ChainCursor, 'updatedAt'>): Promise<ChainCursor>;
}

export interface CollectTaskRepository {
  insert(row: NewCollectTask): Promise<CollectTask>;
  findById(id: string): Promise<CollectTask | null>;
  update(id: string, patch: CollectTaskPatch): Promise<CollectTask>;
  hasInFlight(depositAddressId: string): Promise<boolean>;
  /** Most recently created task for an address. */
  latestFor(depositAddressId: string): Promise<CollectTask | null>;
  /** The task created as a retry of `taskId`, if any. */
  findRetryOf(taskId: string): Promise<CollectTask | null>;
  listByStatus(chain: Chain, status: CollectStatus, limit: number): Promise<CollectTask[]>;
  countByStatus(chain: Chain): Promise<Partial<Record<CollectStatus, number>>>;
}

export interface WebhookRepository {
  /** Returns null when a delivery for (order, event) already exists. */
  insertIfAbsent(row: NewWebhookDelivery): Promise<WebhookDelivery | null>;
  findById(id: string): Promise<WebhookDelivery | null>;
  update(id: string, patch: WebhookDeliveryPatch): Promise<WebhookDelivery>;
  listDue(now: Date, limit: number): Promise<WebhookDelivery[]>;
  listByOrder(orderId: string): Promise<WebhookDelivery[]>;
}

// ─── Store ──────────────────────────────────────────────────────────────────

export interface Store {
  merchants: MerchantRepository;
  accounts: AccountRepository;
  ledger: LedgerRepository;
  orders: OrderRepository;
  addresses: DepositAddressRepository;
  custody: CustodyWalletRepository;
  cursors: CursorRepository;
  collectTasks: CollectTaskRepository;
  webhooks: WebhookRepository;

  /**
   * Runs `fn` atomically. Locks taken inside are released when it settles;
   * calling transaction() on a store that is already transactional joins it.
   */
  transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T>;
}
