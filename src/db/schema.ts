import {
  pgTable,
  uuid,
  varchar,
  text,
  decimal,
  integer,
  bigint,
  bigserial,
  boolean,
  timestamp,
  jsonb,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';
import { CHAINS, TOKENS } from '../chains/catalog.js';

export const ORDER_KINDS = ['deposit', 'withdrawal'] as const;
export const ORDER_STATUSES = ['pending', 'detected', 'confirming', 'processing', 'success', 'expired', 'failed'] as const;
export const ADDRESS_STATUSES = ['available', 'assigned', 'locked', 'disabled'] as const;
export const LEDGER_DIRECTIONS = ['credit', 'debit'] as const;
export const LEDGER_KINDS = ['principal', 'fee', 'adjustment'] as const;
export const COLLECT_STATUSES = ['pending', 'processing', 'success', 'failed', 'skipped'] as const;
export const DELIVERY_OUTCOMES = ['pending', 'delivered', 'failed'] as const;
export const CUSTODY_ROLES = ['hot', 'cold'] as const;

// ─── Merchants ──────────────────────────────────────────────────────────────
export const merchants = pgTable('merchants', {
  id: uuid('id').primaryKey().defaultRandom(),
  merchantNo: varchar('merchant_no', { length: 32 }).unique().notNull(),
  name: varchar('name', { length: 255 }).notNull(),

  // HMAC secrets: deposit operations and withdrawal operations sign with different keys
  depositKey: varchar('deposit_key', { length: 128 }).notNull(),
  withdrawKey: varchar('withdraw_key', { length: 128 }).notNull(),

  // Fee overrides (NULL = platform default)
  depositFeePercent: decimal('deposit_fee_percent', { precision: 10, scale: 6 }),
  withdrawFeePercent: decimal('withdraw_fee_percent', { precision: 10, scale: 6 }),
  withdrawFixedFee: decimal('withdraw_fixed_fee', { precision: 36, scale: 18 }),

  isActive: boolean('is_active').default(true).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

// ─── Accounts (one per merchant + token; balance lives in the ledger) ───────
export const accounts = pgTable('accounts', {
  id: uuid('id').primaryKey().defaultRandom(),
  merchantId: uuid('merchant_id').references(() => merchants.id).notNull(),
  token: varchar('token', { length: 10, enum: TOKENS }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  uniqueIndex('accounts_merchant_token_idx').on(table.merchantId, table.token),
]);

// ─── Orders (deposits and withdrawals) ──────────────────────────────────────
export const orders = pgTable('orders', {
  id: uuid('id').primaryKey().defaultRandom(),
  orderNo: varchar('order_no', { length: 32 }).unique().notNull(),
  merchantId: uuid('merchant_id').references(() => merchants.id).notNull(),
  outTradeNo: varchar('out_trade_no', { length: 64 }),

  kind: varchar('kind', { length: 12, enum: ORDER_KINDS }).notNull(),
  chain: varchar('chain', { length: 20, enum: CHAINS }).notNull(),
  token: varchar('token', { length: 10, enum: TOKENS }).notNull(),

  requestedAmount: decimal('requested_amount', { precision: 36, scale: 18 }).notNull(),
  settledAmount: decimal('settled_amount', { precision: 36, scale: 18 }),
  fee: decimal('fee', { precision: 36, scale: 18 }).default('0').notNull(),
  netAmount: decimal('net_amount', { precision: 36, scale: 18 }).notNull(),
  // 1..9 when requestedAmount carries a unique-amount suffix (thousandths)
  amountSuffix: integer('amount_suffix'),

  // Foreign-currency input (deposits only)
  fiatAmount: decimal('fiat_amount', { precision: 36, scale: 8 }),
  fiatCurrency: varchar('fiat_currency', { length: 8 }),
  exchangeRate: decimal('exchange_rate', { precision: 36, scale: 18 }),

  // Deposit: allocated deposit address. Withdrawal: hot wallet that pays out.
  walletAddress: varchar('wallet_address', { length: 128 }).notNull(),
  toAddress: varchar('to_address', { length: 128 }),

  txHash: varchar('tx_hash', { length: 128 }),
  blockHeight: bigint('block_height', { mode: 'number' }),
  confirmations: integer('confirmations').default(0).notNull(),
  requiredConfirmations: integer('required_confirmations').notNull(),
  waitCycles: integer('wait_cycles').default(0).notNull(),

  status: varchar('status', { length: 16, enum: ORDER_STATUSES }).default('pending').notNull(),
  failureReason: text('failure_reason'),

  callbackUrl: varchar('callback_url', { length: 512 }),
  extraData: text('extra_data'),
  annotations: jsonb('annotations').$type<string[]>().default([]).notNull(),

  expiresAt: timestamp('expires_at', { withTimezone: true }),
  detectedAt: timestamp('detected_at', { withTimezone: true }),
  completedAt: timestamp('completed_at', { withTimezone: true }),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index('orders_merchant_id_idx').on(table.merchantId),
  index('orders_kind_status_idx').on(table.kind, table.status, table.chain),
  index('orders_expires_at_idx').on(table.expiresAt),
  uniqueIndex('orders_merchant_out_trade_no_idx').on(table.merchantId, table.kind, table.outTradeNo),
  uniqueIndex('orders_chain_address_tx_idx').on(table.chain, table.walletAddress, table.txHash),
]);

// ─── Ledger Entries (append-only — never updated or deleted) ────────────────
export const ledgerEntries = pgTable('ledger_entries', {
  id: uuid('id').primaryKey().defaultRandom(),
  seq: bigserial('seq', { mode: 'number' }).notNull(),
  accountId: uuid('account_id').references(() => accounts.id).notNull(),
  orderId: uuid('order_id').references(() => orders.id),

  direction: varchar('direction', { length: 6, enum: LEDGER_DIRECTIONS }).notNull(),
  amount: decimal('amount', { precision: 36, scale: 18 }).notNull(),
  balanceBefore: decimal('balance_before', { precision: 36, scale: 18 }).notNull(),
  balanceAfter: decimal('balance_after', { precision: 36, scale: 18 }).notNull(),
  kind: varchar('kind', { length: 12, enum: LEDGER_KINDS }).notNull(),
  tag: varchar('tag', { length: 32 }).notNull(),
  // 'deposit_credit' | 'withdrawal_reserve' | 'withdrawal_release' | 'reorg_reversal' | 'manual_adjustment'

  idempotencyKey: varchar('idempotency_key', { length: 255 }).unique().notNull(),
  // Format: "{subject}:{referenceId}:{step}"
  note: text('note'),
  operatorId: varchar('operator_id', { length: 64 }),

  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index('ledger_account_seq_idx').on(table.accountId, table.seq),
  index('ledger_order_id_idx').on(table.orderId),
]);

// ─── Deposit Addresses (one per merchant + chain + token, never reassigned) ─
// Pool addresses have merchantId = NULL and status 'available' until claimed.
export const depositAddresses = pgTable('deposit_addresses', {
  id: uuid('id').primaryKey().defaultRandom(),
  merchantId: uuid('merchant_id').references(() => merchants.id),
  chain: varchar('chain', { length: 20, enum: CHAINS }).notNull(),
  token: varchar('token', { length: 10, enum: TOKENS }).notNull(),

  address: varchar('address', { length: 128 }).notNull(),
  derivationPath: varchar('derivation_path', { length: 64 }),
  encryptedPrivateKey: text('encrypted_private_key').notNull(),
  // AES-256-GCM, key from env WALLET_ENCRYPTION_KEY.

  status: varchar('status', { length: 12, enum: ADDRESS_STATUSES }).default('available').notNull(),
  totalReceived: decimal('total_received', { precision: 36, scale: 18 }).default('0').notNull(),
  lastActivityAt: timestamp('last_activity_at', { withTimezone: true }),
  assignedAt: timestamp('assigned_at', { withTimezone: true }),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  uniqueIndex('deposit_addresses_merchant_chain_token_idx').on(table.merchantId, table.chain, table.token),
  uniqueIndex('deposit_addresses_chain_token_address_idx').on(table.chain, table.token, table.address),
  index('deposit_addresses_status_chain_idx').on(table.status, table.chain),
]);

// ─── Address Counters (HD index allocation) ─────────────────────────────────
export const addressCounters = pgTable('address_counters', {
  chain: varchar('chain', { length: 20 }).primaryKey(),
  nextIndex: integer('next_index').default(0).notNull(),
});

// ─── Custody Wallets (hot pays out and funds gas, cold receives sweeps) ─────
export const custodyWallets = pgTable('custody_wallets', {
  id: uuid('id').primaryKey().defaultRandom(),
  chain: varchar('chain', { length: 20, enum: CHAINS }).notNull(),
  role: varchar('role', { length: 8, enum: CUSTODY_ROLES }).notNull(),
  address: varchar('address', { length: 128 }).notNull(),
  encryptedPrivateKey: text('encrypted_private_key'),
  isActive: boolean('is_active').default(true).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index('custody_wallets_chain_role_idx').on(table.chain, table.role),
]);

// ─── Chain Cursors (one per chain, owned by its scanner) ────────────────────
export const chainCursors = pgTable('chain_cursors', {
  chain: varchar('chain', { length: 20, enum: CHAINS }).primaryKey(),
  lastScannedHeight: bigint('last_scanned_height', { mode: 'number' }).notNull(),
  lastScanAt: timestamp('last_scan_at', { withTimezone: true }),
  scanLag: integer('scan_lag').default(0).notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

// ─── Collect Tasks (sweep attempts; a retry is a new row) ───────────────────
export const collectTasks = pgTable('collect_tasks', {
  id: uuid('id').primaryKey().defaultRandom(),
  depositAddressId: uuid('deposit_address_id').references(() => depositAddresses.id).notNull(),
  sourceAddress: varchar('source_address', { length: 128 }).notNull(),
  destinationAddress: varchar('destination_address', { length: 128 }).notNull(),
  chain: varchar('chain', { length: 20, enum: CHAINS }).notNull(),
  token: varchar('token', { length: 10, enum: TOKENS }).notNull(),
  amount: decimal('amount', { precision: 36, scale: 18 }).notNull(),

  status: varchar('status', { length: 12, enum: COLLECT_STATUSES }).default('pending').notNull(),
  txHash: varchar('tx_hash', { length: 128 }),
  gasTopUpTxHash: varchar('gas_top_up_tx_hash', { length: 128 }),
  gasUsed: decimal('gas_used', { precision: 36, scale: 18 }),
  retryCount: integer('retry_count').default(0).notNull(),
  // Passes spent waiting on a gas top-up or an unconfirmed sweep transaction
  waitCycles: integer('wait_cycles').default(0).notNull(),
  errorMessage: text('error_message'),
  previousTaskId: uuid('previous_task_id'),

  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  executedAt: timestamp('executed_at', { withTimezone: true }),
  completedAt: timestamp('completed_at', { withTimezone: true }),
}, (table) => [
  index('collect_tasks_status_chain_idx').on(table.status, table.chain),
  index('collect_tasks_address_idx').on(table.depositAddressId),
]);

// ─── Webhook Deliveries (one per order + status) ────────────────────────────
export const webhookDeliveries = pgTable('webhook_deliveries', {
  id: uuid('id').primaryKey().defaultRandom(),
  orderId: uuid('order_id').references(() => orders.id).notNull(),
  event: varchar('event', { length: 16, enum: ORDER_STATUSES }).notNull(),
  url: varchar('url', { length: 512 }).notNull(),
  payload: jsonb('payload').$type<Record<string, unknown>>().notNull(),
  signature: varchar('signature', { length: 128 }).notNull(),

  attempts: integer('attempts').default(0).notNull(),
  nextAttemptAt: timestamp('next_attempt_at', { withTimezone: true }),
  lastResponseStatus: integer('last_response_status'),
  lastError: text('last_error'),
  outcome: varchar('outcome', { length: 12, enum: DELIVERY_OUTCOMES }).default('pending').notNull(),

  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  deliveredAt: timestamp('delivered_at', { withTimezone: true }),
}, (table) => [
  uniqueIndex('webhook_deliveries_order_event_idx').on(table.orderId, table.event),
  index('webhook_deliveries_due_idx').on(table.outcome, table.nextAttemptAt),
]);

// ─── Row Types ──────────────────────────────────────────────────────────────
export type Merchant = typeof merchants.$inferSelect;
export type Account = typeof accounts.$inferSelect;
export type Order = typeof orders.$inferSelect;
export type NewOrder = typeof orders.$inferInsert;
export type LedgerEntry = typeof ledgerEntries.$inferSelect;
export type DepositAddress = typeof depositAddresses.$inferSelect;
export type CustodyWallet = typeof custodyWallets.$inferSelect;
export type ChainCursor = typeof chainCursors.$inferSelect;
export type CollectTask = typeof collectTasks.$inferSelect;
export type WebhookDelivery = typeof webhookDeliveries.$inferSelect;

export type OrderKind = (typeof ORDER_KINDS)[number];
export type OrderStatus = (typeof ORDER_STATUSES)[number];
export type AddressStatus = (typeof ADDRESS_STATUSES)[number];
export type LedgerDirection = (typeof LEDGER_DIRECTIONS)[number];
export type LedgerKind = (typeof LEDGER_KINDS)[number];
export type CollectStatus = (typeof COLLECT_STATUSES)[number];
export type DeliveryOutcome = (typeof DELIVERY_OUTCOMES)[number];
export type CustodyRole = (typeof CUSTODY_ROLES)[number];
