import { describe, it, expect, beforeEach } from 'vitest';
import type { Merchant, DepositAddress } from '../src/db/schema.js';
import type { IncomingTransfer } from '../src/chains/types.js';
import { depositContext } from '../src/context.js';
import {
  createDepositOrder,
  expireDueDeposits,
  failReorgedDeposit,
  recordDepositTransfer,
  updateDepositConfirmations,
  type CreateDepositInput,
} from '../src/services/deposit-orders.js';
import { deliverDue } from '../src/services/notifications.js';
import { LedgerKeys, ensureAccount, getMerchantBalance, post } from '../src/services/ledger.js';
import { SIGN_FIELDS, verifySignature } from '../src/services/signature.js';
import { GatewayError } from '../src/services/errors.js';
import { DEPOSIT_KEY, seedMerchant, testHarness, type TestHarness } from './support/fixtures.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

function transfer(overrides: Partial<IncomingTransfer> = {}): IncomingTransfer {
  return { txHash: 'tx-1', amount: '100', blockHeight: 990, logIndex: 0, confirmations: 1, from: null, ...overrides };
}

describe('deposit orders', () => {
  let h: TestHarness;
  let merchant: Merchant;

  const input = (overrides: Partial<CreateDepositInput> = {}): CreateDepositInput => ({
    outTradeNo: 'shop-1',
    chain: 'tron',
    token: 'USDT',
    amount: '100.00',
    callbackUrl: 'https://merchant.example/callback',
    ...overrides,
  });

  const create = (overrides: Partial<CreateDepositInput> = {}) =>
    createDepositOrder(depositContext(h.ctx), merchant, input(overrides), NOW);

  const addressOf = async (address: string): Promise<DepositAddress> => {
    const row = await h.store.addresses.findByAddress('tron', 'USDT', address);
    if (!row) throw new Error(`no deposit address ${address}`);
    return row;
  };

  const detect = async (address: string, t: IncomingTransfer) =>
    recordDepositTransfer(h.store, {
      chain: 'tron',
      token: 'USDT',
      depositAddress: await addressOf(address),
      transfer: t,
      requiredConfirmations: 3,
    }, NOW, h.suffixes);

  beforeEach(async () => {
    h = testHarness();
    merchant = await seedMerchant(h.store);
  });

  describe('createDepositOrder', () => {
    it('allocates an address and prices the fee on the token amount', async () => {
      const order = await create();

      expect(order.status).toBe('pending');
      expect(order.orderNo).toMatch(/^D20260301120000[A-Z2-9]{6}$/);
      expect(order.walletAddress).toBe('tron-deposit-0');
      expect(order.requestedAmount).toBe('100');
      expect(order.fee).toBe('1');
      expect(order.netAmount).toBe('99');
      expect(order.requiredConfirmations).toBe(3);
      expect(order.expiresAt?.toISOString()).toBe('2026-03-01T12:30:00.000Z');
    });

    it('reuses the merchant address for later orders', async () => {
      const first = await create();
      const second = await create({ outTradeNo: 'shop-2' });
      expect(second.walletAddress).toBe(first.walletAddress);
    });

    it('claims a pool address before deriving', async () => {
      await h.store.addresses.insert({
        merchantId: null,
        chain: 'tron',
        token: 'USDT',
        address: 'pool-address-1',
        derivationPath: null,
        encryptedPrivateKey: 'enc-pool',
        status: 'available',
        totalReceived: '0',
        lastActivityAt: null,
        assignedAt: null,
      });

      const order = await create();
      expect(order.walletAddress).toBe('pool-address-1');
      expect((await addressOf('pool-address-1')).merchantId).toBe(merchant.id);
    });

    it('rejects a duplicate out_trade_no', async () => {
      await create();
      await expect(create()).rejects.toMatchObject({ code: 'DUPLICATE_ORDER' });
    });

    it('rejects a token the chain does not carry', async () => {
      await expect(create({ chain: 'solana', token: 'USDT' })).rejects.toMatchObject({ code: 'UNSUPPORTED_TOKEN' });
    });

    it('converts a fiat amount once at creation', async () => {
      const order = await create({ amount: '720', currency: 'cny' });

      expect(order.requestedAmount).toBe('100');
      expect(order.fiatAmount).toBe('720');
      expect(order.fiatCurrency).toBe('CNY');
      expect(order.exchangeRate).toBe('7.2');
      expect(order.fee).toBe('1');
    });

    it('hands out distinct unique amounts on one address', async () => {
      const first = await create({ uniqueAmount: true });
      const second = await create({ outTradeNo: 'shop-2', uniqueAmount: true });

      expect(first.requestedAmount).toBe('100.001');
      expect(first.amountSuffix).toBe(1);
      expect(second.requestedAmount).toBe('100.002');
      expect(second.amountSuffix).toBe(2);
    });

    it('refuses once all nine suffixes are held', async () => {
      for (let i = 1; i <= 9; i++) await create({ outTradeNo: `shop-${i}`, uniqueAmount: true });

      const attempt = create({ outTradeNo: 'shop-10', uniqueAmount: true });
      await expect(attempt).rejects.toBeInstanceOf(GatewayError);
      await expect(attempt).rejects.toMatchObject({ code: 'AMOUNT_UNAVAILABLE' });
    });
  });

  describe('exact-amount deposit', () => {
    it('detects, confirms, credits net of fee once and notifies', async () => {
      const order = await create();

      const detected = await detect(order.walletAddress, transfer());
      expect(detected?.outcome).toBe('matched');
      expect(detected?.order.status).toBe('confirming');
      expect(detected?.order.confirmations).toBe(1);
      expect(detected?.order.txHash).toBe('tx-1');

      const done = await updateDepositConfirmations(h.store, order.id, 3, NOW);
      expect(done.status).toBe('success');
      expect(done.completedAt?.toISOString()).toBe(NOW.toISOString());

      const entries = await h.store.ledger.listByOrder(order.id);
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        direction: 'credit',
        amount: '99',
        tag: 'deposit_credit',
        idempotencyKey: `deposit:${order.id}:credit`,
      });
      expect(await getMerchantBalance(h.store, merchant.id, 'USDT')).toBe('99');

      const run = await deliverDue(h.store, h.poster, NOW, { requireHttps: true });
      expect(run).toEqual({ attempted: 1, delivered: 1, rescheduled: 0, failed: 0 });
      expect(h.poster.calls).toHaveLength(1);

      const body = h.poster.calls[0]?.body ?? {};
      expect(body.status).toBe('success');
      expect(body.amount).toBe('100');
      expect(body.net_amount).toBe('99');
      expect(body.order_no).toBe(order.orderNo);
      expect(typeof body.sign).toBe('string');
      expect(verifySignature({
        merchant_no: 'M10001',
        order_no: order.orderNo,
        status: 'success',
        amount: '100',
      }, SIGN_FIELDS.callback, DEPOSIT_KEY, String(body.sign))).toBe(true);
    });

    it('credits once under concurrent confirmation updates', async () => {
      const order = await create();
      await detect(order.walletAddress, transfer());

      await Promise.all([
        updateDepositConfirmations(h.store, order.id, 3, NOW),
        updateDepositConfirmations(h.store, order.id, 4, NOW),
        updateDepositConfirmations(h.store, order.id, 5, NOW),
      ]);

      expect(await h.store.ledger.listByOrder(order.id)).toHaveLength(1);
      expect(await getMerchantBalance(h.store, merchant.id, 'USDT')).toBe('99');
      expect(await h.store.webhooks.listByOrder(order.id)).toHaveLength(1);
    });

    it('goes straight to success when first seen past the threshold', async () => {
      const order = await create();
      const detected = await detect(order.walletAddress, transfer({ confirmations: 7 }));

      expect(detected?.order.status).toBe('success');
      expect(detected?.order.confirmations).toBe(7);
    });

    it('treats a repeated sighting as a confirmation refresh', async () => {
      const order = await create();
      await detect(order.walletAddress, transfer());
      const again = await detect(order.walletAddress, transfer({ confirmations: 2 }));

      expect(again?.outcome).toBe('known');
      expect(again?.order.id).toBe(order.id);
      expect(again?.order.confirmations).toBe(2);
      expect((await addressOf(order.walletAddress)).totalReceived).toBe('100');
    });
  });

  describe('matching', () => {
    it('matches a unique amount to its order and frees the suffix after commit', async () => {
      await create({ uniqueAmount: true });
      const second = await create({ outTradeNo: 'shop-2', uniqueAmount: true });

      const detected = await detect(second.walletAddress, transfer({ amount: '100.002' }));

      expect(detected?.order.id).toBe(second.id);
      expect([...(h.suffixes.held.get('unique_amount:tron-deposit-0:100:used') ?? [])]).toEqual([1]);
    });

    it('settles a lone pending order on the amount that arrived', async () => {
      const order = await create();
      const detected = await detect(order.walletAddress, transfer({ amount: '95' }));

      expect(detected?.order.id).toBe(order.id);
      expect(detected?.order.settledAmount).toBe('95');
      expect(detected?.order.fee).toBe('0.95');
      expect(detected?.order.netAmount).toBe('94.05');
    });

    it('records a transfer nobody asked for as its own deposit', async () => {
      const order = await create();
      await detect(order.walletAddress, transfer());

      const extra = await detect(order.walletAddress, transfer({ txHash: 'tx-2', amount: '12', confirmations: 1 }));

      expect(extra?.outcome).toBe('unsolicited');
      expect(extra?.order.id).not.toBe(order.id);
      expect(extra?.order.outTradeNo).toBeNull();
      expect(extra?.order.requestedAmount).toBe('12');
      expect(extra?.order.status).toBe('confirming');
    });

    it('ignores transfers to an unassigned pool address', async () => {
      const pool = await h.store.addresses.insert({
        merchantId: null,
        chain: 'tron',
        token: 'USDT',
        address: 'pool-address-2',
        derivationPath: null,
        encryptedPrivateKey: 'enc-pool',
        status: 'available',
        totalReceived: '0',
        lastActivityAt: null,
        assignedAt: null,
      });

      const result = await recordDepositTransfer(h.store, {
        chain: 'tron',
        token: 'USDT',
        depositAddress: pool,
        transfer: transfer(),
        requiredConfirmations: 3,
      }, NOW);
      expect(result).toBeNull();
    });
  });

  describe('expiry', () => {
    it('expires exactly at the deadline and not a millisecond before', async () => {
      const order = await create({ uniqueAmount: true });
      const deadline = new Date(NOW.getTime() + 30 * 60_000);

      expect(await expireDueDeposits(h.store, new Date(deadline.getTime() - 1), { suffixes: h.suffixes })).toBe(0);
      expect(await expireDueDeposits(h.store, deadline, { suffixes: h.suffixes })).toBe(1);

      const expired = await h.store.orders.findById(order.id);
      expect(expired?.status).toBe('expired');
      expect(expired?.failureReason).toBe('expired');
      expect(h.suffixes.held.get('unique_amount:tron-deposit-0:100:used')?.size).toBe(0);
      expect((await h.store.webhooks.listByOrder(order.id)).map((w) => w.event)).toEqual(['expired']);
    });

    it('leaves detected orders alone', async () => {
      const order = await create();
      await detect(order.walletAddress, transfer());

      expect(await expireDueDeposits(h.store, new Date(NOW.getTime() + 60 * 60_000))).toBe(0);
      expect((await h.store.orders.findById(order.id))?.status).toBe('confirming');
    });
  });

  describe('reorg', () => {
    it('fails an unconfirmed order without touching the ledger', async () => {
      const order = await create();
      await detect(order.walletAddress, transfer());

      const failed = await failReorgedDeposit(h.store, order.id, NOW);

      expect(failed.status).toBe('failed');
      expect(failed.failureReason).toBe('reorged');
      expect(await h.store.ledger.listByOrder(order.id)).toEqual([]);
      expect((await h.store.webhooks.listByOrder(order.id)).map((w) => w.event)).toEqual(['failed']);
    });

    it('reverses a credit recorded against the order with a compensating debit', async () => {
      const order = await create();
      await detect(order.walletAddress, transfer());
      const account = await ensureAccount(h.store, merchant.id, 'USDT');
      await post(h.store, {
        accountId: account.id,
        orderId: order.id,
        direction: 'credit',
        amount: '99',
        kind: 'principal',
        tag: 'deposit_credit',
        idempotencyKey: LedgerKeys.depositCredit(order.id),
      });

      await failReorgedDeposit(h.store, order.id, NOW);
      await failReorgedDeposit(h.store, order.id, NOW);

      const entries = await h.store.ledger.listByOrder(order.id);
      expect(entries.map((e) => [e.direction, e.amount, e.tag])).toEqual([
        ['credit', '99', 'deposit_credit'],
        ['debit', '99', 'reorg_reversal'],
      ]);
      expect(await getMerchantBalance(h.store, merchant.id, 'USDT')).toBe('0');
    });

    it('leaves a settled deposit final', async () => {
      const order = await create();
      await detect(order.walletAddress, transfer({ confirmations: 3 }));

      const after = await failReorgedDeposit(h.store, order.id, NOW);

      expect(after.status).toBe('success');
      expect(await getMerchantBalance(h.store, merchant.id, 'USDT')).toBe('99');
    });
  });
});
