import { describe, it, expect, beforeEach } from 'vitest';
import type { Merchant, Order } from '../src/db/schema.js';
import { withdrawalContext } from '../src/context.js';
import {
  createWithdrawalOrder,
  dispatchWithdrawals,
  failWithdrawal,
  forceCompleteWithdrawal,
  observeWithdrawal,
  type CreateWithdrawalInput,
} from '../src/services/withdrawal-orders.js';
import { adjustBalance, getMerchantBalance, replayBalance } from '../src/services/ledger.js';
import { currentTotp } from '../src/services/totp.js';
import { BroadcastRejectedError, InsufficientBalanceError, InvalidTransitionError } from '../src/services/errors.js';
import {
  ADMIN_ID,
  HOT_ADDRESS,
  RECIPIENT,
  TEST_TOTP_SECRET,
  fund,
  seedCustody,
  seedMerchant,
  testHarness,
  type TestHarness,
} from './support/fixtures.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

describe('withdrawal orders', () => {
  let h: TestHarness;
  let merchant: Merchant;
  let accountId: string;

  const input = (overrides: Partial<CreateWithdrawalInput> = {}): CreateWithdrawalInput => ({
    outTradeNo: 'payout-1',
    chain: 'tron',
    token: 'USDT',
    amount: '50',
    toAddress: RECIPIENT,
    callbackUrl: 'https://merchant.example/callback',
    ...overrides,
  });

  const create = (overrides: Partial<CreateWithdrawalInput> = {}) =>
    createWithdrawalOrder(withdrawalContext(h.ctx), merchant, input(overrides), NOW);

  const dispatch = () => dispatchWithdrawals(withdrawalContext(h.ctx), NOW, 5);

  const reload = async (order: Order): Promise<Order> => {
    const row = await h.store.orders.findById(order.id);
    if (!row) throw new Error(`order ${order.id} vanished`);
    return row;
  };

  const balance = () => getMerchantBalance(h.store, merchant.id, 'USDT');

  beforeEach(async () => {
    h = testHarness();
    merchant = await seedMerchant(h.store);
    await seedCustody(h.store);
    accountId = await fund(h.store, merchant.id, 'USDT', '100');
  });

  describe('createWithdrawalOrder', () => {
    it('charges the fee on top of the amount sent', async () => {
      const order = await create();

      expect(order.status).toBe('pending');
      expect(order.orderNo).toMatch(/^W20260301120000/);
      expect(order.requestedAmount).toBe('50');
      expect(order.fee).toBe('1.25');
      expect(order.netAmount).toBe('50');
      expect(order.walletAddress).toBe(HOT_ADDRESS);
      expect(order.toAddress).toBe(RECIPIENT);
      expect(await balance()).toBe('100');
    });

    it('rejects early when the balance cannot cover amount and fee', async () => {
      await expect(create({ amount: '99' })).rejects.toBeInstanceOf(InsufficientBalanceError);
      expect(await h.store.orders.findByOutTradeNo(merchant.id, 'withdrawal', 'payout-1')).toBeNull();
    });

    it('rejects an address the chain does not accept', async () => {
      await expect(create({ toAddress: '0x0000000000000000000000000000000000000000' }))
        .rejects.toMatchObject({ code: 'INVALID_ADDRESS' });
    });

    it('rejects a duplicate out_trade_no', async () => {
      await create();
      await expect(create()).rejects.toMatchObject({ code: 'DUPLICATE_ORDER' });
    });

    it('refuses a chain without a hot wallet', async () => {
      const bare = testHarness();
      const other = await seedMerchant(bare.store);
      await fund(bare.store, other.id, 'USDT', '100');

      await expect(createWithdrawalOrder(withdrawalContext(bare.ctx), other, input(), NOW))
        .rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
    });
  });

  describe('dispatch', () => {
    it('reserves amount plus fee, then broadcasts the amount from the hot wallet', async () => {
      const order = await create();

      expect(await dispatch()).toEqual({ claimed: 1, broadcast: 1, failed: 0 });

      const processing = await reload(order);
      expect(processing.status).toBe('processing');
      expect(processing.txHash).toBe('tron-tx-1');
      expect(h.chain.broadcasts).toEqual([{ from: HOT_ADDRESS, to: RECIPIENT, token: 'USDT', amount: '50' }]);
      expect(h.keys.opened).toEqual(['enc-hot']);

      const entries = await h.store.ledger.listByOrder(order.id);
      expect(entries.map((e) => [e.direction, e.amount, e.tag])).toEqual([['debit', '51.25', 'withdrawal_reserve']]);
      expect(await balance()).toBe('48.75');
    });

    it('fails with no ledger entries when the balance dropped before dispatch', async () => {
      const order = await create();
      await adjustBalance(h.store, {
        accountId,
        direction: 'debit',
        amount: '90',
        reference: 'chargeback-1',
        note: 'chargeback',
        operatorId: ADMIN_ID,
      });
      expect(await balance()).toBe('10');

      expect(await dispatch()).toEqual({ claimed: 1, broadcast: 0, failed: 1 });

      const failed = await reload(order);
      expect(failed.status).toBe('failed');
      expect(failed.failureReason).toBe('insufficient_balance');
      expect(await h.store.ledger.listByOrder(order.id)).toEqual([]);
      expect(await balance()).toBe('10');
      expect(h.chain.broadcasts).toEqual([]);
    });

    it('refunds the reservation when the node rejects the broadcast', async () => {
      const order = await create();
      h.chain.broadcastError = new BroadcastRejectedError('tron', 'BANDWITH_ERROR: account has no bandwidth');

      expect(await dispatch()).toEqual({ claimed: 1, broadcast: 0, failed: 1 });

      const failed = await reload(order);
      expect(failed.status).toBe('failed');
      expect(failed.failureReason).toBe('broadcast_rejected: BANDWITH_ERROR: account has no bandwidth');

      const entries = await h.store.ledger.listByOrder(order.id);
      expect(entries.map((e) => [e.direction, e.amount, e.tag])).toEqual([
        ['debit', '51.25', 'withdrawal_reserve'],
        ['credit', '51.25', 'withdrawal_release'],
      ]);
      expect(await balance()).toBe('100');
      expect((await replayBalance(h.store, accountId)).consistent).toBe(true);
    });

    it('fails without submitting when the transaction cannot be built', async () => {
      const order = await create();
      h.chain.rpcDown = true;

      expect(await dispatch()).toEqual({ claimed: 1, broadcast: 0, failed: 1 });

      const failed = await reload(order);
      expect(failed.status).toBe('failed');
      expect(failed.failureReason).toBe('broadcast_rejected: tron RPC unavailable: connect ECONNREFUSED');
      expect(failed.txHash).toBeNull();
      expect(h.chain.broadcasts).toEqual([]);
      expect(await balance()).toBe('100');
    });

    it('keeps the hash of a submission whose response was lost', async () => {
      const order = await create();
      h.chain.lostResponse = true;

      expect(await dispatch()).toEqual({ claimed: 1, broadcast: 0, failed: 0 });

      const processing = await reload(order);
      expect(processing.status).toBe('processing');
      expect(processing.txHash).toBe('tron-tx-1');
      expect(h.chain.broadcasts).toHaveLength(1);
      expect(await balance()).toBe('48.75');
    });

    it('leaves a rejected submission to the watcher when the chain already has it', async () => {
      const order = await create();
      h.chain.setStatus('tron-tx-1', { blockHeight: 999, confirmations: 0, success: true });
      h.chain.broadcastError = new BroadcastRejectedError('tron', 'DUP_TRANSACTION_ERROR: dup transaction');

      expect(await dispatch()).toEqual({ claimed: 1, broadcast: 0, failed: 0 });

      expect(await reload(order)).toMatchObject({ status: 'processing', txHash: 'tron-tx-1' });
      expect(await balance()).toBe('48.75');
    });

    it('does not claim an order twice', async () => {
      await create();
      await dispatch();
      expect(await dispatch()).toEqual({ claimed: 0, broadcast: 0, failed: 0 });
      expect(h.chain.broadcasts).toHaveLength(1);
    });
  });

  describe('confirmation watch', () => {
    let order: Order;

    beforeEach(async () => {
      order = await create();
      await dispatch();
    });

    it('succeeds at the confirmation threshold without touching the ledger again', async () => {
      const partial = await observeWithdrawal(h.store, order.id, { blockHeight: 995, confirmations: 1, success: true }, 40, NOW);
      expect(partial.status).toBe('processing');
      expect(partial.confirmations).toBe(1);

      const done = await observeWithdrawal(h.store, order.id, { blockHeight: 995, confirmations: 3, success: true }, 40, NOW);
      expect(done.status).toBe('success');
      expect(done.blockHeight).toBe(995);
      expect(await h.store.ledger.listByOrder(order.id)).toHaveLength(1);
      expect(await balance()).toBe('48.75');
      expect((await h.store.webhooks.listByOrder(order.id)).map((w) => w.event)).toEqual(['success']);
    });

    it('fails and refunds a transaction the chain reverted', async () => {
      const failed = await observeWithdrawal(h.store, order.id, { blockHeight: 995, confirmations: 5, success: false }, 40, NOW);

      expect(failed.status).toBe('failed');
      expect(failed.failureReason).toBe('rejected_on_chain');
      expect(await balance()).toBe('100');
    });

    it('gives up after the wait budget and refunds', async () => {
      expect((await observeWithdrawal(h.store, order.id, null, 2, NOW)).waitCycles).toBe(1);
      expect((await observeWithdrawal(h.store, order.id, null, 2, NOW)).waitCycles).toBe(2);

      const stuck = await observeWithdrawal(h.store, order.id, null, 2, NOW);
      expect(stuck.status).toBe('failed');
      expect(stuck.failureReason).toBe('stuck');
      expect(await balance()).toBe('100');
    });

    it('settles a lost submission from the chain instead of refunding it', async () => {
      const lost = await create({ outTradeNo: 'payout-2', amount: '10' });
      h.chain.lostResponse = true;
      await dispatch();
      h.chain.lostResponse = false;
      const { txHash } = await reload(lost);
      if (!txHash) throw new Error('expected a recorded hash');

      for (let pass = 0; pass < 3; pass++) {
        await observeWithdrawal(h.store, lost.id, await h.chain.getTransfer(txHash), 2, NOW);
        h.chain.height++;
      }

      const done = await reload(lost);
      expect(done.status).toBe('success');
      expect(done.waitCycles).toBe(0);
      expect((await h.store.ledger.listByOrder(lost.id)).map((e) => e.tag)).toEqual(['withdrawal_reserve']);
      // 100 - 51.25 - 11.05
      expect(await balance()).toBe('37.7');
    });

    it('refunds a lost submission the chain never shows', async () => {
      const lost = await create({ outTradeNo: 'payout-2', amount: '10' });
      h.chain.lostResponse = true;
      await dispatch();
      h.chain.lostResponse = false;
      const { txHash } = await reload(lost);
      if (!txHash) throw new Error('expected a recorded hash');
      h.chain.dropTransfer(txHash);

      for (let pass = 0; pass < 3; pass++) {
        await observeWithdrawal(h.store, lost.id, await h.chain.getTransfer(txHash), 2, NOW);
      }

      const stuck = await reload(lost);
      expect(stuck.status).toBe('failed');
      expect(stuck.failureReason).toBe('stuck');
      expect(await balance()).toBe('48.75');
    });

    it('refunds once however often failure is reported', async () => {
      await failWithdrawal(h.store, order.id, 'stuck', NOW);
      await failWithdrawal(h.store, order.id, 'stuck', NOW);

      expect(await h.store.ledger.listByOrder(order.id)).toHaveLength(2);
      expect(await balance()).toBe('100');
    });
  });

  describe('forceCompleteWithdrawal', () => {
    it('completes a processing withdrawal with a valid code and annotates it', async () => {
      const order = await create();
      await dispatch();

      const done = await forceCompleteWithdrawal(h.store, order.id, {
        operatorId: ADMIN_ID,
        totpCode: currentTotp(TEST_TOTP_SECRET, NOW.getTime()),
        note: 'confirmed on explorer',
      }, TEST_TOTP_SECRET, NOW);

      expect(done.status).toBe('success');
      expect(done.annotations).toEqual([
        'force-completed by admin-test at 2026-03-01T12:00:00.000Z: confirmed on explorer',
      ]);
      expect(await balance()).toBe('48.75');
    });

    it('rejects a wrong code', async () => {
      const order = await create();
      await dispatch();
      const valid = currentTotp(TEST_TOTP_SECRET, NOW.getTime());

      await expect(forceCompleteWithdrawal(h.store, order.id, {
        operatorId: ADMIN_ID,
        totpCode: valid === '000000' ? '111111' : '000000',
      }, TEST_TOTP_SECRET, NOW)).rejects.toMatchObject({ code: 'INVALID_2FA' });
      expect((await reload(order)).status).toBe('processing');
    });

    it('cannot complete a withdrawal that was never reserved', async () => {
      const order = await create();

      await expect(forceCompleteWithdrawal(h.store, order.id, {
        operatorId: ADMIN_ID,
        totpCode: currentTotp(TEST_TOTP_SECRET, NOW.getTime()),
      }, TEST_TOTP_SECRET, NOW)).rejects.toBeInstanceOf(InvalidTransitionError);
    });
  });
});
