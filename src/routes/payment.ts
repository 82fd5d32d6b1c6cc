import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ORDER_KINDS, type Order } from '../db/schema.js';
import { CHAINS, TOKENS } from '../chains/catalog.js';
import { depositContext, withdrawalContext, type AppContext } from '../context.js';
import { verifyMerchantRequest } from '../middleware/signature.js';
import { createDepositOrder } from '../services/deposit-orders.js';
import { createWithdrawalOrder } from '../services/withdrawal-orders.js';
import { NotFoundError } from '../services/errors.js';

// ─── Request Schemas ────────────────────────────────────────────────────────
// Field names follow the merchant wire format (snake_case). Amounts stay
// strings so the signed text is exactly what was sent.

const signedBase = z.object({
  merchant_no: z.string().min(1).max(32),
  timestamp: z.coerce.number().int().positive(),
  nonce: z.string().min(1).max(64),
  sign: z.string().regex(/^[0-9a-fA-F]{64}$/, 'sign must be a hex HMAC-SHA256 digest'),
});

const amountField = z.string().regex(/^\d+(\.\d+)?$/, 'amount must be a decimal string');

const depositCreateSchema = signedBase.extend({
  out_trade_no: z.string().min(1).max(64),
  chain: z.enum(CHAINS),
  token: z.enum(TOKENS),
  amount: amountField,
  currency: z.string().min(3).max(8).optional(),
  unique_amount: z.boolean().optional(),
  callback_url: z.string().url().max(512).optional(),
  extra_data: z.string().max(1024).optional(),
});

const withdrawCreateSchema = signedBase.extend({
  out_trade_no: z.string().min(1).max(64),
  chain: z.enum(CHAINS),
  token: z.enum(TOKENS),
  amount: amountField,
  to_address: z.string().min(20).max(128),
  callback_url: z.string().url().max(512).optional(),
  extra_data: z.string().max(1024).optional(),
});

const querySchema = signedBase.extend({
  order_no: z.string().min(1).max(32),
});

const queryByOutTradeNoSchema = signedBase.extend({
  out_trade_no: z.string().min(1).max(64),
  order_type: z.enum(ORDER_KINDS),
});

// ─── Response Shape ─────────────────────────────────────────────────────────

export function orderView(order: Order) {
  return {
    order_no: order.orderNo,
    out_trade_no: order.outTradeNo,
    order_type: order.kind,
    chain: order.chain,
    token: order.token,
    amount: order.requestedAmount,
    settled_amount: order.settledAmount,
    fee: order.fee,
    net_amount: order.netAmount,
    fiat_amount: order.fiatAmount,
    fiat_currency: order.fiatCurrency,
    exchange_rate: order.exchangeRate,
    status: order.status,
    failure_reason: order.failureReason,
    wallet_address: order.walletAddress,
    to_address: order.toAddress,
    tx_hash: order.txHash,
    confirmations: order.confirmations,
    required_confirmations: order.requiredConfirmations,
    expires_at: order.expiresAt?.toISOString() ?? null,
    created_at: order.createdAt.toISOString(),
    completed_at: order.completedAt?.toISOString() ?? null,
    extra_data: order.extraData,
  };
}

// ─── Routes ─────────────────────────────────────────────────────────────────

export async function paymentRoutes(app: FastifyInstance, opts: { ctx: AppContext }) {
  const { ctx } = opts;
  const verifyOptions = () => ({ now: new Date(), windowMinutes: ctx.config.SIGNATURE_WINDOW_MINUTES });

  // ── POST /api/v1/payment/deposit/create ──
  app.post('/api/v1/payment/deposit/create', async (request) => {
    const body = depositCreateSchema.parse(request.body);
    const merchant = await verifyMerchantRequest(ctx.store, body, 'depositCreate', 'deposit', verifyOptions());

    const order = await createDepositOrder(depositContext(ctx), merchant, {
      outTradeNo: body.out_trade_no,
      chain: body.chain,
      token: body.token,
      amount: body.amount,
      currency: body.currency,
      uniqueAmount: body.unique_amount,
      callbackUrl: body.callback_url,
      extraData: body.extra_data,
    });

    return { success: true, data: orderView(order) };
  });

  // ── POST /api/v1/payment/withdraw/create ──
  app.post('/api/v1/payment/withdraw/create', async (request) => {
    const body = withdrawCreateSchema.parse(request.body);
    const merchant = await verifyMerchantRequest(ctx.store, body, 'withdrawCreate', 'withdraw', verifyOptions());

    const order = await createWithdrawalOrder(withdrawalContext(ctx), merchant, {
      outTradeNo: body.out_trade_no,
      chain: body.chain,
      token: body.token,
      amount: body.amount,
      toAddress: body.to_address.trim(),
      callbackUrl: body.callback_url,
      extraData: body.extra_data,
    });

    return { success: true, data: orderView(order) };
  });

  // ── POST /api/v1/payment/query ──
  app.post('/api/v1/payment/query', async (request) => {
    const body = querySchema.parse(request.body);
    const merchant = await verifyMerchantRequest(ctx.store, body, 'query', 'either', verifyOptions());

    const order = await ctx.store.orders.findByNo(body.order_no);
    if (!order || order.merchantId !== merchant.id) throw new NotFoundError('order', body.order_no);

    return { success: true, data: orderView(order) };
  });

  // ── POST /api/v1/payment/query-by-out-trade-no ──
  app.post('/api/v1/payment/query-by-out-trade-no', async (request) => {
    const body = queryByOutTradeNoSchema.parse(request.body);
    const keyKind = body.order_type === 'deposit' ? 'deposit' : 'withdraw';
    const merchant = await verifyMerchantRequest(ctx.store, body, 'queryByOutTradeNo', keyKind, verifyOptions());

    const order = await ctx.store.orders.findByOutTradeNo(merchant.id, body.order_type, body.out_trade_no);
    if (!order) throw new NotFoundError('order', body.out_trade_no);

    return { success: true, data: orderView(order) };
  });
}
