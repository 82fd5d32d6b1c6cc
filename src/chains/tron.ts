import axios, { type AxiosInstance } from 'axios';
import { ethers } from 'ethers';
import { z } from 'zod';
import type { Token } from './catalog.js';
import type {
  ChainAdapter,
  IncomingTransfer,
  KeyHandle,
  OutgoingTransfer,
  SignedTransfer,
  TransferStatus,
} from './types.js';
import { BlockCache, rpcCall } from './rpc.js';
import { isTronAddress, tronAddressFromHex, tronAddressToEvmHex } from './tron-address.js';
import { fromBaseUnits, toBaseUnits } from '../services/amount.js';
import { BroadcastRejectedError } from '../services/errors.js';

// ═════════════════════════════════════════════════════════════════════════════
//  TRON — TronGrid HTTP API (TRX native + USDT TRC-20)
//  Transactions are built by the node and signed locally (secp256k1 over txID).
// ═════════════════════════════════════════════════════════════════════════════

const TRX_DECIMALS = 6;
const USDT_DECIMALS = 6;
const TRANSFER_SELECTOR = 'a9059cbb';
// getblockbylimitnext returns at most 100 blocks, end exclusive
const BLOCK_PAGE = 100;
const FEE_LIMIT_SUN = 30_000_000;
// Worst case without staked resources: bandwidth burn for TRX, energy burn for USDT
const TRANSFER_COST_TRX = { native: '1.1', token: '30' } as const;

// ─── Response Shapes ────────────────────────────────────────────────────────

const contractSchema = z.object({
  type: z.string(),
  parameter: z.object({
    value: z.object({
      owner_address: z.string().optional(),
      to_address: z.string().optional(),
      contract_address: z.string().optional(),
      amount: z.number().optional(),
      data: z.string().optional(),
    }).passthrough(),
  }).passthrough(),
}).passthrough();

const transactionSchema = z.object({
  txID: z.string(),
  ret: z.array(z.object({ contractRet: z.string().optional() })).optional(),
  raw_data: z.object({ contract: z.array(contractSchema) }).passthrough(),
  raw_data_hex: z.string().optional(),
});

const blockSchema = z.object({
  block_header: z.object({ raw_data: z.object({ number: z.number() }) }),
  transactions: z.array(transactionSchema).optional(),
});

const blockRangeSchema = z.object({ block: z.array(blockSchema).optional() });

const txInfoSchema = z.object({
  id: z.string().optional(),
  blockNumber: z.number().optional(),
  result: z.string().optional(),
  receipt: z.object({ result: z.string().optional() }).optional(),
});

const accountSchema = z.object({ balance: z.number().optional() });

const constantSchema = z.object({ constant_result: z.array(z.string()).optional() });

const triggerSchema = z.object({
  result: z.object({ result: z.boolean().optional(), message: z.string().optional() }).optional(),
  transaction: transactionSchema.optional(),
});

const signedTransactionSchema = transactionSchema.extend({ signature: z.array(z.string()) }).passthrough();

const createdSchema = transactionSchema.or(z.object({ Error: z.string() }));

const broadcastSchema = z.object({
  result: z.boolean().optional(),
  txid: z.string().optional(),
  code: z.string().optional(),
  message: z.string().optional(),
});

type TronBlock = z.infer<typeof blockSchema>;
type TronTransaction = z.infer<typeof transactionSchema>;

// ─── Adapter ────────────────────────────────────────────────────────────────

export interface TronAdapterConfig {
  apiUrl: string;
  apiKey: string;
  usdtContract: string;
  timeoutMs: number;
  requiredConfirmations: number;
}

export class TronAdapter implements ChainAdapter {
  readonly chain = 'tron' as const;
  private readonly http: AxiosInstance;
  private readonly blocks = new BlockCache<TronBlock>();

  constructor(private readonly config: TronAdapterConfig, http?: AxiosInstance) {
    this.http = http ?? axios.create({
      baseURL: config.apiUrl,
      timeout: config.timeoutMs,
      headers: config.apiKey ? { 'TRON-PRO-API-KEY': config.apiKey } : {},
    });
  }

  private post<T>(path: string, body: Record<string, unknown>, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    return rpcCall(this.chain, this.config.timeoutMs, async () => {
      const { data } = await this.http.post<unknown>(path, body);
      return schema.parse(data);
    });
  }

  async currentHeight(): Promise<number> {
    const block = await this.post('/wallet/getnowblock', {}, blockSchema);
    return block.block_header.raw_data.number;
  }

  async *scanAddress(address: string, token: Token, fromHeight: number, toHeight: number): AsyncIterable<IncomingTransfer> {
    const tip = await this.currentHeight();

    for (let height = fromHeight; height <= toHeight; height++) {
      const block = await this.block(height, toHeight);
      const transactions = block.transactions ?? [];

      for (const [position, tx] of transactions.entries()) {
        if (tx.ret?.[0]?.contractRet !== 'SUCCESS') continue;
        const parsed = parseIncoming(tx, this.config.usdtContract);
        if (!parsed || parsed.to !== address || parsed.token !== token || parsed.units === 0n) continue;

        yield {
          txHash: tx.txID,
          amount: fromBaseUnits(parsed.units, token === 'USDT' ? USDT_DECIMALS : TRX_DECIMALS),
          blockHeight: height,
          logIndex: position,
          confirmations: tip - height + 1,
          from: parsed.from,
        };
      }
    }
  }

  /** Blocks are fetched in pages and shared by every address scanned this tick. */
  private async block(height: number, rangeEnd: number): Promise<TronBlock> {
    const cached = this.blocks.get(height);
    if (cached) return cached;

    const endNum = Math.min(height + BLOCK_PAGE, rangeEnd + 1);
    const page = await this.post('/wallet/getblockbylimitnext', { startNum: height, endNum, visible: true }, blockRangeSchema);
    for (const block of page.block ?? []) {
      this.blocks.set(block.block_header.raw_data.number, block);
    }

    // Empty blocks still come back; a gap means the node has not caught up
    return this.blocks.get(height) ?? { block_header: { raw_data: { number: height } }, transactions: [] };
  }

  async getTransfer(txHash: string): Promise<TransferStatus | null> {
    const [info, tip] = await Promise.all([
      this.post('/wallet/gettransactioninfobyid', { value: txHash }, txInfoSchema),
      this.currentHeight(),
    ]);
    if (info.blockNumber === undefined) return null;

    const contractResult = info.receipt?.result;
    const success = info.result !== 'FAILED' && (contractResult === undefined || contractResult === 'SUCCESS');
    return { blockHeight: info.blockNumber, confirmations: tip - info.blockNumber + 1, success };
  }

  async balance(address: string, token: Token): Promise<string> {
    if (token === 'USDT') {
      const result = await this.post('/wallet/triggerconstantcontract', {
        owner_address: address,
        contract_address: this.config.usdtContract,
        function_selector: 'balanceOf(address)',
        parameter: abiAddress(address),
        visible: true,
      }, constantSchema);
      const word = result.constant_result?.[0];
      return fromBaseUnits(word ? BigInt('0x' + word) : 0n, USDT_DECIMALS);
    }

    const account = await this.post('/wallet/getaccount', { address, visible: true }, accountSchema);
    return fromBaseUnits(BigInt(account.balance ?? 0), TRX_DECIMALS);
  }

  async signTransfer(transfer: OutgoingTransfer, key: KeyHandle): Promise<SignedTransfer> {
    const unsigned = await this.buildTransaction(transfer);

    const signature = await key.use(async (privateKey) => {
      const signingKey = new ethers.SigningKey(ethers.hexlify(privateKey));
      return signingKey.sign('0x' + unsigned.txID).serialized.slice(2);
    });

    return { txHash: unsigned.txID, raw: JSON.stringify({ ...unsigned, signature: [signature] }), transfer };
  }

  async broadcast(signed: SignedTransfer): Promise<string> {
    const body = signedTransactionSchema.parse(JSON.parse(signed.raw));
    const result = await this.post('/wallet/broadcasttransaction', { ...body, visible: true }, broadcastSchema);
    if (!result.result) {
      throw new BroadcastRejectedError(this.chain, `${result.code ?? 'UNKNOWN'}: ${decodeMessage(result.message)}`);
    }
    return result.txid ?? body.txID;
  }

  private async buildTransaction(transfer: OutgoingTransfer): Promise<TronTransaction> {
    if (transfer.token === 'USDT') {
      const built = await this.post('/wallet/triggersmartcontract', {
        owner_address: transfer.from,
        contract_address: this.config.usdtContract,
        function_selector: 'transfer(address,uint256)',
        parameter: abiAddress(transfer.to) + abiUint(toBaseUnits(transfer.amount, USDT_DECIMALS)),
        fee_limit: FEE_LIMIT_SUN,
        call_value: 0,
        visible: true,
      }, triggerSchema);
      if (!built.result?.result || !built.transaction) {
        throw new BroadcastRejectedError(this.chain, decodeMessage(built.result?.message));
      }
      return built.transaction;
    }

    const created = await this.post('/wallet/createtransaction', {
      owner_address: transfer.from,
      to_address: transfer.to,
      amount: Number(toBaseUnits(transfer.amount, TRX_DECIMALS)),
      visible: true,
    }, createdSchema);
    if ('Error' in created) throw new BroadcastRejectedError(this.chain, created.Error);
    return created;
  }

  async estimateFee(token: Token): Promise<string> {
    return token === 'USDT' ? TRANSFER_COST_TRX.token : TRANSFER_COST_TRX.native;
  }

  requiredConfirmations(): number {
    return this.config.requiredConfirmations;
  }

  validateAddress(address: string): boolean {
    return isTronAddress(address);
  }
}

// ─── Parsing Helpers ────────────────────────────────────────────────────────

interface ParsedIncoming {
  token: Token;
  to: string;
  from: string | null;
  units: bigint;
}

/** TRX TransferContract or a USDT transfer(address,uint256) call; anything else is null. */
export function parseIncoming(tx: TronTransaction, usdtContract: string): ParsedIncoming | null {
  const contract = tx.raw_data.contract[0];
  if (!contract) return null;
  const value = contract.parameter.value;

  if (contract.type === 'TransferContract' && value.to_address && value.amount !== undefined) {
    return { token: 'TRX', to: value.to_address, from: value.owner_address ?? null, units: BigInt(value.amount) };
  }

  if (contract.type === 'TriggerSmartContract' && value.contract_address === usdtContract && value.data) {
    const data = value.data.toLowerCase();
    if (!data.startsWith(TRANSFER_SELECTOR) || data.length < 8 + 128) return null;
    const recipient = '0x' + data.slice(8 + 24, 8 + 64);
    const units = BigInt('0x' + data.slice(8 + 64, 8 + 128));
    return { token: 'USDT', to: tronAddressFromHex(recipient), from: value.owner_address ?? null, units };
  }

  return null;
}

function abiAddress(address: string): string {
  return tronAddressToEvmHex(address).slice(2).padStart(64, '0');
}

function abiUint(value: bigint): string {
  return value.toString(16).padStart(64, '0');
}

/** TronGrid returns error messages hex-encoded. */
function decodeMessage(message: string | undefined): string {
  if (!message) return 'rejected';
  if (!/^[0-9a-fA-F]+$/.test(message) || message.length % 2 !== 0) return message;
  return Buffer.from(message, 'hex').toString('utf8');
}
