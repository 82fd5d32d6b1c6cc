import { ethers } from 'ethers';
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
import { fromBaseUnits, toBaseUnits } from '../services/amount.js';
import { BroadcastRejectedError, RpcUnavailableError } from '../services/errors.js';

// ═════════════════════════════════════════════════════════════════════════════
//  ETHEREUM — ethers.js JsonRpcProvider (ETH native + USDT ERC-20)
// ═════════════════════════════════════════════════════════════════════════════

const ERC20_TRANSFER_TOPIC = ethers.id('Transfer(address,address,uint256)');
const ERC20 = new ethers.Interface([
  'function transfer(address to, uint256 amount) returns (bool)',
  'function balanceOf(address owner) view returns (uint256)',
]);

const USDT_DECIMALS = 6;
const ETH_DECIMALS = 18;
const GAS_LIMIT = { native: 21_000n, token: 65_000n } as const;

export interface EthereumAdapterConfig {
  rpcUrl: string;
  usdtContract: string;
  timeoutMs: number;
  requiredConfirmations: number;
}

export class EthereumAdapter implements ChainAdapter {
  readonly chain = 'ethereum' as const;
  private readonly provider: ethers.JsonRpcProvider;
  private readonly blocks = new BlockCache<ethers.Block>();

  constructor(private readonly config: EthereumAdapterConfig) {
    const request = new ethers.FetchRequest(config.rpcUrl);
    request.timeout = config.timeoutMs;
    this.provider = new ethers.JsonRpcProvider(request, undefined, { staticNetwork: true });
  }

  private call<T>(fn: () => Promise<T>): Promise<T> {
    return rpcCall(this.chain, this.config.timeoutMs, fn);
  }

  async currentHeight(): Promise<number> {
    return this.call(() => this.provider.getBlockNumber());
  }

  async *scanAddress(address: string, token: Token, fromHeight: number, toHeight: number): AsyncIterable<IncomingTransfer> {
    const tip = await this.currentHeight();
    const transfers = token === 'USDT'
      ? await this.scanTokenTransfers(address, fromHeight, toHeight, tip)
      : await this.scanNativeTransfers(address, fromHeight, toHeight, tip);

    transfers.sort((a, b) => a.blockHeight - b.blockHeight || a.logIndex - b.logIndex);
    yield* transfers;
  }

  // ── USDT: Transfer logs filtered by recipient topic ──
  private async scanTokenTransfers(address: string, fromBlock: number, toBlock: number, tip: number): Promise<IncomingTransfer[]> {
    const recipientTopic = ethers.zeroPadValue(address.toLowerCase(), 32);
    const logs = await this.call(() => this.provider.getLogs({
      address: this.config.usdtContract,
      fromBlock,
      toBlock,
      topics: [ERC20_TRANSFER_TOPIC, null, recipientTopic],
    }));

    return logs
      .filter((log) => !log.removed)
      .map((log) => ({
        txHash: log.transactionHash,
        amount: fromBaseUnits(BigInt(log.data), USDT_DECIMALS),
        blockHeight: log.blockNumber,
        logIndex: log.index,
        confirmations: tip - log.blockNumber + 1,
        from: log.topics[1] ? ethers.getAddress('0x' + log.topics[1].slice(26)) : null,
      }))
      .filter((t) => t.amount !== '0');
  }

  // ── ETH: walk block bodies; only top-level value transfers are seen ──
  private async scanNativeTransfers(address: string, fromBlock: number, toBlock: number, tip: number): Promise<IncomingTransfer[]> {
    const target = address.toLowerCase();
    const transfers: IncomingTransfer[] = [];

    for (let height = fromBlock; height <= toBlock; height++) {
      const block = await this.block(height);
      for (const tx of block.prefetchedTransactions) {
        if (!tx.to || tx.to.toLowerCase() !== target || tx.value === 0n) continue;

        // A reverted transaction keeps its value with the sender
        const receipt = await this.call(() => this.provider.getTransactionReceipt(tx.hash));
        if (!receipt || receipt.status !== 1) continue;

        transfers.push({
          txHash: tx.hash,
          amount: fromBaseUnits(tx.value, ETH_DECIMALS),
          blockHeight: height,
          logIndex: tx.index,
          confirmations: tip - height + 1,
          from: tx.from,
        });
      }
    }
    return transfers;
  }

  private async block(height: number): Promise<ethers.Block> {
    const cached = this.blocks.get(height);
    if (cached) return cached;

    const block = await this.call(() => this.provider.getBlock(height, true));
    if (!block) throw new RpcUnavailableError(this.chain, `block ${height} not available yet`);
    this.blocks.set(height, block);
    return block;
  }

  async getTransfer(txHash: string): Promise<TransferStatus | null> {
    return this.call(async () => {
      const receipt = await this.provider.getTransactionReceipt(txHash);
      if (!receipt) return null;
      return {
        blockHeight: receipt.blockNumber,
        confirmations: await receipt.confirmations(),
        success: receipt.status === 1,
      };
    });
  }

  async balance(address: string, token: Token): Promise<string> {
    if (token === 'USDT') {
      const raw = await this.call(() => this.provider.call({
        to: this.config.usdtContract,
        data: ERC20.encodeFunctionData('balanceOf', [address]),
      }));
      return fromBaseUnits(BigInt(raw), USDT_DECIMALS);
    }
    const wei = await this.call(() => this.provider.getBalance(address));
    return fromBaseUnits(wei, ETH_DECIMALS);
  }

  async signTransfer(transfer: OutgoingTransfer, key: KeyHandle): Promise<SignedTransfer> {
    const request: ethers.TransactionRequest = transfer.token === 'USDT'
      ? {
        to: this.config.usdtContract,
        data: ERC20.encodeFunctionData('transfer', [transfer.to, toBaseUnits(transfer.amount, USDT_DECIMALS)]),
      }
      : { to: transfer.to, value: toBaseUnits(transfer.amount, ETH_DECIMALS) };

    return key.use((privateKey) => this.call(async () => {
      const wallet = new ethers.Wallet(ethers.hexlify(privateKey), this.provider);
      try {
        // Nonce, gas and fees come from the node; the signature does not
        const populated = await wallet.populateTransaction(request);
        delete populated.from;
        const raw = await wallet.signTransaction(ethers.Transaction.from(populated));
        return { txHash: ethers.keccak256(raw), raw, transfer };
      } catch (err) {
        throw classifyBroadcastError(err);
      }
    }));
  }

  async broadcast(signed: SignedTransfer): Promise<string> {
    return this.call(async () => {
      try {
        const tx = await this.provider.broadcastTransaction(signed.raw);
        return tx.hash;
      } catch (err) {
        throw classifyBroadcastError(err);
      }
    });
  }

  async estimateFee(token: Token): Promise<string> {
    const feeData = await this.call(() => this.provider.getFeeData());
    const gasPrice = feeData.maxFeePerGas ?? feeData.gasPrice ?? 0n;
    const gas = token === 'USDT' ? GAS_LIMIT.token : GAS_LIMIT.native;
    return fromBaseUnits(gasPrice * gas, ETH_DECIMALS);
  }

  requiredConfirmations(): number {
    return this.config.requiredConfirmations;
  }

  validateAddress(address: string): boolean {
    return /^0x[0-9a-fA-F]{40}$/.test(address) && ethers.isAddress(address);
  }
}

function classifyBroadcastError(err: unknown): Error {
  if (ethers.isError(err, 'NETWORK_ERROR') || ethers.isError(err, 'TIMEOUT') || ethers.isError(err, 'SERVER_ERROR')) {
    return new RpcUnavailableError('ethereum', err);
  }
  if (err instanceof Error && 'shortMessage' in err && typeof err.shortMessage === 'string') {
    return new BroadcastRejectedError('ethereum', err.shortMessage);
  }
  return new BroadcastRejectedError('ethereum', err instanceof Error ? err.message : String(err));
}
