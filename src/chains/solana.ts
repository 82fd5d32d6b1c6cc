import {
  Connection,
  Keypair,
  PublicKey,
  SendTransactionError,
  SystemProgram,
  Transaction,
  type ConfirmedSignatureInfo,
} from '@solana/web3.js';
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
import { rpcCall } from './rpc.js';
import { fromBaseUnits, toBaseUnits } from '../services/amount.js';
import { BroadcastRejectedError } from '../services/errors.js';

// ═════════════════════════════════════════════════════════════════════════════
//  SOLANA — @solana/web3.js (native SOL; heights are slots)
// ═════════════════════════════════════════════════════════════════════════════

const SOL_DECIMALS = 9;
const SIGNATURE_PAGE = 1000;
// Base fee for one signature; transfers carry no priority fee
const TRANSFER_FEE = '0.000005';

export interface SolanaAdapterConfig {
  rpcUrl: string;
  timeoutMs: number;
  requiredConfirmations: number;
}

export class SolanaAdapter implements ChainAdapter {
  readonly chain = 'solana' as const;
  private readonly connection: Connection;

  constructor(private readonly config: SolanaAdapterConfig) {
    this.connection = new Connection(config.rpcUrl, { commitment: 'confirmed' });
  }

  private call<T>(fn: () => Promise<T>): Promise<T> {
    return rpcCall(this.chain, this.config.timeoutMs, fn);
  }

  async currentHeight(): Promise<number> {
    return this.call(() => this.connection.getSlot('confirmed'));
  }

  async *scanAddress(address: string, token: Token, fromHeight: number, toHeight: number): AsyncIterable<IncomingTransfer> {
    if (token !== 'SOL') return;

    const tip = await this.currentHeight();
    const pubkey = new PublicKey(address);
    const signatures = await this.signaturesInRange(pubkey, fromHeight, toHeight);

    // Newest first from the node; emit oldest first
    signatures.reverse();

    for (const [position, info] of signatures.entries()) {
      if (info.err) continue;

      const tx = await this.call(() => this.connection.getParsedTransaction(info.signature, {
        maxSupportedTransactionVersion: 0,
        commitment: 'confirmed',
      }));
      if (!tx?.meta || tx.meta.err) continue;

      const keys = tx.transaction.message.accountKeys;
      const index = keys.findIndex((k) => k.pubkey.equals(pubkey));
      if (index === -1) continue;

      // Received amount is the balance delta of our account
      const delta = (tx.meta.postBalances[index] ?? 0) - (tx.meta.preBalances[index] ?? 0);
      if (delta <= 0) continue;

      const sender = keys.find((k, i) => i !== index && k.signer);
      yield {
        txHash: info.signature,
        amount: fromBaseUnits(BigInt(delta), SOL_DECIMALS),
        blockHeight: info.slot,
        logIndex: position,
        confirmations: tip - info.slot + 1,
        from: sender ? sender.pubkey.toBase58() : null,
      };
    }
  }

  private async signaturesInRange(pubkey: PublicKey, fromSlot: number, toSlot: number): Promise<ConfirmedSignatureInfo[]> {
    const inRange: ConfirmedSignatureInfo[] = [];
    let before: string | undefined;

    for (;;) {
      const page = await this.call(() => this.connection.getSignaturesForAddress(pubkey, { before, limit: SIGNATURE_PAGE }));
      for (const info of page) {
        if (info.slot >= fromSlot && info.slot <= toSlot) inRange.push(info);
      }

      const last = page.at(-1);
      if (!last || page.length < SIGNATURE_PAGE || last.slot < fromSlot) break;
      before = last.signature;
    }

    return inRange;
  }

  async getTransfer(txHash: string): Promise<TransferStatus | null> {
    const [status, tip] = await Promise.all([
      this.call(() => this.connection.getSignatureStatuses([txHash], { searchTransactionHistory: true })),
      this.currentHeight(),
    ]);
    const value = status.value[0];
    if (!value) return null;

    // confirmations is null once the slot is rooted
    const confirmations = value.confirmationStatus === 'finalized' || value.confirmations === null
      ? Math.max(this.config.requiredConfirmations, tip - value.slot + 1)
      : value.confirmations;

    return { blockHeight: value.slot, confirmations, success: value.err === null };
  }

  async balance(address: string, token: Token): Promise<string> {
    if (token !== 'SOL') return '0';
    const lamports = await this.call(() => this.connection.getBalance(new PublicKey(address)));
    return fromBaseUnits(BigInt(lamports), SOL_DECIMALS);
  }

  async signTransfer(transfer: OutgoingTransfer, key: KeyHandle): Promise<SignedTransfer> {
    if (transfer.token !== 'SOL') {
      throw new BroadcastRejectedError(this.chain, `${transfer.token} transfers are not supported`);
    }

    const { blockhash, lastValidBlockHeight } = await this.call(() => this.connection.getLatestBlockhash('confirmed'));

    return key.use(async (secretKey) => {
      const keypair = Keypair.fromSecretKey(secretKey);
      const transaction = new Transaction({ feePayer: keypair.publicKey, blockhash, lastValidBlockHeight }).add(
        SystemProgram.transfer({
          fromPubkey: keypair.publicKey,
          toPubkey: new PublicKey(transfer.to),
          lamports: toBaseUnits(transfer.amount, SOL_DECIMALS),
        }),
      );
      transaction.sign(keypair);

      // The fee payer's signature is the transaction id
      const signature = transaction.signature;
      if (!signature) throw new BroadcastRejectedError(this.chain, 'transaction was not signed');
      return {
        txHash: ethers.encodeBase58(signature),
        raw: transaction.serialize().toString('base64'),
        transfer,
      };
    });
  }

  async broadcast(signed: SignedTransfer): Promise<string> {
    return this.call(async () => {
      try {
        return await this.connection.sendRawTransaction(Buffer.from(signed.raw, 'base64'));
      } catch (err) {
        if (err instanceof SendTransactionError) {
          throw new BroadcastRejectedError(this.chain, err.message);
        }
        throw err;
      }
    });
  }

  async estimateFee(): Promise<string> {
    return TRANSFER_FEE;
  }

  requiredConfirmations(): number {
    return this.config.requiredConfirmations;
  }

  validateAddress(address: string): boolean {
    if (!/^[1-9A-HJ-NP-Za-km-z]{32,44}$/.test(address)) return false;
    try {
      return new PublicKey(address).toBase58() === address;
    } catch {
      return false;
    }
  }
}
