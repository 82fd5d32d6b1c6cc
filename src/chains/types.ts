import type { Chain, Token } from './catalog.js';

// ─── Chain Adapter Boundary ─────────────────────────────────────────────────

export interface IncomingTransfer {
  txHash: string;
  amount: string;
  blockHeight: number;
  /** Position inside the block (log index, transaction index). */
  logIndex: number;
  confirmations: number;
  from: string | null;
}

export interface TransferStatus {
  blockHeight: number;
  confirmations: number;
  /** false when the chain included the transaction but it reverted. */
  success: boolean;
}

export interface OutgoingTransfer {
  from: string;
  to: string;
  token: Token;
  amount: string;
}

/** A signed transaction not yet submitted. Its hash is final before it reaches a node. */
export interface SignedTransfer {
  txHash: string;
  /** Chain-specific serialization handed to `broadcast`. */
  raw: string;
  transfer: OutgoingTransfer;
}

/**
 * Scope-bounded access to a private key. The raw bytes only exist for the
 * duration of `use` and are zero-filled afterwards.
 */
export interface KeyHandle {
  use<T>(fn: (privateKey: Uint8Array) => Promise<T>): Promise<T>;
}

export interface FinalityPolicy {
  requiredConfirmations: number;
  /** Blocks behind the tip the scanner never reads. */
  safetyLag: number;
  /** Blocks an observed transaction may be missing before it counts as reorged. */
  reorgTolerance: number;
  scanIntervalMs: number;
}

export interface ChainAdapter {
  readonly chain: Chain;

  /** @throws RpcUnavailableError on network failure or timeout */
  currentHeight(): Promise<number>;

  /**
   * Transfers into `address` within [fromHeight, toHeight], ascending by block
   * height then in-block index. Identical input yields identical output.
   */
  scanAddress(address: string, token: Token, fromHeight: number, toHeight: number): AsyncIterable<IncomingTransfer>;

  /** null when the chain does not know the transaction (never included, or reorged out). */
  getTransfer(txHash: string): Promise<TransferStatus | null>;

  balance(address: string, token: Token): Promise<string>;

  /**
   * Builds and signs a transfer without submitting it. Nothing is on chain if this throws.
   * @throws BroadcastRejectedError when the node refuses to build it
   */
  signTransfer(transfer: OutgoingTransfer, key: KeyHandle): Promise<SignedTransfer>;

  /**
   * Submits a signed transfer, returning its hash.
   * @throws BroadcastRejectedError; the transaction may still land, later scans reconcile
   * @throws RpcUnavailableError when the outcome is unknown
   */
  broadcast(signed: SignedTransfer): Promise<string>;

  /** Native-token cost of one transfer of `token`. */
  estimateFee(token: Token): Promise<string>;

  requiredConfirmations(): number;

  validateAddress(address: string): boolean;
}
