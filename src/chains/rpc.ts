import type { Chain } from './catalog.js';
import { GatewayError, RpcUnavailableError } from '../services/errors.js';

/**
 * Run one RPC round trip under a deadline. Transport failures and timeouts
 * surface as RpcUnavailableError; domain errors thrown by `fn` pass through.
 */
export async function rpcCall<T>(chain: Chain, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), deadline]);
  } catch (err) {
    if (err instanceof GatewayError) throw err;
    throw new RpcUnavailableError(chain, err);
  } finally {
    clearTimeout(timer);
  }
}

/** Small bounded cache for block bodies shared by the per-address scans of one tick. */
export class BlockCache<T> {
  private readonly entries = new Map<number, T>();

  constructor(private readonly capacity: number = 500) {}

  get(height: number): T | undefined {
    return this.entries.get(height);
  }

  set(height: number, value: T): void {
    this.entries.set(height, value);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}
