// ─── Chain / Token Catalogue ────────────────────────────────────────────────
// A payment method is identified by chain + token.

export const CHAINS = ['ethereum', 'tron', 'solana'] as const;
export type Chain = (typeof CHAINS)[number];

export const TOKENS = ['USDT', 'ETH', 'TRX', 'SOL'] as const;
export type Token = (typeof TOKENS)[number];

export interface TokenSpec {
  chain: Chain;
  token: Token;
  decimals: number;
  /** true for the chain's gas token, false for a contract token */
  native: boolean;
}

export const NATIVE_TOKEN: Record<Chain, Token> = {
  ethereum: 'ETH',
  tron: 'TRX',
  solana: 'SOL',
};

const TOKEN_SPECS: TokenSpec[] = [
  { chain: 'ethereum', token: 'USDT', decimals: 6, native: false },
  { chain: 'ethereum', token: 'ETH', decimals: 18, native: true },
  { chain: 'tron', token: 'USDT', decimals: 6, native: false },
  { chain: 'tron', token: 'TRX', decimals: 6, native: true },
  { chain: 'solana', token: 'SOL', decimals: 9, native: true },
];

export function isChain(value: string): value is Chain {
  return CHAINS.some((chain) => chain === value);
}

export function getTokenSpec(chain: Chain, token: Token): TokenSpec | null {
  return TOKEN_SPECS.find((s) => s.chain === chain && s.token === token) ?? null;
}

export function tokensForChain(chain: Chain): TokenSpec[] {
  return TOKEN_SPECS.filter((s) => s.chain === chain);
}
