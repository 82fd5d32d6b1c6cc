import { z } from 'zod';
import { logger } from './logger.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3100),
  HOST: z.string().default('0.0.0.0'),

  // Database
  DATABASE_URL: z.string().default('postgresql://localhost:5432/settlement_gateway'),

  // Redis
  REDIS_URL: z.string().default('redis://localhost:6379'),

  // Admin JWT
  JWT_SECRET: z.string().default('settlement-dev-secret-change-in-production'),
  ADMIN_USER_IDS: z.string().default(''),
  // Base32 TOTP secret for privileged admin actions (force-complete)
  ADMIN_TOTP_SECRET: z.string().default(''),

  // ─── Key Material ─────────────────────────────────────────────────────
  // BIP-39 mnemonic for on-demand deposit address derivation
  WALLET_MNEMONIC: z.string().default('abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon about'),
  // AES-256-GCM key, 32-byte hex. Supplied externally, never stored next to ciphertext.
  WALLET_ENCRYPTION_KEY: z.string().default('0000000000000000000000000000000000000000000000000000000000000001'),

  // ─── Payment API ──────────────────────────────────────────────────────
  SIGNATURE_WINDOW_MINUTES: z.coerce.number().default(5),
  DEPOSIT_EXPIRY_MINUTES: z.coerce.number().default(30),
  DEPOSIT_FEE_PERCENT: z.string().default('0.01'),
  WITHDRAW_FEE_PERCENT: z.string().default('0.005'),
  WITHDRAW_FIXED_FEE: z.string().default('1'),

  // ─── Chain RPC ────────────────────────────────────────────────────────
  RPC_TIMEOUT_MS: z.coerce.number().default(10_000),
  ETH_RPC_URL: z.string().default('https://eth.llamarpc.com'),
  ETH_USDT_CONTRACT: z.string().default('0xdAC17F958D2ee523a2206206994597C13D831ec7'),
  TRON_API_URL: z.string().default('https://api.trongrid.io'),
  TRON_API_KEY: z.string().default(''),
  TRON_USDT_CONTRACT: z.string().default('TR7NHqjeKQxGTCi8q8ZY4pL8otSzgjLj6t'),
  SOL_RPC_URL: z.string().default('https://api.mainnet-beta.solana.com'),

  // ─── Finality Policy (per chain) ──────────────────────────────────────
  ETH_REQUIRED_CONFIRMATIONS: z.coerce.number().int().positive().default(12),
  ETH_SAFETY_LAG: z.coerce.number().int().nonnegative().default(2),
  ETH_REORG_TOLERANCE: z.coerce.number().int().nonnegative().default(12),
  ETH_SCAN_INTERVAL_MS: z.coerce.number().default(15_000),

  TRON_REQUIRED_CONFIRMATIONS: z.coerce.number().int().positive().default(19),
  TRON_SAFETY_LAG: z.coerce.number().int().nonnegative().default(1),
  TRON_REORG_TOLERANCE: z.coerce.number().int().nonnegative().default(20),
  TRON_SCAN_INTERVAL_MS: z.coerce.number().default(6_000),

  SOL_REQUIRED_CONFIRMATIONS: z.coerce.number().int().positive().default(32),
  SOL_SAFETY_LAG: z.coerce.number().int().nonnegative().default(4),
  SOL_REORG_TOLERANCE: z.coerce.number().int().nonnegative().default(32),
  SOL_SCAN_INTERVAL_MS: z.coerce.number().default(5_000),

  SCAN_MAX_BLOCKS_PER_TICK: z.coerce.number().int().positive().default(100),

  // ─── Workers ──────────────────────────────────────────────────────────
  WITHDRAWAL_DISPATCH_INTERVAL_MS: z.coerce.number().default(15_000),
  WITHDRAWAL_BATCH_SIZE: z.coerce.number().int().positive().default(5),
  WITHDRAWAL_MAX_WAIT_CYCLES: z.coerce.number().int().positive().default(40),
  EXPIRY_INTERVAL_MS: z.coerce.number().default(30_000),

  SWEEP_INTERVAL_MS: z.coerce.number().default(10 * 60_000),
  SWEEP_MIN_AMOUNT: z.string().default('10'),
  SWEEP_BATCH_SIZE: z.coerce.number().int().positive().default(10),
  SWEEP_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  SWEEP_MAX_WAIT_CYCLES: z.coerce.number().int().positive().default(6),

  WEBHOOK_INTERVAL_MS: z.coerce.number().default(15_000),
  WEBHOOK_TIMEOUT_MS: z.coerce.number().default(10_000),

  // Exchange rates for fiat-denominated deposits
  COINGECKO_API_URL: z.string().default('https://api.coingecko.com/api/v3'),

  // ─── CORS ────────────────────────────────────────────────────────────
  CORS_ORIGINS: z.string().default('http://localhost:3000'),
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);

// ─── Production Safety Checks ─────────────────────────────────────────────
if (env.NODE_ENV === 'production') {
  const INSECURE_SEED = 'abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon about';
  const INSECURE_KEY = '0000000000000000000000000000000000000000000000000000000000000001';

  if (env.WALLET_MNEMONIC === INSECURE_SEED) {
    throw new Error('FATAL: WALLET_MNEMONIC is using the default insecure mnemonic. Set a real seed in production.');
  }

  if (env.WALLET_ENCRYPTION_KEY === INSECURE_KEY) {
    throw new Error('FATAL: WALLET_ENCRYPTION_KEY is using the default insecure key. Set a real 32-byte hex key in production.');
  }

  if (env.JWT_SECRET === 'settlement-dev-secret-change-in-production') {
    throw new Error('FATAL: JWT_SECRET is using the default dev secret. Set a real secret in production.');
  }

  if (!env.ADMIN_USER_IDS || env.ADMIN_USER_IDS.trim() === '') {
    logger.warn('ADMIN_USER_IDS is empty — admin endpoints will be inaccessible');
  }
}
