import { Redis, type RedisOptions } from 'ioredis';
import { env } from '../config/env.js';
import { logger } from '../config/logger.js';

const redisOpts: RedisOptions = {
  maxRetriesPerRequest: 3,
  enableReadyCheck: false,
  lazyConnect: true,
};

// Managed Redis providers expose TLS as rediss://
if (env.REDIS_URL.startsWith('rediss://')) {
  redisOpts.tls = { rejectUnauthorized: false };
}

export function createRedis(url: string = env.REDIS_URL): Redis {
  const client = new Redis(url, redisOpts);
  client.on('error', (err) => logger.error({ err }, 'Redis connection error'));
  return client;
}

export const KEYS = {
  /** Set of suffix digits in use for (address, base amount). */
  amountSuffixes: (address: string, base: string) => `unique_amount:${address}:${base}:used`,
} as const;
