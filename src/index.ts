import { env } from './config/env.js';
import { logger } from './config/logger.js';
import { db, closeDb } from './db/index.js';
import { DrizzleStore } from './db/store.js';
import { createChainRegistry } from './chains/registry.js';
import { buildApp } from './app.js';
import type { AppContext } from './context.js';
import { axiosPoster } from './services/notifications.js';
import { createRedis } from './services/redis.js';
import { redisSuffixStore } from './services/amount-suffix.js';
import { coingeckoRates } from './services/exchange-rate.js';
import { startWorkers, stopWorkers } from './services/workers.js';

async function main() {
  const redis = createRedis();
  await redis.connect();

  const ctx: AppContext = {
    config: env,
    store: new DrizzleStore(db),
    chains: createChainRegistry(env),
    poster: axiosPoster,
    suffixes: redisSuffixStore(redis),
    rates: coingeckoRates(env.COINGECKO_API_URL),
  };

  const app = await buildApp(ctx);

  // ─── Start Server FIRST (so health check responds immediately) ───────
  try {
    await app.listen({ port: env.PORT, host: env.HOST });
    logger.info(`Settlement gateway running on http://${env.HOST}:${env.PORT}`);
    logger.info(`   Environment: ${env.NODE_ENV}`);
    logger.info(`   Chains:      ${ctx.chains.chains().join(', ')}`);
  } catch (err) {
    logger.fatal({ err }, 'failed to listen');
    process.exit(1);
  }

  // ─── Background Workers ───────────────────────────────────────────────
  startWorkers(ctx);

  // Graceful shutdown: stop taking requests, let running ticks finish
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'shutting down');

    await app.close();
    await stopWorkers();
    await redis.quit();
    await closeDb();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.fatal({ err }, 'shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  logger.fatal({ err }, 'FATAL startup error');
  process.exit(1);
});
