import { withdrawalContext, type AppContext } from '../context.js';
import type { Chain } from '../chains/catalog.js';
import { logger } from '../config/logger.js';
import { scanTick } from './block-scanner.js';
import { dispatchWithdrawals } from './withdrawal-orders.js';
import { expireDueDeposits } from './deposit-orders.js';
import { retryFailedTasks, sweepChain } from './sweep.js';
import { deliverDue } from './notifications.js';
import { getPoolStatus } from './address-pool.js';

// ─── Background Workers ─────────────────────────────────────────────────────
// Each job runs on its own timer and shares nothing but persisted state. A
// tick that is still running when the timer fires again is skipped, so a slow
// chain never stacks up work or holds back another job.

export interface Job {
  name: string;
  intervalMs: number;
  tick: () => Promise<void>;
}

interface RunningJob {
  timer: ReturnType<typeof setInterval>;
  inFlight: Promise<void> | null;
}

// ─── Module State ───────────────────────────────────────────────────────────

const running = new Map<string, RunningJob>();

const POOL_MIN_THRESHOLD = 10;

// ─── Job Definitions ────────────────────────────────────────────────────────

export function defineJobs(ctx: AppContext): Job[] {
  const { config, store, chains } = ctx;
  const jobs: Job[] = [];

  for (const chain of chains.chains()) {
    const policy = chains.policy(chain);
    jobs.push({
      name: `scanner:${chain}`,
      intervalMs: policy.scanIntervalMs,
      tick: async () => {
        await scanTick({
          store,
          adapter: chains.adapter(chain),
          policy,
          maxBlocksPerTick: config.SCAN_MAX_BLOCKS_PER_TICK,
          maxWaitCycles: config.WITHDRAWAL_MAX_WAIT_CYCLES,
          suffixes: ctx.suffixes,
        });
      },
    });
  }

  jobs.push({
    name: 'withdrawal-dispatch',
    intervalMs: config.WITHDRAWAL_DISPATCH_INTERVAL_MS,
    tick: async () => {
      const run = await dispatchWithdrawals(withdrawalContext(ctx), new Date(), config.WITHDRAWAL_BATCH_SIZE);
      if (run.claimed > 0) logger.info(run, 'withdrawal dispatch');
    },
  });

  jobs.push({
    name: 'deposit-expiry',
    intervalMs: config.EXPIRY_INTERVAL_MS,
    tick: async () => {
      await expireDueDeposits(store, new Date(), { suffixes: ctx.suffixes });
    },
  });

  jobs.push({
    name: 'sweep',
    intervalMs: config.SWEEP_INTERVAL_MS,
    tick: async () => {
      for (const chain of chains.chains()) {
        await sweepOne(ctx, chain);
      }
      await warnLowPool(ctx);
    },
  });

  jobs.push({
    name: 'webhooks',
    intervalMs: config.WEBHOOK_INTERVAL_MS,
    tick: async () => {
      const run = await deliverDue(store, ctx.poster, new Date(), { timeoutMs: config.WEBHOOK_TIMEOUT_MS });
      if (run.attempted > 0) logger.info(run, 'webhook delivery pass');
    },
  });

  return jobs;
}

/** One chain failing its sweep must not stop the others. */
async function sweepOne(ctx: AppContext, chain: Chain): Promise<void> {
  const { config, store, chains } = ctx;
  try {
    const retries = await retryFailedTasks(store, chain, config.SWEEP_MAX_RETRIES);
    if (retries.retried > 0 || retries.skipped > 0) logger.info({ chain, ...retries }, 'collect task retries');

    await sweepChain({
      store,
      adapter: chains.adapter(chain),
      minAmount: config.SWEEP_MIN_AMOUNT,
      batchSize: config.SWEEP_BATCH_SIZE,
      maxWaitCycles: config.SWEEP_MAX_WAIT_CYCLES,
      keyFor: ctx.keyFor,
    });
  } catch (err) {
    logger.error({ err, chain }, 'sweep error');
  }
}

async function warnLowPool(ctx: AppContext): Promise<void> {
  for (const entry of await getPoolStatus(ctx.store)) {
    if (entry.available < POOL_MIN_THRESHOLD) {
      logger.warn({ ...entry, threshold: POOL_MIN_THRESHOLD }, 'deposit address pool running low');
    }
  }
}

// ─── Start / Stop ───────────────────────────────────────────────────────────

export function startJob(job: Job): void {
  if (running.has(job.name)) return;

  const state: RunningJob = {
    inFlight: null,
    timer: setInterval(() => {
      void runOnce(job, state);
    }, job.intervalMs),
  };
  running.set(job.name, state);

  logger.info(`  ${job.name}: every ${job.intervalMs / 1000}s`);
  void runOnce(job, state);
}

async function runOnce(job: Job, state: RunningJob): Promise<void> {
  if (state.inFlight) {
    logger.debug({ job: job.name }, 'previous tick still running, skipped');
    return;
  }

  state.inFlight = job.tick().catch((err: unknown) => {
    logger.error({ err, job: job.name }, 'worker tick failed');
  });
  try {
    await state.inFlight;
  } finally {
    state.inFlight = null;
  }
}

export function startWorkers(ctx: AppContext): void {
  for (const job of defineJobs(ctx)) startJob(job);
}

/** Clears every timer, then waits for ticks already in progress. */
export async function stopWorkers(): Promise<void> {
  const pending: Promise<void>[] = [];
  for (const state of running.values()) {
    clearInterval(state.timer);
    if (state.inFlight) pending.push(state.inFlight);
  }
  running.clear();
  await Promise.all(pending);
}
