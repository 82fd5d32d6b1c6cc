import type { CollectStatus, CollectTask, DepositAddress } from '../db/schema.js';
import type { Store } from '../repositories/types.js';
import type { ChainAdapter, KeyHandle, SignedTransfer } from '../chains/types.js';
import { NATIVE_TOKEN, getTokenSpec, type Chain } from '../chains/catalog.js';
import { logger } from '../config/logger.js';
import { ErrorCode } from '../config/error-codes.js';
import { Decimal, fmt } from './amount.js';
import { keyHandle } from './wallet.js';
import { NotFoundError, RpcUnavailableError, ValidationError } from './errors.js';

// ═════════════════════════════════════════════════════════════════════════════
//  SWEEP — consolidate deposit address balances into the cold wallet
//  Moves custody only; merchant balances live in the ledger and never change here.
// ═════════════════════════════════════════════════════════════════════════════

export interface SweepDeps {
  store: Store;
  adapter: ChainAdapter;
  minAmount: string;
  batchSize: number;
  /** Passes a task may wait on a gas top-up or an unconfirmed transaction before it fails. */
  maxWaitCycles: number;
  keyFor?: (encryptedPrivateKey: string) => KeyHandle;
}

export interface SweepRun {
  created: number;
  toppedUp: number;
  succeeded: number;
  failed: number;
}

type TaskStep = 'waiting_gas' | 'topped_up' | 'unconfirmed' | 'success' | 'failed';

// Failed tasks stay failed once retried, so the retry scan looks further back
const RETRY_SCAN_LIMIT = 500;

// ─── Sweep ──────────────────────────────────────────────────────────────────

/**
 * One sweep pass over a chain: settle tasks left processing, resume tasks
 * waiting on gas, then open a task for every assigned address holding at
 * least `minAmount`. At most `batchSize` tasks are started per pass.
 */
export async function sweepChain(deps: SweepDeps, now: Date = new Date()): Promise<SweepRun> {
  const { store, adapter } = deps;
  const chain = adapter.chain;
  const run: SweepRun = { created: 0, toppedUp: 0, succeeded: 0, failed: 0 };

  const cold = await store.custody.findActive(chain, 'cold');
  if (!cold) {
    logger.warn({ chain }, 'no cold wallet configured, sweep skipped');
    return run;
  }

  let budget = deps.batchSize;

  // ── Tasks submitted without a definite answer from the node ──
  for (const task of await store.collectTasks.listByStatus(chain, 'processing', deps.batchSize)) {
    tally(run, await reconcileTask(deps, task, now));
  }

  // ── Tasks parked until their gas top-up lands ──
  for (const task of await store.collectTasks.listByStatus(chain, 'pending', deps.batchSize)) {
    if (budget === 0) break;
    budget--;
    tally(run, await advanceTask(deps, task, now));
  }

  // ── New tasks ──
  // An address whose last task did not succeed belongs to the retry chain
  for (const address of await store.addresses.listAssigned(chain)) {
    if (budget === 0) break;
    const latest = await store.collectTasks.latestFor(address.id);
    if (latest && latest.status !== 'success') continue;

    const amount = await sweepableAmount(adapter, address, deps.minAmount);
    if (!amount) continue;

    const task = await store.collectTasks.insert({
      depositAddressId: address.id,
      sourceAddress: address.address,
      destinationAddress: cold.address,
      chain,
      token: address.token,
      amount,
      status: 'pending',
      txHash: null,
      gasTopUpTxHash: null,
      gasUsed: null,
      retryCount: 0,
      waitCycles: 0,
      errorMessage: null,
      previousTaskId: null,
      executedAt: null,
      completedAt: null,
    });
    run.created++;
    budget--;
    tally(run, await advanceTask(deps, task, now));
  }

  if (run.created > 0 || run.toppedUp > 0 || run.failed > 0) {
    logger.info({ chain, ...run }, 'sweep pass complete');
  }
  return run;
}

function tally(run: SweepRun, step: TaskStep): void {
  if (step === 'topped_up') run.toppedUp++;
  if (step === 'success') run.succeeded++;
  if (step === 'failed') run.failed++;
}

/** The amount to move, or null when the address holds less than the threshold. */
async function sweepableAmount(adapter: ChainAdapter, address: DepositAddress, minAmount: string): Promise<string | null> {
  const balance = new Decimal(await adapter.balance(address.address, address.token));
  if (balance.lt(minAmount) || balance.lte(0)) return null;

  if (address.token !== NATIVE_TOKEN[adapter.chain]) return fmt(balance);

  // Native sweeps pay their own fee out of the balance
  const amount = balance.minus(await adapter.estimateFee(address.token));
  return amount.gt(0) ? fmt(amount) : null;
}

async function advanceTask(deps: SweepDeps, task: CollectTask, now: Date): Promise<TaskStep> {
  const { store, adapter } = deps;
  const address = await store.addresses.findById(task.depositAddressId);
  if (!address) throw new NotFoundError('deposit address', task.depositAddressId);

  const spec = getTokenSpec(task.chain, task.token);
  if (spec && !spec.native) {
    const nativeToken = NATIVE_TOKEN[task.chain];
    const [fee, gas] = await Promise.all([
      adapter.estimateFee(task.token),
      adapter.balance(address.address, nativeToken),
    ]);

    if (new Decimal(gas).lt(fee)) {
      if (task.gasTopUpTxHash) return waitForGas(deps, task, now);
      return topUpGas(deps, task, fee, now);
    }
  }

  return executeTask(deps, task, address, now);
}

async function topUpGas(deps: SweepDeps, task: CollectTask, fee: string, now: Date): Promise<TaskStep> {
  const { store, adapter } = deps;
  const hot = await store.custody.findActive(task.chain, 'hot');
  if (!hot?.encryptedPrivateKey) {
    return finishFailed(store, task, 'no hot wallet available for gas top-up', now);
  }

  let signed: SignedTransfer;
  try {
    signed = await adapter.signTransfer(
      { from: hot.address, to: task.sourceAddress, token: NATIVE_TOKEN[task.chain], amount: fmt(fee) },
      (deps.keyFor ?? keyHandle)(hot.encryptedPrivateKey),
    );
  } catch (err) {
    return finishFailed(store, task, `gas top-up failed: ${errorMessage(err)}`, now);
  }

  // Recorded first: a top-up that was sent is waited for, never sent twice
  const txHash = signed.txHash;
  await store.collectTasks.update(task.id, { gasTopUpTxHash: txHash, waitCycles: 0 });

  try {
    await adapter.broadcast(signed);
  } catch (err) {
    if (!(err instanceof RpcUnavailableError)) {
      return finishFailed(store, task, `gas top-up failed: ${errorMessage(err)}`, now);
    }
    logger.warn({ taskId: task.id, chain: task.chain, txHash, err: err.message }, 'gas top-up outcome unknown');
  }

  logger.info({ taskId: task.id, chain: task.chain, address: task.sourceAddress, fee, txHash }, 'gas top-up sent');
  return 'topped_up';
}

async function waitForGas(deps: SweepDeps, task: CollectTask, now: Date): Promise<TaskStep> {
  const waitCycles = task.waitCycles + 1;
  if (waitCycles > deps.maxWaitCycles) {
    return finishFailed(deps.store, task, `gas top-up ${task.gasTopUpTxHash ?? ''} not received after ${deps.maxWaitCycles} passes`, now);
  }
  await deps.store.collectTasks.update(task.id, { waitCycles });
  return 'waiting_gas';
}

async function executeTask(deps: SweepDeps, task: CollectTask, address: DepositAddress, now: Date): Promise<TaskStep> {
  const { store, adapter } = deps;
  const gasUsed = fmt(await adapter.estimateFee(task.token));

  let signed: SignedTransfer;
  try {
    signed = await adapter.signTransfer(
      { from: address.address, to: task.destinationAddress, token: task.token, amount: task.amount },
      (deps.keyFor ?? keyHandle)(address.encryptedPrivateKey),
    );
  } catch (err) {
    return finishFailed(store, task, errorMessage(err), now);
  }

  const txHash = signed.txHash;
  await store.collectTasks.update(task.id, { status: 'processing', txHash, gasUsed, waitCycles: 0, executedAt: now });

  try {
    await adapter.broadcast(signed);
  } catch (err) {
    if (!(err instanceof RpcUnavailableError)) return finishFailed(store, task, errorMessage(err), now);
    logger.warn({ taskId: task.id, chain: task.chain, txHash, err: err.message }, 'collect task outcome unknown');
    return 'unconfirmed';
  }

  return finishSucceeded(store, task, txHash, now);
}

/** Settle a processing task from what the chain knows about its transaction. */
async function reconcileTask(deps: SweepDeps, task: CollectTask, now: Date): Promise<TaskStep> {
  const { store, adapter } = deps;
  if (!task.txHash) return finishFailed(store, task, 'no transaction recorded', now);

  const status = await adapter.getTransfer(task.txHash);
  if (status?.success) return finishSucceeded(store, task, task.txHash, now);
  if (status) return finishFailed(store, task, `transaction ${task.txHash} reverted on chain`, now);

  const waitCycles = task.waitCycles + 1;
  if (waitCycles > deps.maxWaitCycles) {
    return finishFailed(store, task, `transaction ${task.txHash} not found after ${deps.maxWaitCycles} passes`, now);
  }
  await store.collectTasks.update(task.id, { waitCycles });
  return 'unconfirmed';
}

async function finishSucceeded(store: Store, task: CollectTask, txHash: string, now: Date): Promise<TaskStep> {
  await store.collectTasks.update(task.id, { status: 'success', txHash, completedAt: now });
  logger.info({
    taskId: task.id,
    chain: task.chain,
    token: task.token,
    amount: task.amount,
    from: task.sourceAddress,
    txHash,
  }, 'collect task succeeded');
  return 'success';
}

async function finishFailed(store: Store, task: CollectTask, reason: string, now: Date): Promise<TaskStep> {
  await store.collectTasks.update(task.id, { status: 'failed', errorMessage: reason, completedAt: now });
  logger.error({ taskId: task.id, chain: task.chain, address: task.sourceAddress, reason }, 'collect task failed');
  return 'failed';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── Retries ────────────────────────────────────────────────────────────────

export interface RetryRun {
  retried: number;
  skipped: number;
}

/**
 * Failed tasks under the retry cap get a linked successor; at the cap the
 * failed task is parked as skipped for an operator.
 */
export async function retryFailedTasks(store: Store, chain: Chain, maxRetries: number): Promise<RetryRun> {
  const run: RetryRun = { retried: 0, skipped: 0 };

  for (const task of await store.collectTasks.listByStatus(chain, 'failed', RETRY_SCAN_LIMIT)) {
    if (await store.collectTasks.findRetryOf(task.id)) continue;

    if (task.retryCount >= maxRetries) {
      await store.collectTasks.update(task.id, { status: 'skipped' });
      logger.warn({ taskId: task.id, chain, retryCount: task.retryCount }, 'collect task skipped after max retries');
      run.skipped++;
      continue;
    }

    if (await store.collectTasks.hasInFlight(task.depositAddressId)) continue;
    await insertSuccessor(store, task, task.retryCount + 1);
    run.retried++;
  }

  return run;
}

/** Operator action: give a skipped task a fresh successor. */
export async function requeueSkippedTask(store: Store, taskId: string): Promise<CollectTask> {
  const task = await store.collectTasks.findById(taskId);
  if (!task) throw new NotFoundError('collect task', taskId);
  if (task.status !== 'skipped') {
    throw new ValidationError(ErrorCode.VALIDATION_ERROR, `Collect task is ${task.status}, only skipped tasks can be requeued`);
  }
  if (await store.collectTasks.hasInFlight(task.depositAddressId)) {
    throw new ValidationError(ErrorCode.VALIDATION_ERROR, 'A collect task for this address is already in flight');
  }

  const successor = await insertSuccessor(store, task, 0);
  logger.info({ taskId, successorId: successor.id }, 'skipped collect task requeued');
  return successor;
}

function insertSuccessor(store: Store, task: CollectTask, retryCount: number): Promise<CollectTask> {
  return store.collectTasks.insert({
    depositAddressId: task.depositAddressId,
    sourceAddress: task.sourceAddress,
    destinationAddress: task.destinationAddress,
    chain: task.chain,
    token: task.token,
    amount: task.amount,
    status: 'pending',
    txHash: null,
    gasTopUpTxHash: null,
    gasUsed: null,
    retryCount,
    waitCycles: 0,
    errorMessage: null,
    previousTaskId: task.id,
    executedAt: null,
    completedAt: null,
  });
}

// ─── Stats ──────────────────────────────────────────────────────────────────

export async function collectionStats(store: Store, chain: Chain): Promise<Record<CollectStatus, number>> {
  const counts = await store.collectTasks.countByStatus(chain);
  return {
    pending: counts.pending ?? 0,
    processing: counts.processing ?? 0,
    success: counts.success ?? 0,
    failed: counts.failed ?? 0,
    skipped: counts.skipped ?? 0,
  };
}
