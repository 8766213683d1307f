import { makeWorkerUtils } from 'graphile-worker';
import type { TaskSpec, WorkerUtils } from 'graphile-worker';
import { env } from '../config/env.js';
import { query } from '../db/pool.js';
import { errorMessage } from './errors.js';

export const SYNC_TASK = 'syncAccount';

let queue: WorkerUtils | null = null;
let activeWorkersCache: { expiresAtMs: number; value: boolean } | null = null;
const ACTIVE_WORKERS_CACHE_TTL_MS = 5_000;
const WORKER_HEARTBEAT_GRACE_SECONDS = 30;

export const createQueue = async () => {
  if (queue) return queue;
  queue = await makeWorkerUtils({
    connectionString: env.databaseUrl,
  });
  return queue;
};

export const releaseQueue = async () => {
  const current = queue;
  queue = null;
  await current?.release();
};

const countRecentlyLockedJobs = async () => {
  const result = await query<{ count: number }>(
    `SELECT COUNT(*)::int as count
       FROM graphile_worker.jobs
      WHERE locked_at IS NOT NULL
        AND locked_at > NOW() - ($1::double precision * INTERVAL '1 second')`,
    [WORKER_HEARTBEAT_GRACE_SECONDS],
  );
  return Number(result.rows[0]?.count ?? 0);
};

const countLiveWorkers = async () => {
  const result = await query<{ count: number }>(
    `SELECT COUNT(*)::int as count
       FROM graphile_worker._private_workers
      WHERE last_heartbeat IS NOT NULL
        AND last_heartbeat > NOW() - ($1::double precision * INTERVAL '1 second')`,
    [WORKER_HEARTBEAT_GRACE_SECONDS],
  );
  return Number(result.rows[0]?.count ?? 0);
};

/**
 * Whether a worker process looks alive. Some graphile-worker schemas expose
 * no heartbeat table; lock activity is the fallback, and when neither is
 * readable the answer is no, so callers run the sync in-process.
 */
export const hasActiveWorkers = async () => {
  if (activeWorkersCache && activeWorkersCache.expiresAtMs > Date.now()) {
    return activeWorkersCache.value;
  }

  let active: boolean;
  try {
    active = (await countLiveWorkers()) > 0;
  } catch {
    try {
      active = (await countRecentlyLockedJobs()) > 0;
    } catch (error) {
      console.warn(`[queue] worker liveness unknown: ${errorMessage(error)}`);
      active = false;
    }
  }

  activeWorkersCache = {
    value: active,
    expiresAtMs: Date.now() + ACTIVE_WORKERS_CACHE_TTL_MS,
  };
  return active;
};

export type SyncQueuePriority = 'normal' | 'high';

export interface SyncJobPayload {
  accountId: string;
}

/** One queue per account serializes its cycles across workers; the job key folds duplicate triggers. */
export const syncJobSpec = (accountId: string, priority: SyncQueuePriority = 'normal'): TaskSpec => ({
  queueName: `sync:${accountId}`,
  jobKey: `sync:${accountId}`,
  jobKeyMode: 'preserve_run_at',
  maxAttempts: 1,
  priority: priority === 'high' ? -50 : 0,
});

export const parseSyncJobPayload = (payload: unknown): SyncJobPayload => {
  const accountId = typeof payload === 'object' && payload !== null && 'accountId' in payload
    ? payload.accountId
    : undefined;
  if (typeof accountId !== 'string' || !accountId.trim()) {
    throw new Error(`${SYNC_TASK} payload requires an accountId`);
  }
  return { accountId: accountId.trim() };
};

export interface EnqueueSyncOptions {
  priority?: SyncQueuePriority;
  /** Skip the liveness check; the worker's own cadence tick knows it is alive. */
  assumeWorker?: boolean;
}

/** Resolves to false when no worker is alive to pick the job up. */
export const enqueueAccountSync = async (accountId: string, options: EnqueueSyncOptions = {}) => {
  if (!options.assumeWorker && !(await hasActiveWorkers())) {
    return false;
  }
  const q = await createQueue();
  const payload: SyncJobPayload = { accountId };
  await q.addJob(SYNC_TASK, payload, syncJobSpec(accountId, options.priority));
  return true;
};
