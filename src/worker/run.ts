import { run } from 'graphile-worker';
import type { TaskList } from 'graphile-worker';
import { env } from '../config/env.js';
import { pool, query } from '../db/pool.js';
import { SYNC_TASK, releaseQueue } from '../services/queue.js';
import { createSyncRuntime } from '../services/runtime.js';
import { createSyncAccountTask, enqueueActiveAccounts } from './taskHandlers.js';

const runtime = createSyncRuntime();
const syncAccount = createSyncAccountTask(runtime.engine);

const taskList: TaskList = {
  [SYNC_TASK]: async (payload) => {
    await syncAccount(payload);
  },
};

const unlockStaleWorkerLocks = async () => {
  const relationCheck = await query<{ rel: string | null }>(
    "SELECT to_regclass('graphile_worker._private_jobs') AS rel"
  );
  if (!relationCheck.rows[0]?.rel) {
    return;
  }

  const staleWorkers = await query<{ locked_by: string }>(`
    SELECT DISTINCT locked_by
      FROM graphile_worker._private_jobs
     WHERE locked_by IS NOT NULL
       AND locked_at IS NOT NULL
       AND locked_at < NOW() - INTERVAL '5 minutes'
  `);

  const workerIds = staleWorkers.rows
    .map((row) => row.locked_by)
    .filter((value): value is string => Boolean(value));

  if (workerIds.length === 0) {
    return;
  }

  await query('SELECT graphile_worker.force_unlock_workers($1::text[])', [workerIds]);
  console.warn(`[worker] unlocked ${workerIds.length} stale lock(s)`);
};

const startSyncCadence = () => {
  let running = false;

  const tick = async () => {
    if (running) {
      return;
    }
    running = true;
    try {
      const queued = await enqueueActiveAccounts(runtime.store);
      if (queued > 0) {
        console.info(`[worker] cadence tick queued ${queued} account sync(s)`);
      }
    } catch (error) {
      console.warn('[worker] cadence tick failed', error);
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    void tick();
  }, env.sync.intervalMs);
  timer.unref?.();
  void tick();

  return () => clearInterval(timer);
};

async function main() {
  try {
    await unlockStaleWorkerLocks();
  } catch (error) {
    console.warn('[worker] failed to unlock stale locks', error);
  }

  const runner = await run({
    connectionString: env.databaseUrl,
    taskList,
    concurrency: env.worker.concurrency,
    pollInterval: env.worker.pollIntervalMs,
    schema: 'graphile_worker',
  });
  const stopCadence = startSyncCadence();

  const shutdown = () => {
    stopCadence();
    runner.stop()
      .then(() => releaseQueue())
      .then(() => pool.end())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('[worker] shutdown failed', error);
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await runner.promise;
}

main().catch((err) => {
  console.error('[worker] stopped with error', err);
  process.exit(1);
});
