import type { MailboxStore } from '../services/mailboxStore.js';
import { enqueueAccountSync, parseSyncJobPayload } from '../services/queue.js';
import type { SyncCycleResult, SyncEngine } from '../services/syncEngine.js';

/**
 * Runs one cycle for the job's account. Only unexpected failures reject;
 * provider errors are part of the cycle result and the next tick retries.
 */
export const createSyncAccountTask = (engine: Pick<SyncEngine, 'runCycle'>) =>
  async (payload: unknown): Promise<SyncCycleResult> => {
    const { accountId } = parseSyncJobPayload(payload);
    return engine.runCycle(accountId);
  };

export type EnqueueSync = (accountId: string) => Promise<boolean>;

/** Enqueues a sync job for every active account; returns how many were queued. */
export const enqueueActiveAccounts = async (
  store: MailboxStore,
  enqueue: EnqueueSync = (accountId) => enqueueAccountSync(accountId, { assumeWorker: true }),
) => {
  const accounts = await store.listAccounts('active');
  let queued = 0;
  for (const account of accounts) {
    try {
      if (await enqueue(account.id)) {
        queued += 1;
      }
    } catch (error) {
      console.warn(`[worker] failed to enqueue sync for ${account.id}`, error);
    }
  }
  return queued;
};
