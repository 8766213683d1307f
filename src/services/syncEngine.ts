import type { Message } from '../shared/types.js';
import type { ClassificationOptions, ClassificationSummary } from './classifier.js';
import { classifyPendingMessages } from './classifier.js';
import { AuthError, errorMessage } from './errors.js';
import type { InferenceClient } from './inference.js';
import type { MailboxStore } from './mailboxStore.js';
import type { NotificationOptions, NotificationSummary } from './notifications.js';
import { dispatchNotifications } from './notifications.js';
import type { DrainSummary } from './operationQueue.js';
import { drainOperations, emptyDrainSummary } from './operationQueue.js';
import type { ProviderFactory } from './providers/factory.js';
import type { FetchChangesResult, ProviderAdapter } from './providers/types.js';
import type { PushRelay, PushSubscriptionStore } from './push.js';

export type SyncOutcome =
  | 'completed'
  | 'skipped'
  | 'already_running'
  | 'auth_error'
  | 'transient_error'
  | 'abandoned';

export type SyncStage = 'start' | 'drain' | 'fetch' | 'merge' | 'classify' | 'notify';

export interface SyncCycleResult {
  accountId: string;
  outcome: SyncOutcome;
  stage: SyncStage;
  operations: DrainSummary;
  fetched: number;
  ingested: number;
  updated: number;
  removed: number;
  classified: number;
  notified: number;
  errors: string[];
  durationMs: number;
}

export interface MergeSummary {
  ingestedIds: string[];
  updated: number;
  removed: number;
}

export interface SyncEngineSettings {
  maxOperationsPerDrain: number;
  maxOperationAttempts: number;
  operationRetentionHours: number;
  classification: ClassificationOptions;
  notifications: NotificationOptions;
}

export interface SyncEngineDeps {
  store: MailboxStore;
  subscriptions: PushSubscriptionStore;
  createAdapter: ProviderFactory;
  inference: InferenceClient;
  pushRelay: PushRelay | null;
  settings: SyncEngineSettings;
}

const emptyResult = (accountId: string): SyncCycleResult => ({
  accountId,
  outcome: 'completed',
  stage: 'start',
  operations: emptyDrainSummary(),
  fetched: 0,
  ingested: 0,
  updated: 0,
  removed: 0,
  classified: 0,
  notified: 0,
  errors: [],
  durationMs: 0,
});

/**
 * Folds a remote delta into the cache. Remote state wins for read flag,
 * folder and location unless the message has a pending operation; tags are
 * never taken from the remote side. A report whose id is unknown is matched
 * on its remote location before it is treated as new, since providers
 * without stable message ids derive them from where the message lives.
 */
export const mergeRemoteChanges = async (
  store: MailboxStore,
  accountId: string,
  changes: FetchChangesResult,
): Promise<MergeSummary> => {
  const summary: MergeSummary = { ingestedIds: [], updated: 0, removed: 0 };
  const ingestedAt = new Date().toISOString();

  for (const remote of changes.messages) {
    let outcome = await store.mergeRemoteMessage(accountId, remote.id, remote);
    if (outcome === 'missing') {
      const knownId = await store.findMessageIdByRemote(accountId, remote.remote);
      if (knownId && knownId !== remote.id) {
        outcome = await store.mergeRemoteMessage(accountId, knownId, remote);
      }
    }
    if (outcome !== 'missing') {
      summary.updated += 1;
      continue;
    }

    const message: Message = {
      ...remote,
      accountId,
      originalFolder: null,
      tags: [],
      tagSource: null,
      confidence: null,
      priority: null,
      actionRequired: false,
      canArchive: false,
      syncedLabels: [],
      needsClassification: true,
      ingestedAt,
    };
    await store.insertMessage(message);
    summary.ingestedIds.push(remote.id);
  }

  for (const id of changes.removedIds) {
    if (await store.removeRemoteMessage(accountId, id)) {
      summary.removed += 1;
    }
  }

  return summary;
};

/**
 * Runs sync cycles: drain, fetch, merge, classify, notify. At most one cycle
 * per account is in flight in this process; a second trigger while one runs
 * returns `already_running` without waiting.
 */
export class SyncEngine {
  private readonly inFlight = new Map<string, Promise<SyncCycleResult>>();
  private readonly abandonRequests = new Set<string>();

  constructor(private readonly deps: SyncEngineDeps) {}

  isSyncing(accountId: string) {
    return this.inFlight.has(accountId);
  }

  /** Asks a running cycle to stop at its next stage boundary. */
  abandon(accountId: string) {
    if (!this.inFlight.has(accountId)) {
      return false;
    }
    this.abandonRequests.add(accountId);
    return true;
  }

  runCycle(accountId: string): Promise<SyncCycleResult> {
    if (this.inFlight.has(accountId)) {
      return Promise.resolve({ ...emptyResult(accountId), outcome: 'already_running' });
    }
    const run = this.execute(accountId).finally(() => {
      this.inFlight.delete(accountId);
      this.abandonRequests.delete(accountId);
    });
    this.inFlight.set(accountId, run);
    return run;
  }

  private async shouldAbandon(accountId: string) {
    if (this.abandonRequests.has(accountId)) {
      return true;
    }
    const account = await this.deps.store.getAccount(accountId);
    return !account || account.status !== 'active';
  }

  private async execute(accountId: string): Promise<SyncCycleResult> {
    const { store, settings } = this.deps;
    const result = emptyResult(accountId);
    const startedAt = Date.now();
    let adapter: ProviderAdapter | null = null;

    try {
      const account = await store.getAccount(accountId);
      if (!account || account.status !== 'active') {
        result.outcome = 'skipped';
        return result;
      }
      adapter = this.deps.createAdapter(account);

      result.stage = 'drain';
      result.operations = await drainOperations(store, adapter, accountId, {
        maxOperations: settings.maxOperationsPerDrain,
        maxAttempts: settings.maxOperationAttempts,
        labelPrefix: settings.classification.labels.prefix,
        retentionHours: settings.operationRetentionHours,
      });
      if (await this.shouldAbandon(accountId)) {
        result.outcome = 'abandoned';
        return result;
      }

      result.stage = 'fetch';
      const changes = await adapter.fetchChanges(account.syncCursor);
      result.fetched = changes.messages.length;
      if (await this.shouldAbandon(accountId)) {
        result.outcome = 'abandoned';
        return result;
      }

      result.stage = 'merge';
      const merged = await mergeRemoteChanges(store, accountId, changes);
      await store.advanceCursor(accountId, changes.cursor);
      result.ingested = merged.ingestedIds.length;
      result.updated = merged.updated;
      result.removed = merged.removed;
      if (await this.shouldAbandon(accountId)) {
        result.outcome = 'abandoned';
        return result;
      }

      result.stage = 'classify';
      const classification = await this.classify(accountId, result);
      result.classified = classification.classified;
      if (await this.shouldAbandon(accountId)) {
        result.outcome = 'abandoned';
        return result;
      }

      result.stage = 'notify';
      const notification = await this.notify(accountId, merged.ingestedIds, result);
      result.notified = notification.notified;
      result.outcome = 'completed';
      return result;
    } catch (error) {
      const message = errorMessage(error);
      result.errors.push(message);
      if (error instanceof AuthError) {
        result.outcome = 'auth_error';
        await store.setAccountStatus(accountId, 'auth_error', message).catch((statusError: unknown) => {
          result.errors.push(errorMessage(statusError));
        });
      } else {
        result.outcome = 'transient_error';
        await store.recordSyncError(accountId, message).catch((recordError: unknown) => {
          result.errors.push(errorMessage(recordError));
        });
      }
      return result;
    } finally {
      if (adapter?.close) {
        await adapter.close().catch((error: unknown) => {
          console.warn(`[sync] closing provider for ${accountId} failed: ${errorMessage(error)}`);
        });
      }
      result.durationMs = Date.now() - startedAt;
      this.logResult(result);
    }
  }

  private async classify(accountId: string, result: SyncCycleResult): Promise<ClassificationSummary> {
    try {
      return await classifyPendingMessages(this.deps.store, this.deps.inference, accountId, this.deps.settings.classification);
    } catch (error) {
      result.errors.push(`classification: ${errorMessage(error)}`);
      return { attempted: 0, classified: 0, failed: 0, labelsQueued: 0 };
    }
  }

  private async notify(accountId: string, ingestedIds: string[], result: SyncCycleResult): Promise<NotificationSummary> {
    try {
      // Re-read so tags assigned during classification apply.
      const messages = await this.deps.store.getMessages(accountId, ingestedIds);
      return await dispatchNotifications(
        messages,
        this.deps.subscriptions,
        this.deps.pushRelay,
        this.deps.settings.notifications,
      );
    } catch (error) {
      result.errors.push(`notification: ${errorMessage(error)}`);
      return { eligible: 0, notified: 0, delivered: 0, removedSubscriptions: 0, failedDeliveries: 0 };
    }
  }

  private logResult(result: SyncCycleResult) {
    const { operations } = result;
    const line = `[sync] ${result.accountId} ${result.outcome} at ${result.stage} in ${result.durationMs}ms`
      + ` ops=${operations.applied}/${operations.cancelled}/${operations.failed} pruned=${operations.pruned}`
      + ` fetched=${result.fetched} ingested=${result.ingested} updated=${result.updated} removed=${result.removed}`
      + ` classified=${result.classified} notified=${result.notified}`;
    if (result.errors.length > 0) {
      console.warn(`${line} errors=${result.errors.join(' | ')}`);
    } else {
      console.log(line);
    }
  }
}
