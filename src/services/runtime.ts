import { env } from '../config/env.js';
import { sqlExecutor } from '../db/pool.js';
import type { SqlExecutor } from '../db/pool.js';
import { createDefaultInferenceClient } from './inference.js';
import type { InferenceClient } from './inference.js';
import { PgMailboxStore } from './mailboxStore.js';
import type { MailboxStore } from './mailboxStore.js';
import { providerFactory } from './providers/factory.js';
import { PgPushSubscriptionStore, createWebPushRelay } from './push.js';
import type { PushSubscriptionStore } from './push.js';
import { SyncEngine } from './syncEngine.js';

export interface SyncRuntime {
  store: MailboxStore;
  subscriptions: PushSubscriptionStore;
  inference: InferenceClient;
  engine: SyncEngine;
}

/** Wires the Postgres stores, provider adapters, inference and push from `env`. */
export const createSyncRuntime = (db: SqlExecutor = sqlExecutor): SyncRuntime => {
  const store = new PgMailboxStore(db);
  const subscriptions = new PgPushSubscriptionStore(db);
  const inference = createDefaultInferenceClient();

  const engine = new SyncEngine({
    store,
    subscriptions,
    inference,
    pushRelay: createWebPushRelay(),
    createAdapter: providerFactory({
      timeoutMs: env.sync.providerTimeoutMs,
      fetchBatchSize: env.sync.fetchBatchSize,
      onAuthRefreshed: (accountId, authConfig) => store.saveAccountAuth(accountId, authConfig),
    }),
    settings: {
      maxOperationsPerDrain: env.sync.maxOperationsPerDrain,
      maxOperationAttempts: env.sync.maxOperationAttempts,
      operationRetentionHours: env.sync.operationRetentionHours,
      classification: {
        enabled: env.ai.enabled,
        maxPerCycle: env.ai.maxPerCycle,
        maxContextChars: env.ai.maxContextChars,
        labels: { enabled: env.ai.syncLabels, prefix: env.ai.labelPrefix },
      },
      notifications: {
        maxPerCycle: env.push.maxPerCycle,
      },
    },
  });

  return { store, subscriptions, inference, engine };
};
