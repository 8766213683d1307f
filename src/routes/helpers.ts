import type { InferenceClient } from '../services/inference.js';
import type { MailboxStore } from '../services/mailboxStore.js';
import type { PushSubscriptionStore } from '../services/push.js';
import type { SyncCycleResult } from '../services/syncEngine.js';

export interface SyncController {
  isSyncing(accountId: string): boolean;
  runCycle(accountId: string): Promise<SyncCycleResult>;
}

export interface RouteDeps {
  store: MailboxStore;
  subscriptions: PushSubscriptionStore;
  engine: SyncController;
  inference: InferenceClient;
  aiEnabled: boolean;
  maxContextChars: number;
  /** Hands the sync to a worker; resolves to false when none is available. */
  enqueueSync: (accountId: string) => Promise<boolean>;
}

export type AccountParams = { accountId: string };
export type MessageParams = { accountId: string; messageId: string };
export type OperationParams = { operationId: string };
