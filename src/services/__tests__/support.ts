import type { QueryResultRow } from 'pg';
import type { QueryFn, QueryParams, SqlExecutor } from '../../db/pool.js';
import type {
  Account,
  AccountAuthConfig,
  AccountStatus,
  Message,
  MessagePatch,
  MutationKind,
  OperationKind,
  OperationStatus,
  PendingOperation,
  PushPayload,
  PushSubscriptionRecord,
  RemoteLocation,
  RemoteMessage,
} from '../../shared/types.js';
import type { LabelChange } from '../labelSync.js';
import { remoteContentPatch, remoteStatePatch } from '../mailboxStore.js';
import type { ClassificationUpdate, MailboxStore, OperationUpdate, RemoteMergeOutcome } from '../mailboxStore.js';
import type { PushDeliveryResult, PushRelay, PushSubscriptionStore } from '../push.js';
import type { FetchChangesResult, MessageRef, MutationResult, ProviderAdapter } from '../providers/types.js';

export const createTestRunner = () => {
  let passed = 0;
  let failed = 0;

  const test = async (name: string, fn: () => Promise<void> | void) => {
    try {
      await fn();
      passed += 1;
    } catch (error) {
      failed += 1;
      console.error(`FAIL: ${name}`);
      console.error(`  ${error}`);
    }
  };

  const finish = () => {
    console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
    if (failed > 0) {
      process.exit(1);
    }
  };

  return { test, finish };
};

export const makeAccount = (overrides: Partial<Account> = {}): Account => ({
  id: 'acct-1',
  email: 'reader@example.com',
  displayName: 'Reader',
  provider: 'label_api',
  status: 'active',
  authConfig: { authType: 'oauth2', accessToken: 'test-access', refreshToken: 'test-refresh', tokenExpiresAt: null },
  imap: null,
  syncCursor: null,
  lastSyncAt: null,
  lastError: null,
  ...overrides,
});

export const makeMessage = (overrides: Partial<Message> = {}): Message => ({
  id: 'msg-1',
  accountId: 'acct-1',
  threadId: null,
  folder: 'inbox',
  originalFolder: null,
  remote: { mailbox: null, uid: null },
  fromAddress: 'Ada Lovelace <ada@example.com>',
  toAddresses: ['reader@example.com'],
  subject: 'Hello',
  date: '2024-03-01T10:00:00.000Z',
  snippet: 'Hello there',
  bodyText: 'Hello there',
  tags: [],
  tagSource: null,
  confidence: null,
  priority: null,
  actionRequired: false,
  canArchive: false,
  syncedLabels: [],
  needsClassification: false,
  isUnread: true,
  ingestedAt: '2024-03-01T10:00:00.000Z',
  ...overrides,
});

export const makeRemoteMessage = (overrides: Partial<RemoteMessage> = {}): RemoteMessage => ({
  id: 'msg-1',
  threadId: null,
  folder: 'inbox',
  remote: { mailbox: null, uid: null },
  fromAddress: 'Ada Lovelace <ada@example.com>',
  toAddresses: ['reader@example.com'],
  subject: 'Hello',
  date: '2024-03-01T10:00:00.000Z',
  snippet: 'Hello there',
  bodyText: 'Hello there',
  isUnread: true,
  ...overrides,
});

const messageKey = (accountId: string, messageId: string) => `${accountId}\u0000${messageId}`;

/** In-process `MailboxStore` with the same semantics as the Postgres one. */
export class MemoryMailboxStore implements MailboxStore {
  readonly accounts = new Map<string, Account>();
  readonly messages = new Map<string, Message>();
  readonly operations: PendingOperation[] = [];
  readonly classificationFailures = new Map<string, number>();
  private nextOperation = 1;
  private clock = Date.parse('2024-03-01T12:00:00.000Z');

  constructor(seed: { accounts?: Account[]; messages?: Message[] } = {}) {
    for (const account of seed.accounts ?? []) this.accounts.set(account.id, account);
    for (const message of seed.messages ?? []) this.messages.set(messageKey(message.accountId, message.id), message);
  }

  private tick() {
    this.clock += 1_000;
    return new Date(this.clock).toISOString();
  }

  advanceClock(ms: number) {
    this.clock += ms;
  }

  private hasPendingMutation(accountId: string, messageId: string) {
    return this.operations.some((operation) => operation.accountId === accountId
      && operation.messageId === messageId
      && operation.status === 'pending'
      && operation.kind !== 'apply_labels');
  }

  message(accountId: string, messageId: string) {
    return this.messages.get(messageKey(accountId, messageId)) ?? null;
  }

  async getAccount(accountId: string) {
    return this.accounts.get(accountId) ?? null;
  }

  async listAccounts(status?: AccountStatus) {
    return [...this.accounts.values()].filter((account) => !status || account.status === status);
  }

  async setAccountStatus(accountId: string, status: AccountStatus, lastError: string | null) {
    const account = this.accounts.get(accountId);
    if (account) this.accounts.set(accountId, { ...account, status, lastError });
  }

  async recordSyncError(accountId: string, lastError: string) {
    const account = this.accounts.get(accountId);
    if (account) this.accounts.set(accountId, { ...account, lastError });
  }

  async saveAccountAuth(accountId: string, authConfig: AccountAuthConfig) {
    const account = this.accounts.get(accountId);
    if (account) this.accounts.set(accountId, { ...account, authConfig });
  }

  async advanceCursor(accountId: string, cursor: string) {
    const account = this.accounts.get(accountId);
    if (account) {
      this.accounts.set(accountId, { ...account, syncCursor: cursor, lastSyncAt: this.tick(), lastError: null });
    }
  }

  async getMessage(accountId: string, messageId: string) {
    return this.message(accountId, messageId);
  }

  async getMessages(accountId: string, messageIds: string[]) {
    return messageIds
      .map((id) => this.message(accountId, id))
      .filter((message): message is Message => message !== null);
  }

  async insertMessage(message: Message) {
    const key = messageKey(message.accountId, message.id);
    if (!this.messages.has(key)) this.messages.set(key, message);
  }

  async updateMessage(accountId: string, messageId: string, patch: MessagePatch) {
    const existing = this.message(accountId, messageId);
    if (existing) this.messages.set(messageKey(accountId, messageId), { ...existing, ...patch });
  }

  async removeMessage(accountId: string, messageId: string) {
    this.messages.delete(messageKey(accountId, messageId));
  }

  async findMessageIdByRemote(accountId: string, location: RemoteLocation) {
    if (!location.mailbox || location.uid === null) return null;
    const match = [...this.messages.values()].find((message) => message.accountId === accountId
      && message.remote.mailbox === location.mailbox
      && message.remote.uid === location.uid);
    return match?.id ?? null;
  }

  async mergeRemoteMessage(accountId: string, messageId: string, remote: RemoteMessage): Promise<RemoteMergeOutcome> {
    const existing = this.message(accountId, messageId);
    if (!existing) return 'missing';
    if (this.hasPendingMutation(accountId, messageId)) {
      await this.updateMessage(accountId, messageId, remoteContentPatch(remote));
      return 'kept_local';
    }
    await this.updateMessage(accountId, messageId, {
      ...remoteContentPatch(remote),
      ...remoteStatePatch(remote, existing.folder),
    });
    return 'updated';
  }

  async removeRemoteMessage(accountId: string, messageId: string) {
    if (!this.message(accountId, messageId) || this.hasPendingMutation(accountId, messageId)) return false;
    this.messages.delete(messageKey(accountId, messageId));
    return true;
  }

  private failures(accountId: string, messageId: string) {
    return this.classificationFailures.get(messageKey(accountId, messageId)) ?? 0;
  }

  async listMessagesNeedingClassification(accountId: string, limit: number) {
    return [...this.messages.values()]
      .filter((message) => message.accountId === accountId
        && message.needsClassification
        && message.tagSource !== 'manual'
        && message.folder !== 'deleting')
      .sort((left, right) => this.failures(accountId, left.id) - this.failures(accountId, right.id)
        || Date.parse(left.ingestedAt) - Date.parse(right.ingestedAt))
      .slice(0, limit);
  }

  async applyClassification(accountId: string, messageId: string, update: ClassificationUpdate) {
    const existing = this.message(accountId, messageId);
    if (!existing || existing.tagSource === 'manual') return false;
    this.messages.set(messageKey(accountId, messageId), {
      ...existing,
      ...update,
      tagSource: 'ai',
      needsClassification: false,
    });
    return true;
  }

  async recordClassificationFailure(accountId: string, messageId: string) {
    const key = messageKey(accountId, messageId);
    this.classificationFailures.set(key, (this.classificationFailures.get(key) ?? 0) + 1);
  }

  private insertOperation(accountId: string, messageId: string, kind: OperationKind): PendingOperation {
    const operation: PendingOperation = {
      id: `op-${this.nextOperation++}`,
      accountId,
      messageId,
      kind,
      status: 'pending',
      resolution: null,
      attempts: 0,
      lastError: null,
      createdAt: this.tick(),
      completedAt: null,
    };
    this.operations.push(operation);
    return operation;
  }

  async enqueueOperation(
    accountId: string,
    messageId: string,
    kind: OperationKind,
    patchFor: (message: Message) => MessagePatch,
  ) {
    const existing = this.message(accountId, messageId);
    if (!existing) return null;
    const patch = patchFor(existing);
    this.messages.set(messageKey(accountId, messageId), { ...existing, ...patch });
    return this.insertOperation(accountId, messageId, kind);
  }

  async clearTrash(accountId: string) {
    const trashed = [...this.messages.values()].filter((message) => message.accountId === accountId && message.folder === 'trash');
    for (const message of trashed) {
      this.messages.set(messageKey(accountId, message.id), { ...message, folder: 'deleting', originalFolder: 'trash' });
      this.insertOperation(accountId, message.id, 'permanent_delete');
    }
    return { deleted: trashed.length, queued: trashed.length };
  }

  async listPendingOperations(accountId: string, limit: number) {
    return this.operations
      .filter((operation) => operation.accountId === accountId && operation.status === 'pending')
      .slice(0, limit)
      .map((operation) => ({ ...operation }));
  }

  async updateOperation(operationId: string, update: OperationUpdate) {
    const index = this.operations.findIndex((operation) => operation.id === operationId);
    if (index < 0) return null;
    const current = this.operations[index];
    const next: PendingOperation = {
      ...current,
      status: update.status,
      resolution: update.resolution !== undefined ? update.resolution : current.resolution,
      attempts: update.attempts ?? current.attempts,
      lastError: update.lastError !== undefined ? update.lastError : current.lastError,
      completedAt: update.status === 'completed' ? this.tick() : null,
    };
    this.operations[index] = next;
    return { ...next };
  }

  async getOperation(operationId: string) {
    const operation = this.operations.find((entry) => entry.id === operationId);
    return operation ? { ...operation } : null;
  }

  async listOperations(accountId: string, status?: OperationStatus) {
    return this.operations
      .filter((operation) => operation.accountId === accountId && (!status || operation.status === status))
      .map((operation) => ({ ...operation }));
  }

  async pruneCompletedOperations(accountId: string, retentionHours: number) {
    const cutoff = this.clock - retentionHours * 3_600_000;
    let pruned = 0;
    for (let index = this.operations.length - 1; index >= 0; index -= 1) {
      const { accountId: owner, status, completedAt } = this.operations[index];
      if (owner === accountId && status === 'completed' && completedAt && Date.parse(completedAt) < cutoff) {
        this.operations.splice(index, 1);
        pruned += 1;
      }
    }
    return pruned;
  }

  operation(operationId: string) {
    const operation = this.operations.find((entry) => entry.id === operationId);
    if (!operation) throw new Error(`no operation ${operationId}`);
    return operation;
  }
}

export type MutationCall = { id: string; kind: MutationKind; remote: MessageRef['remote'] };

export type LabelCall = { id: string; change: LabelChange };

/** Provider stand-in; `onMutation` and `onLabels` decide each call's result. */
export class FakeProviderAdapter implements ProviderAdapter {
  readonly kind = 'label_api' as const;
  readonly mutations: MutationCall[] = [];
  readonly labelCalls: LabelCall[] = [];
  readonly fetchCursors: Array<string | null> = [];
  closed = false;

  constructor(
    private readonly options: {
      changes?: FetchChangesResult | (() => Promise<FetchChangesResult>);
      onMutation?: (ref: MessageRef, kind: MutationKind) => Promise<MutationResult> | MutationResult;
      onLabels?: (ref: MessageRef, change: LabelChange) => Promise<void> | void;
    } = {},
  ) {}

  async fetchChanges(cursor: string | null) {
    this.fetchCursors.push(cursor);
    const changes = this.options.changes;
    if (typeof changes === 'function') return changes();
    return changes ?? { messages: [], removedIds: [], cursor: 'cursor-1' };
  }

  async applyMutation(ref: MessageRef, kind: MutationKind) {
    this.mutations.push({ id: ref.id, kind, remote: ref.remote });
    return this.options.onMutation ? this.options.onMutation(ref, kind) : {};
  }

  async applyLabels(ref: MessageRef, change: LabelChange) {
    this.labelCalls.push({ id: ref.id, change });
    await this.options.onLabels?.(ref, change);
  }

  async close() {
    this.closed = true;
  }
}

export class MemoryPushSubscriptionStore implements PushSubscriptionStore {
  readonly touched: string[] = [];

  constructor(readonly subscriptions: PushSubscriptionRecord[] = []) {}

  async list() {
    return [...this.subscriptions];
  }

  async upsert(subscription: PushSubscriptionRecord) {
    const index = this.subscriptions.findIndex((entry) => entry.endpoint === subscription.endpoint);
    if (index >= 0) this.subscriptions[index] = subscription;
    else this.subscriptions.push(subscription);
  }

  async remove(endpoint: string) {
    const index = this.subscriptions.findIndex((entry) => entry.endpoint === endpoint);
    if (index < 0) return false;
    this.subscriptions.splice(index, 1);
    return true;
  }

  async touch(endpoint: string) {
    this.touched.push(endpoint);
  }
}

export class RecordingPushRelay implements PushRelay {
  readonly sent: Array<{ endpoint: string; payload: PushPayload }> = [];

  constructor(private readonly results: Record<string, PushDeliveryResult> = {}) {}

  async send(subscription: PushSubscriptionRecord, payload: PushPayload) {
    this.sent.push({ endpoint: subscription.endpoint, payload });
    return this.results[subscription.endpoint] ?? 'delivered';
  }
}

export const makeSubscription = (endpoint: string): PushSubscriptionRecord => ({
  endpoint,
  p256dh: 'test-p256dh',
  auth: 'test-auth',
  userAgent: null,
});

export type QueryCall = { text: string; params: unknown[] };

/**
 * `SqlExecutor` that records statements and answers from `handler`.
 * Transactions run on the same recorder, bracketed by BEGIN/COMMIT or ROLLBACK.
 */
export const createScriptedExecutor = (
  handler: (call: QueryCall) => QueryResultRow[] | undefined,
): { executor: SqlExecutor; calls: QueryCall[] } => {
  const calls: QueryCall[] = [];
  const query: QueryFn = async <T extends QueryResultRow = QueryResultRow>(text: string, params: QueryParams = []) => {
    const call: QueryCall = { text, params: [...params] };
    calls.push(call);
    // pg hands rows back untyped too.
    const rows = (handler(call) ?? []) as T[];
    return { rows };
  };
  const executor: SqlExecutor = {
    query,
    withTransaction: async (fn) => {
      calls.push({ text: 'BEGIN', params: [] });
      try {
        const result = await fn(query);
        calls.push({ text: 'COMMIT', params: [] });
        return result;
      } catch (error) {
        calls.push({ text: 'ROLLBACK', params: [] });
        throw error;
      }
    },
  };
  return { executor, calls };
};
