import { MUTATION_KINDS, OPERATION_STATUSES, pickLiteral } from '../shared/types.js';
import type {
  Account,
  Message,
  MessageFolder,
  MessagePatch,
  MutationKind,
  OperationKind,
  OperationStatus,
  PendingOperation,
} from '../shared/types.js';
import { AuthError, MutationRequestError, NotFoundError, errorMessage } from './errors.js';
import { computeLabelChange, desiredLabels, isEmptyLabelChange } from './labelSync.js';
import type { MailboxStore } from './mailboxStore.js';
import type { MessageRef, ProviderAdapter } from './providers/types.js';

const OPPOSITES: Partial<Record<OperationKind, OperationKind>> = {
  mark_read: 'mark_unread',
  mark_unread: 'mark_read',
  trash: 'restore',
  restore: 'trash',
};

export const isDeleteKind = (kind: OperationKind) => kind === 'delete' || kind === 'permanent_delete';

export const areOpposites = (left: OperationKind, right: OperationKind) => OPPOSITES[left] === right;

export interface ReducedOperations {
  /** Operations that still need a remote call, in creation order. */
  execute: PendingOperation[];
  cancelled: PendingOperation[];
  superseded: PendingOperation[];
}

/**
 * Folds each message's pending operations left to right over a stack: an
 * operation opposite to the top of the stack cancels with it, and nothing
 * after a delete survives. Label pushes sit outside the stack: only the
 * latest one per message runs, and none do when the message is deleted.
 * Input order is creation order.
 */
export const reduceOperations = (operations: PendingOperation[]): ReducedOperations => {
  const byMessage = new Map<string, PendingOperation[]>();
  for (const operation of operations) {
    const group = byMessage.get(operation.messageId) ?? [];
    group.push(operation);
    byMessage.set(operation.messageId, group);
  }

  const survivors = new Set<PendingOperation>();
  const cancelled: PendingOperation[] = [];
  const superseded: PendingOperation[] = [];

  for (const group of byMessage.values()) {
    const stack: PendingOperation[] = [];
    const labelPushes: PendingOperation[] = [];
    let deleted = false;
    for (const operation of group) {
      if (operation.kind === 'apply_labels') {
        labelPushes.push(operation);
        continue;
      }
      if (deleted) {
        superseded.push(operation);
        continue;
      }
      if (isDeleteKind(operation.kind)) {
        stack.push(operation);
        deleted = true;
        continue;
      }
      const top = stack[stack.length - 1];
      if (top && !isDeleteKind(top.kind) && areOpposites(top.kind, operation.kind)) {
        stack.pop();
        cancelled.push(top, operation);
        continue;
      }
      stack.push(operation);
    }
    for (const operation of stack) {
      survivors.add(operation);
    }

    const latest = deleted ? undefined : labelPushes[labelPushes.length - 1];
    for (const operation of labelPushes) {
      if (operation === latest) {
        survivors.add(operation);
      } else {
        superseded.push(operation);
      }
    }
  }

  return {
    execute: operations.filter((operation) => survivors.has(operation)),
    cancelled,
    superseded,
  };
};

export const parseOperationKind = (value: unknown): MutationKind => {
  const kind = pickLiteral(MUTATION_KINDS, value);
  if (!kind) {
    throw new MutationRequestError(400, `kind must be one of ${MUTATION_KINDS.join(', ')}`);
  }
  return kind;
};

export const parseOperationStatus = (value: unknown): OperationStatus | undefined => {
  if (value === undefined || value === '') {
    return undefined;
  }
  const status = pickLiteral(OPERATION_STATUSES, value);
  if (!status) {
    throw new MutationRequestError(400, `status must be one of ${OPERATION_STATUSES.join(', ')}`);
  }
  return status;
};

const restoreTarget = (message: Message): MessageFolder =>
  message.originalFolder === 'inbox' || message.originalFolder === 'sent' ? message.originalFolder : 'inbox';

/** Optimistic local change for `kind`, or a 409 when the message cannot take it. */
export const localPatchFor = (message: Message, kind: MutationKind): MessagePatch => {
  if (message.folder === 'deleting') {
    throw new MutationRequestError(409, `message ${message.id} is being deleted`);
  }
  switch (kind) {
    case 'mark_read':
      return { isUnread: false };
    case 'mark_unread':
      return { isUnread: true };
    case 'trash':
      if (message.folder === 'trash') {
        throw new MutationRequestError(409, `message ${message.id} is already in trash`);
      }
      return { folder: 'trash', originalFolder: message.folder };
    case 'restore':
      if (message.folder !== 'trash') {
        throw new MutationRequestError(409, `message ${message.id} is not in trash`);
      }
      return { folder: restoreTarget(message), originalFolder: null };
    case 'delete':
    case 'permanent_delete':
      return { folder: 'deleting', originalFolder: message.folder };
  }
};

const requireAccount = async (store: MailboxStore, accountId: string): Promise<Account> => {
  const account = await store.getAccount(accountId);
  if (!account) {
    throw new MutationRequestError(404, `account ${accountId} not found`);
  }
  return account;
};

/**
 * Records a local mutation: the message row is patched and the pending
 * operation inserted in one transaction. Remote propagation happens on the
 * next drain.
 */
export const requestMutation = async (
  store: MailboxStore,
  accountId: string,
  messageId: string,
  kind: MutationKind,
): Promise<PendingOperation> => {
  await requireAccount(store, accountId);
  const operation = await store.enqueueOperation(accountId, messageId, kind, (message) => localPatchFor(message, kind));
  if (!operation) {
    throw new MutationRequestError(404, `message ${messageId} not found`);
  }
  console.log(`[queue] queued ${kind} for ${accountId}/${messageId} (${operation.id})`);
  return operation;
};

export const clearTrash = async (store: MailboxStore, accountId: string) => {
  await requireAccount(store, accountId);
  const result = await store.clearTrash(accountId);
  console.log(`[queue] cleared trash for ${accountId}: ${result.queued} permanent deletes queued`);
  return result;
};

export const listOperations = async (store: MailboxStore, accountId: string, status?: OperationStatus) => {
  await requireAccount(store, accountId);
  return store.listOperations(accountId, status);
};

/** Manual retry; `failed` is otherwise terminal. */
export const retryOperation = async (store: MailboxStore, operationId: string): Promise<PendingOperation> => {
  const operation = await store.getOperation(operationId);
  if (!operation) {
    throw new MutationRequestError(404, `operation ${operationId} not found`);
  }
  if (operation.status !== 'failed') {
    throw new MutationRequestError(409, `operation ${operationId} is ${operation.status}, only failed operations can be retried`);
  }
  const updated = await store.updateOperation(operationId, {
    status: 'pending',
    resolution: null,
    attempts: 0,
    lastError: null,
  });
  if (!updated) {
    throw new MutationRequestError(404, `operation ${operationId} not found`);
  }
  return updated;
};

export interface DrainOptions {
  maxOperations: number;
  maxAttempts: number;
  labelPrefix: string;
  /** Completed operations older than this are pruned after the drain; 0 keeps them. */
  retentionHours: number;
}

export interface DrainSummary {
  applied: number;
  cancelled: number;
  superseded: number;
  alreadyAbsent: number;
  retrying: number;
  failed: number;
  pruned: number;
}

export const emptyDrainSummary = (): DrainSummary => ({
  applied: 0,
  cancelled: 0,
  superseded: 0,
  alreadyAbsent: 0,
  retrying: 0,
  failed: 0,
  pruned: 0,
});

const toMessageRef = (operation: PendingOperation, message: Message | null): MessageRef =>
  message
    ? { id: message.id, folder: message.folder, remote: message.remote }
    : { id: operation.messageId, folder: 'deleting', remote: { mailbox: null, uid: null } };

/** Writes the message's classification labels and records them as synced. */
const pushLabels = async (
  store: MailboxStore,
  adapter: ProviderAdapter,
  operation: PendingOperation,
  message: Message,
  prefix: string,
) => {
  const change = computeLabelChange(message, prefix);
  if (!isEmptyLabelChange(change)) {
    await adapter.applyLabels(toMessageRef(operation, message), change);
  }
  await store.updateMessage(message.accountId, message.id, { syncedLabels: desiredLabels(message, prefix) });
};

/**
 * Pushes pending operations to the provider, one attempt each, then prunes
 * completed operations past the retention window. An `AuthError` propagates
 * and leaves the current operation untouched.
 */
export const drainOperations = async (
  store: MailboxStore,
  adapter: ProviderAdapter,
  accountId: string,
  options: DrainOptions,
): Promise<DrainSummary> => {
  const summary = emptyDrainSummary();
  const pending = await store.listPendingOperations(accountId, options.maxOperations);
  const reduced = reduceOperations(pending);
  for (const operation of reduced.cancelled) {
    await store.updateOperation(operation.id, { status: 'completed', resolution: 'cancelled' });
    summary.cancelled += 1;
  }
  for (const operation of reduced.superseded) {
    await store.updateOperation(operation.id, { status: 'completed', resolution: 'superseded' });
    summary.superseded += 1;
  }

  for (const operation of reduced.execute) {
    const message = await store.getMessage(accountId, operation.messageId);
    const { kind } = operation;
    try {
      if (kind === 'apply_labels') {
        if (!message) {
          await store.updateOperation(operation.id, { status: 'completed', resolution: 'already_absent', lastError: null });
          summary.alreadyAbsent += 1;
          continue;
        }
        await pushLabels(store, adapter, operation, message, options.labelPrefix);
        await store.updateOperation(operation.id, { status: 'completed', resolution: 'applied', lastError: null });
        summary.applied += 1;
        continue;
      }

      const result = await adapter.applyMutation(toMessageRef(operation, message), kind);
      await store.updateOperation(operation.id, { status: 'completed', resolution: 'applied', lastError: null });
      if (isDeleteKind(kind)) {
        await store.removeMessage(accountId, operation.messageId);
      } else if (result.relocatedTo && message) {
        await store.updateMessage(accountId, message.id, { remote: result.relocatedTo });
      }
      summary.applied += 1;
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }
      if (error instanceof NotFoundError && isDeleteKind(kind)) {
        await store.updateOperation(operation.id, { status: 'completed', resolution: 'already_absent', lastError: null });
        await store.removeMessage(accountId, operation.messageId);
        summary.alreadyAbsent += 1;
        continue;
      }
      if (error instanceof NotFoundError && kind === 'apply_labels') {
        await store.updateOperation(operation.id, { status: 'completed', resolution: 'already_absent', lastError: null });
        summary.alreadyAbsent += 1;
        continue;
      }

      const attempts = operation.attempts + 1;
      const lastError = errorMessage(error);
      if (error instanceof NotFoundError || attempts >= options.maxAttempts) {
        await store.updateOperation(operation.id, { status: 'failed', attempts, lastError });
        summary.failed += 1;
        console.warn(`[queue] ${operation.kind} ${operation.id} failed after ${attempts} attempt(s): ${lastError}`);
        continue;
      }
      await store.updateOperation(operation.id, { status: 'pending', attempts, lastError });
      summary.retrying += 1;
      console.warn(`[queue] ${operation.kind} ${operation.id} attempt ${attempts} failed: ${lastError}`);
    }
  }

  if (options.retentionHours > 0) {
    summary.pruned = await store.pruneCompletedOperations(accountId, options.retentionHours);
  }
  return summary;
};
