import { v4 as uuidv4 } from 'uuid';
import type { QueryFn, SqlExecutor } from '../db/pool.js';
import {
  ACCOUNT_STATUSES,
  MESSAGE_FOLDERS,
  MESSAGE_PRIORITIES,
  OPERATION_KINDS,
  OPERATION_RESOLUTIONS,
  OPERATION_STATUSES,
  PROVIDER_KINDS,
  TAG_SOURCES,
  pickLiteral,
} from '../shared/types.js';
import type {
  Account,
  AccountAuthConfig,
  AccountStatus,
  Message,
  MessagePatch,
  MessagePriority,
  OperationKind,
  OperationResolution,
  OperationStatus,
  PendingOperation,
  RemoteLocation,
  RemoteMessage,
} from '../shared/types.js';
import { isRecord, readString } from './providers/json.js';

export interface OperationUpdate {
  status: OperationStatus;
  resolution?: OperationResolution | null;
  attempts?: number;
  lastError?: string | null;
}

export interface ClassificationUpdate {
  tags: string[];
  confidence: number;
  priority: MessagePriority;
  actionRequired: boolean;
  canArchive: boolean;
}

/**
 * `kept_local` means a pending operation held the row, so only content
 * fields were refreshed.
 */
export type RemoteMergeOutcome = 'missing' | 'updated' | 'kept_local';

/** Fields of a remote report that never conflict with local mutations. */
export const remoteContentPatch = (remote: RemoteMessage): MessagePatch => ({
  threadId: remote.threadId,
  fromAddress: remote.fromAddress,
  toAddresses: remote.toAddresses,
  subject: remote.subject,
  date: remote.date,
  snippet: remote.snippet,
  bodyText: remote.bodyText,
});

/** Remote-authoritative state: folder, read flag and location. */
export const remoteStatePatch = (remote: RemoteMessage, currentFolder: Message['folder']): MessagePatch => ({
  remote: remote.remote,
  isUnread: remote.isUnread,
  folder: remote.folder,
  ...(remote.folder === 'trash' && currentFolder !== 'trash' ? { originalFolder: currentFolder } : {}),
});

/**
 * Local mailbox cache. Message ids are provider-scoped, so every message
 * lookup is keyed by account as well.
 */
export interface MailboxStore {
  getAccount(accountId: string): Promise<Account | null>;
  listAccounts(status?: AccountStatus): Promise<Account[]>;
  setAccountStatus(accountId: string, status: AccountStatus, lastError: string | null): Promise<void>;
  recordSyncError(accountId: string, lastError: string): Promise<void>;
  saveAccountAuth(accountId: string, authConfig: AccountAuthConfig): Promise<void>;
  advanceCursor(accountId: string, cursor: string): Promise<void>;

  getMessage(accountId: string, messageId: string): Promise<Message | null>;
  getMessages(accountId: string, messageIds: string[]): Promise<Message[]>;
  insertMessage(message: Message): Promise<void>;
  updateMessage(accountId: string, messageId: string, patch: MessagePatch): Promise<void>;
  removeMessage(accountId: string, messageId: string): Promise<void>;
  /** Looks a message up by where it lives remotely, for providers whose ids are not stable across moves. */
  findMessageIdByRemote(accountId: string, location: RemoteLocation): Promise<string | null>;
  /**
   * Folds a remote report into an existing row. The row is locked while
   * pending operations are checked, so a mutation queued concurrently is
   * never overwritten by remote state.
   */
  mergeRemoteMessage(accountId: string, messageId: string, remote: RemoteMessage): Promise<RemoteMergeOutcome>;
  /** Drops a remotely removed message unless a pending operation still refers to it. */
  removeRemoteMessage(accountId: string, messageId: string): Promise<boolean>;
  /** Least-attempted first, then oldest, so repeated failures cannot starve new mail. */
  listMessagesNeedingClassification(accountId: string, limit: number): Promise<Message[]>;
  applyClassification(accountId: string, messageId: string, update: ClassificationUpdate): Promise<boolean>;
  recordClassificationFailure(accountId: string, messageId: string): Promise<void>;

  /**
   * Applies `patchFor(message)` and records the operation in one transaction.
   * Resolves to null when the message is unknown; a throw from `patchFor`
   * rolls everything back.
   */
  enqueueOperation(
    accountId: string,
    messageId: string,
    kind: OperationKind,
    patchFor: (message: Message) => MessagePatch,
  ): Promise<PendingOperation | null>;
  /** Moves every trashed message to `deleting` and queues a `permanent_delete` for each. */
  clearTrash(accountId: string): Promise<{ deleted: number; queued: number }>;
  listPendingOperations(accountId: string, limit: number): Promise<PendingOperation[]>;
  updateOperation(operationId: string, update: OperationUpdate): Promise<PendingOperation | null>;
  getOperation(operationId: string): Promise<PendingOperation | null>;
  listOperations(accountId: string, status?: OperationStatus): Promise<PendingOperation[]>;
  /** Deletes completed operations older than the retention window; returns how many went. */
  pruneCompletedOperations(accountId: string, retentionHours: number): Promise<number>;
}

type Timestamp = Date | string;

type AccountRow = {
  id: string;
  email: string;
  display_name: string | null;
  provider: string;
  status: string;
  auth_config: unknown;
  imap_host: string | null;
  imap_port: number | null;
  imap_tls: boolean | null;
  sync_cursor: string | null;
  last_sync_at: Timestamp | null;
  last_error: string | null;
};

type MessageRow = {
  id: string;
  account_id: string;
  thread_id: string | null;
  folder: string;
  original_folder: string | null;
  remote_mailbox: string | null;
  remote_uid: string | number | null;
  from_address: string;
  to_addresses: unknown;
  subject: string;
  date: Timestamp;
  snippet: string;
  body_text: string | null;
  tags: unknown;
  tag_source: string | null;
  confidence: number | null;
  priority: string | null;
  action_required: boolean;
  can_archive: boolean;
  synced_labels: unknown;
  needs_classification: boolean;
  is_unread: boolean;
  ingested_at: Timestamp;
};

type OperationRow = {
  id: string;
  account_id: string;
  message_id: string;
  kind: string;
  status: string;
  resolution: string | null;
  attempts: number;
  last_error: string | null;
  created_at: Timestamp;
  completed_at: Timestamp | null;
};

const ACCOUNT_COLUMNS = `id, email, display_name, provider, status, auth_config, imap_host, imap_port, imap_tls,
  sync_cursor, last_sync_at, last_error`;

const MESSAGE_COLUMNS = `id, account_id, thread_id, folder, original_folder, remote_mailbox, remote_uid,
  from_address, to_addresses, subject, date, snippet, body_text, tags, tag_source, confidence,
  priority, action_required, can_archive, synced_labels, needs_classification, is_unread, ingested_at`;

const OPERATION_COLUMNS = `id, account_id, message_id, kind, status, resolution, attempts, last_error,
  created_at, completed_at`;

const toIso = (value: Timestamp) => (value instanceof Date ? value : new Date(value)).toISOString();

const toIsoOrNull = (value: Timestamp | null) => (value === null ? null : toIso(value));

const toStringList = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];

const toAuthConfig = (value: unknown): AccountAuthConfig => {
  const record = isRecord(value) ? value : {};
  return {
    authType: readString(record, 'authType') === 'oauth2' ? 'oauth2' : 'password',
    accessToken: readString(record, 'accessToken'),
    refreshToken: readString(record, 'refreshToken'),
    tokenExpiresAt: readString(record, 'tokenExpiresAt'),
    oauthClientId: readString(record, 'oauthClientId'),
    oauthClientSecret: readString(record, 'oauthClientSecret'),
    password: readString(record, 'password'),
  };
};

export const mapAccountRow = (row: AccountRow): Account => ({
  id: row.id,
  email: row.email,
  displayName: row.display_name,
  provider: pickLiteral(PROVIDER_KINDS, row.provider) ?? 'imap',
  status: pickLiteral(ACCOUNT_STATUSES, row.status) ?? 'disabled',
  authConfig: toAuthConfig(row.auth_config),
  imap: row.imap_host
    ? { host: row.imap_host, port: row.imap_port ?? 993, tls: row.imap_tls ?? true }
    : null,
  syncCursor: row.sync_cursor,
  lastSyncAt: toIsoOrNull(row.last_sync_at),
  lastError: row.last_error,
});

export const mapMessageRow = (row: MessageRow): Message => ({
  id: row.id,
  accountId: row.account_id,
  threadId: row.thread_id,
  folder: pickLiteral(MESSAGE_FOLDERS, row.folder) ?? 'inbox',
  originalFolder: pickLiteral(MESSAGE_FOLDERS, row.original_folder),
  remote: {
    mailbox: row.remote_mailbox,
    uid: row.remote_uid === null ? null : Number(row.remote_uid),
  },
  fromAddress: row.from_address,
  toAddresses: toStringList(row.to_addresses),
  subject: row.subject,
  date: toIso(row.date),
  snippet: row.snippet,
  bodyText: row.body_text,
  tags: toStringList(row.tags),
  tagSource: pickLiteral(TAG_SOURCES, row.tag_source),
  confidence: row.confidence === null ? null : Number(row.confidence),
  priority: pickLiteral(MESSAGE_PRIORITIES, row.priority),
  actionRequired: row.action_required,
  canArchive: row.can_archive,
  syncedLabels: toStringList(row.synced_labels),
  needsClassification: row.needs_classification,
  isUnread: row.is_unread,
  ingestedAt: toIso(row.ingested_at),
});

export const mapOperationRow = (row: OperationRow): PendingOperation => ({
  id: row.id,
  accountId: row.account_id,
  messageId: row.message_id,
  kind: pickLiteral(OPERATION_KINDS, row.kind) ?? 'mark_read',
  status: pickLiteral(OPERATION_STATUSES, row.status) ?? 'failed',
  resolution: pickLiteral(OPERATION_RESOLUTIONS, row.resolution),
  attempts: Number(row.attempts),
  lastError: row.last_error,
  createdAt: toIso(row.created_at),
  completedAt: toIsoOrNull(row.completed_at),
});

/** Builds `column = $n` assignments for the fields present in `patch`, appending to `params`. */
export const messagePatchAssignments = (patch: MessagePatch, params: unknown[]): string[] => {
  const sets: string[] = [];
  const set = (column: string, value: unknown, cast = '') => {
    params.push(value);
    sets.push(`${column} = $${params.length}${cast}`);
  };

  if (patch.threadId !== undefined) set('thread_id', patch.threadId);
  if (patch.folder !== undefined) set('folder', patch.folder);
  if (patch.originalFolder !== undefined) set('original_folder', patch.originalFolder);
  if (patch.remote !== undefined) {
    set('remote_mailbox', patch.remote.mailbox);
    set('remote_uid', patch.remote.uid);
  }
  if (patch.fromAddress !== undefined) set('from_address', patch.fromAddress);
  if (patch.toAddresses !== undefined) set('to_addresses', JSON.stringify(patch.toAddresses), '::jsonb');
  if (patch.subject !== undefined) set('subject', patch.subject);
  if (patch.date !== undefined) set('date', patch.date);
  if (patch.snippet !== undefined) set('snippet', patch.snippet);
  if (patch.bodyText !== undefined) set('body_text', patch.bodyText);
  if (patch.tags !== undefined) set('tags', JSON.stringify(patch.tags), '::jsonb');
  if (patch.tagSource !== undefined) set('tag_source', patch.tagSource);
  if (patch.confidence !== undefined) set('confidence', patch.confidence);
  if (patch.priority !== undefined) set('priority', patch.priority);
  if (patch.actionRequired !== undefined) set('action_required', patch.actionRequired);
  if (patch.canArchive !== undefined) set('can_archive', patch.canArchive);
  if (patch.syncedLabels !== undefined) set('synced_labels', JSON.stringify(patch.syncedLabels), '::jsonb');
  if (patch.needsClassification !== undefined) set('needs_classification', patch.needsClassification);
  if (patch.isUnread !== undefined) set('is_unread', patch.isUnread);
  return sets;
};

const updateMessageWith = async (query: QueryFn, accountId: string, messageId: string, patch: MessagePatch) => {
  const params: unknown[] = [accountId, messageId];
  const sets = messagePatchAssignments(patch, params);
  if (sets.length === 0) {
    return;
  }
  await query(`UPDATE messages SET ${sets.join(', ')} WHERE account_id = $1 AND id = $2`, params);
};

/** Locks the row and reports whether a user mutation is still waiting on it. */
const lockWithPendingCheck = async (query: QueryFn, accountId: string, messageId: string) => {
  const locked = await query<{ folder: string }>(
    'SELECT folder FROM messages WHERE account_id = $1 AND id = $2 FOR UPDATE',
    [accountId, messageId],
  );
  const row = locked.rows[0];
  if (!row) {
    return null;
  }
  const pending = await query<{ id: string }>(
    `SELECT id FROM pending_operations
      WHERE account_id = $1 AND message_id = $2 AND status = 'pending' AND kind <> 'apply_labels'
      LIMIT 1`,
    [accountId, messageId],
  );
  return {
    folder: pickLiteral(MESSAGE_FOLDERS, row.folder) ?? 'inbox',
    hasPending: pending.rows.length > 0,
  };
};

const insertOperationWith = async (
  query: QueryFn,
  accountId: string,
  messageId: string,
  kind: OperationKind,
): Promise<PendingOperation> => {
  const result = await query<OperationRow>(
    `INSERT INTO pending_operations (id, account_id, message_id, kind, status, attempts)
     VALUES ($1, $2, $3, $4, 'pending', 0)
     RETURNING ${OPERATION_COLUMNS}`,
    [uuidv4(), accountId, messageId, kind],
  );
  const row = result.rows[0];
  if (!row) {
    throw new Error(`failed to record ${kind} for message ${messageId}`);
  }
  return mapOperationRow(row);
};

export class PgMailboxStore implements MailboxStore {
  constructor(private readonly db: SqlExecutor) {}

  async getAccount(accountId: string) {
    const result = await this.db.query<AccountRow>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE id = $1`,
      [accountId],
    );
    const row = result.rows[0];
    return row ? mapAccountRow(row) : null;
  }

  async listAccounts(status?: AccountStatus) {
    const result = status
      ? await this.db.query<AccountRow>(
        `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE status = $1 ORDER BY id`,
        [status],
      )
      : await this.db.query<AccountRow>(`SELECT ${ACCOUNT_COLUMNS} FROM accounts ORDER BY id`);
    return result.rows.map(mapAccountRow);
  }

  async setAccountStatus(accountId: string, status: AccountStatus, lastError: string | null) {
    await this.db.query(
      'UPDATE accounts SET status = $2, last_error = $3, updated_at = NOW() WHERE id = $1',
      [accountId, status, lastError],
    );
  }

  async recordSyncError(accountId: string, lastError: string) {
    await this.db.query(
      'UPDATE accounts SET last_error = $2, updated_at = NOW() WHERE id = $1',
      [accountId, lastError],
    );
  }

  async saveAccountAuth(accountId: string, authConfig: AccountAuthConfig) {
    await this.db.query(
      'UPDATE accounts SET auth_config = $2::jsonb, updated_at = NOW() WHERE id = $1',
      [accountId, JSON.stringify(authConfig)],
    );
  }

  async advanceCursor(accountId: string, cursor: string) {
    await this.db.query(
      `UPDATE accounts
          SET sync_cursor = $2, last_sync_at = NOW(), last_error = NULL, updated_at = NOW()
        WHERE id = $1`,
      [accountId, cursor],
    );
  }

  async getMessage(accountId: string, messageId: string) {
    const result = await this.db.query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM messages WHERE account_id = $1 AND id = $2`,
      [accountId, messageId],
    );
    const row = result.rows[0];
    return row ? mapMessageRow(row) : null;
  }

  async getMessages(accountId: string, messageIds: string[]) {
    if (messageIds.length === 0) {
      return [];
    }
    const result = await this.db.query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM messages WHERE account_id = $1 AND id = ANY($2::text[]) ORDER BY date DESC`,
      [accountId, messageIds],
    );
    return result.rows.map(mapMessageRow);
  }

  async insertMessage(message: Message) {
    await this.db.query(
      `INSERT INTO messages (
         id, account_id, thread_id, folder, original_folder, remote_mailbox, remote_uid,
         from_address, to_addresses, subject, date, snippet, body_text, tags, tag_source, confidence,
         priority, action_required, can_archive, synced_labels, needs_classification, is_unread, ingested_at
       ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9::jsonb,$10,$11,$12,$13,$14::jsonb,$15,$16,$17,$18,$19,$20::jsonb,$21,$22,$23)
       ON CONFLICT (account_id, id) DO NOTHING`,
      [
        message.id,
        message.accountId,
        message.threadId,
        message.folder,
        message.originalFolder,
        message.remote.mailbox,
        message.remote.uid,
        message.fromAddress,
        JSON.stringify(message.toAddresses),
        message.subject,
        message.date,
        message.snippet,
        message.bodyText,
        JSON.stringify(message.tags),
        message.tagSource,
        message.confidence,
        message.priority,
        message.actionRequired,
        message.canArchive,
        JSON.stringify(message.syncedLabels),
        message.needsClassification,
        message.isUnread,
        message.ingestedAt,
      ],
    );
  }

  async updateMessage(accountId: string, messageId: string, patch: MessagePatch) {
    await updateMessageWith(this.db.query, accountId, messageId, patch);
  }

  async removeMessage(accountId: string, messageId: string) {
    await this.db.query('DELETE FROM messages WHERE account_id = $1 AND id = $2', [accountId, messageId]);
  }

  async findMessageIdByRemote(accountId: string, location: RemoteLocation) {
    if (!location.mailbox || location.uid === null) {
      return null;
    }
    const result = await this.db.query<{ id: string }>(
      `SELECT id FROM messages
        WHERE account_id = $1 AND remote_mailbox = $2 AND remote_uid = $3
        LIMIT 1`,
      [accountId, location.mailbox, location.uid],
    );
    return result.rows[0]?.id ?? null;
  }

  async mergeRemoteMessage(accountId: string, messageId: string, remote: RemoteMessage) {
    return this.db.withTransaction(async (query): Promise<RemoteMergeOutcome> => {
      const locked = await lockWithPendingCheck(query, accountId, messageId);
      if (!locked) {
        return 'missing';
      }
      if (locked.hasPending) {
        await updateMessageWith(query, accountId, messageId, remoteContentPatch(remote));
        return 'kept_local';
      }
      await updateMessageWith(query, accountId, messageId, {
        ...remoteContentPatch(remote),
        ...remoteStatePatch(remote, locked.folder),
      });
      return 'updated';
    });
  }

  async removeRemoteMessage(accountId: string, messageId: string) {
    return this.db.withTransaction(async (query) => {
      const locked = await lockWithPendingCheck(query, accountId, messageId);
      if (!locked || locked.hasPending) {
        return false;
      }
      await query('DELETE FROM messages WHERE account_id = $1 AND id = $2', [accountId, messageId]);
      return true;
    });
  }

  async listMessagesNeedingClassification(accountId: string, limit: number) {
    const result = await this.db.query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS}
         FROM messages
        WHERE account_id = $1
          AND needs_classification
          AND tag_source IS DISTINCT FROM 'manual'
          AND folder <> 'deleting'
        ORDER BY classification_attempts ASC, ingested_at ASC
        LIMIT $2`,
      [accountId, limit],
    );
    return result.rows.map(mapMessageRow);
  }

  async applyClassification(accountId: string, messageId: string, update: ClassificationUpdate) {
    const result = await this.db.query<{ id: string }>(
      `UPDATE messages
          SET tags = $3::jsonb, confidence = $4, priority = $5, action_required = $6, can_archive = $7,
              tag_source = 'ai', needs_classification = FALSE
        WHERE account_id = $1 AND id = $2 AND tag_source IS DISTINCT FROM 'manual'
        RETURNING id`,
      [
        accountId,
        messageId,
        JSON.stringify(update.tags),
        update.confidence,
        update.priority,
        update.actionRequired,
        update.canArchive,
      ],
    );
    return result.rows.length > 0;
  }

  async recordClassificationFailure(accountId: string, messageId: string) {
    await this.db.query(
      'UPDATE messages SET classification_attempts = classification_attempts + 1 WHERE account_id = $1 AND id = $2',
      [accountId, messageId],
    );
  }

  async enqueueOperation(
    accountId: string,
    messageId: string,
    kind: OperationKind,
    patchFor: (message: Message) => MessagePatch,
  ) {
    return this.db.withTransaction(async (query) => {
      const result = await query<MessageRow>(
        `SELECT ${MESSAGE_COLUMNS} FROM messages WHERE account_id = $1 AND id = $2 FOR UPDATE`,
        [accountId, messageId],
      );
      const row = result.rows[0];
      if (!row) {
        return null;
      }
      await updateMessageWith(query, accountId, messageId, patchFor(mapMessageRow(row)));
      return insertOperationWith(query, accountId, messageId, kind);
    });
  }

  async clearTrash(accountId: string) {
    return this.db.withTransaction(async (query) => {
      const moved = await query<{ id: string }>(
        `UPDATE messages
            SET folder = 'deleting', original_folder = 'trash'
          WHERE account_id = $1 AND folder = 'trash'
          RETURNING id`,
        [accountId],
      );
      const ids = moved.rows.map((row) => row.id);
      if (ids.length === 0) {
        return { deleted: 0, queued: 0 };
      }
      const queued = await query<{ id: string }>(
        `INSERT INTO pending_operations (id, account_id, message_id, kind, status, attempts)
         SELECT ids.op_id, $1, ids.message_id, 'permanent_delete', 'pending', 0
           FROM UNNEST($2::text[], $3::text[]) AS ids(op_id, message_id)
         RETURNING id`,
        [accountId, ids.map(() => uuidv4()), ids],
      );
      return { deleted: ids.length, queued: queued.rows.length };
    });
  }

  async listPendingOperations(accountId: string, limit: number) {
    const result = await this.db.query<OperationRow>(
      `SELECT ${OPERATION_COLUMNS}
         FROM pending_operations
        WHERE account_id = $1 AND status = 'pending'
        ORDER BY seq ASC
        LIMIT $2`,
      [accountId, limit],
    );
    return result.rows.map(mapOperationRow);
  }

  async updateOperation(operationId: string, update: OperationUpdate) {
    const params: unknown[] = [operationId, update.status];
    const sets = [
      'status = $2',
      `completed_at = CASE WHEN $2 = 'completed' THEN NOW() ELSE NULL END`,
    ];
    if (update.resolution !== undefined) {
      params.push(update.resolution);
      sets.push(`resolution = $${params.length}`);
    }
    if (update.attempts !== undefined) {
      params.push(update.attempts);
      sets.push(`attempts = $${params.length}`);
    }
    if (update.lastError !== undefined) {
      params.push(update.lastError);
      sets.push(`last_error = $${params.length}`);
    }
    const result = await this.db.query<OperationRow>(
      `UPDATE pending_operations SET ${sets.join(', ')} WHERE id = $1 RETURNING ${OPERATION_COLUMNS}`,
      params,
    );
    const row = result.rows[0];
    return row ? mapOperationRow(row) : null;
  }

  async getOperation(operationId: string) {
    const result = await this.db.query<OperationRow>(
      `SELECT ${OPERATION_COLUMNS} FROM pending_operations WHERE id = $1`,
      [operationId],
    );
    const row = result.rows[0];
    return row ? mapOperationRow(row) : null;
  }

  async listOperations(accountId: string, status?: OperationStatus) {
    const result = status
      ? await this.db.query<OperationRow>(
        `SELECT ${OPERATION_COLUMNS} FROM pending_operations
          WHERE account_id = $1 AND status = $2 ORDER BY seq DESC LIMIT 500`,
        [accountId, status],
      )
      : await this.db.query<OperationRow>(
        `SELECT ${OPERATION_COLUMNS} FROM pending_operations
          WHERE account_id = $1 ORDER BY seq DESC LIMIT 500`,
        [accountId],
      );
    return result.rows.map(mapOperationRow);
  }

  async pruneCompletedOperations(accountId: string, retentionHours: number) {
    const result = await this.db.query<{ id: string }>(
      `DELETE FROM pending_operations
        WHERE account_id = $1 AND status = 'completed'
          AND completed_at < NOW() - ($2::double precision * INTERVAL '1 hour')
        RETURNING id`,
      [accountId, retentionHours],
    );
    return result.rows.length;
  }
}
