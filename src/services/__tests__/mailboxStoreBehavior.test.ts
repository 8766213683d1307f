import assert from 'node:assert/strict';
import { MutationRequestError } from '../errors.js';
import { PgMailboxStore, mapAccountRow, mapMessageRow, mapOperationRow, messagePatchAssignments } from '../mailboxStore.js';
import { createScriptedExecutor, createTestRunner, makeRemoteMessage } from './support.js';

const { test, finish } = createTestRunner();

type MessageRow = Parameters<typeof mapMessageRow>[0];
type OperationRow = Parameters<typeof mapOperationRow>[0];

const messageRow = (overrides: Partial<MessageRow> = {}): MessageRow => ({
  id: 'msg-1',
  account_id: 'acct-1',
  thread_id: null,
  folder: 'inbox',
  original_folder: null,
  remote_mailbox: 'INBOX',
  remote_uid: '7',
  from_address: 'Ada <ada@example.com>',
  to_addresses: ['reader@example.com'],
  subject: 'Hello',
  date: new Date('2024-03-01T10:00:00.000Z'),
  snippet: 'Hello there',
  body_text: null,
  tags: ['work'],
  tag_source: 'ai',
  confidence: 0.9,
  priority: 'normal',
  action_required: false,
  can_archive: false,
  synced_labels: [],
  needs_classification: false,
  is_unread: true,
  ingested_at: '2024-03-01T10:05:00.000Z',
  ...overrides,
});

const operationRow = (overrides: Partial<OperationRow> = {}): OperationRow => ({
  id: 'op-1',
  account_id: 'acct-1',
  message_id: 'msg-1',
  kind: 'mark_read',
  status: 'pending',
  resolution: null,
  attempts: 0,
  last_error: null,
  created_at: new Date('2024-03-01T11:00:00.000Z'),
  completed_at: null,
  ...overrides,
});

await test('mapMessageRow normalizes timestamps, uids and unknown literals', () => {
  const message = mapMessageRow(messageRow({ folder: 'archive', tag_source: 'other' }));
  assert.equal(message.folder, 'inbox');
  assert.equal(message.tagSource, null);
  assert.deepEqual(message.remote, { mailbox: 'INBOX', uid: 7 });
  assert.equal(message.date, '2024-03-01T10:00:00.000Z');
  assert.equal(message.ingestedAt, '2024-03-01T10:05:00.000Z');
  assert.deepEqual(message.tags, ['work']);
});

await test('mapMessageRow reads classification hints and synced labels', () => {
  const message = mapMessageRow(messageRow({
    priority: 'urgent',
    action_required: true,
    can_archive: true,
    synced_labels: ['AI/Work', 3],
  }));
  assert.equal(message.priority, null);
  assert.equal(message.actionRequired, true);
  assert.equal(message.canArchive, true);
  assert.deepEqual(message.syncedLabels, ['AI/Work']);
});

await test('mapAccountRow reads auth config and IMAP settings', () => {
  const account = mapAccountRow({
    id: 'acct-2',
    email: 'reader@example.com',
    display_name: null,
    provider: 'imap',
    status: 'paused',
    auth_config: { authType: 'password', password: 'test-secret', extra: true },
    imap_host: 'imap.example.com',
    imap_port: null,
    imap_tls: null,
    sync_cursor: null,
    last_sync_at: null,
    last_error: null,
  });
  assert.equal(account.status, 'disabled');
  assert.deepEqual(account.imap, { host: 'imap.example.com', port: 993, tls: true });
  assert.equal(account.authConfig.authType, 'password');
  assert.equal(account.authConfig.password, 'test-secret');
  assert.equal(account.authConfig.accessToken, null);
});

await test('messagePatchAssignments numbers placeholders after existing params', () => {
  const params: unknown[] = ['acct-1', 'msg-1'];
  const sets = messagePatchAssignments(
    { folder: 'trash', originalFolder: 'inbox', remote: { mailbox: 'Trash', uid: 4 }, tags: ['junk'] },
    params,
  );
  assert.deepEqual(sets, [
    'folder = $3',
    'original_folder = $4',
    'remote_mailbox = $5',
    'remote_uid = $6',
    'tags = $7::jsonb',
  ]);
  assert.deepEqual(params, ['acct-1', 'msg-1', 'trash', 'inbox', 'Trash', 4, '["junk"]']);
});

await test('enqueueOperation locks the row, patches it and records the operation in one transaction', async () => {
  const { executor, calls } = createScriptedExecutor((call) => {
    if (call.text.includes('FOR UPDATE')) return [messageRow()];
    if (call.text.includes('INSERT INTO pending_operations')) return [operationRow()];
    return undefined;
  });
  const store = new PgMailboxStore(executor);

  const operation = await store.enqueueOperation('acct-1', 'msg-1', 'mark_read', (message) => {
    assert.equal(message.isUnread, true);
    return { isUnread: false };
  });
  assert.equal(operation?.id, 'op-1');
  assert.equal(operation?.createdAt, '2024-03-01T11:00:00.000Z');
  assert.deepEqual(calls.map((call) => call.text.split(/\s+/)[0]), ['BEGIN', 'SELECT', 'UPDATE', 'INSERT', 'COMMIT']);
  assert.deepEqual(calls[2]?.params, ['acct-1', 'msg-1', false]);
  assert.deepEqual(calls[3]?.params.slice(1), ['acct-1', 'msg-1', 'mark_read']);
});

await test('enqueueOperation rolls back when the patch is refused and returns null for unknown messages', async () => {
  const refusing = createScriptedExecutor((call) => (call.text.includes('FOR UPDATE') ? [messageRow()] : undefined));
  await assert.rejects(
    new PgMailboxStore(refusing.executor).enqueueOperation('acct-1', 'msg-1', 'restore', () => {
      throw new MutationRequestError(409, 'message msg-1 is not in trash');
    }),
    MutationRequestError,
  );
  assert.deepEqual(refusing.calls.map((call) => call.text.split(/\s+/)[0]), ['BEGIN', 'SELECT', 'ROLLBACK']);

  const empty = createScriptedExecutor(() => []);
  assert.equal(await new PgMailboxStore(empty.executor).enqueueOperation('acct-1', 'nope', 'trash', () => ({})), null);
  assert.equal(empty.calls.at(-1)?.text, 'COMMIT');
});

await test('clearTrash queues one permanent delete per trashed message', async () => {
  const { executor, calls } = createScriptedExecutor((call) => {
    if (call.text.includes('UPDATE messages')) return [{ id: 't1' }, { id: 't2' }];
    if (call.text.includes('INSERT INTO pending_operations')) return [{ id: 'op-a' }, { id: 'op-b' }];
    return undefined;
  });
  const result = await new PgMailboxStore(executor).clearTrash('acct-1');
  assert.deepEqual(result, { deleted: 2, queued: 2 });
  const insert = calls.find((call) => call.text.includes('UNNEST'));
  assert.deepEqual(insert?.params[2], ['t1', 't2']);
  assert.ok(Array.isArray(insert?.params[1]));
});

await test('clearTrash with an empty trash inserts nothing', async () => {
  const { executor, calls } = createScriptedExecutor(() => []);
  assert.deepEqual(await new PgMailboxStore(executor).clearTrash('acct-1'), { deleted: 0, queued: 0 });
  assert.equal(calls.some((call) => call.text.includes('INSERT')), false);
});

await test('updateOperation only sets the fields it is given', async () => {
  const { executor, calls } = createScriptedExecutor(() => [
    operationRow({ status: 'failed', attempts: 3, last_error: 'boom' }),
  ]);
  const updated = await new PgMailboxStore(executor).updateOperation('op-1', {
    status: 'failed',
    attempts: 3,
    lastError: 'boom',
  });
  assert.equal(updated?.status, 'failed');
  assert.equal(updated?.attempts, 3);
  assert.deepEqual(calls[0]?.params, ['op-1', 'failed', 3, 'boom']);
  assert.ok(calls[0]?.text.includes('attempts = $3, last_error = $4'));
  assert.equal(calls[0]?.text.includes('resolution ='), false);
});

await test('listPendingOperations reads in queue order', async () => {
  const { executor, calls } = createScriptedExecutor(() => [operationRow(), operationRow({ id: 'op-2', kind: 'trash' })]);
  const operations = await new PgMailboxStore(executor).listPendingOperations('acct-1', 25);
  assert.deepEqual(operations.map((operation) => operation.kind), ['mark_read', 'trash']);
  assert.ok(calls[0]?.text.includes('ORDER BY seq ASC'));
  assert.deepEqual(calls[0]?.params, ['acct-1', 25]);
});

await test('mergeRemoteMessage only refreshes content while a mutation is pending on the locked row', async () => {
  const { executor, calls } = createScriptedExecutor((call) => {
    if (call.text.includes('FOR UPDATE')) return [{ folder: 'trash' }];
    if (call.text.includes('FROM pending_operations')) return [{ id: 'op-1' }];
    return undefined;
  });
  const outcome = await new PgMailboxStore(executor).mergeRemoteMessage(
    'acct-1',
    'msg-1',
    makeRemoteMessage({ folder: 'inbox', isUnread: false }),
  );
  assert.equal(outcome, 'kept_local');
  assert.deepEqual(calls.map((call) => call.text.split(/\s+/)[0]), ['BEGIN', 'SELECT', 'SELECT', 'UPDATE', 'COMMIT']);
  assert.ok(calls[2]?.text.includes("kind <> 'apply_labels'"));
  assert.equal(calls[3]?.text.includes('is_unread'), false);
  assert.equal(calls[3]?.text.includes('folder'), false);
});

await test('mergeRemoteMessage applies remote state and remembers the folder it left', async () => {
  const { executor, calls } = createScriptedExecutor((call) =>
    (call.text.includes('FOR UPDATE') ? [{ folder: 'inbox' }] : undefined));
  const outcome = await new PgMailboxStore(executor).mergeRemoteMessage(
    'acct-1',
    'msg-1',
    makeRemoteMessage({ folder: 'trash', remote: { mailbox: 'Trash', uid: 4 }, isUnread: false }),
  );
  assert.equal(outcome, 'updated');
  const update = calls[3];
  assert.ok(update?.text.includes('original_folder = $5'));
  assert.deepEqual(update?.params.slice(2, 7), [null, 'trash', 'inbox', 'Trash', 4]);
  assert.equal(update?.params.at(-1), false);
});

await test('mergeRemoteMessage reports unknown rows as missing', async () => {
  const { executor, calls } = createScriptedExecutor(() => []);
  assert.equal(await new PgMailboxStore(executor).mergeRemoteMessage('acct-1', 'nope', makeRemoteMessage()), 'missing');
  assert.deepEqual(calls.map((call) => call.text.split(/\s+/)[0]), ['BEGIN', 'SELECT', 'COMMIT']);
});

await test('removeRemoteMessage keeps rows that still have pending work', async () => {
  const pending = createScriptedExecutor((call) => {
    if (call.text.includes('FOR UPDATE')) return [{ folder: 'inbox' }];
    if (call.text.includes('FROM pending_operations')) return [{ id: 'op-1' }];
    return undefined;
  });
  assert.equal(await new PgMailboxStore(pending.executor).removeRemoteMessage('acct-1', 'msg-1'), false);
  assert.equal(pending.calls.some((call) => call.text.startsWith('DELETE')), false);

  const idle = createScriptedExecutor((call) => (call.text.includes('FOR UPDATE') ? [{ folder: 'inbox' }] : undefined));
  assert.equal(await new PgMailboxStore(idle.executor).removeRemoteMessage('acct-1', 'msg-1'), true);
  assert.deepEqual(idle.calls.find((call) => call.text.startsWith('DELETE'))?.params, ['acct-1', 'msg-1']);
});

await test('findMessageIdByRemote needs a full location', async () => {
  const { executor, calls } = createScriptedExecutor(() => [{ id: 'INBOX:11:7' }]);
  const store = new PgMailboxStore(executor);
  assert.equal(await store.findMessageIdByRemote('acct-1', { mailbox: null, uid: 4 }), null);
  assert.equal(calls.length, 0);
  assert.equal(await store.findMessageIdByRemote('acct-1', { mailbox: 'Trash', uid: 4 }), 'INBOX:11:7');
  assert.deepEqual(calls[0]?.params, ['acct-1', 'Trash', 4]);
});

await test('classification candidates come least-attempted first and failures are counted', async () => {
  const { executor, calls } = createScriptedExecutor(() => []);
  const store = new PgMailboxStore(executor);
  await store.listMessagesNeedingClassification('acct-1', 5);
  await store.recordClassificationFailure('acct-1', 'msg-1');
  assert.ok(calls[0]?.text.includes('ORDER BY classification_attempts ASC, ingested_at ASC'));
  assert.deepEqual(calls[0]?.params, ['acct-1', 5]);
  assert.ok(calls[1]?.text.includes('classification_attempts = classification_attempts + 1'));
  assert.deepEqual(calls[1]?.params, ['acct-1', 'msg-1']);
});

await test('applyClassification writes the hints alongside the tags', async () => {
  const { executor, calls } = createScriptedExecutor(() => [{ id: 'msg-1' }]);
  const applied = await new PgMailboxStore(executor).applyClassification('acct-1', 'msg-1', {
    tags: ['work'],
    confidence: 0.7,
    priority: 'high',
    actionRequired: true,
    canArchive: false,
  });
  assert.equal(applied, true);
  assert.deepEqual(calls[0]?.params, ['acct-1', 'msg-1', '["work"]', 0.7, 'high', true, false]);
});

await test('pruneCompletedOperations deletes past the window and counts the rows', async () => {
  const { executor, calls } = createScriptedExecutor(() => [{ id: 'op-1' }, { id: 'op-2' }]);
  assert.equal(await new PgMailboxStore(executor).pruneCompletedOperations('acct-1', 24), 2);
  assert.ok(calls[0]?.text.includes("status = 'completed'"));
  assert.deepEqual(calls[0]?.params, ['acct-1', 24]);
});

finish();
