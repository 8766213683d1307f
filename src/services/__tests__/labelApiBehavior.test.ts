import assert from 'node:assert/strict';
import type { AccountAuthConfig } from '../../shared/types.js';
import { AuthError, NotFoundError, ProviderError, TransientProviderError } from '../errors.js';
import type { FetchImpl, RefreshAuth } from '../providers/labelApiClient.js';
import { LabelApiProvider, folderFromLabels, toRemoteMessage } from '../providers/labelApiProvider.js';
import { createTestRunner, makeAccount } from './support.js';

const { test, finish } = createTestRunner();

const BASE_URL = 'https://mail.test/v1';

type FetchCall = { method: string; path: string; query: URLSearchParams; authorization: string | null; body: unknown };

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const base64Url = (text: string) => Buffer.from(text, 'utf8').toString('base64url');

/** Routes each request through `handler`; unknown routes throw. */
const fakeFetch = (handler: (call: FetchCall) => Response | undefined) => {
  const calls: FetchCall[] = [];
  const fetchImpl: FetchImpl = async (input, init) => {
    const url = new URL(input);
    const call: FetchCall = {
      method: init?.method ?? 'GET',
      path: url.pathname.replace('/v1', ''),
      query: url.searchParams,
      authorization: new Headers(init?.headers).get('authorization'),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : null,
    };
    calls.push(call);
    const response = handler(call);
    if (!response) {
      throw new Error(`unexpected request ${call.method} ${call.path}`);
    }
    return response;
  };
  return { calls, fetchImpl };
};

const buildProvider = (
  fetchImpl: FetchImpl,
  extra: { refreshAuth?: RefreshAuth; refreshed?: AccountAuthConfig[] } = {},
) => new LabelApiProvider(
  makeAccount({
    authConfig: { authType: 'oauth2', accessToken: 'test-access', refreshToken: 'test-refresh', tokenExpiresAt: null },
  }),
  {
    timeoutMs: 1_000,
    fetchBatchSize: 2,
    baseUrl: BASE_URL,
    fetchImpl,
    refreshAuth: extra.refreshAuth ?? (async (auth) => auth),
    onAuthRefreshed: async (_accountId, auth) => {
      extra.refreshed?.push(auth);
    },
  },
);

const fullMessage = (id: string, labelIds: string[], extra: Record<string, unknown> = {}) => ({
  id,
  threadId: `thread-${id}`,
  labelIds,
  snippet: `snippet ${id}`,
  internalDate: '1709287200000',
  payload: { headers: [{ name: 'From', value: 'Ada <ada@example.com>' }], mimeType: 'text/plain' },
  ...extra,
});

await test('folderFromLabels maps trash, sent-only and everything else', () => {
  assert.equal(folderFromLabels(['INBOX', 'TRASH']), 'trash');
  assert.equal(folderFromLabels(['SENT']), 'sent');
  assert.equal(folderFromLabels(['SENT', 'INBOX']), 'inbox');
  assert.equal(folderFromLabels(['CATEGORY_UPDATES']), 'inbox');
});

await test('toRemoteMessage reads headers and prefers the plain text part', () => {
  const message = toRemoteMessage({
    id: 'a',
    threadId: 't1',
    labelIds: ['INBOX', 'UNREAD'],
    snippet: 'Hi',
    internalDate: '1709287200000',
    payload: {
      mimeType: 'multipart/alternative',
      headers: [
        { name: 'From', value: 'Ada <ada@example.com>' },
        { name: 'To', value: 'r@example.com, s@example.com' },
        { name: 'Subject', value: 'Plans' },
        { name: 'Date', value: 'Fri, 01 Mar 2024 11:30:00 +0000' },
      ],
      parts: [
        { mimeType: 'text/html', body: { data: base64Url('<p>HTML body</p>') } },
        { mimeType: 'text/plain', body: { data: base64Url('Plain body') } },
      ],
    },
  });
  assert.deepEqual(message, {
    id: 'a',
    threadId: 't1',
    folder: 'inbox',
    remote: { mailbox: null, uid: null },
    fromAddress: 'Ada <ada@example.com>',
    toAddresses: ['r@example.com', 's@example.com'],
    subject: 'Plans',
    date: '2024-03-01T11:30:00.000Z',
    snippet: 'Hi',
    bodyText: 'Plain body',
    isUnread: true,
  });
});

await test('toRemoteMessage strips HTML-only bodies and falls back to internalDate', () => {
  const message = toRemoteMessage({
    id: 'b',
    labelIds: ['SENT'],
    internalDate: '1709287200000',
    payload: { mimeType: 'text/html', body: { data: base64Url('<p>Hello <b>there</b></p>') } },
  });
  assert.equal(message?.bodyText, 'Hello there');
  assert.equal(message?.date, '2024-03-01T10:00:00.000Z');
  assert.equal(message?.folder, 'sent');
  assert.equal(message?.isUnread, false);
  assert.equal(toRemoteMessage({ snippet: 'no id' }), null);
});

await test('first sync lists recent messages and starts from the profile history id', async () => {
  const { calls, fetchImpl } = fakeFetch((call) => {
    if (call.path === '/profile') return json({ historyId: '100' });
    if (call.path === '/messages') return json({ messages: [{ id: 'a' }, { id: 'b' }] });
    if (call.path === '/messages/a') return json(fullMessage('a', ['INBOX', 'UNREAD']));
    if (call.path === '/messages/b') return json(fullMessage('b', ['INBOX']));
    return undefined;
  });
  const result = await buildProvider(fetchImpl).fetchChanges(null);
  assert.equal(result.cursor, '100');
  assert.deepEqual(result.messages.map((message) => message.id), ['a', 'b']);
  assert.deepEqual(result.removedIds, []);
  assert.equal(calls[1]?.query.get('maxResults'), '2');
  assert.equal(calls[1]?.query.get('q'), '-in:spam -in:draft');
  assert.equal(calls[2]?.query.get('format'), 'full');
  assert.equal(calls[0]?.authorization, 'Bearer test-access');
});

await test('incremental sync walks history pages and reports removals', async () => {
  const { fetchImpl } = fakeFetch((call) => {
    if (call.path === '/history' && !call.query.get('pageToken')) {
      return json({
        historyId: '120',
        nextPageToken: 'p2',
        history: [
          { messagesAdded: [{ message: { id: 'c' } }], labelsRemoved: [{ message: { id: 'a' } }] },
          { messagesDeleted: [{ message: { id: 'b' } }], labelsAdded: [{ message: { id: 'b' } }] },
        ],
      });
    }
    if (call.path === '/history' && call.query.get('pageToken') === 'p2') {
      assert.equal(call.query.get('startHistoryId'), '100');
      return json({ historyId: '125', history: [{ labelsAdded: [{ message: { id: 'd' } }] }] });
    }
    if (call.path === '/messages/c') return json(fullMessage('c', ['INBOX', 'UNREAD']));
    if (call.path === '/messages/a') return json(fullMessage('a', ['TRASH']));
    if (call.path === '/messages/d') return json({ error: { code: 404 } }, 404);
    return undefined;
  });
  const result = await buildProvider(fetchImpl).fetchChanges('100');
  assert.equal(result.cursor, '125');
  assert.deepEqual(result.messages.map((message) => [message.id, message.folder]), [['c', 'inbox'], ['a', 'trash']]);
  assert.deepEqual(result.removedIds, ['b', 'd']);
});

await test('an expired history cursor falls back to a recent listing', async () => {
  const { calls, fetchImpl } = fakeFetch((call) => {
    if (call.path === '/history') return json({ error: { code: 404 } }, 404);
    if (call.path === '/profile') return json({ historyId: '900' });
    if (call.path === '/messages') return json({});
    return undefined;
  });
  const result = await buildProvider(fetchImpl).fetchChanges('5');
  assert.deepEqual(result, { messages: [], removedIds: [], cursor: '900' });
  assert.deepEqual(calls.map((call) => call.path), ['/history', '/profile', '/messages']);
});

await test('mutations modify labels and deletes call DELETE', async () => {
  const { calls, fetchImpl } = fakeFetch((call) => {
    if (call.method === 'POST' && call.path === '/messages/m%2F1/modify') return json({ id: 'm/1' });
    if (call.method === 'DELETE' && call.path === '/messages/m%2F1') return new Response(null, { status: 204 });
    return undefined;
  });
  const provider = buildProvider(fetchImpl);
  const ref = { id: 'm/1', folder: 'inbox', remote: { mailbox: null, uid: null } };

  assert.deepEqual(await provider.applyMutation(ref, 'trash'), {});
  assert.deepEqual(calls[0]?.body, { addLabelIds: ['TRASH'], removeLabelIds: ['INBOX'] });
  await provider.applyMutation(ref, 'mark_read');
  assert.deepEqual(calls[1]?.body, { addLabelIds: [], removeLabelIds: ['UNREAD'] });
  await provider.applyMutation(ref, 'permanent_delete');
  assert.equal(calls[2]?.method, 'DELETE');
});

await test('classification labels are created once, then added and removed by id', async () => {
  let created = 0;
  const { calls, fetchImpl } = fakeFetch((call) => {
    if (call.method === 'GET' && call.path === '/labels') {
      return json({ labels: [{ id: 'Label_1', name: 'AI/Finance' }, { id: 'Label_2', name: 'AI/Work' }] });
    }
    if (call.method === 'POST' && call.path === '/labels') {
      created += 1;
      return json({ id: `Label_new_${created}`, name: 'AI/ToDo' });
    }
    if (call.method === 'POST' && call.path === '/messages/m1/modify') return json({ id: 'm1' });
    return undefined;
  });
  const provider = buildProvider(fetchImpl);
  const ref = { id: 'm1', folder: 'inbox', remote: { mailbox: null, uid: null } };

  await provider.applyLabels(ref, { add: ['AI/Work', 'AI/ToDo'], remove: ['AI/Finance', 'AI/Unknown'], archive: true });
  await provider.applyLabels(ref, { add: ['AI/ToDo'], remove: [], archive: false });
  await provider.applyLabels(ref, { add: [], remove: ['AI/Unknown'], archive: false });

  assert.deepEqual(calls.map((call) => `${call.method} ${call.path}`), [
    'GET /labels',
    'POST /labels',
    'POST /messages/m1/modify',
    'POST /messages/m1/modify',
  ]);
  assert.deepEqual(calls[1]?.body, { name: 'AI/ToDo', labelListVisibility: 'labelShow', messageListVisibility: 'show' });
  assert.deepEqual(calls[2]?.body, { addLabelIds: ['Label_2', 'Label_new_1'], removeLabelIds: ['Label_1', 'INBOX'] });
  assert.deepEqual(calls[3]?.body, { addLabelIds: ['Label_new_1'], removeLabelIds: [] });
});

await test('a rejected token is refreshed once before giving up', async () => {
  const refreshed: AccountAuthConfig[] = [];
  const refreshAuth: RefreshAuth = async (auth, options) => {
    assert.equal(options.forceRefresh, true);
    return { ...auth, accessToken: 'test-access-2' };
  };

  let attempt = 0;
  const recovering = fakeFetch(() => {
    attempt += 1;
    return attempt === 1 ? json({}, 401) : json({ historyId: '1' });
  });
  await buildProvider(recovering.fetchImpl, { refreshAuth, refreshed }).applyMutation(
    { id: 'a', folder: 'inbox', remote: { mailbox: null, uid: null } },
    'mark_unread',
  );
  assert.deepEqual(recovering.calls.map((call) => call.authorization), ['Bearer test-access', 'Bearer test-access-2']);
  assert.equal(refreshed.length, 1);

  const rejecting = fakeFetch(() => json({}, 401));
  await assert.rejects(buildProvider(rejecting.fetchImpl, { refreshAuth }).fetchChanges('5'), AuthError);
  assert.equal(rejecting.calls.length, 2);
});

await test('HTTP failures map onto the provider error taxonomy', async () => {
  const ref = { id: 'a', folder: 'inbox', remote: { mailbox: null, uid: null } };
  const failWith = (response: () => Response) => buildProvider(fakeFetch(response).fetchImpl).applyMutation(ref, 'trash');

  await assert.rejects(failWith(() => json({}, 429)), TransientProviderError);
  await assert.rejects(failWith(() => json({}, 503)), TransientProviderError);
  await assert.rejects(failWith(() => json({ error: { reason: 'rateLimitExceeded' } }, 403)), TransientProviderError);
  await assert.rejects(failWith(() => json({}, 404)), NotFoundError);
  await assert.rejects(failWith(() => json({}, 400)), (error: unknown) =>
    error instanceof ProviderError
    && !(error instanceof TransientProviderError)
    && !(error instanceof NotFoundError)
    && !(error instanceof AuthError));

  const offline: FetchImpl = async () => {
    throw Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
  };
  await assert.rejects(buildProvider(offline).applyMutation(ref, 'trash'), TransientProviderError);
});

finish();
