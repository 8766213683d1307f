import type { Account, MessageFolder, MutationKind, RemoteMessage } from '../../shared/types.js';
import { NotFoundError } from '../errors.js';
import type { LabelChange } from '../labelSync.js';
import { asRecord, readRecords, readString, readStrings } from './json.js';
import type { JsonRecord } from './json.js';
import { createLabelApiClient } from './labelApiClient.js';
import type { FetchImpl, LabelApiClient, RefreshAuth } from './labelApiClient.js';
import type { FetchChangesResult, MessageRef, MutationResult, ProviderAdapter, ProviderAdapterOptions } from './types.js';

const UNREAD = 'UNREAD';
const INBOX = 'INBOX';
const TRASH = 'TRASH';
const SENT = 'SENT';

const HISTORY_PAGE_SIZE = 500;

type LabelEdit = { addLabelIds: string[]; removeLabelIds: string[] };

const LABEL_EDITS: Record<Exclude<MutationKind, 'delete' | 'permanent_delete'>, LabelEdit> = {
  mark_read: { addLabelIds: [], removeLabelIds: [UNREAD] },
  mark_unread: { addLabelIds: [UNREAD], removeLabelIds: [] },
  trash: { addLabelIds: [TRASH], removeLabelIds: [INBOX] },
  restore: { addLabelIds: [INBOX], removeLabelIds: [TRASH] },
};

export const folderFromLabels = (labelIds: string[]): MessageFolder => {
  if (labelIds.includes(TRASH)) {
    return 'trash';
  }
  if (labelIds.includes(SENT) && !labelIds.includes(INBOX)) {
    return 'sent';
  }
  return 'inbox';
};

const decodeBase64Url = (value: string) =>
  Buffer.from(value.replace(/-/g, '+').replace(/_/g, '/'), 'base64').toString('utf8');

const mapHeadersByName = (payload: JsonRecord) => {
  const map = new Map<string, string>();
  for (const header of readRecords(payload, 'headers')) {
    const name = readString(header, 'name');
    const value = readString(header, 'value');
    if (name && value !== null) {
      map.set(name.toLowerCase(), value);
    }
  }
  return map;
};

const findPartBody = (part: JsonRecord, mimeType: string): string | null => {
  if (readString(part, 'mimeType') === mimeType) {
    const data = readString(asRecord(part.body), 'data');
    if (data) {
      return decodeBase64Url(data);
    }
  }
  for (const child of readRecords(part, 'parts')) {
    const found = findPartBody(child, mimeType);
    if (found !== null) {
      return found;
    }
  }
  return null;
};

const stripHtml = (html: string) => html.replace(/<[^>]*>/g, ' ').replace(/\s+/g, ' ').trim();

const extractBodyText = (payload: JsonRecord): string | null => {
  const plain = findPartBody(payload, 'text/plain');
  if (plain !== null) {
    return plain;
  }
  const html = findPartBody(payload, 'text/html');
  return html === null ? null : stripHtml(html);
};

const splitAddresses = (value: string | undefined) =>
  (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);

const toIsoDate = (headerDate: string | undefined, internalDate: string | null) => {
  const fromHeader = headerDate ? Date.parse(headerDate) : Number.NaN;
  if (Number.isFinite(fromHeader)) {
    return new Date(fromHeader).toISOString();
  }
  const fromInternal = internalDate ? Number(internalDate) : Number.NaN;
  if (Number.isFinite(fromInternal)) {
    return new Date(fromInternal).toISOString();
  }
  return new Date().toISOString();
};

export const toRemoteMessage = (raw: unknown): RemoteMessage | null => {
  const message = asRecord(raw);
  const id = readString(message, 'id');
  if (!id) {
    return null;
  }
  const labelIds = readStrings(message, 'labelIds');
  const payload = asRecord(message.payload);
  const headers = mapHeadersByName(payload);

  return {
    id,
    threadId: readString(message, 'threadId'),
    folder: folderFromLabels(labelIds),
    remote: { mailbox: null, uid: null },
    fromAddress: headers.get('from') ?? '',
    toAddresses: splitAddresses(headers.get('to')),
    subject: headers.get('subject') ?? '',
    date: toIsoDate(headers.get('date'), readString(message, 'internalDate')),
    snippet: readString(message, 'snippet') ?? '',
    bodyText: extractBodyText(payload),
    isUnread: labelIds.includes(UNREAD),
  };
};

export interface LabelApiProviderOptions extends ProviderAdapterOptions {
  fetchImpl?: FetchImpl;
  refreshAuth?: RefreshAuth;
  baseUrl?: string;
}

export class LabelApiProvider implements ProviderAdapter {
  readonly kind = 'label_api' as const;
  private readonly client: LabelApiClient;
  private labelIds: Map<string, string> | null = null;

  constructor(account: Account, private readonly options: LabelApiProviderOptions) {
    this.client = createLabelApiClient({
      accountId: account.id,
      authConfig: account.authConfig,
      timeoutMs: options.timeoutMs,
      baseUrl: options.baseUrl,
      fetchImpl: options.fetchImpl,
      refreshAuth: options.refreshAuth,
      onAuthRefreshed: options.onAuthRefreshed,
    });
  }

  async fetchChanges(cursor: string | null): Promise<FetchChangesResult> {
    if (!cursor) {
      return this.fetchRecent();
    }
    try {
      return await this.fetchHistory(cursor);
    } catch (error) {
      // The provider forgets old history ids; start over from the recent window.
      if (error instanceof NotFoundError) {
        console.warn(`[label-api] history cursor ${cursor} expired, refetching recent messages`);
        return this.fetchRecent();
      }
      throw error;
    }
  }

  async applyMutation(ref: MessageRef, kind: MutationKind): Promise<MutationResult> {
    const path = `/messages/${encodeURIComponent(ref.id)}`;
    if (kind === 'delete' || kind === 'permanent_delete') {
      await this.client.request(path, { method: 'DELETE' });
      return {};
    }
    await this.client.request(`${path}/modify`, {
      method: 'POST',
      body: JSON.stringify(LABEL_EDITS[kind]),
    });
    return {};
  }

  /** Creates missing user labels by name; removals only touch labels that exist. */
  async applyLabels(ref: MessageRef, change: LabelChange): Promise<void> {
    const labelIds = await this.loadLabelIds();
    const addLabelIds: string[] = [];
    for (const name of change.add) {
      addLabelIds.push(labelIds.get(name) ?? await this.createLabel(name));
    }
    const removeLabelIds = change.remove
      .map((name) => labelIds.get(name))
      .filter((id): id is string => Boolean(id));
    if (change.archive) {
      removeLabelIds.push(INBOX);
    }
    if (addLabelIds.length === 0 && removeLabelIds.length === 0) {
      return;
    }
    await this.client.request(`/messages/${encodeURIComponent(ref.id)}/modify`, {
      method: 'POST',
      body: JSON.stringify({ addLabelIds, removeLabelIds }),
    });
  }

  private async loadLabelIds(): Promise<Map<string, string>> {
    if (!this.labelIds) {
      const listing = asRecord(await this.client.request('/labels'));
      const labelIds = new Map<string, string>();
      for (const label of readRecords(listing, 'labels')) {
        const id = readString(label, 'id');
        const name = readString(label, 'name');
        if (id && name) labelIds.set(name, id);
      }
      this.labelIds = labelIds;
    }
    return this.labelIds;
  }

  private async createLabel(name: string): Promise<string> {
    const created = asRecord(await this.client.request('/labels', {
      method: 'POST',
      body: JSON.stringify({ name, labelListVisibility: 'labelShow', messageListVisibility: 'show' }),
    }));
    const id = readString(created, 'id');
    if (!id) {
      throw new Error(`label API did not return an id for label ${name}`);
    }
    this.labelIds?.set(name, id);
    return id;
  }

  private async fetchRecent(): Promise<FetchChangesResult> {
    const profile = asRecord(await this.client.request('/profile'));
    const historyId = readString(profile, 'historyId');
    if (!historyId) {
      throw new Error('label API profile did not include a historyId');
    }

    const query = new URLSearchParams();
    query.set('maxResults', String(this.options.fetchBatchSize));
    query.set('q', '-in:spam -in:draft');
    const listing = asRecord(await this.client.request(`/messages?${query.toString()}`));
    const ids = readRecords(listing, 'messages')
      .map((entry) => readString(entry, 'id'))
      .filter((id): id is string => Boolean(id));

    const { messages } = await this.fetchMessages(ids);
    return { messages, removedIds: [], cursor: historyId };
  }

  private async fetchHistory(startHistoryId: string): Promise<FetchChangesResult> {
    const changed = new Set<string>();
    const removed = new Set<string>();
    let latestHistoryId = startHistoryId;
    let pageToken: string | null = null;

    do {
      const query = new URLSearchParams();
      query.set('startHistoryId', startHistoryId);
      query.set('maxResults', String(HISTORY_PAGE_SIZE));
      if (pageToken) query.set('pageToken', pageToken);
      const payload = asRecord(await this.client.request(`/history?${query.toString()}`));
      latestHistoryId = readString(payload, 'historyId') ?? latestHistoryId;

      for (const record of readRecords(payload, 'history')) {
        for (const message of readRecords(record, 'messages')) {
          const id = readString(message, 'id');
          if (id) changed.add(id);
        }
        for (const key of ['messagesAdded', 'labelsAdded', 'labelsRemoved']) {
          for (const item of readRecords(record, key)) {
            const id = readString(asRecord(item.message), 'id');
            if (id) changed.add(id);
          }
        }
        for (const item of readRecords(record, 'messagesDeleted')) {
          const id = readString(asRecord(item.message), 'id');
          if (id) removed.add(id);
        }
      }

      pageToken = readString(payload, 'nextPageToken');
    } while (pageToken);

    for (const id of removed) {
      changed.delete(id);
    }

    const { messages, missing } = await this.fetchMessages(Array.from(changed));
    for (const id of missing) {
      removed.add(id);
    }

    return { messages, removedIds: Array.from(removed), cursor: latestHistoryId };
  }

  private async fetchMessages(ids: string[]) {
    const messages: RemoteMessage[] = [];
    const missing: string[] = [];
    for (const id of ids) {
      try {
        const raw = await this.client.request(`/messages/${encodeURIComponent(id)}?format=full`);
        const message = toRemoteMessage(raw);
        if (message) {
          messages.push(message);
        }
      } catch (error) {
        if (error instanceof NotFoundError) {
          missing.push(id);
          continue;
        }
        throw error;
      }
    }
    return { messages, missing };
  }
}
