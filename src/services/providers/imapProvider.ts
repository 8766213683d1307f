import PostalMime from 'postal-mime';
import type { Account, MessageFolder, MutationKind, RemoteMessage } from '../../shared/types.js';
import { NotFoundError, ProviderError, TransientProviderError, errorMessage } from '../errors.js';
import type { LabelChange } from '../labelSync.js';
import { normalizeMessageId, resolveThreadId } from '../threadingUtils.js';
import { isRecord, readString } from './json.js';
import type { RefreshAuth } from './labelApiClient.js';
import { openImapSession } from './imapSession.js';
import type { FetchedSource, MailboxInfo, MailboxSession } from './imapSession.js';
import type { FetchChangesResult, MessageRef, MutationResult, ProviderAdapter, ProviderAdapterOptions } from './types.js';

type SyncedFolder = Exclude<MessageFolder, 'deleting'>;

interface MailboxCursor {
  uidValidity: string;
  lastUid: number;
}

export interface ImapCursor {
  mailboxes: Record<string, MailboxCursor>;
}

type MailboxRoles = Record<SyncedFolder, string | null>;

const SNIPPET_LENGTH = 200;

export const parseImapCursor = (cursor: string | null): ImapCursor => {
  if (!cursor) {
    return { mailboxes: {} };
  }
  let raw: unknown;
  try {
    raw = JSON.parse(cursor);
  } catch {
    console.warn('[imap] ignoring unreadable sync cursor');
    return { mailboxes: {} };
  }
  const mailboxes: Record<string, MailboxCursor> = {};
  const entries = isRecord(raw) && isRecord(raw.mailboxes) ? Object.entries(raw.mailboxes) : [];
  for (const [path, value] of entries) {
    if (!isRecord(value)) continue;
    const uidValidity = readString(value, 'uidValidity');
    const lastUid = Number(value.lastUid);
    if (uidValidity && Number.isInteger(lastUid) && lastUid >= 0) {
      mailboxes[path] = { uidValidity, lastUid };
    }
  }
  return { mailboxes };
};

export const resolveMailboxRoles = (mailboxes: MailboxInfo[]): MailboxRoles => {
  const bySpecialUse = (flag: string) =>
    mailboxes.find((mailbox) => mailbox.specialUse?.toLowerCase() === flag.toLowerCase())?.path ?? null;
  const inbox = mailboxes.find((mailbox) => mailbox.path.toUpperCase() === 'INBOX')?.path ?? 'INBOX';
  return {
    inbox,
    sent: bySpecialUse('\\Sent'),
    trash: bySpecialUse('\\Trash'),
  };
};

const formatAddress = (value: unknown): string[] => {
  if (Array.isArray(value)) {
    return value.flatMap((entry) => formatAddress(entry));
  }
  if (!isRecord(value)) {
    return [];
  }
  if (Array.isArray(value.group)) {
    return formatAddress(value.group);
  }
  const name = readString(value, 'name') ?? '';
  const address = readString(value, 'address') ?? '';
  if (!address) {
    return name ? [name] : [];
  }
  return [name ? `${name} <${address}>` : address];
};

const toSnippet = (text: string | null, html: string | null) =>
  (text ?? (html ?? '').replace(/<[^>]*>/g, ' '))
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, SNIPPET_LENGTH);

export const parseFetchedSource = async (
  fetched: FetchedSource,
  folder: SyncedFolder,
  mailbox: string,
  uidValidity: string,
): Promise<RemoteMessage> => {
  const parser = new PostalMime();
  const parsed = await parser.parse(fetched.source);

  const text = parsed.text ?? null;
  const html = parsed.html ?? null;
  const headerId = normalizeMessageId(parsed.messageId);
  const parsedDate = parsed.date ? Date.parse(parsed.date) : Number.NaN;

  return {
    id: headerId ?? `${mailbox}:${uidValidity}:${fetched.uid}`,
    threadId: resolveThreadId(headerId, parsed.inReplyTo, parsed.references),
    folder,
    remote: { mailbox, uid: fetched.uid },
    fromAddress: formatAddress(parsed.from).join(', '),
    toAddresses: formatAddress(parsed.to),
    subject: parsed.subject ?? '',
    date: Number.isFinite(parsedDate)
      ? new Date(parsedDate).toISOString()
      : fetched.internalDate ?? new Date().toISOString(),
    snippet: toSnippet(text, html),
    bodyText: text ?? (html === null ? null : toSnippet(null, html)),
    isUnread: !fetched.seen,
  };
};

export interface ImapProviderOptions extends ProviderAdapterOptions {
  openSession?: () => Promise<MailboxSession>;
  refreshAuth?: RefreshAuth;
}

/**
 * IMAP mailbox adapter. One connection is opened lazily per adapter and
 * reused until `close` or until a call fails transiently, after which the
 * next call reconnects. Remote removals are not detected by UID walking, so
 * `removedIds` is always empty; deletions made elsewhere surface when a
 * mutation against the message reports it missing.
 */
export class ImapProvider implements ProviderAdapter {
  readonly kind = 'imap' as const;
  private session: MailboxSession | null = null;
  private roles: MailboxRoles | null = null;

  constructor(private readonly account: Account, private readonly options: ImapProviderOptions) {}

  fetchChanges(cursor: string | null): Promise<FetchChangesResult> {
    return this.withSession((session) => this.fetchWith(session, cursor));
  }

  applyMutation(ref: MessageRef, kind: MutationKind): Promise<MutationResult> {
    return this.withSession((session) => this.mutateWith(session, ref, kind));
  }

  /** Labels become IMAP keywords; archiving has no IMAP counterpart here. */
  applyLabels(ref: MessageRef, change: LabelChange): Promise<void> {
    return this.withSession(async (session) => {
      const uid = await this.selectMessage(session, ref);
      if (change.add.length > 0) {
        await session.addFlags(uid, change.add);
      }
      if (change.remove.length > 0) {
        await session.removeFlags(uid, change.remove);
      }
    });
  }

  private async fetchWith(session: MailboxSession, cursor: string | null): Promise<FetchChangesResult> {
    const roles = await this.getRoles();
    const previous = parseImapCursor(cursor);
    const next: ImapCursor = { mailboxes: { ...previous.mailboxes } };
    const messages: RemoteMessage[] = [];

    for (const folder of ['inbox', 'sent', 'trash'] as const) {
      const path = roles[folder];
      if (!path) continue;

      const opened = await session.open(path);
      const known = previous.mailboxes[path];
      const resume = known && known.uidValidity === opened.uidValidity ? known : null;
      if (known && !resume) {
        console.warn(`[imap] uidValidity changed for ${this.account.id}/${path}, resyncing recent messages`);
      }

      let fetched: FetchedSource[];
      if (resume) {
        fetched = (await session.fetchRange(`${resume.lastUid + 1}:*`, { uid: true }))
          .filter((message) => message.uid > resume.lastUid);
      } else if (opened.exists > 0) {
        const start = Math.max(1, opened.exists - this.options.fetchBatchSize + 1);
        fetched = await session.fetchRange(`${start}:*`, { uid: false });
      } else {
        fetched = [];
      }

      fetched.sort((left, right) => left.uid - right.uid);
      const batch = fetched.slice(0, this.options.fetchBatchSize);

      let lastUid = resume?.lastUid ?? Math.max(0, opened.uidNext - 1);
      if (!resume && batch.length > 0) {
        lastUid = 0;
      }
      for (const source of batch) {
        messages.push(await parseFetchedSource(source, folder, path, opened.uidValidity));
        lastUid = Math.max(lastUid, source.uid);
      }
      next.mailboxes[path] = { uidValidity: opened.uidValidity, lastUid };
    }

    return { messages, removedIds: [], cursor: JSON.stringify(next) };
  }

  private async selectMessage(session: MailboxSession, ref: MessageRef): Promise<number> {
    const { mailbox, uid } = ref.remote;
    if (!mailbox || uid === null) {
      throw new NotFoundError(`message ${ref.id} has no remote location`);
    }
    await session.open(mailbox);
    if (!(await session.hasUid(uid))) {
      throw new NotFoundError(`uid ${uid} no longer exists in ${mailbox}`);
    }
    return uid;
  }

  private async mutateWith(session: MailboxSession, ref: MessageRef, kind: MutationKind): Promise<MutationResult> {
    const uid = await this.selectMessage(session, ref);
    const mailbox = ref.remote.mailbox ?? '';

    switch (kind) {
      case 'mark_read':
        await session.addFlags(uid, ['\\Seen']);
        return {};
      case 'mark_unread':
        await session.removeFlags(uid, ['\\Seen']);
        return {};
      case 'trash': {
        const roles = await this.getRoles();
        if (!roles.trash) {
          throw new ProviderError(`account ${this.account.id} has no trash mailbox`);
        }
        return this.relocate(session, mailbox, uid, roles.trash);
      }
      case 'restore': {
        const roles = await this.getRoles();
        return this.relocate(session, mailbox, uid, roles.inbox ?? 'INBOX');
      }
      case 'delete':
      case 'permanent_delete':
        await session.expunge(uid);
        return {};
    }
  }

  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    this.roles = null;
    if (session) {
      await session.close();
    }
  }

  private async relocate(
    session: MailboxSession,
    mailbox: string,
    uid: number,
    destination: string,
  ): Promise<MutationResult> {
    if (mailbox === destination) {
      return {};
    }
    const newUid = await session.copy(uid, destination);
    await session.expunge(uid);
    return { relocatedTo: { mailbox: destination, uid: newUid } };
  }

  private async withSession<T>(fn: (session: MailboxSession) => Promise<T>): Promise<T> {
    try {
      return await fn(await this.getSession());
    } catch (error) {
      if (error instanceof TransientProviderError) {
        await this.discardSession();
      }
      throw error;
    }
  }

  /** A timed-out call closes the underlying connection, so it cannot be reused. */
  private async discardSession() {
    const session = this.session;
    this.session = null;
    this.roles = null;
    if (session) {
      await session.close().catch((error: unknown) => {
        console.warn(`[imap] closing failed session for ${this.account.id}: ${errorMessage(error)}`);
      });
    }
  }

  private async getSession(): Promise<MailboxSession> {
    if (!this.session) {
      this.session = this.options.openSession
        ? await this.options.openSession()
        : await openImapSession(this.account, {
          timeoutMs: this.options.timeoutMs,
          refreshAuth: this.options.refreshAuth,
          onAuthRefreshed: this.options.onAuthRefreshed,
        });
    }
    return this.session;
  }

  private async getRoles(): Promise<MailboxRoles> {
    if (!this.roles) {
      const session = await this.getSession();
      this.roles = resolveMailboxRoles(await session.listMailboxes());
    }
    return this.roles;
  }
}
