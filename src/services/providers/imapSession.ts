import { ImapFlow } from 'imapflow';
import type { Account } from '../../shared/types.js';
import {
  AuthError,
  NotFoundError,
  ProviderError,
  TransientProviderError,
  errorMessage,
  isRecoverableNetworkError,
  runWithTimeout,
} from '../errors.js';
import { ensureValidGoogleAccessToken } from '../googleOAuth.js';
import type { RefreshAuth } from './labelApiClient.js';
import type { AuthRefreshListener } from './types.js';

export interface MailboxInfo {
  path: string;
  specialUse: string | null;
}

export interface OpenedMailbox {
  path: string;
  uidValidity: string;
  uidNext: number;
  exists: number;
}

export interface FetchedSource {
  uid: number;
  seen: boolean;
  internalDate: string | null;
  source: Buffer;
}

/**
 * The slice of an IMAP connection the provider needs. Every UID argument
 * refers to the mailbox selected by the most recent `open`.
 */
export interface MailboxSession {
  listMailboxes(): Promise<MailboxInfo[]>;
  open(path: string): Promise<OpenedMailbox>;
  fetchRange(range: string, options: { uid: boolean }): Promise<FetchedSource[]>;
  hasUid(uid: number): Promise<boolean>;
  addFlags(uid: number, flags: string[]): Promise<void>;
  removeFlags(uid: number, flags: string[]): Promise<void>;
  /** Copies into `destination`; resolves to the new UID when the server reports one. */
  copy(uid: number, destination: string): Promise<number | null>;
  /** Marks `\Deleted` and expunges. */
  expunge(uid: number): Promise<void>;
  close(): Promise<void>;
}

export interface ImapSessionOptions {
  timeoutMs: number;
  refreshAuth?: RefreshAuth;
  onAuthRefreshed?: AuthRefreshListener;
}

const MISSING_MAILBOX_PATTERN = /nonexistent|doesn't exist|does not exist|unknown mailbox|not found/i;

const isAuthenticationFailure = (error: unknown) =>
  typeof error === 'object'
  && error !== null
  && 'authenticationFailed' in error
  && error.authenticationFailed === true;

export const mapImapError = (label: string, error: unknown): ProviderError => {
  if (error instanceof ProviderError) {
    return error;
  }
  const detail = `${label}: ${errorMessage(error)}`;
  if (isAuthenticationFailure(error)) {
    return new AuthError(detail, { cause: error });
  }
  if (isRecoverableNetworkError(error)) {
    return new TransientProviderError(detail, { cause: error });
  }
  if (MISSING_MAILBOX_PATTERN.test(errorMessage(error))) {
    return new NotFoundError(detail, { cause: error });
  }
  return new ProviderError(detail, { cause: error });
};

const resolveImapAuth = async (account: Account, options: ImapSessionOptions) => {
  const authConfig = account.authConfig;
  if (authConfig.authType === 'oauth2') {
    const refreshAuth = options.refreshAuth ?? ensureValidGoogleAccessToken;
    const next = await refreshAuth(authConfig, {});
    if (next !== authConfig) {
      await options.onAuthRefreshed?.(account.id, next);
    }
    if (!next.accessToken) {
      throw new AuthError(`no access token available for ${account.email}`);
    }
    return { user: account.email, accessToken: next.accessToken };
  }
  if (!authConfig.password) {
    throw new AuthError(`no password configured for ${account.email}`);
  }
  return { user: account.email, pass: authConfig.password };
};

/** Connects an `imapflow` client for the account and wraps it as a `MailboxSession`. */
export const openImapSession = async (account: Account, options: ImapSessionOptions): Promise<MailboxSession> => {
  if (!account.imap) {
    throw new ProviderError(`account ${account.id} has no IMAP settings`);
  }

  const client = new ImapFlow({
    host: account.imap.host,
    port: account.imap.port,
    secure: account.imap.tls,
    auth: await resolveImapAuth(account, options),
    logger: false,
  });
  client.on('error', (error: unknown) => {
    console.warn(`[imap] connection error for ${account.id}: ${errorMessage(error)}`);
  });

  const run = async <T>(label: string, fn: () => Promise<T>): Promise<T> => {
    try {
      return await runWithTimeout(label, options.timeoutMs, fn, () => client.close());
    } catch (error) {
      throw mapImapError(label, error);
    }
  };

  await run('imap connect', () => client.connect());

  return {
    listMailboxes: () =>
      run('imap list', async () => {
        const mailboxes = await client.list();
        return mailboxes.map((mailbox) => ({
          path: mailbox.path,
          specialUse: mailbox.specialUse ? String(mailbox.specialUse) : null,
        }));
      }),
    open: (path) =>
      run(`imap open ${path}`, async () => {
        const opened = await client.mailboxOpen(path);
        return {
          path: opened.path,
          uidValidity: String(opened.uidValidity),
          uidNext: Number(opened.uidNext ?? 0),
          exists: Number(opened.exists ?? 0),
        };
      }),
    fetchRange: (range, fetchOptions) =>
      run(`imap fetch ${range}`, async () => {
        const fetched: FetchedSource[] = [];
        for await (const message of client.fetch(
          range,
          { uid: true, flags: true, internalDate: true, source: true },
          { uid: fetchOptions.uid },
        )) {
          if (!message.source) {
            continue;
          }
          fetched.push({
            uid: message.uid,
            seen: Boolean(message.flags?.has('\\Seen')),
            internalDate: message.internalDate ? new Date(message.internalDate).toISOString() : null,
            source: message.source,
          });
        }
        return fetched;
      }),
    hasUid: (uid) =>
      run(`imap search uid ${uid}`, async () => {
        const found = await client.search({ uid: String(uid) }, { uid: true });
        return Array.isArray(found) && found.includes(uid);
      }),
    addFlags: (uid, flags) =>
      run(`imap flag ${uid}`, async () => {
        await client.messageFlagsAdd(String(uid), flags, { uid: true });
      }),
    removeFlags: (uid, flags) =>
      run(`imap unflag ${uid}`, async () => {
        await client.messageFlagsRemove(String(uid), flags, { uid: true });
      }),
    copy: (uid, destination) =>
      run(`imap copy ${uid}`, async () => {
        const result = await client.messageCopy(String(uid), destination, { uid: true });
        if (!result || !result.uidMap) {
          return null;
        }
        return result.uidMap.get(uid) ?? null;
      }),
    expunge: (uid) =>
      run(`imap delete ${uid}`, async () => {
        await client.messageDelete(String(uid), { uid: true });
      }),
    close: async () => {
      try {
        await runWithTimeout('imap logout', options.timeoutMs, () => client.logout());
      } catch (error) {
        console.warn(`[imap] logout failed for ${account.id}: ${errorMessage(error)}`);
        client.close();
      }
    },
  };
};
