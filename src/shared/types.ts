export type ProviderKind = 'label_api' | 'imap';

export const PROVIDER_KINDS: readonly ProviderKind[] = ['label_api', 'imap'];

export type AccountStatus = 'active' | 'auth_error' | 'disabled';

export const ACCOUNT_STATUSES: readonly AccountStatus[] = ['active', 'auth_error', 'disabled'];

export type MessageFolder = 'inbox' | 'sent' | 'trash' | 'deleting';

export const MESSAGE_FOLDERS: readonly MessageFolder[] = ['inbox', 'sent', 'trash', 'deleting'];

export type TagSource = 'ai' | 'manual';

export const TAG_SOURCES: readonly TagSource[] = ['ai', 'manual'];

export type MessagePriority = 'high' | 'normal';

export const MESSAGE_PRIORITIES: readonly MessagePriority[] = ['high', 'normal'];

/** Mutations a user can request against a message. */
export type MutationKind =
  | 'mark_read'
  | 'mark_unread'
  | 'trash'
  | 'restore'
  | 'delete'
  | 'permanent_delete';

export const MUTATION_KINDS: readonly MutationKind[] = [
  'mark_read',
  'mark_unread',
  'trash',
  'restore',
  'delete',
  'permanent_delete',
];

/** `apply_labels` is queued by classification to push tags back as provider labels. */
export type OperationKind = MutationKind | 'apply_labels';

export const OPERATION_KINDS: readonly OperationKind[] = [...MUTATION_KINDS, 'apply_labels'];

export type OperationStatus = 'pending' | 'completed' | 'failed';

export const OPERATION_STATUSES: readonly OperationStatus[] = ['pending', 'completed', 'failed'];

export type OperationResolution = 'applied' | 'cancelled' | 'superseded' | 'already_absent';

export const OPERATION_RESOLUTIONS: readonly OperationResolution[] = [
  'applied',
  'cancelled',
  'superseded',
  'already_absent',
];

/** Narrows an untrusted string (database row, request body) onto a literal union. */
export const pickLiteral = <T extends string>(allowed: readonly T[], value: unknown): T | null =>
  allowed.find((entry) => entry === value) ?? null;

export interface AccountAuthConfig {
  authType: 'oauth2' | 'password';
  accessToken?: string | null;
  refreshToken?: string | null;
  tokenExpiresAt?: string | null;
  oauthClientId?: string | null;
  oauthClientSecret?: string | null;
  password?: string | null;
}

export interface ImapSettings {
  host: string;
  port: number;
  tls: boolean;
}

export interface Account {
  id: string;
  email: string;
  displayName: string | null;
  provider: ProviderKind;
  status: AccountStatus;
  authConfig: AccountAuthConfig;
  imap: ImapSettings | null;
  syncCursor: string | null;
  lastSyncAt: string | null;
  lastError: string | null;
}

/** Where a message currently lives on the remote side. */
export interface RemoteLocation {
  mailbox: string | null;
  uid: number | null;
}

export interface Message {
  id: string;
  accountId: string;
  threadId: string | null;
  folder: MessageFolder;
  originalFolder: MessageFolder | null;
  remote: RemoteLocation;
  fromAddress: string;
  toAddresses: string[];
  subject: string;
  date: string;
  snippet: string;
  bodyText: string | null;
  tags: string[];
  tagSource: TagSource | null;
  confidence: number | null;
  priority: MessagePriority | null;
  actionRequired: boolean;
  canArchive: boolean;
  /** Classification labels last written to the provider. */
  syncedLabels: string[];
  needsClassification: boolean;
  isUnread: boolean;
  ingestedAt: string;
}

/** Message as reported by a provider, before it is merged into the local cache. */
export interface RemoteMessage {
  id: string;
  threadId: string | null;
  folder: MessageFolder;
  remote: RemoteLocation;
  fromAddress: string;
  toAddresses: string[];
  subject: string;
  date: string;
  snippet: string;
  bodyText: string | null;
  isUnread: boolean;
}

export interface PendingOperation {
  id: string;
  accountId: string;
  messageId: string;
  kind: OperationKind;
  status: OperationStatus;
  resolution: OperationResolution | null;
  attempts: number;
  lastError: string | null;
  createdAt: string;
  completedAt: string | null;
}

/** Fields a merge, mutation or classification may change on a cached message. */
export type MessagePatch = Partial<Omit<Message, 'id' | 'accountId' | 'ingestedAt'>>;

export interface PushSubscriptionRecord {
  endpoint: string;
  p256dh: string;
  auth: string;
  userAgent: string | null;
}

export interface PushPayload {
  title: string;
  body: string;
  url: string;
  tag: string;
}
