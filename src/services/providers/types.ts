import type { Account, AccountAuthConfig, MutationKind, RemoteLocation, RemoteMessage } from '../../shared/types.js';
import type { LabelChange } from '../labelSync.js';

export interface MessageRef {
  id: string;
  folder: string;
  remote: RemoteLocation;
}

export interface FetchChangesResult {
  messages: RemoteMessage[];
  /** Provider ids the remote side reports as gone since the cursor. */
  removedIds: string[];
  cursor: string;
}

export interface MutationResult {
  relocatedTo?: RemoteLocation;
}

/**
 * Capability surface shared by every provider variant. Implementations only
 * touch the remote mailbox; the local cache is the caller's business.
 *
 * Failures are reported as `TransientProviderError`, `AuthError` or
 * `NotFoundError` from `../errors.js`.
 */
export interface ProviderAdapter {
  readonly kind: Account['provider'];
  fetchChanges(cursor: string | null): Promise<FetchChangesResult>;
  applyMutation(ref: MessageRef, kind: MutationKind): Promise<MutationResult>;
  /** Writes classification labels; same error taxonomy as `applyMutation`. */
  applyLabels(ref: MessageRef, change: LabelChange): Promise<void>;
  close?(): Promise<void>;
}

export type AuthRefreshListener = (accountId: string, authConfig: AccountAuthConfig) => Promise<void>;

export interface ProviderAdapterOptions {
  timeoutMs: number;
  fetchBatchSize: number;
  onAuthRefreshed?: AuthRefreshListener;
}
