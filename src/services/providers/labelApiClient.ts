import type { AccountAuthConfig } from '../../shared/types.js';
import {
  AuthError,
  NotFoundError,
  ProviderError,
  TransientProviderError,
  isRecoverableNetworkError,
  isRetryableStatus,
  isTokenInvalidStatus,
} from '../errors.js';
import { ensureValidGoogleAccessToken, isGoogleTokenExpiringSoon } from '../googleOAuth.js';
import type { AuthRefreshListener } from './types.js';

export const LABEL_API_BASE = 'https://gmail.googleapis.com/gmail/v1/users/me';

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export type RefreshAuth = (
  authConfig: AccountAuthConfig,
  options: { forceRefresh?: boolean },
) => Promise<AccountAuthConfig>;

export interface LabelApiClientOptions {
  accountId: string;
  authConfig: AccountAuthConfig;
  timeoutMs: number;
  baseUrl?: string;
  fetchImpl?: FetchImpl;
  refreshAuth?: RefreshAuth;
  onAuthRefreshed?: AuthRefreshListener;
}

export interface LabelApiClient {
  request(path: string, init?: RequestInit): Promise<unknown>;
}

const isRateLimitBody = (text: string) => /rateLimitExceeded|userRateLimitExceeded|quota/i.test(text);

/**
 * Thin JSON client for the label-based mail API. Each call is a single
 * attempt with its own timeout; failures are mapped onto the provider error
 * taxonomy and the next sync cycle acts as the retry. The one exception is a
 * rejected access token, which gets one forced refresh before `AuthError`.
 */
export const createLabelApiClient = (options: LabelApiClientOptions): LabelApiClient => {
  const baseUrl = options.baseUrl ?? LABEL_API_BASE;
  const fetchImpl: FetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const refreshAuth = options.refreshAuth ?? ensureValidGoogleAccessToken;
  let auth = options.authConfig;

  const refresh = async (forceRefresh: boolean) => {
    const next = await refreshAuth(auth, { forceRefresh });
    if (next !== auth) {
      auth = next;
      await options.onAuthRefreshed?.(options.accountId, next);
    }
    return auth;
  };

  const send = async (path: string, init: RequestInit, accessToken: string) => {
    try {
      return await fetchImpl(`${baseUrl}${path}`, {
        ...init,
        signal: AbortSignal.timeout(options.timeoutMs),
        headers: {
          Authorization: `Bearer ${accessToken}`,
          Accept: 'application/json',
          ...(init.body ? { 'Content-Type': 'application/json' } : {}),
        },
      });
    } catch (error) {
      if (isRecoverableNetworkError(error)) {
        throw new TransientProviderError(`label API request failed: ${String(error)}`, { cause: error });
      }
      throw new ProviderError(`label API request failed: ${String(error)}`, { cause: error });
    }
  };

  const request = async (path: string, init: RequestInit = {}): Promise<unknown> => {
    if (!auth.accessToken || isGoogleTokenExpiringSoon(auth)) {
      await refresh(false);
    }

    let refreshed = false;
    for (;;) {
      const response = await send(path, init, auth.accessToken ?? '');
      if (response.ok) {
        if (response.status === 204) {
          return null;
        }
        const text = await response.text();
        if (!text) {
          return null;
        }
        try {
          return JSON.parse(text);
        } catch (error) {
          throw new TransientProviderError(`label API returned malformed JSON for ${path}`, { cause: error });
        }
      }

      const text = await response.text().catch(() => '');
      const detail = `label API ${response.status} ${response.statusText}: ${text.slice(0, 500)}`;
      if (response.status === 404) {
        throw new NotFoundError(detail);
      }
      if (response.status === 403 && isRateLimitBody(text)) {
        throw new TransientProviderError(detail);
      }
      if (isTokenInvalidStatus(response.status)) {
        if (!refreshed) {
          refreshed = true;
          await refresh(true);
          continue;
        }
        throw new AuthError(detail);
      }
      if (isRetryableStatus(response.status)) {
        throw new TransientProviderError(detail);
      }
      throw new ProviderError(detail);
    }
  };

  return { request };
};
