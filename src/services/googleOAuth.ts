import { OAuth2Client } from 'google-auth-library';
import { env } from '../config/env.js';
import type { AccountAuthConfig } from '../shared/types.js';
import { AuthError, TransientProviderError, errorMessage, isRetryableStatus } from './errors.js';
import { isRecord } from './providers/json.js';

const INVALID_GRANT_REGEX = /invalid[_\s-]grant|unauthorized|disabled|permission.?denied|rejected/i;

const getGoogleClient = (clientId?: string | null, clientSecret?: string | null): OAuth2Client => {
  return new OAuth2Client({
    clientId: clientId ?? env.googleClientId,
    clientSecret: clientSecret ?? env.googleClientSecret,
  });
};

const toTimestamp = (value?: string | null): number | undefined => {
  if (!value) {
    return undefined;
  }

  const parsed = Date.parse(value);
  if (!Number.isFinite(parsed)) {
    return undefined;
  }

  return parsed;
};

export const isGoogleTokenExpiringSoon = (authConfig: AccountAuthConfig, windowMs = 5 * 60 * 1000): boolean => {
  if (authConfig.authType !== 'oauth2' || !authConfig.tokenExpiresAt) {
    return false;
  }

  const expiry = toTimestamp(authConfig.tokenExpiresAt);
  if (!expiry) {
    return false;
  }

  return expiry - Date.now() <= windowMs;
};

/** HTTP status of a failed token request, where the client attached one. */
const refreshFailureStatus = (error: unknown): number | null => {
  if (!isRecord(error)) {
    return null;
  }
  const response = error.response;
  const status = isRecord(response) ? response.status : error.status;
  return typeof status === 'number' ? status : null;
};

const isExpired = (value?: string | null): boolean => {
  if (!value) {
    return false;
  }
  const expiry = toTimestamp(value);
  if (!expiry) {
    return true;
  }

  return expiry <= Date.now();
};

/**
 * Returns usable OAuth credentials, refreshing the access token when it is
 * missing, expired or `forceRefresh` is set. A revoked grant is an
 * `AuthError`; the user has to reconnect the account.
 */
export const ensureValidGoogleAccessToken = async (
  authConfig: AccountAuthConfig,
  options: { forceRefresh?: boolean } = {},
): Promise<AccountAuthConfig> => {
  if (authConfig.authType !== 'oauth2') {
    return authConfig;
  }

  const isTokenValid = !isExpired(authConfig.tokenExpiresAt) && !!authConfig.accessToken;
  if (!options.forceRefresh && isTokenValid) {
    return authConfig;
  }

  if (!authConfig.refreshToken) {
    throw new AuthError('OAuth refresh token is missing; user must reconnect account');
  }

  const client = getGoogleClient(authConfig.oauthClientId, authConfig.oauthClientSecret);
  client.setCredentials({
    refresh_token: authConfig.refreshToken,
    access_token: authConfig.accessToken,
    expiry_date: toTimestamp(authConfig.tokenExpiresAt),
  });

  try {
    const refresh = await client.refreshAccessToken();
    const credentials = refresh.credentials;
    if (!credentials.access_token) {
      throw new AuthError('OAuth refresh returned no access token');
    }
    return {
      ...authConfig,
      accessToken: credentials.access_token,
      refreshToken: credentials.refresh_token ?? authConfig.refreshToken,
      tokenExpiresAt: credentials.expiry_date ? new Date(credentials.expiry_date).toISOString() : null,
    };
  } catch (error) {
    if (error instanceof AuthError) {
      throw error;
    }
    if (INVALID_GRANT_REGEX.test(String(error))) {
      throw new AuthError('OAuth grant was revoked; user must reconnect account', { cause: error });
    }
    const status = refreshFailureStatus(error);
    if (status !== null && status >= 400 && status < 500 && !isRetryableStatus(status)) {
      throw new AuthError(`OAuth token refresh rejected (${status}): ${errorMessage(error)}`, { cause: error });
    }
    // Server errors, throttling and anything unclassified are retried next cycle.
    throw new TransientProviderError(`OAuth token refresh failed: ${errorMessage(error)}`, { cause: error });
  }
};
