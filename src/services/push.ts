import webPush from 'web-push';
import { env } from '../config/env.js';
import type { SqlExecutor } from '../db/pool.js';
import type { PushPayload, PushSubscriptionRecord } from '../shared/types.js';
import { MutationRequestError, errorMessage } from './errors.js';

export type PushDeliveryResult = 'delivered' | 'gone' | 'failed';

export interface PushRelay {
  send(subscription: PushSubscriptionRecord, payload: PushPayload): Promise<PushDeliveryResult>;
}

export interface PushSubscriptionStore {
  list(): Promise<PushSubscriptionRecord[]>;
  upsert(subscription: PushSubscriptionRecord): Promise<void>;
  remove(endpoint: string): Promise<boolean>;
  touch(endpoint: string): Promise<void>;
}

export class PgPushSubscriptionStore implements PushSubscriptionStore {
  constructor(private readonly db: SqlExecutor) {}

  async list() {
    const result = await this.db.query<{ endpoint: string; p256dh: string; auth: string; user_agent: string | null }>(
      'SELECT endpoint, p256dh, auth, user_agent FROM push_subscriptions ORDER BY created_at ASC',
    );
    return result.rows.map((row) => ({
      endpoint: row.endpoint,
      p256dh: row.p256dh,
      auth: row.auth,
      userAgent: row.user_agent,
    }));
  }

  async upsert(subscription: PushSubscriptionRecord) {
    await this.db.query(
      `INSERT INTO push_subscriptions (endpoint, p256dh, auth, user_agent)
       VALUES ($1,$2,$3,$4)
       ON CONFLICT (endpoint)
       DO UPDATE SET p256dh = EXCLUDED.p256dh, auth = EXCLUDED.auth, user_agent = EXCLUDED.user_agent`,
      [subscription.endpoint, subscription.p256dh, subscription.auth, subscription.userAgent],
    );
  }

  async remove(endpoint: string) {
    const result = await this.db.query<{ endpoint: string }>(
      'DELETE FROM push_subscriptions WHERE endpoint = $1 RETURNING endpoint',
      [endpoint],
    );
    return result.rows.length > 0;
  }

  async touch(endpoint: string) {
    await this.db.query('UPDATE push_subscriptions SET last_used_at = NOW() WHERE endpoint = $1', [endpoint]);
  }
}

const statusCodeOf = (error: unknown) =>
  typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number'
    ? error.statusCode
    : null;

/** Web Push delivery through the `web-push` library with VAPID credentials. */
export class WebPushRelay implements PushRelay {
  constructor(private readonly ttlSeconds: number) {}

  async send(subscription: PushSubscriptionRecord, payload: PushPayload): Promise<PushDeliveryResult> {
    try {
      await webPush.sendNotification(
        {
          endpoint: subscription.endpoint,
          keys: { p256dh: subscription.p256dh, auth: subscription.auth },
        },
        JSON.stringify(payload),
        { TTL: this.ttlSeconds },
      );
      return 'delivered';
    } catch (error) {
      const statusCode = statusCodeOf(error);
      if (statusCode === 404 || statusCode === 410) {
        return 'gone';
      }
      console.warn(`[push] delivery to ${subscription.endpoint} failed: ${errorMessage(error)}`);
      return 'failed';
    }
  }
}

export const configurePush = () => {
  if (!env.push.enabled) {
    return false;
  }
  if (!env.push.publicKey || !env.push.privateKey) {
    console.warn('[push] WEB_PUSH_ENABLED is set but VAPID keys are missing; notifications disabled');
    return false;
  }
  webPush.setVapidDetails(env.push.email, env.push.publicKey, env.push.privateKey);
  return true;
};

export const createWebPushRelay = (): PushRelay | null =>
  configurePush() ? new WebPushRelay(env.push.ttlSeconds) : null;

const MAX_PUSH_ENDPOINT_CHARS = 2048;
const MAX_PUSH_KEY_CHARS = 512;
const MAX_PUSH_USER_AGENT_CHARS = 512;

const readField = (source: object, key: string) => {
  if (!(key in source)) {
    return null;
  }
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' && value.trim() ? value.trim() : null;
};

/**
 * Validates a subscription body: either flat `{endpoint, p256dh, auth}` or
 * the browser's `PushSubscription.toJSON()` shape with nested `keys`.
 */
export const parseSubscriptionBody = (body: unknown, fallbackUserAgent: string | null): PushSubscriptionRecord => {
  if (typeof body !== 'object' || body === null) {
    throw new MutationRequestError(400, 'endpoint, p256dh, auth required');
  }
  const nested = 'keys' in body && typeof body.keys === 'object' && body.keys !== null ? body.keys : body;
  const endpoint = readField(body, 'endpoint');
  const p256dh = readField(body, 'p256dh') ?? readField(nested, 'p256dh');
  const auth = readField(body, 'auth') ?? readField(nested, 'auth');
  const userAgent = readField(body, 'userAgent') ?? fallbackUserAgent;

  if (!endpoint || !p256dh || !auth) {
    throw new MutationRequestError(400, 'endpoint, p256dh, auth required');
  }
  if (endpoint.length > MAX_PUSH_ENDPOINT_CHARS) {
    throw new MutationRequestError(400, `endpoint exceeds ${MAX_PUSH_ENDPOINT_CHARS} characters`);
  }
  if (p256dh.length > MAX_PUSH_KEY_CHARS || auth.length > MAX_PUSH_KEY_CHARS) {
    throw new MutationRequestError(400, `p256dh/auth exceeds ${MAX_PUSH_KEY_CHARS} characters`);
  }
  let protocol: string;
  try {
    protocol = new URL(endpoint).protocol;
  } catch {
    throw new MutationRequestError(400, 'endpoint must be a URL');
  }
  if (protocol !== 'https:') {
    throw new MutationRequestError(400, 'endpoint must use https');
  }
  return {
    endpoint,
    p256dh,
    auth,
    userAgent: userAgent ? userAgent.slice(0, MAX_PUSH_USER_AGENT_CHARS) : null,
  };
};

export const parseEndpointBody = (body: unknown): string => {
  const endpoint = typeof body === 'object' && body !== null ? readField(body, 'endpoint') : null;
  if (!endpoint) {
    throw new MutationRequestError(400, 'endpoint required');
  }
  return endpoint;
};

export const createPushSubscription = async (store: PushSubscriptionStore, subscription: PushSubscriptionRecord) => {
  await store.upsert(subscription);
  console.log(`[push] subscription registered for ${new URL(subscription.endpoint).host}`);
};

export const removePushSubscription = async (store: PushSubscriptionStore, endpoint: string) => store.remove(endpoint);
