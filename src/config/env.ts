import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { DEFAULT_LABEL_PREFIX } from '../services/labelSync.js';

const cwdEnvPath = path.resolve(process.cwd(), '.env');
const repoEnvPath = path.resolve(process.cwd(), '..', '.env');

dotenv.config({ path: cwdEnvPath });
if (repoEnvPath !== cwdEnvPath && fs.existsSync(repoEnvPath)) {
  dotenv.config({ path: repoEnvPath, override: false });
}

const required = (value?: string, name = 'environment variable'): string => {
  if (!value) {
    throw new Error(`Missing required ${name}`);
  }
  return value;
};

const positiveNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value ?? '');
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: Number(process.env.PORT ?? '3000'),
  apiAdminToken: process.env.API_ADMIN_TOKEN ?? '',
  databaseUrl: required(process.env.DATABASE_URL, 'DATABASE_URL'),
  googleClientId: process.env.GOOGLE_CLIENT_ID,
  googleClientSecret: process.env.GOOGLE_CLIENT_SECRET,
  sync: {
    intervalMs: positiveNumber(process.env.SYNC_INTERVAL_MS, 300_000),
    fetchBatchSize: positiveNumber(process.env.SYNC_FETCH_BATCH_SIZE, 100),
    maxOperationsPerDrain: positiveNumber(process.env.SYNC_MAX_OPERATIONS_PER_DRAIN, 50),
    maxOperationAttempts: positiveNumber(process.env.SYNC_MAX_OPERATION_ATTEMPTS, 3),
    providerTimeoutMs: positiveNumber(process.env.SYNC_PROVIDER_TIMEOUT_MS, 30_000),
    operationRetentionHours: positiveNumber(process.env.SYNC_OPERATION_RETENTION_HOURS, 24),
  },
  ai: {
    enabled: process.env.AI_ENABLED !== 'false',
    endpoint: process.env.AI_ENDPOINT ?? 'http://localhost:11434',
    model: process.env.AI_MODEL ?? 'llama3.2',
    temperature: Number(process.env.AI_TEMPERATURE ?? '0.3'),
    timeoutMs: positiveNumber(process.env.AI_TIMEOUT_MS, 30_000),
    maxContextChars: positiveNumber(process.env.AI_MAX_CONTEXT_CHARS, 1_000),
    maxPerCycle: positiveNumber(process.env.AI_MAX_PER_CYCLE, 50),
    syncLabels: process.env.AI_SYNC_LABELS !== 'false',
    labelPrefix: process.env.AI_LABEL_PREFIX?.trim() || DEFAULT_LABEL_PREFIX,
  },
  push: {
    enabled: process.env.WEB_PUSH_ENABLED === 'true',
    publicKey: process.env.VAPID_PUBLIC_KEY ?? '',
    privateKey: process.env.VAPID_PRIVATE_KEY ?? '',
    email: process.env.VAPID_EMAIL ?? 'mailto:admin@example.com',
    maxPerCycle: positiveNumber(process.env.PUSH_MAX_PER_CYCLE, 5),
    ttlSeconds: positiveNumber(process.env.PUSH_TTL_SECONDS, 3_600),
  },
  worker: {
    concurrency: positiveNumber(process.env.WORKER_CONCURRENCY, 5),
    pollIntervalMs: positiveNumber(process.env.WORKER_POLL_INTERVAL_MS, 1_000),
  },
};
