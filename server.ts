import { buildServer } from './src/app.js';
import { env } from './src/config/env.js';
import { pool } from './src/db/pool.js';
import { enqueueAccountSync, releaseQueue } from './src/services/queue.js';
import { createSyncRuntime } from './src/services/runtime.js';

if (env.nodeEnv === 'production' && !env.apiAdminToken) {
  throw new Error('API_ADMIN_TOKEN is required in production');
}

const runtime = createSyncRuntime();

const server = await buildServer(
  {
    store: runtime.store,
    subscriptions: runtime.subscriptions,
    engine: runtime.engine,
    inference: runtime.inference,
    aiEnabled: env.ai.enabled,
    maxContextChars: env.ai.maxContextChars,
    enqueueSync: (accountId) => enqueueAccountSync(accountId, { priority: 'high' }),
  },
  {
    logger: env.nodeEnv === 'development',
    apiToken: env.apiAdminToken,
  },
);

const stop = async () => {
  await server.close();
  await releaseQueue();
  await pool.end();
};

const handleSignal = () => {
  stop()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error('Shutdown failed', error);
      process.exit(1);
    });
};

process.once('SIGINT', handleSignal);
process.once('SIGTERM', handleSignal);

await server.listen({ port: env.port, host: '0.0.0.0' });
console.log(`mailsync API listening on ${env.port}`);
