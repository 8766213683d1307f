import type { FastifyInstance } from 'fastify';
import type { RouteDeps } from './helpers.js';
import { registerMessageRoutes } from './messages.js';
import { registerPushRoutes } from './push.js';
import { registerSyncRoutes } from './sync.js';

export type { RouteDeps, SyncController } from './helpers.js';

export const registerRoutes = async (app: FastifyInstance, deps: RouteDeps) => {
  app.get('/api/health', async () => ({ status: 'ok' }));

  await registerMessageRoutes(app, deps);
  await registerSyncRoutes(app, deps);
  await registerPushRoutes(app, deps);
};
