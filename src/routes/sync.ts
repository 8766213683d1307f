import type { FastifyInstance } from 'fastify';
import { MutationRequestError, errorMessage } from '../services/errors.js';
import type { AccountParams, RouteDeps } from './helpers.js';

export type SyncTriggerStatus = 'queued' | 'started' | 'already_running';

export const registerSyncRoutes = async (app: FastifyInstance, deps: RouteDeps) => {
  const startInProcess = (accountId: string) => {
    deps.engine.runCycle(accountId).catch((error: unknown) => {
      app.log.warn({ accountId, error: errorMessage(error) }, 'in-process sync failed');
    });
  };

  app.post<{ Params: AccountParams }>('/api/accounts/:accountId/sync', async (req, reply) => {
    const { accountId } = req.params;
    const account = await deps.store.getAccount(accountId);
    if (!account) {
      throw new MutationRequestError(404, `account ${accountId} not found`);
    }
    if (account.status !== 'active') {
      throw new MutationRequestError(409, `account ${accountId} is ${account.status}`);
    }

    let status: SyncTriggerStatus;
    if (deps.engine.isSyncing(accountId)) {
      status = 'already_running';
    } else {
      let queued = false;
      try {
        queued = await deps.enqueueSync(accountId);
      } catch (error) {
        req.log.warn({ accountId, error: errorMessage(error) }, 'sync enqueue failed, running in-process');
      }
      if (queued) {
        status = 'queued';
      } else {
        startInProcess(accountId);
        status = 'started';
      }
    }
    return reply.code(202).send({ status });
  });

  app.get('/api/sync/status', async () => {
    const accounts = await deps.store.listAccounts();
    return {
      accounts: accounts.map((account) => ({
        id: account.id,
        status: account.status,
        syncing: deps.engine.isSyncing(account.id),
        lastSyncAt: account.lastSyncAt,
        lastError: account.lastError,
      })),
    };
  });
};
