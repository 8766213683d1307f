import type { FastifyInstance } from 'fastify';
import { suggestReplies } from '../services/classifier.js';
import { MutationRequestError } from '../services/errors.js';
import {
  clearTrash,
  listOperations,
  parseOperationKind,
  parseOperationStatus,
  requestMutation,
  retryOperation,
} from '../services/operationQueue.js';
import type { AccountParams, MessageParams, OperationParams, RouteDeps } from './helpers.js';

const readKind = (body: unknown) =>
  parseOperationKind(typeof body === 'object' && body !== null && 'kind' in body ? body.kind : undefined);

export const registerMessageRoutes = async (app: FastifyInstance, deps: RouteDeps) => {
  app.post<{ Params: MessageParams; Body: unknown }>(
    '/api/accounts/:accountId/messages/:messageId/actions',
    async (req, reply) => {
      const kind = readKind(req.body);
      const operation = await requestMutation(deps.store, req.params.accountId, req.params.messageId, kind);
      return reply.code(202).send({ operation });
    },
  );

  app.post<{ Params: AccountParams }>('/api/accounts/:accountId/trash/clear', async (req) => {
    return clearTrash(deps.store, req.params.accountId);
  });

  app.get<{ Params: AccountParams; Querystring: { status?: string } }>(
    '/api/accounts/:accountId/operations',
    async (req) => {
      const status = parseOperationStatus(req.query.status);
      const operations = await listOperations(deps.store, req.params.accountId, status);
      return { operations };
    },
  );

  app.post<{ Params: OperationParams }>('/api/operations/:operationId/retry', async (req) => {
    const operation = await retryOperation(deps.store, req.params.operationId);
    return { operation };
  });

  app.post<{ Params: MessageParams }>('/api/accounts/:accountId/messages/:messageId/replies', async (req) => {
    const message = await deps.store.getMessage(req.params.accountId, req.params.messageId);
    if (!message) {
      throw new MutationRequestError(404, `message ${req.params.messageId} not found`);
    }
    if (!deps.aiEnabled) {
      return { replies: [] };
    }
    const replies = await suggestReplies(deps.inference, message, deps.maxContextChars);
    return { replies };
  });
};
