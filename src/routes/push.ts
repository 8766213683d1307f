import type { FastifyInstance } from 'fastify';
import {
  createPushSubscription,
  parseEndpointBody,
  parseSubscriptionBody,
  removePushSubscription,
} from '../services/push.js';
import type { RouteDeps } from './helpers.js';

export const registerPushRoutes = async (app: FastifyInstance, deps: RouteDeps) => {
  app.post<{ Body: unknown }>('/api/push/subscribe', async (req, reply) => {
    const userAgentHeader = req.headers['user-agent'];
    const subscription = parseSubscriptionBody(req.body, typeof userAgentHeader === 'string' ? userAgentHeader : null);
    await createPushSubscription(deps.subscriptions, subscription);
    return reply.code(201).send({ status: 'subscribed' });
  });

  app.delete<{ Body: unknown }>('/api/push/subscribe', async (req) => {
    const endpoint = parseEndpointBody(req.body);
    const removed = await removePushSubscription(deps.subscriptions, endpoint);
    return { status: removed ? 'deleted' : 'not_found' };
  });
};
