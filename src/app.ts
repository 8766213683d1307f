import Fastify from 'fastify';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { MutationRequestError } from './services/errors.js';
import { registerRoutes } from './routes/index.js';
import type { RouteDeps } from './routes/index.js';

export interface ServerOptions {
  logger: boolean;
  /** When set, every route except the health check needs this bearer token. */
  apiToken: string;
}

const PUBLIC_ROUTES = new Set(['/api/health']);

const getRequestPathname = (url: string) => {
  try {
    return new URL(url, 'http://localhost').pathname;
  } catch {
    return String(url || '/').split('?')[0] || '/';
  }
};

const extractToken = (request: FastifyRequest) => {
  const authHeader = request.headers.authorization;
  if (typeof authHeader === 'string' && authHeader.toLowerCase().startsWith('bearer ')) {
    return authHeader.slice(7).trim();
  }
  const apiKey = request.headers['x-api-key'];
  const headerToken = Array.isArray(apiKey) ? apiKey[0] : apiKey;
  return headerToken ?? undefined;
};

export const buildServer = async (deps: RouteDeps, options: ServerOptions) => {
  const server = Fastify({ logger: options.logger });

  server.addHook('onRequest', async (request, reply) => {
    if (!options.apiToken || PUBLIC_ROUTES.has(getRequestPathname(request.url))) {
      return;
    }
    const token = extractToken(request);
    if (!token) {
      return reply.code(401).send({ error: 'missing api token' });
    }
    if (token !== options.apiToken) {
      return reply.code(401).send({ error: 'invalid api token' });
    }
  });

  server.addHook('onSend', async (_request, reply, payload) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('Referrer-Policy', 'no-referrer');
    return payload;
  });

  server.setErrorHandler((error, request: FastifyRequest, reply: FastifyReply) => {
    const statusCode = error instanceof MutationRequestError ? error.statusCode : error.statusCode ?? 500;
    const resolvedStatus = typeof statusCode === 'number' && statusCode >= 400 ? statusCode : 500;
    if (resolvedStatus >= 500) {
      request.log.error(error);
    }
    const message = resolvedStatus < 500 ? error.message : 'internal server error';
    reply.code(resolvedStatus).send({ error: message });
  });

  await registerRoutes(server, deps);
  return server;
};
