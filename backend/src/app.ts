import Fastify from 'fastify';
import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { registerRoutes } from './routes/index.js';
import type { SyncContext } from './services/context.js';

export interface BuildServerOptions {
  tasksApiToken: string;
  logger?: boolean | { level: string };
}

const getRequestPathname = (url: string) => {
  try {
    return new URL(url, 'http://localhost').pathname;
  } catch {
    return String(url || '/').split('?')[0] || '/';
  }
};

const isTaskRoute = (path: string) => path === '/tasks' || path.startsWith('/tasks/');

export const buildServer = async (ctx: SyncContext, options: BuildServerOptions) => {
  const server = Fastify({
    logger: options.logger ?? false,
  });

  server.addHook('onRequest', async (request, reply) => {
    const requestPath = getRequestPathname(request.url);
    if (!isTaskRoute(requestPath) || !options.tasksApiToken) {
      return;
    }

    const headerValue = request.headers['x-api-key'];
    const headerToken = Array.isArray(headerValue) ? headerValue[0] : headerValue;
    if (headerToken !== options.tasksApiToken) {
      request.log.info({ path: requestPath }, 'rejected task request without a valid api key');
      return reply.code(401).send({ error: 'unauthorized' });
    }
  });

  server.addHook('onSend', async (_request, reply, payload) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('Referrer-Policy', 'no-referrer');
    return payload;
  });

  server.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    request.log.error(error);
    const statusCode = typeof error.statusCode === 'number' ? error.statusCode : 500;
    const exposeMessage = statusCode >= 400 && statusCode < 500;
    reply.code(statusCode).send({ error: exposeMessage ? error.message : 'internal server error' });
  });

  await registerRoutes(server, ctx);
  return server;
};
