import type { FastifyInstance } from 'fastify';
import type { SyncContext } from '../services/context.js';
import { registerSyncRoutes } from './syncRoutes.js';
import { registerTaskRoutes } from './taskRoutes.js';

export const registerRoutes = async (app: FastifyInstance, ctx: SyncContext) => {
  app.get('/health', async () => ({ status: 'healthy' }));
  await registerTaskRoutes(app, ctx);
  await registerSyncRoutes(app, ctx);
};
