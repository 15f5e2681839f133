import type { FastifyInstance } from 'fastify';
import type { SyncContext } from '../services/context.js';
import { parseUserId, toStatusBody } from './helpers.js';

export const registerSyncRoutes = async (app: FastifyInstance, ctx: SyncContext) => {
  app.get<{ Params: { userId: string } }>('/sync/status/:userId', async (req, reply) => {
    const userId = parseUserId(req.params.userId);
    if (!userId) {
      return reply.code(400).send({ error: 'userId must be a valid UUID' });
    }
    const user = await ctx.users.getUserById(userId);
    if (!user) {
      return reply.code(404).send({ error: 'user not found' });
    }
    return toStatusBody(await ctx.statuses.read(userId));
  });
};
