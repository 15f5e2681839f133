import type { FastifyInstance } from 'fastify';
import type { SyncContext } from '../services/context.js';
import {
  MAX_RETENTION_DAYS,
  parsePositiveIntWithCap,
  parseUserId,
  readBodyField,
  toScheduleBody,
} from './helpers.js';

export const registerTaskRoutes = async (app: FastifyInstance, ctx: SyncContext) => {
  app.post('/tasks/sync-user', async (req, reply) => {
    const userId = parseUserId(readBodyField(req.body, 'user_id'));
    if (!userId) {
      return reply.code(400).send({ error: 'user_id must be a valid UUID' });
    }
    const user = await ctx.users.getUserById(userId);
    if (!user) {
      return reply.code(404).send({ error: 'user not found' });
    }

    const outcome = await ctx.dispatcher.schedule(userId);
    return reply.code(outcome.mode === 'queued' ? 202 : 200).send(toScheduleBody(outcome));
  });

  app.post('/tasks/sync-all-users', async (_req, reply) => {
    const summary = await ctx.dispatcher.scheduleAllActive();
    return reply.code(202).send({
      mode: ctx.dispatcher.mode,
      scheduled: summary.scheduled.length,
      failed: summary.failed.length,
      failures: summary.failed.map((entry) => ({ user_id: entry.userId, error: entry.error })),
    });
  });

  app.post('/tasks/cleanup-sync-statuses', async (req, reply) => {
    const requestedDays = readBodyField(req.body, 'days');
    let days: number | undefined;
    if (requestedDays !== undefined) {
      days = parsePositiveIntWithCap(requestedDays, 0, MAX_RETENTION_DAYS);
      if (days === 0) {
        return reply.code(400).send({ error: 'days must be a positive integer' });
      }
    }
    const result = await ctx.dispatcher.cleanupOldSyncStatuses(days);
    return { deleted: result.deleted, cutoff: result.cutoff };
  });
};
