import type { SyncContext } from '../services/context.js';
import {
  CLEANUP_SYNC_STATUSES_TASK,
  SYNC_ALL_USERS_TASK,
  SYNC_USER_TASK,
  readSyncUserPayload,
} from '../services/queue.js';
import type { SyncLogger } from '../shared/types.js';

export type TaskHandler = (payload: unknown) => Promise<void>;

const readRetentionDays = (payload: unknown): number | undefined => {
  if (typeof payload === 'object' && payload !== null && 'days' in payload) {
    const days = Number(payload.days);
    if (Number.isFinite(days) && days > 0) {
      return Math.floor(days);
    }
  }
  return undefined;
};

export const createTaskHandlers = (
  ctx: Pick<SyncContext, 'orchestrator' | 'dispatcher'>,
  logger: SyncLogger,
): Record<string, TaskHandler> => ({
  // A failed sync is recorded in sync_status; the job itself succeeds so the
  // queue does not retry it.
  [SYNC_USER_TASK]: async (payload) => {
    const { userId } = readSyncUserPayload(payload);
    const result = await ctx.orchestrator.runUserSync(userId);
    if (result.status === 'failed') {
      logger.warn({ userId, error: result.error }, 'queued user sync failed');
    }
  },

  [SYNC_ALL_USERS_TASK]: async () => {
    const summary = await ctx.dispatcher.scheduleAllActive();
    logger.info(
      { scheduled: summary.scheduled.length, failed: summary.failed.length },
      'scheduled active users',
    );
  },

  [CLEANUP_SYNC_STATUSES_TASK]: async (payload) => {
    await ctx.dispatcher.cleanupOldSyncStatuses(readRetentionDays(payload));
  },
});
