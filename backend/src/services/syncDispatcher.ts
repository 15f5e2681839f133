import type { SyncOrchestrator } from './syncOrchestrator.js';
import type { SyncStatusTracker } from './syncStatus.js';
import type { SyncTaskBackend } from './queue.js';
import type { UserStore } from './user.js';
import type { SyncBackendKind, SyncConfig } from '../config/syncConfig.js';
import type { SyncLogger, SyncResult } from '../shared/types.js';

export type ScheduleOutcome =
  | { userId: string; mode: 'inline'; delaySeconds: number; result: SyncResult }
  | { userId: string; mode: 'queued'; delaySeconds: number; jobId: string; runAt: string };

export interface ScheduleAllSummary {
  scheduled: ScheduleOutcome[];
  failed: Array<{ userId: string; error: string }>;
}

export type DispatcherConfig = Pick<SyncConfig, 'staggerSeconds' | 'statusRetentionDays'> & {
  backend: SyncBackendKind;
};

export interface SyncDispatcherDeps {
  users: Pick<UserStore, 'listSyncableUsers'>;
  statuses: Pick<SyncStatusTracker, 'create' | 'purgeOlderThan'>;
  orchestrator: SyncOrchestrator;
  taskBackend: SyncTaskBackend | null;
  config: DispatcherConfig;
  logger: SyncLogger;
  now?: () => Date;
}

export interface SyncDispatcher {
  readonly mode: SyncBackendKind;
  schedule(userId: string, delaySeconds?: number): Promise<ScheduleOutcome>;
  scheduleAllActive(): Promise<ScheduleAllSummary>;
  cleanupOldSyncStatuses(days?: number): Promise<{ deleted: number; cutoff: string }>;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export const createSyncDispatcher = (deps: SyncDispatcherDeps): SyncDispatcher => {
  const now = deps.now ?? (() => new Date());
  const { config, logger } = deps;

  // Backend choice is fixed at construction.
  const taskBackend = config.backend === 'queue' ? deps.taskBackend : null;
  if (config.backend === 'queue' && !taskBackend) {
    throw new Error('queue sync backend selected but no task backend was provided');
  }

  const schedule = async (userId: string, delaySeconds = 0): Promise<ScheduleOutcome> => {
    const delay = Math.max(0, Math.floor(delaySeconds));
    if (!taskBackend) {
      const result = await deps.orchestrator.runUserSync(userId);
      return { userId, mode: 'inline', delaySeconds: delay, result };
    }

    const runAt = delay > 0 ? new Date(now().getTime() + delay * 1000) : undefined;
    const handle = await taskBackend.enqueueUserSync(userId, { runAt });
    // Leaves an existing status row untouched.
    await deps.statuses.create(userId);
    logger.info({ userId, jobId: handle.id, delaySeconds: delay }, 'scheduled user sync');
    return {
      userId,
      mode: 'queued',
      delaySeconds: delay,
      jobId: handle.id,
      runAt: handle.runAt.toISOString(),
    };
  };

  return {
    mode: config.backend,

    schedule,

    async scheduleAllActive() {
      const users = await deps.users.listSyncableUsers();
      logger.info({ users: users.length, mode: config.backend }, 'starting background sync');

      const summary: ScheduleAllSummary = { scheduled: [], failed: [] };
      for (const [index, user] of users.entries()) {
        try {
          summary.scheduled.push(await schedule(user.id, index * config.staggerSeconds));
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.error({ userId: user.id, error: message }, 'failed to schedule user sync');
          summary.failed.push({ userId: user.id, error: message });
        }
      }
      return summary;
    },

    async cleanupOldSyncStatuses(days = config.statusRetentionDays) {
      const cutoff = new Date(now().getTime() - days * DAY_MS);
      const deleted = await deps.statuses.purgeOlderThan(cutoff);
      logger.info({ deleted, cutoff: cutoff.toISOString() }, 'purged old sync statuses');
      return { deleted, cutoff: cutoff.toISOString() };
    },
  };
};
