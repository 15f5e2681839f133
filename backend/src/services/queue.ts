import { makeWorkerUtils } from 'graphile-worker';
import type { TaskSpec, WorkerUtils } from 'graphile-worker';

export const SYNC_USER_TASK = 'syncUser';
export const SYNC_ALL_USERS_TASK = 'syncAllUsers';
export const CLEANUP_SYNC_STATUSES_TASK = 'cleanupSyncStatuses';

export interface SyncUserTaskPayload {
  userId: string;
}

export interface TaskHandle {
  id: string;
  /** Run time stored on the job, which may differ from the one requested. */
  runAt: Date;
}

export interface SyncTaskBackend {
  enqueueUserSync(userId: string, options?: { runAt?: Date }): Promise<TaskHandle>;
}

export interface JobAdder {
  addJob(identifier: string, payload: unknown, spec: TaskSpec): Promise<{ id: string | number; run_at: Date }>;
}

let workerUtils: WorkerUtils | null = null;

export const createQueue = async (connectionString: string) => {
  if (workerUtils) return workerUtils;
  workerUtils = await makeWorkerUtils({ connectionString });
  return workerUtils;
};

export const releaseQueue = async () => {
  if (!workerUtils) return;
  const current = workerUtils;
  workerUtils = null;
  await current.release();
};

/**
 * Durable backend over graphile-worker. Jobs for the same user share a queue
 * name, so the worker never runs two syncs for one user at once, and a job key,
 * so a user has at most one pending sync. A delayed request keeps the run time
 * of a job already pending; an immediate one moves that job to now.
 */
export const createGraphileSyncBackend = (
  getQueue: () => Promise<JobAdder>,
  options: { queueName: string; maxAttempts: number },
): SyncTaskBackend => ({
  async enqueueUserSync(userId, enqueueOptions = {}) {
    const queue = await getQueue();
    const payload: SyncUserTaskPayload = { userId };
    const job = await queue.addJob(SYNC_USER_TASK, payload, {
      queueName: `${options.queueName}:${userId}`,
      jobKey: `sync-user:${userId}`,
      jobKeyMode: enqueueOptions.runAt ? 'preserve_run_at' : 'replace',
      maxAttempts: options.maxAttempts,
      ...(enqueueOptions.runAt ? { runAt: enqueueOptions.runAt } : {}),
    });
    return { id: String(job.id), runAt: job.run_at };
  },
});

export const readSyncUserPayload = (payload: unknown): SyncUserTaskPayload => {
  if (typeof payload === 'object' && payload !== null && 'userId' in payload) {
    const userId = payload.userId;
    if (typeof userId === 'string' && userId.trim()) {
      return { userId: userId.trim() };
    }
  }
  throw new Error('syncUser payload requires a userId');
};
