import { run } from 'graphile-worker';
import type { TaskList } from 'graphile-worker';
import { env } from '../config/env.js';
import { pool } from '../db/pool.js';
import { createSyncContext } from '../services/context.js';
import {
  CLEANUP_SYNC_STATUSES_TASK,
  SYNC_ALL_USERS_TASK,
  createQueue,
  releaseQueue,
} from '../services/queue.js';
import { logger } from '../shared/logger.js';
import { createTaskHandlers } from './taskHandlers.js';

const buildCrontab = () => [
  `${env.sync.syncAllCron} ${SYNC_ALL_USERS_TASK}`,
  `0 3 * * * ${CLEANUP_SYNC_STATUSES_TASK}`,
].join('\n');

async function main() {
  const ctx = createSyncContext({
    db: pool,
    config: env.sync,
    google: { clientId: env.googleClientId, clientSecret: env.googleClientSecret },
    logger,
    getQueue: () => createQueue(env.databaseUrl),
  });

  const taskList: TaskList = createTaskHandlers(ctx, logger);

  const runner = await run({
    connectionString: env.databaseUrl,
    taskList,
    crontab: buildCrontab(),
    concurrency: env.sync.workerConcurrency,
    pollInterval: 1000,
    schema: 'graphile_worker',
  });

  logger.info({ concurrency: env.sync.workerConcurrency, mode: ctx.dispatcher.mode }, 'sync worker started');

  const stop = async () => {
    await runner.stop();
    await releaseQueue();
    await pool.end();
  };
  const onSignal = () => {
    stop().then(() => process.exit(0)).catch((error: unknown) => {
      logger.error({ error: String(error) }, 'worker shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await runner.promise;
}

main().catch((err: unknown) => {
  logger.error({ error: String(err) }, 'worker stopped with error');
  process.exit(1);
});
