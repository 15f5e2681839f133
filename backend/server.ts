import { env } from './src/config/env.js';
import { pool } from './src/db/pool.js';
import { buildServer } from './src/app.js';
import { createSyncContext } from './src/services/context.js';
import { createQueue, releaseQueue } from './src/services/queue.js';
import { logger } from './src/shared/logger.js';

if (env.nodeEnv === 'production' && !env.tasksApiToken) {
  throw new Error('TASKS_API_TOKEN is required in production');
}

const ctx = createSyncContext({
  db: pool,
  config: env.sync,
  google: { clientId: env.googleClientId, clientSecret: env.googleClientSecret },
  logger,
  getQueue: () => createQueue(env.databaseUrl),
});

const server = await buildServer(ctx, {
  tasksApiToken: env.tasksApiToken,
  logger: { level: env.logLevel },
});

const stop = async () => {
  await server.close();
  await releaseQueue();
  await pool.end();
};

const onSignal = () => {
  stop().catch((error: unknown) => {
    logger.error({ error: String(error) }, 'shutdown failed');
    process.exit(1);
  });
};

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

await server.listen({ port: env.port, host: '0.0.0.0' });
logger.info({ port: env.port, syncBackend: ctx.dispatcher.mode }, 'mail sync API listening');
