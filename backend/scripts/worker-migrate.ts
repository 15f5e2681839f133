import { runMigrations } from 'graphile-worker';
import { env } from '../src/config/env.js';
import { logger } from '../src/shared/logger.js';

runMigrations({
  connectionString: env.databaseUrl,
}).then(() => {
  logger.info('graphile worker migrations complete');
  process.exit(0);
}).catch((error: unknown) => {
  logger.error({ error: String(error) }, 'graphile worker migrations failed');
  process.exit(1);
});
