import { readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { pool } from '../src/db/pool.js';
import { logger } from '../src/shared/logger.js';

const isIgnorableDuplicateConstraintError = (error: unknown) => {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  const code = 'code' in error ? error.code : undefined;
  const message = error instanceof Error ? error.message : '';
  return code === '42710' && message.includes('already exists');
};

async function run() {
  const migrationsDir = path.resolve(process.cwd(), 'migrations');
  const files = readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();

  for (const file of files) {
    const sql = readFileSync(path.resolve(migrationsDir, file), 'utf8');
    try {
      await pool.query(sql);
      logger.info({ file }, 'applied migration');
    } catch (error) {
      if (isIgnorableDuplicateConstraintError(error)) {
        logger.warn({ file }, 'skipping duplicate constraint');
        continue;
      }
      throw error;
    }
  }

  logger.info({ count: files.length }, 'database migrations applied');
  await pool.end();
}

run().catch((err: unknown) => {
  logger.error({ error: String(err) }, 'migration failed');
  process.exit(1);
});
