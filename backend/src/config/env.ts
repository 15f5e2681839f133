import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { resolveSyncConfig } from './syncConfig.js';

const cwdEnvPath = path.resolve(process.cwd(), '.env');
const repoEnvPath = path.resolve(process.cwd(), '..', '.env');

dotenv.config({ path: cwdEnvPath });
if (repoEnvPath !== cwdEnvPath && fs.existsSync(repoEnvPath)) {
  dotenv.config({ path: repoEnvPath, override: false });
}

const required = (value?: string, name = 'environment variable'): string => {
  if (!value) {
    throw new Error(`Missing required ${name}`);
  }
  return value;
};

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: Number(process.env.PORT ?? '3000'),
  logLevel: process.env.LOG_LEVEL ?? 'info',
  tasksApiToken: process.env.TASKS_API_TOKEN ?? '',
  databaseUrl: required(process.env.DATABASE_URL, 'DATABASE_URL'),
  googleClientId: process.env.GOOGLE_CLIENT_ID,
  googleClientSecret: process.env.GOOGLE_CLIENT_SECRET,
  sync: resolveSyncConfig(process.env),
};
