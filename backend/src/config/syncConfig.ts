export type SyncBackendKind = 'inline' | 'queue';

export interface SyncConfig {
  backend: SyncBackendKind;
  queueName: string | null;
  pageSize: number;
  maxMessagesPerRun: number;
  recencyDays: number;
  pageDelayMs: number;
  staggerSeconds: number;
  statusRetentionDays: number;
  jobMaxAttempts: number;
  workerConcurrency: number;
  syncAllCron: string;
}

export const DEFAULT_SYNC_CONFIG: SyncConfig = {
  backend: 'inline',
  queueName: null,
  pageSize: 100,
  maxMessagesPerRun: 1000,
  recencyDays: 30,
  pageDelayMs: 1000,
  staggerSeconds: 30,
  statusRetentionDays: 7,
  jobMaxAttempts: 3,
  workerConcurrency: 5,
  syncAllCron: '0 * * * *',
};

const positiveInt = (value: string | undefined, fallback: number) => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.floor(parsed);
};

const nonNegativeInt = (value: string | undefined, fallback: number) => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return fallback;
  }
  return Math.floor(parsed);
};

export const resolveSyncConfig = (source: Record<string, string | undefined>): SyncConfig => {
  const queueName = String(source.SYNC_QUEUE_NAME ?? '').trim() || null;
  return {
    backend: queueName ? 'queue' : 'inline',
    queueName,
    pageSize: positiveInt(source.SYNC_PAGE_SIZE, DEFAULT_SYNC_CONFIG.pageSize),
    maxMessagesPerRun: positiveInt(source.SYNC_MAX_MESSAGES_PER_RUN, DEFAULT_SYNC_CONFIG.maxMessagesPerRun),
    recencyDays: positiveInt(source.SYNC_RECENCY_DAYS, DEFAULT_SYNC_CONFIG.recencyDays),
    pageDelayMs: nonNegativeInt(source.SYNC_PAGE_DELAY_MS, DEFAULT_SYNC_CONFIG.pageDelayMs),
    staggerSeconds: nonNegativeInt(source.SYNC_STAGGER_SECONDS, DEFAULT_SYNC_CONFIG.staggerSeconds),
    statusRetentionDays: positiveInt(source.SYNC_STATUS_RETENTION_DAYS, DEFAULT_SYNC_CONFIG.statusRetentionDays),
    jobMaxAttempts: positiveInt(source.SYNC_JOB_MAX_ATTEMPTS, DEFAULT_SYNC_CONFIG.jobMaxAttempts),
    workerConcurrency: positiveInt(source.WORKER_CONCURRENCY, DEFAULT_SYNC_CONFIG.workerConcurrency),
    syncAllCron: String(source.SYNC_ALL_CRON ?? '').trim() || DEFAULT_SYNC_CONFIG.syncAllCron,
  };
};

export const recencyQuery = (config: Pick<SyncConfig, 'recencyDays'>) => `newer_than:${config.recencyDays}d`;
