import type { SyncResult, SyncStatusView } from '../shared/types.js';
import type { ScheduleOutcome } from '../services/syncDispatcher.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export const MAX_RETENTION_DAYS = 3650;

export const parseUserId = (value: unknown): string | null => {
  const normalized = String(value ?? '').trim();
  if (!UUID_PATTERN.test(normalized)) {
    return null;
  }
  return normalized.toLowerCase();
};

export const readBodyField = (body: unknown, key: string): unknown => {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return undefined;
  }
  const fields: Record<string, unknown> = { ...body };
  return fields[key];
};

export const parsePositiveIntWithCap = (value: unknown, fallback: number, max: number) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.min(Math.floor(parsed), max);
};

export const toSyncResultBody = (result: SyncResult) => {
  if (result.status === 'failed') {
    return { user_id: result.userId, status: result.status, error: result.error };
  }
  return {
    user_id: result.userId,
    status: result.status,
    emails_synced: result.emailsSynced,
    labels_synced: result.labelsSynced,
  };
};

export const toScheduleBody = (outcome: ScheduleOutcome) => {
  if (outcome.mode === 'inline') {
    return toSyncResultBody(outcome.result);
  }
  return {
    user_id: outcome.userId,
    status: 'queued',
    job_id: outcome.jobId,
    run_at: outcome.runAt,
  };
};

export const toStatusBody = (view: SyncStatusView) => {
  switch (view.status) {
    case 'never_synced':
      return { user_id: view.userId, status: view.status };
    case 'failed':
      return {
        user_id: view.userId,
        status: view.status,
        last_sync: view.lastSync,
        emails_synced: view.emailsSynced,
        error_message: view.errorMessage,
      };
    default:
      return {
        user_id: view.userId,
        status: view.status,
        last_sync: view.lastSync,
        emails_synced: view.emailsSynced,
      };
  }
};
