import type { QueryResultRow } from 'pg';
import type { Queryable } from '../db/queryable.js';
import { toIsoString } from '../db/queryable.js';
import type { SyncState, SyncStatusRecord, SyncStatusView } from '../shared/types.js';

export interface SyncStatusPatch {
  emailsSynced?: number;
  /** `null` clears the stored error, `undefined` leaves it untouched. */
  errorMessage?: string | null;
}

export interface SyncStatusTracker {
  create(userId: string): Promise<SyncStatusRecord>;
  update(userId: string, status: SyncState, patch?: SyncStatusPatch): Promise<SyncStatusRecord>;
  read(userId: string): Promise<SyncStatusView>;
  purgeOlderThan(cutoff: Date): Promise<number>;
}

const SYNC_STATES: readonly SyncState[] = ['pending', 'running', 'completed', 'failed'];

const toSyncState = (value: unknown): SyncState => {
  const match = SYNC_STATES.find((state) => state === value);
  if (!match) {
    throw new Error(`unknown sync status ${String(value)}`);
  }
  return match;
};

const statusColumns = `user_id, status, last_sync, emails_synced, error_message`;

const toStatusRecord = (row: QueryResultRow): SyncStatusRecord => ({
  userId: String(row.user_id),
  status: toSyncState(row.status),
  lastSync: toIsoString(row.last_sync),
  emailsSynced: Number(row.emails_synced ?? 0),
  errorMessage: row.error_message ?? null,
});

export const toStatusView = (userId: string, record: SyncStatusRecord | null): SyncStatusView => {
  if (!record) {
    return { userId, status: 'never_synced' };
  }
  if (record.status === 'failed') {
    return {
      userId,
      status: 'failed',
      lastSync: record.lastSync,
      emailsSynced: record.emailsSynced,
      errorMessage: record.errorMessage,
    };
  }
  return {
    userId,
    status: record.status,
    lastSync: record.lastSync,
    emailsSynced: record.emailsSynced,
  };
};

export const createSyncStatusTracker = (db: Queryable): SyncStatusTracker => ({
  async create(userId) {
    await db.query(
      `INSERT INTO sync_status (user_id, status)
       VALUES ($1, 'pending')
       ON CONFLICT (user_id) DO NOTHING`,
      [userId],
    );
    const result = await db.query(
      `SELECT ${statusColumns}
         FROM sync_status
        WHERE user_id = $1`,
      [userId],
    );
    return toStatusRecord(result.rows[0]);
  },

  async update(userId, status, patch = {}) {
    const hasError = patch.errorMessage !== undefined;
    const result = await db.query(
      `INSERT INTO sync_status (user_id, status, last_sync, emails_synced, error_message)
       VALUES ($1, $2, NOW(), COALESCE($3::int, 0), $4::text)
       ON CONFLICT (user_id) DO UPDATE
       SET status = EXCLUDED.status,
           last_sync = EXCLUDED.last_sync,
           emails_synced = COALESCE($3::int, sync_status.emails_synced),
           error_message = CASE WHEN $5::boolean THEN $4::text ELSE sync_status.error_message END,
           updated_at = NOW()
       RETURNING ${statusColumns}`,
      [userId, status, patch.emailsSynced ?? null, hasError ? patch.errorMessage : null, hasError],
    );
    return toStatusRecord(result.rows[0]);
  },

  async read(userId) {
    const result = await db.query(
      `SELECT ${statusColumns}
         FROM sync_status
        WHERE user_id = $1`,
      [userId],
    );
    const row = result.rows[0];
    return toStatusView(userId, row ? toStatusRecord(row) : null);
  },

  async purgeOlderThan(cutoff) {
    const result = await db.query(
      `WITH deleted AS (
         DELETE FROM sync_status
          WHERE last_sync < $1
         RETURNING 1
       )
       SELECT COUNT(*)::int AS count FROM deleted`,
      [cutoff.toISOString()],
    );
    return Number(result.rows[0]?.count ?? 0);
  },
});
