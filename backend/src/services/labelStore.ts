import type { Queryable } from '../db/queryable.js';
import type { ProviderLabel } from '../shared/types.js';

export type LabelType = 'system' | 'user';

export interface LabelStore {
  findByProviderId(userId: string, providerLabelId: string): Promise<{ id: string } | null>;
  /** Returns false when a row for (user, provider label id) already exists. */
  insertLabel(userId: string, label: ProviderLabel): Promise<boolean>;
}

export const createLabelStore = (db: Queryable): LabelStore => ({
  async findByProviderId(userId, providerLabelId) {
    const result = await db.query(
      `SELECT id
         FROM labels
        WHERE gmail_label_id = $1
          AND user_id = $2`,
      [providerLabelId, userId],
    );
    const row = result.rows[0];
    return row ? { id: String(row.id) } : null;
  },

  async insertLabel(userId, label) {
    const labelType: LabelType = label.type ?? 'user';
    const result = await db.query(
      `INSERT INTO labels (user_id, gmail_label_id, name, label_type, messages_total, messages_unread)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (user_id, gmail_label_id) DO NOTHING
       RETURNING id`,
      [userId, label.id, label.name, labelType, label.messagesTotal ?? 0, label.messagesUnread ?? 0],
    );
    return result.rows.length > 0;
  },
});
