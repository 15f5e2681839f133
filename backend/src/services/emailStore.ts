import type { Queryable } from '../db/queryable.js';
import type { NormalizedEmail } from '../shared/types.js';

export interface EmailStore {
  findByProviderId(providerMessageId: string): Promise<{ id: string } | null>;
  /** Returns false when the storage uniqueness guard rejected the row. */
  insertEmail(userId: string, email: NormalizedEmail): Promise<boolean>;
}

const hasLabel = (email: NormalizedEmail, labelId: string) => email.labelIds.includes(labelId);

export const createEmailStore = (db: Queryable): EmailStore => ({
  async findByProviderId(providerMessageId) {
    const result = await db.query(
      `SELECT id
         FROM emails
        WHERE gmail_message_id = $1`,
      [providerMessageId],
    );
    const row = result.rows[0];
    return row ? { id: String(row.id) } : null;
  },

  async insertEmail(userId, email) {
    const result = await db.query(
      `INSERT INTO emails (
         user_id, gmail_message_id, thread_id, subject, sender, recipient, cc, bcc,
         date_sent, date_received, body_text, body_html, snippet,
         is_read, is_starred, is_important, raw_headers, attachments_count
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17::jsonb, $18)
       ON CONFLICT (gmail_message_id) DO NOTHING
       RETURNING id`,
      [
        userId,
        email.id,
        email.threadId,
        email.subject,
        email.sender,
        email.recipient,
        email.cc,
        email.bcc,
        email.dateSent,
        email.dateReceived,
        email.bodyText,
        email.bodyHtml,
        email.snippet,
        !hasLabel(email, 'UNREAD'),
        hasLabel(email, 'STARRED'),
        hasLabel(email, 'IMPORTANT'),
        JSON.stringify(email.headers),
        email.attachmentCount,
      ],
    );
    return result.rows.length > 0;
  },
});
