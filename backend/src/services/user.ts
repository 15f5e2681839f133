import type { QueryResultRow } from 'pg';
import type { Queryable } from '../db/queryable.js';
import { toIsoString } from '../db/queryable.js';
import type { TokenSet, UserRecord } from '../shared/types.js';

const normalizeEmail = (email: string) => String(email).trim().toLowerCase();

export interface NewUserPayload {
  email: string;
  gmailUserId?: string | null;
  tokens?: TokenSet;
}

export interface UserStore {
  createUser(payload: NewUserPayload): Promise<UserRecord>;
  getUserById(userId: string): Promise<UserRecord | null>;
  getUserByEmail(email: string): Promise<UserRecord | null>;
  updateTokens(userId: string, tokens: TokenSet): Promise<UserRecord | null>;
  setActive(userId: string, isActive: boolean): Promise<void>;
  listSyncableUsers(): Promise<UserRecord[]>;
}

const userColumns = `id, email, gmail_user_id, access_token, refresh_token, token_expiry, is_active`;

const toUserRecord = (row: QueryResultRow): UserRecord => ({
  id: String(row.id),
  email: String(row.email),
  gmailUserId: row.gmail_user_id ?? null,
  accessToken: row.access_token ?? null,
  refreshToken: row.refresh_token ?? null,
  tokenExpiry: toIsoString(row.token_expiry),
  isActive: row.is_active !== false,
});

export const createUserStore = (db: Queryable): UserStore => {
  const findOne = async (where: string, value: string) => {
    const result = await db.query(
      `SELECT ${userColumns}
         FROM users
        WHERE ${where} = $1`,
      [value],
    );
    const row = result.rows[0];
    return row ? toUserRecord(row) : null;
  };

  return {
    async createUser(payload) {
      const result = await db.query(
        `INSERT INTO users (email, gmail_user_id, access_token, refresh_token, token_expiry)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${userColumns}`,
        [
          normalizeEmail(payload.email),
          payload.gmailUserId ?? null,
          payload.tokens?.accessToken ?? null,
          payload.tokens?.refreshToken ?? null,
          payload.tokens?.tokenExpiry ?? null,
        ],
      );
      return toUserRecord(result.rows[0]);
    },

    getUserById: (userId) => findOne('id', userId),

    getUserByEmail: (email) => findOne('email', normalizeEmail(email)),

    async updateTokens(userId, tokens) {
      // A refresh response may omit the refresh token; keep the stored one then.
      const result = await db.query(
        `UPDATE users
            SET access_token = $2,
                refresh_token = COALESCE($3, refresh_token),
                token_expiry = $4,
                updated_at = NOW()
          WHERE id = $1
        RETURNING ${userColumns}`,
        [userId, tokens.accessToken, tokens.refreshToken, tokens.tokenExpiry],
      );
      const row = result.rows[0];
      return row ? toUserRecord(row) : null;
    },

    async setActive(userId, isActive) {
      await db.query(
        `UPDATE users
            SET is_active = $2, updated_at = NOW()
          WHERE id = $1`,
        [userId, isActive],
      );
    },

    async listSyncableUsers() {
      const result = await db.query(
        `SELECT ${userColumns}
           FROM users
          WHERE is_active = TRUE
            AND access_token IS NOT NULL
          ORDER BY created_at ASC, id ASC`,
      );
      return result.rows.map(toUserRecord);
    },
  };
};
