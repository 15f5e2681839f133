import type { QueryResultRow } from 'pg';

export interface Queryable {
  query(text: string, params?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

export const toIsoString = (value: unknown): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  const date = value instanceof Date ? value : new Date(String(value));
  return Number.isFinite(date.getTime()) ? date.toISOString() : null;
};
