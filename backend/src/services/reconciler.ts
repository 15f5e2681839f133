import type { EmailStore } from './emailStore.js';
import type { LabelStore } from './labelStore.js';
import type { NormalizedEmail, ProviderLabel } from '../shared/types.js';

export interface EmailReconcileSummary {
  created: number;
  updated: number;
  total: number;
}

export interface LabelReconcileSummary {
  created: number;
  total: number;
}

export interface Reconciler {
  reconcileEmails(userId: string, records: NormalizedEmail[]): Promise<EmailReconcileSummary>;
  reconcileLabels(userId: string, records: ProviderLabel[]): Promise<LabelReconcileSummary>;
}

/**
 * Create-if-absent reconciliation of provider records. Existing emails are
 * immutable once captured: a record that is already stored counts as
 * `updated` but none of its fields change.
 */
export const createReconciler = (stores: { emails: EmailStore; labels: LabelStore }): Reconciler => ({
  async reconcileEmails(userId, records) {
    let created = 0;
    let updated = 0;

    // Lookup and insert for one record complete before the next record starts.
    for (const record of records) {
      const existing = await stores.emails.findByProviderId(record.id);
      if (existing) {
        updated += 1;
        continue;
      }
      if (await stores.emails.insertEmail(userId, record)) {
        created += 1;
      } else {
        updated += 1;
      }
    }

    return { created, updated, total: records.length };
  },

  async reconcileLabels(userId, records) {
    let created = 0;

    for (const record of records) {
      const existing = await stores.labels.findByProviderId(userId, record.id);
      if (existing) {
        continue;
      }
      if (await stores.labels.insertLabel(userId, record)) {
        created += 1;
      }
    }

    return { created, total: records.length };
  },
});
