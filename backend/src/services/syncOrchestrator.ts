import type { Reconciler } from './reconciler.js';
import type { SyncStatusTracker } from './syncStatus.js';
import type { UserStore } from './user.js';
import type { SyncConfig } from '../config/syncConfig.js';
import { recencyQuery } from '../config/syncConfig.js';
import type { MailProvider, MailProviderFactory, SyncLogger, SyncResult, UserRecord } from '../shared/types.js';

export class SyncPreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SyncPreconditionError';
  }
}

export type OrchestratorConfig = Pick<SyncConfig, 'pageSize' | 'maxMessagesPerRun' | 'recencyDays' | 'pageDelayMs'>;

export interface SyncOrchestratorDeps {
  users: Pick<UserStore, 'getUserById'>;
  statuses: SyncStatusTracker;
  reconciler: Reconciler;
  providerFactory: MailProviderFactory;
  config: OrchestratorConfig;
  logger: SyncLogger;
  sleep?: (ms: number) => Promise<void>;
}

export interface SyncOrchestrator {
  runUserSync(userId: string): Promise<SyncResult>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const errorText = (error: unknown) => (error instanceof Error ? error.message : String(error));

export const createSyncOrchestrator = (deps: SyncOrchestratorDeps): SyncOrchestrator => {
  const sleep = deps.sleep ?? defaultSleep;
  const { config, logger } = deps;

  const requireCredential = (user: UserRecord) => {
    if (!user.accessToken) {
      throw new SyncPreconditionError(`User ${user.id} has no access token`);
    }
    return {
      accessToken: user.accessToken,
      refreshToken: user.refreshToken,
      tokenExpiry: user.tokenExpiry,
    };
  };

  // A failing page stops the remaining pages; what was stored so far is kept.
  const syncEmailPages = async (userId: string, provider: MailProvider) => {
    const query = recencyQuery(config);
    let emailsSynced = 0;
    let fetched = 0;
    let pageToken: string | undefined;
    let page = 0;

    while (fetched < config.maxMessagesPerRun) {
      if (page > 0) {
        await sleep(config.pageDelayMs);
      }
      try {
        const result = await provider.listMessages({
          query,
          maxResults: Math.min(config.pageSize, config.maxMessagesPerRun - fetched),
          pageToken,
        });
        if (result.messages.length === 0) {
          break;
        }
        const summary = await deps.reconciler.reconcileEmails(userId, result.messages);
        emailsSynced += summary.created;
        fetched += result.messages.length;
        if (!result.nextPageToken) {
          break;
        }
        pageToken = result.nextPageToken;
        page += 1;
      } catch (error) {
        logger.error({ userId, page, error: errorText(error) }, 'email page sync failed; stopping remaining pages');
        break;
      }
    }

    return emailsSynced;
  };

  const markFailed = async (userId: string, message: string) => {
    try {
      await deps.statuses.update(userId, 'failed', { errorMessage: message });
    } catch (statusError) {
      logger.error(
        { userId, syncError: message, statusError: errorText(statusError) },
        'could not record failed sync status',
      );
    }
  };

  return {
    async runUserSync(userId) {
      let user: UserRecord | null;
      try {
        user = await deps.users.getUserById(userId);
      } catch (error) {
        const message = errorText(error);
        logger.error({ userId, error: message }, 'sync failed before start');
        return { userId, status: 'failed', error: message };
      }

      if (!user) {
        const message = `User ${userId} not found`;
        logger.warn({ userId }, message);
        return { userId, status: 'failed', error: message };
      }

      try {
        await deps.statuses.update(userId, 'running', { errorMessage: null });

        const provider = deps.providerFactory(userId, requireCredential(user));

        const labels = await provider.listLabels();
        const labelSummary = await deps.reconciler.reconcileLabels(userId, labels);

        const emailsSynced = await syncEmailPages(userId, provider);

        await deps.statuses.update(userId, 'completed', { emailsSynced });
        logger.info(
          { userId, emailsSynced, labelsSynced: labelSummary.created },
          'user sync completed',
        );
        return {
          userId,
          status: 'completed',
          emailsSynced,
          labelsSynced: labelSummary.created,
        };
      } catch (error) {
        const message = errorText(error);
        logger.error(
          { userId, error: message, precondition: error instanceof SyncPreconditionError },
          'user sync failed',
        );
        await markFailed(userId, message);
        return { userId, status: 'failed', error: message };
      }
    },
  };
};
