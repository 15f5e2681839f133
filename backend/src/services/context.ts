import type { SyncConfig } from '../config/syncConfig.js';
import type { Queryable } from '../db/queryable.js';
import type { MailProviderFactory, SyncLogger, TokenSet } from '../shared/types.js';
import { createEmailStore } from './emailStore.js';
import { createGmailProvider } from './gmailApi.js';
import { createGoogleAuthClient, createOAuthAccessTokenSource } from './googleOAuth.js';
import type { GoogleClientSettings } from './googleOAuth.js';
import { createLabelStore } from './labelStore.js';
import { createGraphileSyncBackend } from './queue.js';
import type { JobAdder } from './queue.js';
import { createReconciler } from './reconciler.js';
import { createSyncDispatcher } from './syncDispatcher.js';
import type { SyncDispatcher } from './syncDispatcher.js';
import { createSyncOrchestrator } from './syncOrchestrator.js';
import type { SyncOrchestrator } from './syncOrchestrator.js';
import { createSyncStatusTracker } from './syncStatus.js';
import type { SyncStatusTracker } from './syncStatus.js';
import { createUserStore } from './user.js';
import type { UserStore } from './user.js';

export interface SyncContext {
  users: UserStore;
  statuses: SyncStatusTracker;
  orchestrator: SyncOrchestrator;
  dispatcher: SyncDispatcher;
  providerFactory: MailProviderFactory;
}

export interface SyncContextOptions {
  db: Queryable;
  config: SyncConfig;
  google: GoogleClientSettings;
  logger: SyncLogger;
  getQueue: () => Promise<JobAdder>;
}

export const createGmailProviderFactory = (
  google: GoogleClientSettings,
  users: Pick<UserStore, 'updateTokens'>,
  logger: SyncLogger,
): MailProviderFactory => (userId: string | null, tokens: TokenSet) => {
  const persistTokens = (next: TokenSet) => {
    if (!userId) return;
    users.updateTokens(userId, next).catch((error: unknown) => {
      logger.warn({ userId, error: String(error) }, 'failed to persist refreshed tokens');
    });
  };
  const client = createGoogleAuthClient(google, tokens, persistTokens);
  return createGmailProvider({ tokens: createOAuthAccessTokenSource(client) });
};

export const createSyncContext = (options: SyncContextOptions): SyncContext => {
  const { db, config, logger } = options;
  const users = createUserStore(db);
  const statuses = createSyncStatusTracker(db);
  const reconciler = createReconciler({
    emails: createEmailStore(db),
    labels: createLabelStore(db),
  });
  const providerFactory = createGmailProviderFactory(options.google, users, logger);

  const orchestrator = createSyncOrchestrator({
    users,
    statuses,
    reconciler,
    providerFactory,
    config,
    logger,
  });

  const taskBackend = config.backend === 'queue' && config.queueName
    ? createGraphileSyncBackend(options.getQueue, {
      queueName: config.queueName,
      maxAttempts: config.jobMaxAttempts,
    })
    : null;

  const dispatcher = createSyncDispatcher({
    users,
    statuses,
    orchestrator,
    taskBackend,
    config,
    logger,
  });

  return { users, statuses, orchestrator, dispatcher, providerFactory };
};
