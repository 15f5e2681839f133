import { env } from '../src/config/env.js';
import { pool } from '../src/db/pool.js';
import { createGmailProviderFactory } from '../src/services/context.js';
import { createUserStore } from '../src/services/user.js';
import { upsertUserFromTokens } from '../src/services/userOnboarding.js';
import { logger } from '../src/shared/logger.js';

// Usage: GMAIL_ACCESS_TOKEN=... GMAIL_REFRESH_TOKEN=... tsx scripts/register-user.ts
async function main() {
  const accessToken = process.env.GMAIL_ACCESS_TOKEN;
  if (!accessToken) {
    throw new Error('GMAIL_ACCESS_TOKEN is required');
  }

  const users = createUserStore(pool);
  const providerFactory = createGmailProviderFactory(
    { clientId: env.googleClientId, clientSecret: env.googleClientSecret },
    users,
    logger,
  );

  const { user, created } = await upsertUserFromTokens({ users, providerFactory }, {
    accessToken,
    refreshToken: process.env.GMAIL_REFRESH_TOKEN ?? null,
    tokenExpiry: process.env.GMAIL_TOKEN_EXPIRY ?? null,
  });
  logger.info({ userId: user.id, email: user.email, created }, 'registered user');
  await pool.end();
}

main().catch((error: unknown) => {
  logger.error({ error: String(error) }, 'register user failed');
  process.exit(1);
});
