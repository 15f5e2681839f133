import type { UserStore } from './user.js';
import type { MailProviderFactory, TokenSet, UserRecord } from '../shared/types.js';

export interface OnboardingResult {
  user: UserRecord;
  created: boolean;
}

/**
 * Resolves the mailbox owner from the provider profile, then creates the user
 * or stores the fresh tokens on the existing one. A returning user is
 * re-activated.
 */
export const upsertUserFromTokens = async (
  deps: { users: UserStore; providerFactory: MailProviderFactory },
  tokens: TokenSet,
): Promise<OnboardingResult> => {
  const provider = deps.providerFactory(null, tokens);
  const profile = await provider.getProfile();

  const existing = await deps.users.getUserByEmail(profile.emailAddress);
  if (!existing) {
    const user = await deps.users.createUser({ email: profile.emailAddress, tokens });
    return { user, created: true };
  }

  const updated = await deps.users.updateTokens(existing.id, tokens);
  if (!existing.isActive) {
    await deps.users.setActive(existing.id, true);
  }
  return {
    user: { ...(updated ?? existing), isActive: true },
    created: false,
  };
};
