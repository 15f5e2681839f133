import { OAuth2Client } from 'google-auth-library';
import type { Credentials } from 'google-auth-library';
import type { TokenSet } from '../shared/types.js';

export interface GoogleClientSettings {
  clientId?: string;
  clientSecret?: string;
}

export interface AccessTokenSource {
  getAccessToken(forceRefresh: boolean): Promise<string>;
}

const toTimestamp = (value?: string | null): number | undefined => {
  if (!value) {
    return undefined;
  }

  const parsed = Date.parse(value);
  if (!Number.isFinite(parsed)) {
    return undefined;
  }

  return parsed;
};

export const credentialsToTokenSet = (credentials: Credentials, previous: TokenSet): TokenSet | null => {
  const accessToken = credentials.access_token ?? null;
  if (!accessToken) {
    return null;
  }
  return {
    accessToken,
    refreshToken: credentials.refresh_token ?? previous.refreshToken,
    tokenExpiry: credentials.expiry_date ? new Date(credentials.expiry_date).toISOString() : previous.tokenExpiry,
  };
};

/**
 * Rebuilds an OAuth client from stored tokens. Nothing is validated here; the
 * library refreshes lazily on the first request that needs a fresh token and
 * reports the new tokens through `onTokens`.
 */
export const createGoogleAuthClient = (
  settings: GoogleClientSettings,
  tokens: TokenSet,
  onTokens?: (next: TokenSet) => void,
): OAuth2Client => {
  const client = new OAuth2Client({
    clientId: settings.clientId,
    clientSecret: settings.clientSecret,
  });
  client.setCredentials({
    access_token: tokens.accessToken,
    refresh_token: tokens.refreshToken ?? undefined,
    expiry_date: toTimestamp(tokens.tokenExpiry),
  });

  if (onTokens) {
    client.on('tokens', (credentials: Credentials) => {
      const next = credentialsToTokenSet(credentials, tokens);
      if (next) {
        onTokens(next);
      }
    });
  }

  return client;
};

export const createOAuthAccessTokenSource = (client: OAuth2Client): AccessTokenSource => ({
  async getAccessToken(forceRefresh) {
    if (forceRefresh) {
      const { credentials } = await client.refreshAccessToken();
      if (!credentials.access_token) {
        throw new Error('OAuth refresh returned no access token; user must reconnect account');
      }
      return credentials.access_token;
    }

    const { token } = await client.getAccessToken();
    if (!token) {
      throw new Error('Google OAuth returned no access token');
    }
    return token;
  },
});
