import type { AccessTokenSource } from './googleOAuth.js';
import { parseGmailRawMessage } from './messageParser.js';
import type { GmailRawMessage } from './messageParser.js';
import type {
  ListMessagesOptions,
  MailProvider,
  MessagePage,
  NormalizedEmail,
  ProviderLabel,
} from '../shared/types.js';

export const GMAIL_API_BASE = 'https://gmail.googleapis.com/gmail/v1/users/me';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface GmailRequestContext {
  tokens: AccessTokenSource;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

interface GmailLabelPayload {
  id: string;
  name: string;
  type?: string;
  messagesTotal?: number;
  messagesUnread?: number;
}

interface GmailMessageListPayload {
  messages?: Array<{ id: string; threadId?: string }>;
  nextPageToken?: string;
}

const isRecoverableNetworkError = (error: unknown) => {
  const asError = error as { code?: string; errno?: string };
  const message = String(error).toLowerCase();
  return (
    asError.code === 'ECONNRESET'
    || asError.code === 'ETIMEDOUT'
    || asError.code === 'EAI_AGAIN'
    || asError.errno === 'ECONNRESET'
    || asError.errno === 'ETIMEDOUT'
    || message.includes('timed out')
    || message.includes('timeout')
    || message.includes('connection')
    || message.includes('network')
  );
};

const isRetryableStatus = (status: number) => status === 429 || status === 408 || (status >= 500 && status <= 599);

const isTokenInvalidStatus = (status: number) => status === 401 || status === 403;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const nextBackoffMs = (attempt: number) => Math.min(500 * 2 ** attempt, 8000);

class GmailApiError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'GmailApiError';
  }
}

export const gmailApiRequest = async <T>(
  context: GmailRequestContext,
  path: string,
  init: RequestInit = {},
): Promise<T> => {
  const fetchImpl = context.fetchImpl ?? fetch;
  const sleep = context.sleep ?? defaultSleep;
  const maxAttempts = 4;
  let forceRefresh = false;
  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    try {
      const accessToken = await context.tokens.getAccessToken(forceRefresh);
      forceRefresh = false;

      const response = await fetchImpl(`${GMAIL_API_BASE}${path}`, {
        ...init,
        headers: {
          Authorization: `Bearer ${accessToken}`,
          Accept: 'application/json',
          ...(init.body ? { 'Content-Type': 'application/json' } : {}),
        },
      });

      if (!response.ok) {
        const text = await response.text().catch(() => '');
        const error = new GmailApiError(
          response.status,
          `Gmail API ${response.status} ${response.statusText}: ${text.slice(0, 500)}`,
        );
        if (isTokenInvalidStatus(response.status) && attempt < maxAttempts - 1) {
          forceRefresh = true;
          await sleep(nextBackoffMs(attempt));
          continue;
        }
        if (isRetryableStatus(response.status) && attempt < maxAttempts - 1) {
          await sleep(nextBackoffMs(attempt));
          continue;
        }
        throw error;
      }

      return await response.json() as T;
    } catch (error) {
      lastError = error;
      if (error instanceof GmailApiError || attempt >= maxAttempts - 1 || !isRecoverableNetworkError(error)) {
        throw error;
      }
      await sleep(nextBackoffMs(attempt));
    }
  }

  throw lastError;
};

const toProviderLabel = (label: GmailLabelPayload): ProviderLabel => ({
  id: label.id,
  name: label.name,
  type: label.type === 'system' ? 'system' : 'user',
  messagesTotal: label.messagesTotal ?? 0,
  messagesUnread: label.messagesUnread ?? 0,
});

export const buildMessageListPath = (options: ListMessagesOptions) => {
  const query = new URLSearchParams();
  query.set('maxResults', String(options.maxResults));
  if (options.query) query.set('q', options.query);
  for (const labelId of options.labelIds ?? []) {
    query.append('labelIds', labelId);
  }
  if (options.pageToken) query.set('pageToken', options.pageToken);
  return `/messages?${query.toString()}`;
};

export const createGmailProvider = (context: GmailRequestContext): MailProvider => {
  const fetchMessage = async (gmailMessageId: string): Promise<NormalizedEmail> => {
    const payload = await gmailApiRequest<GmailRawMessage>(
      context,
      `/messages/${encodeURIComponent(gmailMessageId)}?format=raw`,
    );
    return parseGmailRawMessage(payload);
  };

  return {
    async listLabels() {
      const payload = await gmailApiRequest<{ labels?: GmailLabelPayload[] }>(context, '/labels');
      return (payload.labels ?? []).map(toProviderLabel);
    },

    async listMessages(options): Promise<MessagePage> {
      const payload = await gmailApiRequest<GmailMessageListPayload>(context, buildMessageListPath(options));
      const messages: NormalizedEmail[] = [];
      for (const entry of payload.messages ?? []) {
        messages.push(await fetchMessage(entry.id));
      }
      return {
        messages,
        nextPageToken: payload.nextPageToken || null,
      };
    },

    async getProfile() {
      const payload = await gmailApiRequest<{ emailAddress?: string }>(context, '/profile');
      if (!payload.emailAddress) {
        throw new Error('Gmail profile has no email address');
      }
      return { emailAddress: payload.emailAddress };
    },
  };
};
