export type SyncState = 'pending' | 'running' | 'completed' | 'failed';

export interface UserRecord {
  id: string;
  email: string;
  gmailUserId: string | null;
  accessToken: string | null;
  refreshToken: string | null;
  tokenExpiry: string | null;
  isActive: boolean;
}

export interface TokenSet {
  accessToken: string;
  refreshToken: string | null;
  tokenExpiry: string | null;
}

export interface ProviderLabel {
  id: string;
  name: string;
  type?: 'system' | 'user';
  messagesTotal?: number;
  messagesUnread?: number;
}

export interface NormalizedEmail {
  id: string;
  threadId: string | null;
  subject: string | null;
  sender: string | null;
  recipient: string | null;
  cc: string | null;
  bcc: string | null;
  dateSent: string | null;
  dateReceived: string | null;
  bodyText: string | null;
  bodyHtml: string | null;
  snippet: string | null;
  labelIds: string[];
  headers: Record<string, string>;
  attachmentCount: number;
}

export interface MessagePage {
  messages: NormalizedEmail[];
  nextPageToken: string | null;
}

export interface ListMessagesOptions {
  query?: string;
  maxResults: number;
  labelIds?: string[];
  pageToken?: string;
}

export interface MailProvider {
  listLabels(): Promise<ProviderLabel[]>;
  listMessages(options: ListMessagesOptions): Promise<MessagePage>;
  getProfile(): Promise<{ emailAddress: string }>;
}

export type MailProviderFactory = (userId: string | null, tokens: TokenSet) => MailProvider;

export interface SyncStatusRecord {
  userId: string;
  status: SyncState;
  lastSync: string | null;
  emailsSynced: number;
  errorMessage: string | null;
}

export type SyncStatusView =
  | { userId: string; status: 'never_synced' }
  | { userId: string; status: 'pending' | 'running' | 'completed'; lastSync: string | null; emailsSynced: number }
  | { userId: string; status: 'failed'; lastSync: string | null; emailsSynced: number; errorMessage: string | null };

export type SyncResult =
  | { userId: string; status: 'completed'; emailsSynced: number; labelsSynced: number }
  | { userId: string; status: 'failed'; error: string };

export interface SyncLogger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}
