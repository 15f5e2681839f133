import PostalMime from 'postal-mime';
import { toIsoString } from '../db/queryable.js';
import type { NormalizedEmail } from '../shared/types.js';

export interface GmailRawMessage {
  id: string;
  threadId?: string;
  labelIds?: string[];
  snippet?: string;
  internalDate?: string;
  raw?: string;
}

type ParsedEmail = Awaited<ReturnType<PostalMime['parse']>>;
type ParsedAddress = NonNullable<ParsedEmail['from']>;

export const decodeBase64UrlToBuffer = (value: string) => {
  const normalized = value.replace(/-/g, '+').replace(/_/g, '/');
  const padded = normalized + '='.repeat((4 - (normalized.length % 4)) % 4);
  return Buffer.from(padded, 'base64');
};

const formatAddress = (value: ParsedAddress): string => {
  if ('group' in value && Array.isArray(value.group)) {
    return value.group.map((member) => formatAddress(member)).join(', ');
  }
  const address = 'address' in value ? value.address ?? '' : '';
  if (value.name && address) {
    return `${value.name} <${address}>`;
  }
  return address || value.name || '';
};

const formatAddressList = (values: ParsedAddress[] | undefined): string | null => {
  if (!values || values.length === 0) return null;
  const formatted = values.map(formatAddress).filter(Boolean).join(', ');
  return formatted || null;
};

const headersToObject = (headers: Array<{ key: string; value: string }>) => {
  const normalized: Record<string, string> = {};
  for (const header of headers) {
    const key = header.key.toLowerCase();
    normalized[key] = normalized[key] ? `${normalized[key]}\n${header.value}` : header.value;
  }
  return normalized;
};

const internalDateToIso = (value?: string) => {
  if (!value) return null;
  const millis = Number(value);
  return Number.isFinite(millis) ? new Date(millis).toISOString() : null;
};

export const parseGmailRawMessage = async (message: GmailRawMessage): Promise<NormalizedEmail> => {
  if (!message.raw) {
    throw new Error(`gmail message ${message.id} has no raw payload`);
  }

  const parser = new PostalMime();
  const parsed = await parser.parse(decodeBase64UrlToBuffer(message.raw));

  return {
    id: message.id,
    threadId: message.threadId ?? null,
    subject: parsed.subject ?? null,
    sender: parsed.from ? formatAddress(parsed.from) || null : null,
    recipient: formatAddressList(parsed.to),
    cc: formatAddressList(parsed.cc),
    bcc: formatAddressList(parsed.bcc),
    dateSent: toIsoString(parsed.date ?? null),
    dateReceived: internalDateToIso(message.internalDate),
    bodyText: parsed.text ?? null,
    bodyHtml: parsed.html ?? null,
    snippet: message.snippet ?? null,
    labelIds: message.labelIds ?? [],
    headers: headersToObject(parsed.headers),
    attachmentCount: parsed.attachments.length,
  };
};
