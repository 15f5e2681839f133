import assert from 'node:assert/strict';
import { decodeBase64UrlToBuffer, parseGmailRawMessage } from '../messageParser.js';
import { finish, test } from './support/memoryStores.js';

const encode = (lines: string[]) => Buffer.from(lines.join('\r\n')).toString('base64url');

await test('decodes unpadded base64url payloads', () => {
  const source = 'subject?>~ with padding';
  const encoded = Buffer.from(source).toString('base64url');
  assert.equal(encoded.includes('='), false);
  assert.equal(decodeBase64UrlToBuffer(encoded).toString('utf8'), source);
});

await test('counts attachments and joins address lists', async () => {
  const raw = encode([
    'From: reports@example.com',
    'To: Ann <ann@example.com>, ben@example.com',
    'Cc: Carol <carol@example.com>',
    'Subject: Monthly report',
    'Received: from relay-a.example.com',
    'Received: from relay-b.example.com',
    'MIME-Version: 1.0',
    'Content-Type: multipart/mixed; boundary="part-boundary"',
    '',
    '--part-boundary',
    'Content-Type: text/plain; charset=utf-8',
    '',
    'See attached.',
    '--part-boundary',
    'Content-Type: text/plain; name="notes.txt"',
    'Content-Disposition: attachment; filename="notes.txt"',
    '',
    'first line of notes',
    '--part-boundary--',
    '',
  ]);

  const email = await parseGmailRawMessage({ id: 'm2', raw });

  assert.equal(email.id, 'm2');
  assert.equal(email.threadId, null);
  assert.equal(email.subject, 'Monthly report');
  assert.equal(email.sender, 'reports@example.com');
  assert.equal(email.recipient, 'Ann <ann@example.com>, ben@example.com');
  assert.equal(email.cc, 'Carol <carol@example.com>');
  assert.equal(email.bcc, null);
  assert.equal(email.bodyText?.trim(), 'See attached.');
  assert.equal(email.attachmentCount, 1);
  assert.equal(email.dateSent, null);
  assert.equal(email.dateReceived, null);
  assert.equal(email.snippet, null);
  assert.deepEqual(email.labelIds, []);
  assert.equal(email.headers.received, 'from relay-a.example.com\nfrom relay-b.example.com');
});

await test('rejects messages without a raw payload', async () => {
  await assert.rejects(parseGmailRawMessage({ id: 'm3' }), /gmail message m3 has no raw payload/);
});

finish();
