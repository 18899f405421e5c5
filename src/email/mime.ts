/**
 * MIME Message Encoder
 *
 * Constructs an RFC 2822 compliant MIME message and base64url encodes it
 * for the Gmail API `message.raw` field.
 *
 * - Headers use CRLF (\r\n) line endings per RFC 2822
 * - HTML-only messages are a single text/html part
 * - Messages with attachments are multipart/mixed: the HTML part first,
 *   then one base64 part per attachment (lines wrapped at 76 characters)
 * - Output is base64url encoded (no +, /, or = padding)
 */

import { randomUUID } from 'node:crypto';
import type { ReportAttachment } from '../report/index.js';
import type { MimeMessageInput } from './types.js';

const CRLF = '\r\n';

/**
 * Encodes an HTML email (with optional attachments) as a base64url-encoded
 * RFC 2822 MIME message.
 */
export function encodeMimeMessage(input: MimeMessageInput): string {
  return toBase64Url(Buffer.from(buildMimeMessage(input)));
}

/** The raw MIME text before transport encoding */
export function buildMimeMessage(input: MimeMessageInput): string {
  const headerLines = [
    `From: ${input.from}`,
    `To: ${input.to.join(', ')}`,
    `Subject: ${encodeHeaderValue(input.subject)}`,
    'MIME-Version: 1.0',
  ];

  const attachments = input.attachments ?? [];
  if (attachments.length === 0) {
    headerLines.push('Content-Type: text/html; charset=utf-8', 'Content-Transfer-Encoding: base64');
    return `${headerLines.join(CRLF)}${CRLF}${CRLF}${wrapBase64(Buffer.from(input.html, 'utf-8'))}`;
  }

  const boundary = input.boundary ?? `sales-report-${randomUUID()}`;
  headerLines.push(`Content-Type: multipart/mixed; boundary="${boundary}"`);

  const parts = [
    [
      'Content-Type: text/html; charset=utf-8',
      'Content-Transfer-Encoding: base64',
      '',
      wrapBase64(Buffer.from(input.html, 'utf-8')),
    ].join(CRLF),
    ...attachments.map(attachmentPart),
  ];

  const body = parts.map(part => `--${boundary}${CRLF}${part}`).join(CRLF);
  return `${headerLines.join(CRLF)}${CRLF}${CRLF}${body}${CRLF}--${boundary}--`;
}

function attachmentPart(attachment: ReportAttachment): string {
  const filename = encodeHeaderValue(attachment.filename).replace(/"/g, '');
  return [
    `Content-Type: ${attachment.contentType}; name="${filename}"`,
    `Content-Disposition: attachment; filename="${filename}"`,
    'Content-Transfer-Encoding: base64',
    '',
    wrapBase64(attachment.content),
  ].join(CRLF);
}

/**
 * RFC 2047 encoded-word for non-ASCII header values. ASCII-only values pass
 * through unchanged.
 */
function encodeHeaderValue(value: string): string {
  // eslint-disable-next-line no-control-regex
  if (/^[\x00-\x7F]*$/.test(value)) return value;
  return `=?UTF-8?B?${Buffer.from(value, 'utf-8').toString('base64')}?=`;
}

function wrapBase64(content: Buffer): string {
  return content.toString('base64').match(/.{1,76}/g)?.join(CRLF) ?? '';
}

function toBase64Url(content: Buffer): string {
  return content
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=+$/, '');
}
