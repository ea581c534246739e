/**
 * MIME Message Builder
 *
 * Constructs an RFC 2822 multipart/mixed message: a UTF-8 plain text part
 * followed by one base64 part per attachment. The result is handed to the SMTP
 * transport as a raw message.
 *
 * - Lines use CRLF (\r\n); body newlines (\n) are converted
 * - Non-ASCII subjects and filenames use RFC 2047 encoded-words, split into
 *   words of at most 45 UTF-8 bytes and folded so no line nears 998 octets
 * - Base64 content is wrapped at 76 characters
 * - CR/LF are stripped from header values
 *
 * Uses Node.js built-in Buffer only.
 */

import { randomBytes } from 'node:crypto';
import type { MimeMessageInput } from './types.js';

const CRLF = '\r\n';
const BASE64_LINE_LENGTH = 76;
const FOLD = `${CRLF} `;

/** 45 bytes → 60 base64 chars → a 72-char encoded-word (limit 75) */
const ENCODED_WORD_MAX_BYTES = 45;

/** ASCII values longer than this are encoded so they can be folded */
const MAX_PLAIN_HEADER_LENGTH = 900;

/** Remove line breaks so a value cannot start a new header */
function sanitizeHeader(value: string): string {
  return value.replace(/[\r\n]+/g, ' ');
}

function isAscii(text: string): boolean {
  // eslint-disable-next-line no-control-regex
  return /^[\x00-\x7F]*$/.test(text);
}

function encodedWord(text: string): string {
  return `=?UTF-8?B?${Buffer.from(text, 'utf-8').toString('base64')}?=`;
}

/**
 * Splits a header value into RFC 2047 encoded-words, never inside a code
 * point. Short ASCII values come back as a single plain word.
 */
export function encodeHeaderWords(value: string): string[] {
  const clean = sanitizeHeader(value);
  if (isAscii(clean) && clean.length <= MAX_PLAIN_HEADER_LENGTH) return [clean];

  const words: string[] = [];
  let chunk = '';
  for (const char of clean) {
    if (chunk && Buffer.byteLength(chunk + char, 'utf-8') > ENCODED_WORD_MAX_BYTES) {
      words.push(encodedWord(chunk));
      chunk = '';
    }
    chunk += char;
  }
  if (chunk) words.push(encodedWord(chunk));
  return words;
}

/** Header value with encoded-words folded onto continuation lines */
export function encodeHeaderValue(value: string): string {
  return encodeHeaderWords(value).join(FOLD);
}

/** Quoted parameter value for Content-Type name / Content-Disposition filename */
function encodeParameter(value: string): string {
  const words = encodeHeaderWords(value).map(word => word.replace(/(["\\])/g, '\\$1'));
  return `"${words.join(FOLD)}"`;
}

/** Base64 encode and wrap at 76 characters per line */
export function toBase64Lines(content: Buffer): string {
  const base64 = content.toString('base64');
  const lines: string[] = [];
  for (let i = 0; i < base64.length; i += BASE64_LINE_LENGTH) {
    lines.push(base64.slice(i, i + BASE64_LINE_LENGTH));
  }
  return lines.join(CRLF);
}

export function createBoundary(): string {
  return `----=_Part_${randomBytes(12).toString('hex')}`;
}

/**
 * Builds a multipart/mixed MIME message with a plain text body and attachments.
 *
 * @param input - Message headers, body and attachments
 * @returns The raw message with CRLF line endings
 */
export function buildMimeMessage(input: MimeMessageInput): string {
  const boundary = input.boundary ?? createBoundary();
  const date = input.date ?? new Date();

  const headers = [
    `From: ${sanitizeHeader(input.from)}`,
    `To: ${sanitizeHeader(input.to)}`,
    `Subject: ${encodeHeaderValue(input.subject)}`,
    `Date: ${date.toUTCString()}`,
    'MIME-Version: 1.0',
    `Content-Type: multipart/mixed; boundary="${boundary}"`,
  ];

  const body = input.body.replace(/\r?\n/g, CRLF);
  const parts = [
    [
      'Content-Type: text/plain; charset=utf-8',
      'Content-Transfer-Encoding: base64',
      '',
      toBase64Lines(Buffer.from(body, 'utf-8')),
    ].join(CRLF),
  ];

  for (const attachment of input.attachments) {
    parts.push(
      [
        `Content-Type: ${sanitizeHeader(attachment.mimeType)}; name=${encodeParameter(attachment.filename)}`,
        `Content-Disposition: attachment; filename=${encodeParameter(attachment.filename)}`,
        'Content-Transfer-Encoding: base64',
        '',
        toBase64Lines(attachment.content),
      ].join(CRLF),
    );
  }

  const multipart = parts.map(part => `--${boundary}${CRLF}${part}`).join(CRLF);

  return `${headers.join(CRLF)}${CRLF}${CRLF}${multipart}${CRLF}--${boundary}--${CRLF}`;
}
