/**
 * Attachment Resolver — Attachment Control → AttachmentDescriptor[]
 *
 * Attachment controls (`attachment`, `attachmentV2`) encode their files in several ways:
 * - value as JSON text or already-decoded JSON
 * - value as a bare URL string (not JSON at all)
 * - entries as URL strings or as objects with file_token/token, name/file_name, url/download_url
 * - filenames carried separately in `ext` (comma-separated text, an object, or an array)
 *
 * Each decision is an explicit branch (decideAttachmentValue, candidateNames, describeEntry)
 * so it can be tested on its own. resolveAttachmentControl never throws: malformed entries
 * are dropped.
 *
 * Pure functions — no side effects, no I/O.
 */

import { isRecord, tryParseJson } from './form-parser.js';
import type { AttachmentControl, AttachmentDescriptor } from './types.js';

const URL_SCHEME = /^https?:\/\//i;

/** How a control's value was interpreted */
export type AttachmentValueDecision =
  | { kind: 'empty' }
  | { kind: 'entries'; entries: unknown[] }
  | { kind: 'discarded'; reason: string };

/** Generated name for the i-th (zero-based) file of a control */
export function fallbackName(index: number): string {
  return `attachment_${index + 1}`;
}

function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined || value === '' || value === false || value === 0) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isRecord(value)) return Object.keys(value).length === 0;
  return false;
}

function firstText(record: Record<string, unknown>, keys: readonly string[]): string {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value) return value;
  }
  return '';
}

// ---------------------------------------------------------------------------
// Decisions
// ---------------------------------------------------------------------------

/**
 * Interpret a control's value as a list of file entries.
 *
 * Text is parsed as JSON first; text that is not JSON is kept only when it is a URL.
 */
export function decideAttachmentValue(value: unknown): AttachmentValueDecision {
  if (isEmptyValue(value)) return { kind: 'empty' };

  let decoded = value;
  if (typeof value === 'string') {
    const parsed = tryParseJson(value);
    if (parsed.ok) {
      decoded = parsed.value;
    } else if (URL_SCHEME.test(value)) {
      return { kind: 'entries', entries: [value] };
    } else {
      return { kind: 'discarded', reason: `Value is neither JSON nor a URL: ${parsed.reason}` };
    }
  }

  if (isEmptyValue(decoded)) return { kind: 'empty' };
  return { kind: 'entries', entries: Array.isArray(decoded) ? decoded : [decoded] };
}

/**
 * Filenames carried in `ext`, positionally aligned with the value entries.
 * Missing or unusable positions are returned as empty strings.
 */
export function candidateNames(ext: unknown): string[] {
  if (typeof ext === 'string') {
    return ext ? ext.split(',').map(name => name.trim()) : [];
  }
  if (isRecord(ext)) {
    const name = firstText(ext, ['name', 'file_name']);
    return name ? [name] : [];
  }
  if (Array.isArray(ext)) {
    return ext.map(name => (typeof name === 'string' ? name.trim() : ''));
  }
  return [];
}

/**
 * Build the descriptor for one entry, or null when the entry is unusable
 * (neither a URL nor an object with a file token or URL).
 */
export function describeEntry(
  entry: unknown,
  index: number,
  names: readonly string[],
): AttachmentDescriptor | null {
  const extName = names[index] || '';

  if (typeof entry === 'string') {
    if (!URL_SCHEME.test(entry)) return null;
    return {
      fileToken: '',
      name: extName || fallbackName(index),
      downloadUrl: entry,
    };
  }

  if (!isRecord(entry)) return null;

  const fileToken = firstText(entry, ['file_token', 'token']);
  const downloadUrl = firstText(entry, ['url', 'download_url']);
  if (!fileToken && !downloadUrl) return null;

  const descriptor: AttachmentDescriptor = {
    fileToken,
    name: firstText(entry, ['name', 'file_name']) || extName || fallbackName(index),
  };
  const mimeType = firstText(entry, ['mime_type']);
  if (mimeType) descriptor.mimeType = mimeType;
  if (downloadUrl) descriptor.downloadUrl = downloadUrl;
  return descriptor;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** All files referenced by one attachment control, in entry order */
export function resolveAttachmentControl(control: AttachmentControl): AttachmentDescriptor[] {
  const decision = decideAttachmentValue(control.value);
  if (decision.kind !== 'entries') return [];

  const names = candidateNames(control.ext);
  const descriptors: AttachmentDescriptor[] = [];
  decision.entries.forEach((entry, index) => {
    const descriptor = describeEntry(entry, index, names);
    if (descriptor) descriptors.push(descriptor);
  });
  return descriptors;
}

/** Identity used for deduplication: the file token, else the download URL */
export function attachmentKey(attachment: AttachmentDescriptor): string {
  return attachment.fileToken ? `token:${attachment.fileToken}` : `url:${attachment.downloadUrl ?? ''}`;
}

/** Drop repeated files, keeping the first occurrence */
export function dedupeAttachments(attachments: readonly AttachmentDescriptor[]): AttachmentDescriptor[] {
  const seen = new Set<string>();
  return attachments.filter(attachment => {
    const key = attachmentKey(attachment);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
