/**
 * Form Parser — JSON Text → FormControl Tree
 *
 * Narrows the weakly-typed Feishu form JSON into the FormControl union.
 * Parsing is best-effort: nodes that are not objects are dropped, unrecognized
 * control types become `unknown` controls, and rows that are not arrays are skipped.
 *
 * Nesting is bounded by `maxDepth`: a fieldList whose rows would sit deeper than
 * the limit keeps its summaries but gets no rows and `truncated: true`.
 *
 * Pure functions — no side effects, no I/O.
 */

import { ATTACHMENT_TYPES } from './types.js';
import type {
  AmountSummary,
  AttachmentControlType,
  FormControl,
  FormDocument,
  ParseOutcome,
} from './types.js';

export const DEFAULT_MAX_DEPTH = 16;

export interface ParseOptions {
  maxDepth?: number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** JSON.parse that reports failure instead of throwing */
export function tryParseJson(text: string): ParseOutcome<unknown> {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

/** Render a scalar form value as text. Objects, arrays and null render empty. */
export function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function isAttachmentType(type: string): type is AttachmentControlType {
  return ATTACHMENT_TYPES.some(attachmentType => attachmentType === type);
}

// ---------------------------------------------------------------------------
// Control parsing
// ---------------------------------------------------------------------------

function parseSummaries(ext: unknown): AmountSummary[] {
  if (!Array.isArray(ext)) return [];

  const summaries: AmountSummary[] = [];
  for (const item of ext) {
    if (!isRecord(item) || item.type !== 'amount') continue;
    const sumItems = item.sumItems;
    summaries.push({
      value: toText(item.value),
      // Some templates send the list already decoded
      sumItems: Array.isArray(sumItems) ? JSON.stringify(sumItems) : toText(sumItems),
    });
  }
  return summaries;
}

function parseRows(value: unknown, depth: number, maxDepth: number): FormControl[][] {
  if (!Array.isArray(value)) return [];

  const rows: FormControl[][] = [];
  for (const row of value) {
    if (Array.isArray(row)) {
      rows.push(parseControls(row, depth + 1, maxDepth));
    }
  }
  return rows;
}

/**
 * Narrow one raw control. Returns null for nodes that are not objects.
 *
 * @param depth - Nesting level of this control (0 = top level)
 */
export function parseControl(raw: unknown, depth = 0, maxDepth = DEFAULT_MAX_DEPTH): FormControl | null {
  if (!isRecord(raw)) return null;

  const name = toText(raw.name);
  const type = toText(raw.type);

  switch (type) {
    case 'input':
      return { kind: 'input', name, value: toText(raw.value) };

    case 'amount':
      return {
        kind: 'amount',
        name,
        value: toText(raw.value),
        currency: isRecord(raw.ext) && typeof raw.ext.currency === 'string' && raw.ext.currency
          ? raw.ext.currency
          : null,
      };

    case 'fieldList': {
      const truncated = depth + 1 > maxDepth;
      return {
        kind: 'fieldList',
        name,
        rows: truncated ? [] : parseRows(raw.value, depth, maxDepth),
        summaries: parseSummaries(raw.ext),
        truncated,
      };
    }

    case 'select':
      return { kind: 'select', name, value: raw.value };

    default:
      if (isAttachmentType(type)) {
        return { kind: 'attachment', type, name, value: raw.value, ext: raw.ext };
      }
      return { kind: 'unknown', type, name, value: raw.value, ext: raw.ext };
  }
}

export function parseControls(raw: readonly unknown[], depth = 0, maxDepth = DEFAULT_MAX_DEPTH): FormControl[] {
  const controls: FormControl[] = [];
  for (const node of raw) {
    const control = parseControl(node, depth, maxDepth);
    if (control) controls.push(control);
  }
  return controls;
}

/**
 * Parse the form JSON text of an approval instance.
 *
 * Fails (without throwing) when the text is not JSON or not a JSON array.
 */
export function parseFormDocument(text: string, options: ParseOptions = {}): ParseOutcome<FormDocument> {
  const parsed = tryParseJson(text);
  if (!parsed.ok) return parsed;

  if (!Array.isArray(parsed.value)) {
    return { ok: false, reason: 'Form document is not an array' };
  }

  return { ok: true, value: parseControls(parsed.value, 0, options.maxDepth ?? DEFAULT_MAX_DEPTH) };
}
