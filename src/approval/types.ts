/**
 * Approval Form Type Definitions
 *
 * Feishu approval forms arrive as a JSON text blob: an array of controls shaped
 * `{ name, type, value, ext }`, where `value` and `ext` change shape with `type`.
 * The parser (form-parser.ts) narrows each raw control into the FormControl union
 * below so downstream code only sees the fields valid for that control kind.
 *
 * Consumers:
 * - form-walker.ts, attachment-resolver.ts, field-aggregator.ts
 * - processor.ts (orchestration)
 */

// ---------------------------------------------------------------------------
// Parse outcomes
// ---------------------------------------------------------------------------

/** Result of a best-effort parse step. Failures carry a reason for logs and tests. */
export type ParseOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

// ---------------------------------------------------------------------------
// Form Controls
// ---------------------------------------------------------------------------

/** Raw `type` values that carry file attachments */
export const ATTACHMENT_TYPES = ['attachment', 'attachmentV2'] as const;
export type AttachmentControlType = (typeof ATTACHMENT_TYPES)[number];

/** A monetary summary entry from a fieldList's `ext` */
export interface AmountSummary {
  /** Pre-rendered total, used when sumItems cannot be parsed */
  value: string;
  /** JSON text: [{ value, currency }, ...] */
  sumItems: string;
}

export interface InputControl {
  kind: 'input';
  name: string;
  value: string;
}

export interface AmountControl {
  kind: 'amount';
  name: string;
  value: string;
  /** ext.currency, null when absent */
  currency: string | null;
}

export interface FieldListControl {
  kind: 'fieldList';
  name: string;
  /** Each row is itself a list of controls */
  rows: FormControl[][];
  summaries: AmountSummary[];
  /** True when rows were not parsed because the nesting limit was reached */
  truncated: boolean;
}

export interface AttachmentControl {
  kind: 'attachment';
  type: AttachmentControlType;
  name: string;
  value: unknown;
  ext: unknown;
}

export interface SelectControl {
  kind: 'select';
  name: string;
  value: unknown;
}

/** Anything the parser does not recognize. Passed through, never interpreted. */
export interface UnknownControl {
  kind: 'unknown';
  type: string;
  name: string;
  value: unknown;
  ext: unknown;
}

export type FormControl =
  | InputControl
  | AmountControl
  | FieldListControl
  | AttachmentControl
  | SelectControl
  | UnknownControl;

export type FormDocument = readonly FormControl[];

// ---------------------------------------------------------------------------
// Attachments
// ---------------------------------------------------------------------------

/**
 * A file referenced by the form.
 * At least one of fileToken / downloadUrl is non-empty; content is set after download.
 */
export interface AttachmentDescriptor {
  fileToken: string;
  name: string;
  mimeType?: string;
  downloadUrl?: string;
  content?: Buffer;
}

// ---------------------------------------------------------------------------
// Walk & Summary
// ---------------------------------------------------------------------------

export interface WalkResult {
  fields: FormControl[];
  attachments: AttachmentDescriptor[];
  /** fieldList controls whose rows were dropped by the nesting limit */
  truncatedGroups: number;
}

export interface ExtractedSummary {
  /** Empty when no title field was found; the caller substitutes a fallback */
  title: string;
  /** Human-readable, currency-annotated; empty when no amount was found */
  amount: string;
}

/** Labels and defaults the aggregator matches against */
export interface FieldRules {
  titleField: string;
  amountField: string;
  defaultCurrency: string;
}

/** Approval category name → destination mailbox (empty string means "no destination") */
export type CategoryMap = ReadonlyMap<string, string>;
