/**
 * Field Aggregator — title and amount from walked form fields
 *
 * Title and amount are independent first-match searches over the fields in
 * document order:
 * - title: first `input` control named rules.titleField
 * - amount: first `amount` control named rules.amountField ("{value} {currency}");
 *   when there is none, the first fieldList whose amount summary renders, e.g.
 *   "50 SEK, 10 EUR"
 *
 * Pure function.
 */

import { isRecord, toText, tryParseJson } from './form-parser.js';
import type {
  AmountSummary,
  ExtractedSummary,
  FieldListControl,
  FieldRules,
  FormControl,
  ParseOutcome,
} from './types.js';

export const DEFAULT_FIELD_RULES: FieldRules = {
  titleField: '名称',
  amountField: '金额',
  defaultCurrency: 'SEK',
};

// ---------------------------------------------------------------------------
// Amount summaries (fieldList ext)
// ---------------------------------------------------------------------------

/** Parse sumItems JSON text into "value currency" parts */
export function parseSumItems(sumItems: string): ParseOutcome<string[]> {
  const parsed = tryParseJson(sumItems);
  if (!parsed.ok) return parsed;
  if (!Array.isArray(parsed.value)) {
    return { ok: false, reason: 'sumItems is not a list' };
  }

  const parts = parsed.value
    .filter(isRecord)
    .map(item => `${toText(item.value)} ${toText(item.currency)}`);
  return { ok: true, value: parts };
}

/**
 * Render a fieldList's amount. Only the first amount summary is considered;
 * an empty string means this fieldList yields no amount.
 */
export function renderFieldListAmount(control: FieldListControl): string {
  const summary: AmountSummary | undefined = control.summaries[0];
  if (!summary || !summary.sumItems) return '';

  const parts = parseSumItems(summary.sumItems);
  return parts.ok ? parts.value.join(', ') : summary.value;
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

function findTitle(fields: readonly FormControl[], rules: FieldRules): string {
  for (const field of fields) {
    if (field.kind === 'input' && field.name === rules.titleField) {
      return field.value;
    }
  }
  return '';
}

function findAmount(fields: readonly FormControl[], rules: FieldRules): string {
  for (const field of fields) {
    if (field.kind === 'amount' && field.name === rules.amountField) {
      return `${field.value} ${field.currency ?? rules.defaultCurrency}`;
    }
  }

  for (const field of fields) {
    if (field.kind !== 'fieldList') continue;
    const amount = renderFieldListAmount(field);
    if (amount) return amount;
  }

  return '';
}

export function extractSummary(
  fields: readonly FormControl[],
  rules: FieldRules = DEFAULT_FIELD_RULES,
): ExtractedSummary {
  return {
    title: findTitle(fields, rules),
    amount: findAmount(fields, rules),
  };
}
