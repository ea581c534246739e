/**
 * Form Walker
 *
 * Depth-first walk over a parsed form document, producing:
 * - fields: every non-attachment control at every nesting level, in document order.
 *   fieldList controls are included themselves (the aggregator reads their amount
 *   summaries) followed by the controls of each of their rows.
 * - attachments: descriptors from every attachment control, deduplicated.
 *
 * The tree is bounded by the parser's depth limit, so the recursion here is too.
 */

import { dedupeAttachments, resolveAttachmentControl } from './attachment-resolver.js';
import { parseFormDocument } from './form-parser.js';
import type { ParseOptions } from './form-parser.js';
import type { AttachmentDescriptor, FormControl, FormDocument, WalkResult } from './types.js';

function visit(
  controls: readonly FormControl[],
  fields: FormControl[],
  attachments: AttachmentDescriptor[],
): number {
  let truncatedGroups = 0;

  for (const control of controls) {
    switch (control.kind) {
      case 'fieldList':
        fields.push(control);
        if (control.truncated) truncatedGroups++;
        for (const row of control.rows) {
          truncatedGroups += visit(row, fields, attachments);
        }
        break;

      case 'attachment':
        attachments.push(...resolveAttachmentControl(control));
        break;

      default:
        fields.push(control);
    }
  }

  return truncatedGroups;
}

export function walkForm(document: FormDocument): WalkResult {
  const fields: FormControl[] = [];
  const attachments: AttachmentDescriptor[] = [];
  const truncatedGroups = visit(document, fields, attachments);

  return { fields, attachments: dedupeAttachments(attachments), truncatedGroups };
}

/**
 * Parse and walk form JSON text in one step.
 * Text that is not a JSON array yields an empty result.
 */
export function walkFormText(text: string, options: ParseOptions = {}): WalkResult {
  const parsed = parseFormDocument(text, options);
  if (!parsed.ok) {
    return { fields: [], attachments: [], truncatedGroups: 0 };
  }
  return walkForm(parsed.value);
}
