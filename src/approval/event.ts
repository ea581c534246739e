/**
 * Approval Event Filter
 *
 * Decides whether a Feishu event envelope should be processed. Both envelope
 * generations are accepted:
 * - v2: { schema: "2.0", header: { event_type }, event: { ... } }
 * - v1: { type: "event_callback", event: { type: "approval_instance", ... } }
 *
 * Status and instance code are read from whichever field the envelope carries:
 * - status: event.status | event.instance_status | event.object.status
 * - instance code: event.instance_code | event.approval_code | event.object.instance_code
 *
 * Only approval-instance events with status APPROVED are accepted.
 */

import { isRecord } from './form-parser.js';

export const APPROVAL_INSTANCE_MARKER = 'approval_instance';
export const APPROVED_STATUS = 'APPROVED';

export type EventDecision =
  | { accepted: true; instanceCode: string }
  | { accepted: false; reason: string };

function textAt(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value ? value : undefined;
}

/** The event type, from the v2 header or the v1 event body */
export function readEventType(envelope: Record<string, unknown>): string | undefined {
  if (isRecord(envelope.header)) {
    const fromHeader = textAt(envelope.header, 'event_type');
    if (fromHeader) return fromHeader;
  }
  return isRecord(envelope.event) ? textAt(envelope.event, 'type') : undefined;
}

export function parseApprovalEvent(envelope: unknown): EventDecision {
  if (!isRecord(envelope)) {
    return { accepted: false, reason: 'Payload is not an object' };
  }

  const eventType = readEventType(envelope);
  if (eventType && !eventType.includes(APPROVAL_INSTANCE_MARKER)) {
    return { accepted: false, reason: `Not an approval instance event: ${eventType}` };
  }

  const event: Record<string, unknown> = isRecord(envelope.event) ? envelope.event : {};
  const object: Record<string, unknown> = isRecord(event.object) ? event.object : {};

  const status = textAt(event, 'status') ?? textAt(event, 'instance_status') ?? textAt(object, 'status');
  if (status !== APPROVED_STATUS) {
    return { accepted: false, reason: `Status is ${status ?? 'missing'}` };
  }

  const instanceCode = textAt(event, 'instance_code') ?? textAt(event, 'approval_code') ?? textAt(object, 'instance_code');
  if (!instanceCode) {
    return { accepted: false, reason: 'No instance code in event' };
  }

  return { accepted: true, instanceCode };
}
