/**
 * Tests for the approval event filter
 */

import { describe, it, expect } from 'vitest';
import { parseApprovalEvent, readEventType } from '../event.js';

describe('parseApprovalEvent', () => {
  it('accepts an approved v2 event', () => {
    expect(
      parseApprovalEvent({
        schema: '2.0',
        header: { event_type: 'approval_instance' },
        event: { instance_code: 'INST-1', status: 'APPROVED' },
      }),
    ).toEqual({ accepted: true, instanceCode: 'INST-1' });
  });

  it('accepts an approved v1 event with a nested object', () => {
    expect(
      parseApprovalEvent({
        type: 'event_callback',
        event: { type: 'approval_instance', object: { instance_code: 'INST-2', status: 'APPROVED' } },
      }),
    ).toEqual({ accepted: true, instanceCode: 'INST-2' });
  });

  it('reads instance_status and approval_code', () => {
    expect(
      parseApprovalEvent({ event: { instance_status: 'APPROVED', approval_code: 'INST-3' } }),
    ).toEqual({ accepted: true, instanceCode: 'INST-3' });
  });

  it('rejects other event types', () => {
    expect(parseApprovalEvent({ header: { event_type: 'contact.user.created_v3' }, event: {} })).toEqual({
      accepted: false,
      reason: 'Not an approval instance event: contact.user.created_v3',
    });
  });

  it('rejects statuses other than APPROVED', () => {
    expect(parseApprovalEvent({ event: { instance_code: 'INST-4', status: 'PENDING' } })).toEqual({
      accepted: false,
      reason: 'Status is PENDING',
    });
    expect(parseApprovalEvent({ event: { instance_code: 'INST-4' } })).toEqual({
      accepted: false,
      reason: 'Status is missing',
    });
  });

  it('rejects approved events without an instance code', () => {
    expect(parseApprovalEvent({ event: { status: 'APPROVED' } })).toEqual({
      accepted: false,
      reason: 'No instance code in event',
    });
  });

  it('rejects payloads that are not objects', () => {
    expect(parseApprovalEvent('APPROVED')).toEqual({ accepted: false, reason: 'Payload is not an object' });
    expect(parseApprovalEvent(null)).toEqual({ accepted: false, reason: 'Payload is not an object' });
  });
});

describe('readEventType', () => {
  it('prefers the header event type', () => {
    expect(readEventType({ header: { event_type: 'approval_instance' }, event: { type: 'other' } })).toBe(
      'approval_instance',
    );
  });

  it('falls back to the event type', () => {
    expect(readEventType({ event: { type: 'approval_instance' } })).toBe('approval_instance');
    expect(readEventType({})).toBeUndefined();
  });
});
