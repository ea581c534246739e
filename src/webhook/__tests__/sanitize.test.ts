/**
 * Tests for log sanitization of Feishu payloads
 */

import { describe, it, expect } from 'vitest';
import { sanitizeForLog, SENSITIVE_FIELDS } from '../sanitize.js';

describe('sanitizeForLog', () => {
  it('passes primitives through unchanged', () => {
    expect(sanitizeForLog('text')).toBe('text');
    expect(sanitizeForLog(42)).toBe(42);
    expect(sanitizeForLog(null)).toBeNull();
    expect(sanitizeForLog(undefined)).toBeUndefined();
  });

  it('redacts the verification token and user identifiers', () => {
    const payload = {
      schema: '2.0',
      header: { event_type: 'approval_instance', token: 'test-verification-token', tenant_key: 'tenant-1' },
      event: { instance_code: 'INST-1', status: 'APPROVED', open_id: 'ou_1', user_id: 'u_1' },
    };

    expect(sanitizeForLog(payload)).toEqual({
      schema: '2.0',
      header: { event_type: 'approval_instance', token: '[REDACTED]', tenant_key: '[REDACTED]' },
      event: { instance_code: 'INST-1', status: 'APPROVED', open_id: '[REDACTED]', user_id: '[REDACTED]' },
    });
  });

  it('redacts form content and challenge', () => {
    expect(sanitizeForLog({ form: '[{"name":"名称"}]', challenge: 'abc' })).toEqual({
      form: '[REDACTED]',
      challenge: '[REDACTED]',
    });
  });

  it('summarizes arrays instead of iterating into them', () => {
    expect(sanitizeForLog({ items: [{ open_id: 'ou_1' }, 2, 3] })).toEqual({ items: '[Array(3)]' });
  });

  it('stops at depth 10', () => {
    let nested: Record<string, unknown> = { leaf: true };
    for (let i = 0; i < 11; i++) {
      nested = { child: nested };
    }

    let current: unknown = sanitizeForLog(nested);
    for (let i = 0; i < 10; i++) {
      expect(current).toHaveProperty('child');
      if (typeof current === 'object' && current !== null && 'child' in current) {
        current = current.child;
      }
    }
    expect(current).toBe('[Object]');
  });

  it('covers the credential fields', () => {
    for (const field of ['token', 'app_secret', 'tenant_access_token', 'encrypt']) {
      expect(SENSITIVE_FIELDS.has(field)).toBe(true);
    }
  });
});
