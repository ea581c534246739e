/**
 * Sanitization for Safe Logging
 *
 * Replaces credentials and user identifiers in Feishu payloads with '[REDACTED]'
 * before they are written to logs. Event callbacks carry the app verification
 * token, tenant keys and the open/union/user IDs of the submitter.
 *
 * - Arrays are replaced with '[Array(N)]' summaries (never iterated into)
 * - Depth limit of 10 prevents runaway recursion on deeply nested payloads
 */

/** Set of field names whose values must never appear in logs */
export const SENSITIVE_FIELDS: ReadonlySet<string> = new Set([
  'token',
  'challenge',
  'encrypt',
  'app_secret',
  'tenant_access_token',
  'tenant_key',
  'open_id',
  'union_id',
  'user_id',
  'employee_id',
  'form',
]);

const MAX_DEPTH = 10;
const REDACTED = '[REDACTED]';

/**
 * Recursively sanitize a value for safe logging.
 *
 * - Primitives pass through unchanged
 * - Sensitive field values are replaced with '[REDACTED]'
 * - Arrays are replaced with '[Array(N)]'
 * - Objects deeper than MAX_DEPTH are replaced with '[Object]'
 */
export function sanitizeForLog(obj: unknown, depth = 0): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return `[Array(${obj.length})]`;
  }

  if (depth >= MAX_DEPTH) {
    return '[Object]';
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = SENSITIVE_FIELDS.has(key) ? REDACTED : sanitizeForLog(value, depth + 1);
  }

  return result;
}
