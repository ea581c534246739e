// ============================================================================
// Feishu Error Types — Typed errors for API call failures
// ============================================================================

/**
 * Thrown when a Feishu API call fails: non-2xx HTTP status, a non-zero
 * business `code` in the response envelope, or a response of unexpected shape.
 * Includes the HTTP status and Feishu code for debugging.
 */
export class RemoteError extends Error {
  readonly statusCode: number;
  /** Feishu business code, null when the failure happened before the envelope was read */
  readonly code: number | null;
  readonly responseBody: string;

  constructor(message: string, statusCode: number, code: number | null = null, responseBody = '') {
    super(message);
    this.name = 'RemoteError';
    this.statusCode = statusCode;
    this.code = code;
    this.responseBody = responseBody;
  }
}
