// ============================================================================
// Email Module — Barrel Export
// ============================================================================
//
// Public API for the email module. All downstream consumers should import
// from this barrel rather than individual files.
//
// NOT exported:
// - getSmtpTransport — internal implementation detail; shutdown uses closeSmtpTransport

// Email types
export type {
  NotificationContent,
  MimeAttachment,
  MimeMessageInput,
  SmtpSettings,
  SendResult,
} from './types.js';

// Pure functions
export { formatSubject, formatBody } from './body.js';
export { buildMimeMessage } from './mime.js';

// Delivery
export { sendNotification } from './send.js';
export { closeSmtpTransport } from './smtp-client.js';
