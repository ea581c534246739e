/**
 * Email Module Type Definitions
 *
 * Types for:
 * - Notification content (NotificationContent)
 * - MIME message construction (MimeMessageInput, MimeAttachment)
 * - SMTP delivery (SmtpSettings, SendResult)
 */

// ---------------------------------------------------------------------------
// Notification Content
// ---------------------------------------------------------------------------

/** What the approval notification says */
export interface NotificationContent {
  approvalName: string;
  title: string;
  amount: string;
  attachmentCount: number;
}

// ---------------------------------------------------------------------------
// MIME Message
// ---------------------------------------------------------------------------

export interface MimeAttachment {
  filename: string;
  mimeType: string;
  content: Buffer;
}

/** Input for MIME message construction */
export interface MimeMessageInput {
  to: string;
  from: string;
  subject: string;
  /** Plain text body */
  body: string;
  attachments: MimeAttachment[];
  /** Defaults to a random boundary; fixed in tests */
  boundary?: string;
  date?: Date;
}

// ---------------------------------------------------------------------------
// SMTP
// ---------------------------------------------------------------------------

export interface SmtpSettings {
  host: string;
  port: number;
  user: string;
  password: string;
  fromAddress: string;
}

/** Result of sending a notification */
export interface SendResult {
  messageId: string;
  recipient: string;
  attachmentCount: number;
}
