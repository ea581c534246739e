/**
 * Notification Delivery
 *
 * Sends an approval notification with its downloaded attachments over SMTP.
 *
 * Safety:
 * - MAIL_RECIPIENT_OVERRIDE redirects every message (for testing against real approvals)
 * - MAIL_SUBJECT_PREFIX is prepended to every subject
 * - Logs only metadata (recipient, attachment count, message ID)
 */

import type { AttachmentDescriptor } from '../approval/types.js';
import { appConfig } from '../config.js';
import { buildMimeMessage } from './mime.js';
import { getSmtpTransport } from './smtp-client.js';
import type { MimeAttachment, SendResult } from './types.js';

const DEFAULT_MIME_TYPE = 'application/octet-stream';

/** Attachments with downloaded content, in order; others are left out */
export function toMimeAttachments(attachments: readonly AttachmentDescriptor[]): MimeAttachment[] {
  const result: MimeAttachment[] = [];
  for (const attachment of attachments) {
    if (!attachment.content) continue;
    result.push({
      filename: attachment.name,
      mimeType: attachment.mimeType || DEFAULT_MIME_TYPE,
      content: attachment.content,
    });
  }
  return result;
}

/**
 * Send a notification email.
 *
 * @param toAddress - Destination mailbox (replaced by MAIL_RECIPIENT_OVERRIDE when set)
 * @param attachments - Descriptors with content populated; content-less entries are skipped
 * @throws Error from the SMTP transport if delivery fails
 */
export async function sendNotification(
  toAddress: string,
  subject: string,
  body: string,
  attachments: readonly AttachmentDescriptor[],
): Promise<SendResult> {
  const recipient = appConfig.mail.recipientOverride ?? toAddress;
  const from = appConfig.smtp.fromAddress;
  const mimeAttachments = toMimeAttachments(attachments);

  const raw = buildMimeMessage({
    to: recipient,
    from,
    subject: `${appConfig.mail.subjectPrefix}${subject}`,
    body,
    attachments: mimeAttachments,
  });

  const info = await getSmtpTransport().sendMail({
    envelope: { from, to: [recipient] },
    raw,
  });

  console.log('[mail] Notification sent', {
    recipient,
    overridden: recipient !== toAddress,
    attachmentCount: mimeAttachments.length,
    messageId: info.messageId,
  });

  return {
    messageId: info.messageId,
    recipient,
    attachmentCount: mimeAttachments.length,
  };
}
