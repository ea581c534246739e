// ============================================================================
// Tests: Notification Delivery — sendNotification
// ============================================================================
//
// nodemailer is mocked; no SMTP connection is opened.

import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';

const { mockSendMail, mockClose, mockCreateTransport, mockConfig } = vi.hoisted(() => {
  const mockSendMail = vi.fn();
  const mockClose = vi.fn();
  const mockCreateTransport = vi.fn(() => ({ sendMail: mockSendMail, close: mockClose }));
  const mail: { recipientOverride: string | null; subjectPrefix: string } = {
    recipientOverride: null,
    subjectPrefix: '',
  };
  const mockConfig = {
    smtp: {
      host: 'smtp.test.local',
      port: 465,
      user: 'bridge@test.local',
      password: 'test-password',
      fromAddress: 'bridge@test.local',
    },
    mail,
  };
  return { mockSendMail, mockClose, mockCreateTransport, mockConfig };
});

vi.mock('nodemailer', () => ({
  default: { createTransport: mockCreateTransport },
}));

vi.mock('../../config.js', () => ({
  appConfig: mockConfig,
}));

import { sendNotification, toMimeAttachments } from '../send.js';
import { closeSmtpTransport, smtpTransportOptions } from '../smtp-client.js';
import type { AttachmentDescriptor } from '../../approval/types.js';

const ATTACHMENTS: AttachmentDescriptor[] = [
  { fileToken: 't1', name: 'receipt.pdf', mimeType: 'application/pdf', content: Buffer.from('PDF') },
  { fileToken: 't2', name: 'missing.pdf' },
  { fileToken: '', name: 'photo', downloadUrl: 'https://files.test/photo', content: Buffer.from('IMG') },
];

function sentMail(): { envelope: { from: string; to: string[] }; raw: string } {
  return mockSendMail.mock.calls[0][0];
}

describe('sendNotification', () => {
  beforeEach(() => {
    mockSendMail.mockReset();
    mockSendMail.mockResolvedValue({ messageId: '<abc@test.local>' });
    mockCreateTransport.mockClear();
    mockClose.mockClear();
    mockConfig.mail.recipientOverride = null;
    mockConfig.mail.subjectPrefix = '';
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    closeSmtpTransport();
  });

  test('sends a raw message to the routed mailbox', async () => {
    const result = await sendNotification('payments@test.local', 'Approved', 'body', ATTACHMENTS);

    expect(result).toEqual({ messageId: '<abc@test.local>', recipient: 'payments@test.local', attachmentCount: 2 });
    const mail = sentMail();
    expect(mail.envelope).toEqual({ from: 'bridge@test.local', to: ['payments@test.local'] });
    expect(mail.raw).toContain('\r\nTo: payments@test.local\r\n');
    expect(mail.raw).toContain('\r\nSubject: Approved\r\n');
    expect(mail.raw).toContain('filename="receipt.pdf"');
    expect(mail.raw).toContain('Content-Type: application/octet-stream; name="photo"');
    expect(mail.raw).not.toContain('missing.pdf');
  });

  test('redirects to the recipient override', async () => {
    mockConfig.mail.recipientOverride = 'qa@test.local';

    const result = await sendNotification('payments@test.local', 'Approved', 'body', ATTACHMENTS);

    expect(result.recipient).toBe('qa@test.local');
    expect(sentMail().envelope.to).toEqual(['qa@test.local']);
    expect(sentMail().raw).toContain('\r\nTo: qa@test.local\r\n');
  });

  test('prepends the subject prefix', async () => {
    mockConfig.mail.subjectPrefix = '[TEST] ';

    await sendNotification('payments@test.local', 'Approved', 'body', ATTACHMENTS);

    expect(sentMail().raw).toContain('\r\nSubject: [TEST] Approved\r\n');
  });

  test('reuses one transport across sends', async () => {
    await sendNotification('payments@test.local', 'A', 'body', ATTACHMENTS);
    await sendNotification('payments@test.local', 'B', 'body', ATTACHMENTS);

    expect(mockCreateTransport).toHaveBeenCalledTimes(1);
  });

  test('propagates transport errors', async () => {
    mockSendMail.mockRejectedValue(new Error('Invalid login: 535 Authentication failed'));

    await expect(sendNotification('payments@test.local', 'A', 'body', ATTACHMENTS)).rejects.toThrow(
      'Invalid login: 535 Authentication failed',
    );
  });

  test('closes the transport on shutdown', async () => {
    await sendNotification('payments@test.local', 'A', 'body', ATTACHMENTS);
    closeSmtpTransport();

    expect(mockClose).toHaveBeenCalledTimes(1);
  });
});

describe('toMimeAttachments', () => {
  test('keeps downloaded attachments in order with a default MIME type', () => {
    expect(toMimeAttachments(ATTACHMENTS)).toEqual([
      { filename: 'receipt.pdf', mimeType: 'application/pdf', content: Buffer.from('PDF') },
      { filename: 'photo', mimeType: 'application/octet-stream', content: Buffer.from('IMG') },
    ]);
  });
});

describe('smtpTransportOptions', () => {
  test('uses implicit TLS on port 465', () => {
    expect(smtpTransportOptions(mockConfig.smtp)).toEqual({
      host: 'smtp.test.local',
      port: 465,
      secure: true,
      requireTLS: false,
      auth: { user: 'bridge@test.local', pass: 'test-password' },
    });
  });

  test('upgrades with STARTTLS on port 587', () => {
    expect(smtpTransportOptions({ ...mockConfig.smtp, port: 587 })).toMatchObject({
      secure: false,
      requireTLS: true,
    });
  });
});
