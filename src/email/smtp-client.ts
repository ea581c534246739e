/**
 * SMTP Transport
 *
 * nodemailer transport built from appConfig.smtp:
 * - Port 587: plain connection upgraded with STARTTLS (Microsoft 365 / Office 365)
 * - Any other port (465 by default): implicit TLS
 *
 * Internal module — not exported from barrel. Consumers use send.ts.
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport/index.js';
import { appConfig } from '../config.js';
import type { SmtpSettings } from './types.js';

export const STARTTLS_PORT = 587;

type SmtpTransporter = Transporter<SMTPTransport.SentMessageInfo>;

/** Transport options for the given settings (pure, for testing) */
export function smtpTransportOptions(settings: SmtpSettings): SMTPTransport.Options {
  const startTls = settings.port === STARTTLS_PORT;
  return {
    host: settings.host,
    port: settings.port,
    secure: !startTls,
    requireTLS: startTls,
    auth: {
      user: settings.user,
      pass: settings.password,
    },
  };
}

// Lazy singleton, no sockets at import time
let _transport: SmtpTransporter | null = null;

export function getSmtpTransport(): SmtpTransporter {
  if (!_transport) {
    _transport = nodemailer.createTransport(smtpTransportOptions(appConfig.smtp));
  }
  return _transport;
}

/** Close pooled connections for graceful shutdown */
export function closeSmtpTransport(): void {
  if (_transport) {
    _transport.close();
    _transport = null;
  }
}
