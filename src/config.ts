/**
 * Shared Application Configuration
 *
 * Centralizes all environment variable access for the bridge.
 *
 * Environment variables:
 * - AUTOMATION_KILL_SWITCH: Set to 'true' to disable all approval processing
 * - REDIS_URL / REDIS_HOST / REDIS_PORT / REDIS_PASSWORD: Redis connection for the queue
 * - FEISHU_APP_ID / FEISHU_APP_SECRET: Required Feishu app credentials
 * - FEISHU_API_BASE: Feishu Open API base URL (defaults to open.feishu.cn)
 * - SMTP_HOST / SMTP_PORT / SMTP_USER / SMTP_PASSWORD / SMTP_FROM_EMAIL: Outbound mail
 * - MAIL_RECIPIENT_OVERRIDE / MAIL_SUBJECT_PREFIX: Safety valves for testing against real mailboxes
 * - FORM_*: Form field labels and walker depth guard
 * - CATEGORY_ROUTES_FILE: JSON file mapping approval categories to address env vars
 * - PORT: HTTP server port (default 3000)
 *
 * FEISHU_APP_SECRET and SMTP_PASSWORD may be stored encrypted (ENC:...), see secrets.ts.
 */

import 'dotenv/config';
import { fileURLToPath } from 'node:url';
import { decryptSecret } from './secrets.js';

export interface AppConfig {
  isDev: boolean;
  killSwitch: boolean;
  redis: {
    url: string | undefined;
    host: string;
    port: number;
    password: string | undefined;
  };
  feishu: {
    appId: string;
    appSecret: string;
    apiBase: string;
    requestTimeoutMs: number;
  };
  smtp: {
    host: string;
    port: number;
    user: string;
    password: string;
    fromAddress: string;
  };
  mail: {
    recipientOverride: string | null;
    subjectPrefix: string;
  };
  form: {
    titleField: string;
    amountField: string;
    defaultCurrency: string;
    maxDepth: number;
  };
  attachments: {
    maxBytes: number;
  };
  worker: {
    concurrency: number;
  };
  categoryRoutesFile: string;
  server: {
    port: number;
  };
}

function requiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
      `Copy .env.example to .env and fill in the required values.`
    );
  }
  return value;
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] || fallback;
}

function intEnv(key: string, fallback: number): number {
  const parsed = parseInt(optionalEnv(key, String(fallback)), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

const isDev = (optionalEnv('APP_ENV', 'development')) !== 'production';

const defaultRoutesFile = fileURLToPath(new URL('../config/category-routes.json', import.meta.url));

export const appConfig: AppConfig = {
  isDev,
  killSwitch: process.env.AUTOMATION_KILL_SWITCH === 'true',
  redis: {
    url: process.env.REDIS_URL || undefined,
    host: optionalEnv('REDIS_HOST', 'localhost'),
    port: intEnv('REDIS_PORT', 6379),
    password: process.env.REDIS_PASSWORD || undefined,
  },
  feishu: {
    appId: requiredEnv('FEISHU_APP_ID'),
    appSecret: decryptSecret(requiredEnv('FEISHU_APP_SECRET')),
    apiBase: optionalEnv('FEISHU_API_BASE', 'https://open.feishu.cn/open-apis'),
    requestTimeoutMs: intEnv('FEISHU_REQUEST_TIMEOUT_MS', 30_000),
  },
  smtp: {
    host: requiredEnv('SMTP_HOST'),
    port: intEnv('SMTP_PORT', 465),
    user: requiredEnv('SMTP_USER'),
    password: decryptSecret(requiredEnv('SMTP_PASSWORD')),
    fromAddress: requiredEnv('SMTP_FROM_EMAIL'),
  },
  mail: {
    recipientOverride: process.env.MAIL_RECIPIENT_OVERRIDE || null,
    subjectPrefix: optionalEnv('MAIL_SUBJECT_PREFIX'),
  },
  form: {
    titleField: optionalEnv('FORM_TITLE_FIELD', '名称'),
    amountField: optionalEnv('FORM_AMOUNT_FIELD', '金额'),
    defaultCurrency: optionalEnv('FORM_DEFAULT_CURRENCY', 'SEK'),
    maxDepth: intEnv('FORM_MAX_DEPTH', 16),
  },
  attachments: {
    maxBytes: intEnv('ATTACHMENT_MAX_BYTES', 25 * 1024 * 1024),
  },
  worker: {
    concurrency: intEnv('WORKER_CONCURRENCY', 4),
  },
  categoryRoutesFile: optionalEnv('CATEGORY_ROUTES_FILE', defaultRoutesFile),
  server: {
    port: intEnv('PORT', 3000),
  },
};
