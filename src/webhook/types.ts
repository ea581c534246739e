/**
 * Webhook Type Definitions
 *
 * Defines the contract between webhook receiver, BullMQ queue, and worker.
 */

import type { ApprovalOutcome } from '../approval/processor.js';

/** Raw Feishu event callback body (v1 or v2 envelope, or a URL verification request) */
export interface WebhookPayload {
  type?: unknown;
  challenge?: unknown;
  encrypt?: unknown;
  header?: unknown;
  event?: unknown;
  [key: string]: unknown;
}

/** Data stored in BullMQ job */
export interface JobData {
  instanceCode: string;
  receivedAt: string; // ISO timestamp of webhook receipt
}

/** Result returned by worker after processing a job */
export type ProcessingResult = ApprovalOutcome;
