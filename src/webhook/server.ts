/**
 * Express Webhook Server
 *
 * HTTP layer for receiving Feishu event callbacks. Routes:
 * - POST /webhooks/feishu — Filter approval events, enqueue approved instances to BullMQ
 * - POST /admin/reprocess-instance — Clear the dedup job for an instance and enqueue it again
 * - GET /health — Server status and kill switch state
 *
 * The webhook endpoint:
 * 1. Checks kill switch (returns 503 if active)
 * 2. Answers URL verification requests by echoing the challenge
 * 3. Rejects encrypted payloads (no encrypt key is configured)
 * 4. Accepts only approval-instance events with status APPROVED
 * 5. Enqueues job with dedup key (jobId = approval-{instanceCode})
 *
 * Non-approved and unrelated events are acknowledged with 200 so Feishu does
 * not redeliver them. Payloads are sanitized before any console output.
 */

import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { appConfig } from '../config.js';
import { parseApprovalEvent } from '../approval/event.js';
import { approvalJobId, getApprovalQueue, JOB_NAME } from './queue.js';
import { sanitizeForLog } from './sanitize.js';
import { healthHandler } from './health.js';
import type { JobData, WebhookPayload } from './types.js';

function isPayload(body: unknown): body is WebhookPayload {
  return typeof body === 'object' && body !== null && !Array.isArray(body);
}

async function enqueueApproval(instanceCode: string): Promise<string> {
  const jobData: JobData = {
    instanceCode,
    receivedAt: new Date().toISOString(),
  };
  const jobId = approvalJobId(instanceCode);
  await getApprovalQueue().add(JOB_NAME, jobData, { jobId });
  return jobId;
}

/**
 * Create the Express application with all routes configured.
 *
 * Exported as a factory function so tests can create fresh app instances
 * without shared state between test cases.
 */
export function createApp() {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  // Health check
  app.get('/health', healthHandler);

  // Feishu event callback
  app.post('/webhooks/feishu', async (req: Request, res: Response, next: NextFunction) => {
    try {
      // Kill switch check — return 503 so Feishu retries later
      if (appConfig.killSwitch) {
        console.log('[webhook] Kill switch active — rejecting event');
        res.status(503).json({ message: 'Automation disabled' });
        return;
      }

      const payload: unknown = req.body;

      if (isPayload(payload) && payload.type === 'url_verification') {
        console.log('[webhook] URL verification request');
        res.json({ challenge: payload.challenge });
        return;
      }

      if (isPayload(payload) && payload.encrypt !== undefined) {
        console.warn('[webhook] Encrypted payload received, encrypt key is not configured');
        res.status(400).json({ error: 'Encrypted payloads are not supported' });
        return;
      }

      const decision = parseApprovalEvent(payload);
      if (!decision.accepted) {
        console.log('[webhook] Event ignored', { reason: decision.reason, payload: sanitizeForLog(payload) });
        res.json({ accepted: false, reason: decision.reason });
        return;
      }

      const jobId = await enqueueApproval(decision.instanceCode);
      console.log('[webhook] Enqueued', { instanceCode: decision.instanceCode, jobId });
      res.json({ accepted: true, instanceCode: decision.instanceCode });
    } catch (err) {
      next(err);
    }
  });

  // Admin: reprocess an approval instance (bypasses BullMQ dedup)
  app.post('/admin/reprocess-instance', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: unknown = req.body;
      const instanceCode = isPayload(body) && typeof body.instanceCode === 'string' ? body.instanceCode : '';
      if (!instanceCode) {
        res.status(400).json({ error: 'Missing instanceCode' });
        return;
      }

      const jobId = approvalJobId(instanceCode);

      // Remove existing completed/failed job if present (clears dedup)
      const existing = await getApprovalQueue().getJob(jobId);
      if (existing) {
        await existing.remove();
        console.log('[admin] Removed existing job', { jobId });
      }

      await enqueueApproval(instanceCode);
      console.log('[admin] Reprocessing instance', { instanceCode, jobId });
      res.json({ success: true, jobId });
    } catch (err) {
      next(err);
    }
  });

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[server] Unhandled error:', err.message);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
