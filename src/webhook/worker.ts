/**
 * BullMQ Worker — Approval Job Runner
 *
 * When the webhook enqueues an approved instance, this worker hands it to the
 * approval processor with the production dependencies:
 *   - Feishu client (tenant token cache shared across jobs)
 *   - Category routes loaded once from CATEGORY_ROUTES_FILE (at startup via
 *     loadCategoryRoutes, so a malformed file stops the process before any job)
 *   - SMTP notification sender
 *
 * Design:
 * - processJob is extracted as a named function for testability
 * - Worker uses lazy singleton pattern (same as queue.ts)
 * - Several jobs run concurrently (WORKER_CONCURRENCY); the processor holds no shared mutable state
 * - Kill switch checked at worker level (belt-and-suspenders with webhook layer)
 *
 * Failure handling:
 * - Single attempt per job (configured in queue.ts); failed jobs are kept
 *   24h and can be re-run via POST /admin/reprocess-instance
 */

import { Worker } from 'bullmq';
import type { Job } from 'bullmq';
import { appConfig } from '../config.js';
import { loadCategoryMap, processApproval } from '../approval/index.js';
import type { CategoryMap, ProcessorDeps } from '../approval/index.js';
import { sendNotification } from '../email/index.js';
import { getFeishuClient } from '../feishu/index.js';
import { createRedisConnection, QUEUE_NAME } from './queue.js';
import type { JobData, ProcessingResult } from './types.js';

let _worker: Worker<JobData, ProcessingResult> | null = null;
let _categories: CategoryMap | null = null;

/**
 * Load and cache the category routes. Called from main() before the worker
 * starts; jobs reuse the cached map.
 *
 * @throws Error if the routes file is missing or malformed
 */
export function loadCategoryRoutes(): CategoryMap {
  _categories = loadCategoryMap(appConfig.categoryRoutesFile);
  console.log('[worker] Category routes loaded', { routes: _categories.size });
  return _categories;
}

function getCategories(): CategoryMap {
  return _categories ?? loadCategoryRoutes();
}

/** Production dependencies for the approval processor */
export function defaultProcessorDeps(): ProcessorDeps {
  return {
    api: getFeishuClient(),
    categories: getCategories(),
    sendNotification,
    rules: {
      titleField: appConfig.form.titleField,
      amountField: appConfig.form.amountField,
      defaultCurrency: appConfig.form.defaultCurrency,
    },
    maxDepth: appConfig.form.maxDepth,
    maxAttachmentBytes: appConfig.attachments.maxBytes,
  };
}

/**
 * Process a single approval job.
 *
 * Exported for testing (allows calling without BullMQ Worker infrastructure).
 *
 * @throws Error if the kill switch is active or the processor fails
 */
export async function processJob(job: Job<JobData>): Promise<ProcessingResult> {
  const { instanceCode } = job.data;
  console.log(`[worker] Processing job ${job.id}`, { instanceCode, attempt: job.attemptsMade + 1 });

  if (appConfig.killSwitch) {
    throw new Error('Automation disabled by kill switch');
  }

  const result = await processApproval(instanceCode, defaultProcessorDeps());

  console.log('[worker] Approval processed', {
    instanceCode,
    status: result.status,
    ...(result.status === 'skipped' ? { reason: result.reason } : { attachments: result.attachmentCount }),
  });
  return result;
}

/**
 * Create and start the BullMQ worker (lazy singleton).
 *
 * @returns The BullMQ Worker instance
 */
export function createWorker(): Worker<JobData, ProcessingResult> {
  if (_worker) return _worker;

  _worker = new Worker<JobData, ProcessingResult>(QUEUE_NAME, processJob, {
    connection: createRedisConnection(),
    concurrency: appConfig.worker.concurrency,
  });

  _worker.on('completed', (job) => {
    console.log(`[worker] Job ${job.id} completed`, {
      instanceCode: job.data.instanceCode,
    });
  });

  _worker.on('failed', (job, err) => {
    console.error(`[worker] Job ${job?.id} failed`, {
      instanceCode: job?.data.instanceCode,
      error: err.message,
    });
  });

  console.log('[worker] Started, listening for jobs on queue:', QUEUE_NAME, {
    concurrency: appConfig.worker.concurrency,
  });
  return _worker;
}

/**
 * Close the worker for graceful shutdown.
 *
 * Finishes current job processing, then stops accepting new jobs.
 * Resets the singleton so a new worker can be created if needed.
 */
export async function closeWorker(): Promise<void> {
  if (_worker) {
    await _worker.close();
    _worker = null;
  }
}
