/**
 * BullMQ Queue Configuration
 *
 * Manages the approval processing queue with:
 * - Deduplication via BullMQ jobId (same instance code = same job), since Feishu
 *   redelivers callbacks that are not acknowledged quickly
 * - A single attempt per job (failures are logged and kept for manual reprocessing)
 * - 24h retention of completed and failed jobs (dedup window)
 *
 * Uses lazy singleton pattern — queue is not created until first access.
 * This prevents Redis connections during module import (breaks tests).
 */

import { Queue } from 'bullmq';
import { appConfig } from '../config.js';
import type { JobData } from './types.js';

export const QUEUE_NAME = 'feishu-approvals';
export const JOB_NAME = 'process-approval';

/** Redis connection config shape for BullMQ */
interface RedisConnectionConfig {
  host: string;
  port: number;
  password?: string;
  maxRetriesPerRequest: null;
}

/** Dedup key for an approval instance */
export function approvalJobId(instanceCode: string): string {
  return `approval-${instanceCode}`;
}

/**
 * Parse a Redis URL into a connection config object.
 *
 * Supports redis:// and rediss:// (TLS) URL formats.
 */
function parseRedisUrl(url: string): RedisConnectionConfig {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parsed.port ? parseInt(parsed.port, 10) : 6379,
    password: parsed.password || undefined,
    maxRetriesPerRequest: null,
  };
}

/**
 * Create a Redis connection config for BullMQ.
 *
 * If REDIS_URL is set, parses it into host/port/password components.
 * Otherwise uses individual REDIS_HOST/PORT/PASSWORD env vars.
 *
 * maxRetriesPerRequest: null is required by BullMQ for blocking commands.
 */
export function createRedisConnection(): RedisConnectionConfig {
  if (appConfig.redis.url) {
    return parseRedisUrl(appConfig.redis.url);
  }

  return {
    host: appConfig.redis.host,
    port: appConfig.redis.port,
    password: appConfig.redis.password,
    maxRetriesPerRequest: null,
  };
}

// Lazy singleton — don't connect at import time
let _queue: Queue<JobData> | null = null;

export function getApprovalQueue(): Queue<JobData> {
  if (!_queue) {
    _queue = new Queue<JobData>(QUEUE_NAME, {
      connection: createRedisConnection(),
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: { age: 86400 }, // Keep 24h for dedup window
        removeOnFail: { age: 86400 },
      },
    });
  }
  return _queue;
}

/**
 * Close the queue connection for graceful shutdown.
 * Resets the singleton so a new connection can be created if needed.
 */
export async function closeQueue(): Promise<void> {
  if (_queue) {
    await _queue.close();
    _queue = null;
  }
}
