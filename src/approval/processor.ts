/**
 * Approval Processor — one approved instance, end to end
 *
 *   1. Fetch the approval instance (form JSON, category, serial number)
 *   2. Walk the form: fields + attachment descriptors
 *   3. Extract title and amount
 *   4. Route the category to a mailbox (skip when there is none)
 *   5. Skip when the form has no attachments
 *   6. Resolve file tokens to download URLs, download concurrently
 *   7. Skip when no download succeeded
 *   8. Send the notification with the downloaded attachments
 *
 * Skips are normal outcomes, logged and returned. Failures of steps 1, 6 (URL
 * resolution) and 8 are logged with the instance code and stage, then re-thrown.
 *
 * Dependencies are passed in (ProcessorDeps) so tests can use in-memory fakes.
 */

import { formatBody, formatSubject } from '../email/body.js';
import type { SendResult } from '../email/types.js';
import type { ApprovalApi } from '../feishu/types.js';
import { routeCategory } from './category-router.js';
import { downloadAttachments, resolveDownloadUrls } from './downloader.js';
import { extractSummary } from './field-aggregator.js';
import { walkFormText } from './form-walker.js';
import type { AttachmentDescriptor, CategoryMap, FieldRules } from './types.js';

export type NotificationSender = (
  toAddress: string,
  subject: string,
  body: string,
  attachments: readonly AttachmentDescriptor[],
) => Promise<SendResult>;

export interface ProcessorDeps {
  api: ApprovalApi;
  categories: CategoryMap;
  sendNotification: NotificationSender;
  rules: FieldRules;
  maxDepth: number;
  maxAttachmentBytes: number;
}

export type ProcessingStage = 'fetch-instance' | 'extract' | 'resolve-urls' | 'download' | 'send-mail';

export type SkipReason = 'unmapped-category' | 'no-attachments' | 'no-downloads';

export type ApprovalOutcome =
  | {
      status: 'sent';
      instanceCode: string;
      approvalName: string;
      recipient: string;
      title: string;
      amount: string;
      attachmentCount: number;
      failedAttachments: number;
      messageId: string;
    }
  | {
      status: 'skipped';
      instanceCode: string;
      approvalName: string;
      reason: SkipReason;
    };

export async function processApproval(instanceCode: string, deps: ProcessorDeps): Promise<ApprovalOutcome> {
  let stage: ProcessingStage = 'fetch-instance';

  try {
    // 1. Fetch
    const instance = await deps.api.getApprovalInstance(instanceCode);
    const { approvalName } = instance;

    // 2-3. Walk + summarize
    stage = 'extract';
    const walk = walkFormText(instance.formJson, { maxDepth: deps.maxDepth });
    if (walk.truncatedGroups > 0) {
      console.warn('[approval] Form nesting limit reached, inner rows ignored', {
        instanceCode,
        truncatedGroups: walk.truncatedGroups,
        maxDepth: deps.maxDepth,
      });
    }

    const summary = extractSummary(walk.fields, deps.rules);
    const title = summary.title || instance.serialNumber || instanceCode;

    // 4. Route
    const recipient = routeCategory(deps.categories, approvalName);
    if (!recipient) {
      console.log('[approval] Category not mapped, skipping', { instanceCode, approvalName });
      return { status: 'skipped', instanceCode, approvalName, reason: 'unmapped-category' };
    }

    // 5. Anything to forward?
    if (walk.attachments.length === 0) {
      console.log('[approval] No attachments found, skipping', { instanceCode, approvalName });
      return { status: 'skipped', instanceCode, approvalName, reason: 'no-attachments' };
    }

    // 6. Download
    console.log('[approval] Downloading attachments', {
      instanceCode,
      approvalName,
      attachments: walk.attachments.length,
    });
    stage = 'resolve-urls';
    const tokenUrls = await resolveDownloadUrls(walk.attachments, deps.api);

    stage = 'download';
    const { downloaded, failed } = await downloadAttachments(
      walk.attachments,
      tokenUrls,
      deps.api,
      deps.maxAttachmentBytes,
    );

    // 7. Anything downloaded?
    if (downloaded.length === 0) {
      console.warn('[approval] No attachment could be downloaded, skipping', {
        instanceCode,
        approvalName,
        failed: failed.length,
      });
      return { status: 'skipped', instanceCode, approvalName, reason: 'no-downloads' };
    }

    // 8. Send
    stage = 'send-mail';
    const subject = formatSubject(approvalName, title);
    const body = formatBody({
      approvalName,
      title,
      amount: summary.amount,
      attachmentCount: downloaded.length,
    });
    const sent = await deps.sendNotification(recipient, subject, body, downloaded);

    console.log('[approval] Notification delivered', {
      instanceCode,
      approvalName,
      attachments: downloaded.length,
      failedAttachments: failed.length,
    });

    return {
      status: 'sent',
      instanceCode,
      approvalName,
      recipient: sent.recipient,
      title,
      amount: summary.amount,
      attachmentCount: downloaded.length,
      failedAttachments: failed.length,
      messageId: sent.messageId,
    };
  } catch (err) {
    console.error('[approval] Processing failed', {
      instanceCode,
      stage,
      error: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }
}
