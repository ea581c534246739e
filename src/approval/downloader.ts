/**
 * Attachment Downloader
 *
 * Two steps, so the caller can tell which one failed:
 * 1. resolveDownloadUrls: one batched API call for descriptors that only carry a file token.
 *    API failures propagate (RemoteError).
 * 2. downloadAttachments: concurrent downloads. A failure (no URL, HTTP error, too large)
 *    excludes that attachment only; successful descriptors get `content` set in place
 *    and are returned in their original order.
 */

import type { ApprovalApi } from '../feishu/types.js';
import type { AttachmentDescriptor } from './types.js';

export interface FailedAttachment {
  name: string;
  reason: string;
}

export interface DownloadOutcome {
  downloaded: AttachmentDescriptor[];
  failed: FailedAttachment[];
}

/** Map of file token → temporary URL for descriptors without a direct URL */
export async function resolveDownloadUrls(
  attachments: readonly AttachmentDescriptor[],
  api: ApprovalApi,
): Promise<Map<string, string>> {
  const tokens = attachments
    .filter(attachment => attachment.fileToken && !attachment.downloadUrl)
    .map(attachment => attachment.fileToken);

  if (tokens.length === 0) return new Map();
  return api.getFileDownloadUrls(tokens);
}

async function downloadOne(
  attachment: AttachmentDescriptor,
  tokenUrls: ReadonlyMap<string, string>,
  api: ApprovalApi,
  maxBytes: number,
): Promise<Buffer> {
  const url = attachment.downloadUrl || tokenUrls.get(attachment.fileToken);
  if (!url) {
    throw new Error('No download URL');
  }

  const content = await api.downloadFile(url);
  if (content.length > maxBytes) {
    throw new Error(`File is ${content.length} bytes, limit is ${maxBytes}`);
  }
  return content;
}

export async function downloadAttachments(
  attachments: AttachmentDescriptor[],
  tokenUrls: ReadonlyMap<string, string>,
  api: ApprovalApi,
  maxBytes: number,
): Promise<DownloadOutcome> {
  const results = await Promise.allSettled(
    attachments.map(attachment => downloadOne(attachment, tokenUrls, api, maxBytes)),
  );

  const outcome: DownloadOutcome = { downloaded: [], failed: [] };
  results.forEach((result, index) => {
    const attachment = attachments[index];
    if (result.status === 'fulfilled') {
      attachment.content = result.value;
      outcome.downloaded.push(attachment);
      return;
    }

    const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
    console.warn('[approval] Attachment download failed', { name: attachment.name, error: reason });
    outcome.failed.push({ name: attachment.name, reason });
  });

  return outcome;
}
