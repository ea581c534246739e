/**
 * Notification Text
 *
 * Subject and plain text body for an approved-approval notification.
 * Recipients are Chinese-speaking finance staff; labels stay in Chinese.
 *
 * Subject: [审批种类]-审批标题
 */

import type { NotificationContent } from './types.js';

export function formatSubject(approvalName: string, title: string): string {
  return `[${approvalName}]-${title}`;
}

export function formatBody(content: NotificationContent): string {
  return [
    '审批已通过',
    '',
    `审批类型: ${content.approvalName}`,
    `审批标题: ${content.title}`,
    `审批金额: ${content.amount}`,
    `附件数量: ${content.attachmentCount}`,
    '',
  ].join('\n');
}
