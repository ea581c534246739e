/**
 * Feishu Open API Types
 *
 * zod schemas for the parts of the Feishu responses the bridge reads, and the
 * camelCase shapes the rest of the code works with. Unread fields pass through
 * untouched.
 */

import { z } from 'zod';

/** Common response envelope: { code, msg, data } */
export const ApiEnvelopeSchema = z.object({
  code: z.number(),
  msg: z.string().optional(),
  data: z.unknown().optional(),
});

export const TenantTokenResponseSchema = z.object({
  code: z.number(),
  msg: z.string().optional(),
  tenant_access_token: z.string().optional(),
  expire: z.number().optional(),
});

export const ApprovalInstanceDataSchema = z
  .object({
    approval_name: z.string().default(''),
    approval_code: z.string().optional(),
    instance_code: z.string().optional(),
    serial_number: z.string().optional(),
    status: z.string().optional(),
    /** Form controls as JSON text */
    form: z.string().default('[]'),
  })
  .passthrough();

export const TmpDownloadUrlsDataSchema = z.object({
  tmp_download_urls: z
    .array(
      z.object({
        file_token: z.string(),
        tmp_download_url: z.string(),
      }),
    )
    .default([]),
});

/** An approval instance as used by the processor */
export interface ApprovalInstance {
  instanceCode: string;
  /** The approval template name, used as the routing category */
  approvalName: string;
  approvalCode: string | null;
  serialNumber: string | null;
  status: string | null;
  formJson: string;
}

/** The subset of the Feishu client the approval processor depends on */
export interface ApprovalApi {
  getApprovalInstance(instanceCode: string): Promise<ApprovalInstance>;
  getFileDownloadUrls(fileTokens: Iterable<string>): Promise<Map<string, string>>;
  downloadFile(url: string): Promise<Buffer>;
}
