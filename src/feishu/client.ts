/**
 * Feishu Open API Client
 *
 * The three calls the bridge needs:
 * - getApprovalInstance: GET /approval/v4/instances/{instanceCode}
 * - getFileDownloadUrls: GET /drive/v1/medias/batch_get_tmp_download_url
 * - downloadFile: plain GET of a temporary or direct file URL
 *
 * Auth: tenant access token from POST /auth/v3/tenant_access_token/internal,
 * held in a TenantTokenCache shared by all calls on this client.
 *
 * Every failure (network error, timeout, non-2xx status, non-zero `code`,
 * unexpected response shape) surfaces as a RemoteError.
 *
 * Security:
 * - Only logs metadata (instance code, approval name, counts)
 * - Never logs the form content or file URLs (temporary URLs grant access)
 */

import { appConfig } from '../config.js';
import { RemoteError } from './errors.js';
import { TenantTokenCache } from './token-cache.js';
import type { IssuedToken } from './token-cache.js';
import {
  ApiEnvelopeSchema,
  ApprovalInstanceDataSchema,
  TenantTokenResponseSchema,
  TmpDownloadUrlsDataSchema,
} from './types.js';
import type { ApprovalApi, ApprovalInstance } from './types.js';

/** batch_get_tmp_download_url accepts at most 5 tokens per request */
export const DOWNLOAD_URL_BATCH_SIZE = 5;

/** Business codes Feishu returns for a rejected tenant access token */
const INVALID_TOKEN_CODES: ReadonlySet<number> = new Set([99991663, 99991668]);

export interface FeishuClientOptions {
  appId: string;
  appSecret: string;
  apiBase: string;
  requestTimeoutMs: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class FeishuClient implements ApprovalApi {
  readonly tokens: TenantTokenCache;

  constructor(private readonly options: FeishuClientOptions, tokens?: TenantTokenCache) {
    this.tokens = tokens ?? new TenantTokenCache(() => this.fetchTenantToken());
  }

  // -------------------------------------------------------------------------
  // Transport
  // -------------------------------------------------------------------------

  private async send(url: string, init: RequestInit, label: string): Promise<Response> {
    try {
      return await fetch(url, { ...init, signal: AbortSignal.timeout(this.options.requestTimeoutMs) });
    } catch (err) {
      throw new RemoteError(`Feishu request failed for ${label}: ${errorMessage(err)}`, 0);
    }
  }

  /** Body as JSON; a body that is not JSON or fails to arrive (timeout) is a RemoteError */
  private async readJson(response: Response, label: string): Promise<unknown> {
    try {
      return await response.json();
    } catch {
      throw new RemoteError(`Feishu API returned an unexpected response for ${label}`, response.status);
    }
  }

  /** Fetch a fresh tenant access token (used by the token cache) */
  async fetchTenantToken(): Promise<IssuedToken> {
    const label = 'tenant_access_token';
    const response = await this.send(
      `${this.options.apiBase}/auth/v3/tenant_access_token/internal`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json; charset=utf-8' },
        body: JSON.stringify({ app_id: this.options.appId, app_secret: this.options.appSecret }),
      },
      label,
    );

    if (!response.ok) {
      throw new RemoteError(
        `Feishu API error: ${response.status} ${response.statusText} for ${label}`,
        response.status,
        null,
        await response.text(),
      );
    }

    const parsed = TenantTokenResponseSchema.safeParse(await this.readJson(response, label));
    if (!parsed.success) {
      throw new RemoteError(`Feishu API returned an unexpected response for ${label}`, response.status);
    }

    const { code, msg, tenant_access_token: token, expire } = parsed.data;
    if (code !== 0 || !token || expire === undefined) {
      throw new RemoteError(`Failed to get tenant access token: ${msg ?? 'no token in response'}`, response.status, code);
    }

    console.log('[feishu] Tenant access token refreshed', { expiresInSeconds: expire });
    return { token, expiresInSeconds: expire };
  }

  /**
   * Authenticated GET returning the envelope's `data`.
   *
   * @throws RemoteError on any failure
   */
  private async get(path: string, params?: URLSearchParams): Promise<unknown> {
    const token = await this.tokens.getToken();
    const query = params ? `?${params.toString()}` : '';
    const response = await this.send(
      `${this.options.apiBase}${path}${query}`,
      { headers: { Authorization: `Bearer ${token}`, Accept: 'application/json' } },
      path,
    );

    if (!response.ok) {
      if (response.status === 401) this.tokens.invalidate();
      throw new RemoteError(
        `Feishu API error: ${response.status} ${response.statusText} for ${path}`,
        response.status,
        null,
        await response.text(),
      );
    }

    const envelope = ApiEnvelopeSchema.safeParse(await this.readJson(response, path));
    if (!envelope.success) {
      throw new RemoteError(`Feishu API returned an unexpected response for ${path}`, response.status);
    }

    const { code, msg, data } = envelope.data;
    if (code !== 0) {
      if (INVALID_TOKEN_CODES.has(code)) this.tokens.invalidate();
      throw new RemoteError(`Feishu API error: code ${code} (${msg ?? 'no message'}) for ${path}`, response.status, code);
    }

    return data;
  }

  // -------------------------------------------------------------------------
  // API
  // -------------------------------------------------------------------------

  async getApprovalInstance(instanceCode: string): Promise<ApprovalInstance> {
    const path = `/approval/v4/instances/${encodeURIComponent(instanceCode)}`;
    const parsed = ApprovalInstanceDataSchema.safeParse(await this.get(path));
    if (!parsed.success) {
      throw new RemoteError(`Feishu API returned an unexpected approval instance for ${instanceCode}`, 200);
    }

    const data = parsed.data;
    const instance: ApprovalInstance = {
      instanceCode: data.instance_code ?? instanceCode,
      approvalName: data.approval_name,
      approvalCode: data.approval_code ?? null,
      serialNumber: data.serial_number ?? null,
      status: data.status ?? null,
      formJson: data.form,
    };

    // Metadata only, the form holds submitter-entered content
    console.log('[feishu] Fetched approval instance', {
      instanceCode,
      approvalName: instance.approvalName,
      status: instance.status,
    });

    return instance;
  }

  /**
   * Resolve file tokens to temporary download URLs.
   * Duplicate and empty tokens are ignored; no tokens means no request.
   */
  async getFileDownloadUrls(fileTokens: Iterable<string>): Promise<Map<string, string>> {
    const unique = [...new Set(fileTokens)].filter(Boolean);
    const urls = new Map<string, string>();
    if (unique.length === 0) return urls;

    for (let i = 0; i < unique.length; i += DOWNLOAD_URL_BATCH_SIZE) {
      const params = new URLSearchParams();
      for (const token of unique.slice(i, i + DOWNLOAD_URL_BATCH_SIZE)) {
        params.append('file_tokens', token);
      }

      const path = '/drive/v1/medias/batch_get_tmp_download_url';
      const parsed = TmpDownloadUrlsDataSchema.safeParse(await this.get(path, params));
      if (!parsed.success) {
        throw new RemoteError(`Feishu API returned an unexpected response for ${path}`, 200);
      }
      for (const item of parsed.data.tmp_download_urls) {
        urls.set(item.file_token, item.tmp_download_url);
      }
    }

    console.log('[feishu] Resolved download URLs', { requested: unique.length, resolved: urls.size });
    return urls;
  }

  /** Download file bytes. Temporary URLs carry their own authorization. */
  async downloadFile(url: string): Promise<Buffer> {
    const response = await this.send(url, { redirect: 'follow' }, 'file download');
    if (!response.ok) {
      throw new RemoteError(
        `File download failed: ${response.status} ${response.statusText}`,
        response.status,
      );
    }
    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (err) {
      throw new RemoteError(`File download failed: ${errorMessage(err)}`, response.status);
    }
  }
}

// Lazy singleton: one client (and so one token cache) per process
let _client: FeishuClient | null = null;

export function getFeishuClient(): FeishuClient {
  if (!_client) {
    _client = new FeishuClient(appConfig.feishu);
  }
  return _client;
}
