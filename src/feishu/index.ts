// ============================================================================
// Feishu Module — Barrel Export
// ============================================================================

export type { ApprovalApi, ApprovalInstance } from './types.js';
export type { FeishuClientOptions } from './client.js';
export type { IssuedToken, TokenFetcher } from './token-cache.js';

export { FeishuClient, getFeishuClient, DOWNLOAD_URL_BATCH_SIZE } from './client.js';
export { TenantTokenCache, EARLY_EXPIRY_SECONDS } from './token-cache.js';
export { RemoteError } from './errors.js';
