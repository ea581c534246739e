/**
 * Tests for the tenant access token cache
 */

import { describe, it, expect, vi } from 'vitest';
import { TenantTokenCache } from '../token-cache.js';
import type { IssuedToken } from '../token-cache.js';

function clock(start = 0) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('TenantTokenCache', () => {
  it('fetches once and serves the cached token', async () => {
    const fetchToken = vi.fn(async (): Promise<IssuedToken> => ({ token: 't-1', expiresInSeconds: 7200 }));
    const cache = new TenantTokenCache(fetchToken, clock().now);

    expect(await cache.getToken()).toBe('t-1');
    expect(await cache.getToken()).toBe('t-1');
    expect(fetchToken).toHaveBeenCalledTimes(1);
  });

  it('refreshes 300 seconds before the server expiry', async () => {
    const time = clock();
    let issued = 0;
    const fetchToken = vi.fn(async (): Promise<IssuedToken> => {
      issued++;
      return { token: `t-${issued}`, expiresInSeconds: 7200 };
    });
    const cache = new TenantTokenCache(fetchToken, time.now);

    await cache.getToken();
    time.advance(6_899_999);
    expect(cache.isExpired()).toBe(false);
    expect(await cache.getToken()).toBe('t-1');

    time.advance(1);
    expect(cache.isExpired()).toBe(true);
    expect(await cache.getToken()).toBe('t-2');
    expect(fetchToken).toHaveBeenCalledTimes(2);
  });

  it('shares one in-flight refresh between concurrent callers', async () => {
    let resolveToken: (token: IssuedToken) => void = () => {};
    const fetchToken = vi.fn(
      () =>
        new Promise<IssuedToken>(resolve => {
          resolveToken = resolve;
        }),
    );
    const cache = new TenantTokenCache(fetchToken, clock().now);

    const first = cache.getToken();
    const second = cache.getToken();
    resolveToken({ token: 't-shared', expiresInSeconds: 7200 });

    expect(await Promise.all([first, second])).toEqual(['t-shared', 't-shared']);
    expect(fetchToken).toHaveBeenCalledTimes(1);
  });

  it('retries on the next call after a failed refresh', async () => {
    const fetchToken = vi
      .fn<() => Promise<IssuedToken>>()
      .mockRejectedValueOnce(new Error('Failed to get tenant access token: invalid app secret'))
      .mockResolvedValueOnce({ token: 't-2', expiresInSeconds: 7200 });
    const cache = new TenantTokenCache(fetchToken, clock().now);

    await expect(cache.getToken()).rejects.toThrow('Failed to get tenant access token: invalid app secret');
    expect(cache.isExpired()).toBe(true);
    expect(await cache.getToken()).toBe('t-2');
  });

  it('fetches again after invalidate', async () => {
    const fetchToken = vi
      .fn<() => Promise<IssuedToken>>()
      .mockResolvedValueOnce({ token: 't-1', expiresInSeconds: 7200 })
      .mockResolvedValueOnce({ token: 't-2', expiresInSeconds: 7200 });
    const cache = new TenantTokenCache(fetchToken, clock().now);

    await cache.getToken();
    cache.invalidate();

    expect(cache.isExpired()).toBe(true);
    expect(await cache.getToken()).toBe('t-2');
  });
});
