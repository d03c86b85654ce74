import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TokenCache } from './token-cache';
import type { TokenAcquisitionResult } from './types';

describe('TokenCache', () => {
  const now = new Date('2025-03-01T10:00:00.000Z').getTime();
  const minutes = (count: number) => count * 60 * 1000;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(now);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('reuses a token until the refresh margin is reached', async () => {
    const acquire = vi.fn().mockResolvedValue({ token: 'token-1', expiresAt: now + minutes(60) });
    const cache = new TokenCache(acquire);

    expect(await cache.getToken()).toBe('token-1');
    expect(await cache.getToken()).toBe('token-1');
    expect(acquire).toHaveBeenCalledTimes(1);
  });

  it('acquires a new token inside the five minute margin', async () => {
    const acquire = vi
      .fn()
      .mockResolvedValueOnce({ token: 'token-1', expiresAt: now + minutes(10) })
      .mockResolvedValueOnce({ token: 'token-2', expiresAt: now + minutes(70) });
    const cache = new TokenCache(acquire);

    await cache.getToken();
    vi.setSystemTime(now + minutes(6));

    expect(await cache.getToken()).toBe('token-2');
    expect(acquire).toHaveBeenCalledTimes(2);
  });

  it('honours a custom refresh margin', async () => {
    const acquire = vi
      .fn()
      .mockResolvedValueOnce({ token: 'token-1', expiresAt: now + minutes(10) })
      .mockResolvedValueOnce({ token: 'token-2', expiresAt: now + minutes(70) });
    const cache = new TokenCache(acquire, minutes(1));

    await cache.getToken();
    vi.setSystemTime(now + minutes(6));

    expect(await cache.getToken()).toBe('token-1');
    expect(acquire).toHaveBeenCalledTimes(1);
  });

  it('shares one acquisition between concurrent callers', async () => {
    let resolveToken: (value: TokenAcquisitionResult) => void = () => {};
    const acquire = vi.fn(
      () =>
        new Promise<TokenAcquisitionResult>((resolve) => {
          resolveToken = resolve;
        }),
    );
    const cache = new TokenCache(acquire);

    const first = cache.getToken();
    const second = cache.getToken();
    resolveToken({ token: 'shared', expiresAt: now + minutes(60) });

    expect(await Promise.all([first, second])).toEqual(['shared', 'shared']);
    expect(acquire).toHaveBeenCalledTimes(1);
  });

  it('clears the cache and rethrows when acquisition fails', async () => {
    const failure = new Error('AADSTS7000215: invalid client secret');
    const acquire = vi
      .fn()
      .mockRejectedValueOnce(failure)
      .mockResolvedValueOnce({ token: 'token-2', expiresAt: now + minutes(60) });
    const cache = new TokenCache(acquire);

    await expect(cache.getToken()).rejects.toBe(failure);
    expect(await cache.getToken()).toBe('token-2');
  });

  it('acquires again after invalidation', async () => {
    const acquire = vi
      .fn()
      .mockResolvedValueOnce({ token: 'token-1', expiresAt: now + minutes(60) })
      .mockResolvedValueOnce({ token: 'token-2', expiresAt: now + minutes(60) });
    const cache = new TokenCache(acquire);

    await cache.getToken();
    cache.invalidate();

    expect(await cache.getToken()).toBe('token-2');
  });
});
