import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { makeHttpError, makeSyncError } from './error';
import { getPublicErrorCode, jsonErrorFromThrowable, jsonNoStore } from './routeResponses';

describe('getPublicErrorCode', () => {
  it('exposes snake_case codes of http and expected sync errors', () => {
    expect(getPublicErrorCode(makeHttpError(503, 'server_misconfigured'))).toBe('server_misconfigured');
    expect(getPublicErrorCode(makeSyncError('not_found', 'Supplier 3 not found'))).toBe('not_found');
  });

  it('hides store failures, free-text messages and plain errors', () => {
    expect(getPublicErrorCode(makeSyncError('store_failure', 'boom'))).toBeNull();
    expect(getPublicErrorCode(makeHttpError(400, 'Bad thing happened'))).toBeNull();
    expect(getPublicErrorCode(new Error('conflict'))).toBeNull();
  });
});

describe('jsonErrorFromThrowable', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('carries status, headers and the current version of a conflict', async () => {
    const res = jsonErrorFromThrowable(makeSyncError('conflict', 'moved', { currentVersion: 7 }));
    expect(res.status).toBe(409);
    expect(res.headers.get('cache-control')).toBe('no-store');
    expect(await res.json()).toEqual({ error: 'conflict', current_version: 7 });
  });

  it('passes Retry-After through', async () => {
    const res = jsonErrorFromThrowable(makeHttpError(429, 'rate_limited', { 'Retry-After': '12' }));
    expect(res.status).toBe(429);
    expect(res.headers.get('retry-after')).toBe('12');
  });

  it('maps internal errors to the fallback code and logs them', async () => {
    const res = jsonErrorFromThrowable(new TypeError('x is undefined'), { fallbackCode: 'sync_failed', logLabel: 'sync:batch' });
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'sync_failed' });
    expect(console.error).toHaveBeenCalledWith('[sync:batch] unexpected error', expect.any(TypeError));
  });
});

describe('jsonNoStore', () => {
  it('serializes the body with no-store caching', async () => {
    const res = jsonNoStore({ ok: true }, { status: 201 });
    expect(res.status).toBe(201);
    expect(res.headers.get('cache-control')).toBe('no-store');
    expect(await res.json()).toEqual({ ok: true });
  });
});
