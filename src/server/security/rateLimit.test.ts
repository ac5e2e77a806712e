import { afterEach, describe, expect, it } from 'vitest';

import { isHttpErrorLike } from '~/server/http/error';
import { consumeRateLimit, getClientIp, requireSyncWriteBudgetOrThrow, resetRateLimit } from './rateLimit';
import { securityConfig } from './securityConfig';

const opt = { windowMs: 1000, maxPerWindow: 2, blockMs: 5000 };

describe('consumeRateLimit', () => {
  afterEach(() => {
    resetRateLimit('t:window');
    resetRateLimit('t:reset');
  });

  it('blocks past the window budget for blockMs', () => {
    expect(consumeRateLimit('t:window', opt, 0)).toEqual({ ok: true });
    expect(consumeRateLimit('t:window', opt, 10)).toEqual({ ok: true });
    expect(consumeRateLimit('t:window', opt, 20)).toEqual({ ok: false, retryAfterMs: 5000 });
    expect(consumeRateLimit('t:window', opt, 3020)).toEqual({ ok: false, retryAfterMs: 2000 });
    expect(consumeRateLimit('t:window', opt, 5020)).toEqual({ ok: true });
  });

  it('starts a fresh window once the old one has passed', () => {
    consumeRateLimit('t:reset', opt, 0);
    consumeRateLimit('t:reset', opt, 1);
    expect(consumeRateLimit('t:reset', opt, 1000)).toEqual({ ok: true });
  });
});

describe('getClientIp', () => {
  const headers = new Headers({ 'x-forwarded-for': '203.0.113.7, 10.0.0.1', 'x-real-ip': '10.0.0.2' });

  it('ignores proxy headers unless the proxy is trusted', () => {
    expect(getClientIp(headers, false)).toBeNull();
  });

  it('takes the first forwarded address, then x-real-ip', () => {
    expect(getClientIp(headers, true)).toBe('203.0.113.7');
    expect(getClientIp(new Headers({ 'x-real-ip': ' 10.0.0.2 ' }), true)).toBe('10.0.0.2');
  });
});

describe('requireSyncWriteBudgetOrThrow', () => {
  const limit = { ...securityConfig.sync.writeRateLimit };

  afterEach(() => {
    securityConfig.sync.writeRateLimit = limit;
    resetRateLimit('sync-write:uid:user-rl');
  });

  it('throws 429 with Retry-After once the user is over budget', () => {
    securityConfig.sync.writeRateLimit = { maxPerWindow: 1, windowMs: 60_000, blockMs: 30_000 };
    const headers = new Headers();

    requireSyncWriteBudgetOrThrow('user-rl', headers);

    try {
      requireSyncWriteBudgetOrThrow('user-rl', headers);
      expect.unreachable();
    } catch (err) {
      if (!isHttpErrorLike(err)) throw err;
      expect(err.status).toBe(429);
      expect(err.message).toBe('rate_limited');
      expect(err.headers).toEqual({ 'Retry-After': '30' });
    }
  });
});
