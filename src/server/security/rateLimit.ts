// src/server/security/rateLimit.ts

import { makeHttpError } from '~/server/http/error';
import { securityConfig } from '~/server/security/securityConfig';

type Entry = {
  windowStart: number;
  count: number;
  blockedUntil: number;
  lastSeen: number;
};

declare global {
  // eslint-disable-next-line no-var
  var __ledgerSyncRateLimitStore: Map<string, Entry> | undefined;
}

function store(): Map<string, Entry> {
  if (!globalThis.__ledgerSyncRateLimitStore) globalThis.__ledgerSyncRateLimitStore = new Map();
  return globalThis.__ledgerSyncRateLimitStore;
}

const STALE_ENTRY_MS = 60 * 60 * 1000;
const CLEANUP_THRESHOLD = 10_000;

export type RateLimitOptions = {
  windowMs: number;
  maxPerWindow: number;
  blockMs: number;
};

export type RateLimitResult =
  | { ok: true }
  | { ok: false; retryAfterMs: number };

/**
 * Fixed-window limiter with temporary blocking when exceeded.
 * In-memory, per instance: enough to stop a runaway sync loop on one device.
 */
export function consumeRateLimit(key: string, opt: RateLimitOptions, now: number = Date.now()): RateLimitResult {
  const m = store();

  if (m.size > CLEANUP_THRESHOLD) {
    for (const [k, e] of m.entries()) {
      if (now - e.lastSeen > STALE_ENTRY_MS) m.delete(k);
    }
  }

  const e = m.get(key) ?? { windowStart: now, count: 0, blockedUntil: 0, lastSeen: now };
  e.lastSeen = now;
  m.set(key, e);

  if (e.blockedUntil > now)
    return { ok: false, retryAfterMs: e.blockedUntil - now };

  if (now - e.windowStart >= opt.windowMs) {
    e.windowStart = now;
    e.count = 0;
  }

  e.count += 1;

  if (e.count > opt.maxPerWindow) {
    e.blockedUntil = now + opt.blockMs;
    return { ok: false, retryAfterMs: opt.blockMs };
  }

  return { ok: true };
}

export function resetRateLimit(key: string): void {
  store().delete(key);
}

/**
 * Convenience: throw an HTTP 429 with Retry-After header.
 */
export function requireRateLimitOrThrow(key: string, opt: RateLimitOptions): void {
  const res = consumeRateLimit(key, opt);
  if (res.ok) return;

  const retryAfterSec = Math.max(1, Math.ceil(res.retryAfterMs / 1000));
  throw makeHttpError(429, 'rate_limited', {
    'Retry-After': String(retryAfterSec),
  });
}

/**
 * Client IP from proxy headers, only when LS_TRUST_PROXY=1.
 * Without a trusted proxy we do not guess the remote address.
 */
export function getClientIp(headers: Headers, trustProxy: boolean = securityConfig.trustProxy): string | null {
  if (!trustProxy) return null;

  // "client, proxy1, proxy2"
  const xff = headers.get('x-forwarded-for');
  if (xff) return xff.split(',')[0]?.trim() || null;

  const realIp = headers.get('x-real-ip');
  if (realIp) return realIp.trim();

  return null;
}

/**
 * All sync writes (batches and conflict resolutions) of one user share one budget.
 * Several devices of the same operator behind one proxy IP are still told apart by user id.
 */
export function requireSyncWriteBudgetOrThrow(userId: string, headers: Headers): void {
  const ip = getClientIp(headers);
  const key = ip ? `sync-write:uid:${userId}:ip:${ip}` : `sync-write:uid:${userId}`;
  requireRateLimitOrThrow(key, securityConfig.sync.writeRateLimit);
}
