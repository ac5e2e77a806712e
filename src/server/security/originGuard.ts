// src/server/security/originGuard.ts

import { makeHttpError } from '~/server/http/error';
import { securityConfig } from '~/server/security/securityConfig';

export function getExpectedOriginFromNextAuthUrl(): string | null {
  const raw = process.env.NEXTAUTH_URL;
  if (!raw) return null;
  try {
    return new URL(raw).origin;
  } catch {
    return null;
  }
}

/**
 * Cookie-auth write endpoints should be same-origin.
 * NEXTAUTH_URL is the source of truth for the public origin.
 *
 * No-op unless LS_SYNC_REQUIRE_SAME_ORIGIN_WRITES is on (default in production):
 * native field clients do not send an Origin header.
 */
export function requireSameOriginWriteOrThrow(req: { headers: Headers }): void {
  if (!securityConfig.sync.requireSameOriginWrites) return;

  const expected = getExpectedOriginFromNextAuthUrl();
  if (!expected) {
    // Misconfiguration: we can't safely validate Origin.
    throw makeHttpError(503, 'server_misconfigured');
  }

  const origin = req.headers.get('origin');
  if (!origin) throw makeHttpError(403, 'missing_origin');
  if (origin !== expected) throw makeHttpError(403, 'bad_origin');
}
