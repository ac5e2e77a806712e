// src/server/http/routeResponses.ts

import { NextResponse } from 'next/server';
import { isHttpErrorLike, isSyncError } from '~/server/http/error';

// Only expose "code-ish" messages to clients (prevents accidental leakage).
const PUBLIC_CODE_RE = /^[a-z0-9_]+$/;

function isPublicCode(message: unknown): message is string {
  return typeof message === 'string' && PUBLIC_CODE_RE.test(message);
}

/**
 * Sync state must never be served from a browser/CDN cache.
 * (We intentionally override any incoming Cache-Control.)
 */
export function noStoreHeaders(extra?: Record<string, string>): Record<string, string> {
  return {
    ...(extra || {}),
    'Cache-Control': 'no-store',
  };
}

export function getErrorStatus(err: unknown): number {
  if (isHttpErrorLike(err)) return err.status || 500;
  return 500;
}

export function getErrorHeaders(err: unknown): Record<string, string> | undefined {
  if (!isHttpErrorLike(err)) return undefined;
  return err.headers;
}

/**
 * Public error codes are:
 * - thrown via makeHttpError / makeSyncError (status present)
 * - message matches our public code format
 * - not an unexpected (store) failure
 *
 * Anything else is treated as internal and not exposed.
 */
export function getPublicErrorCode(err: unknown): string | null {
  if (!isHttpErrorLike(err)) return null;
  // Unexpected sync faults carry a code-ish message too; never expose those.
  if (isSyncError(err) && !err.expected) return null;
  return isPublicCode(err.message) ? err.message : null;
}

export function jsonNoStore<T>(
  body: T,
  init?: { status?: number; headers?: Record<string, string> },
): NextResponse {
  return NextResponse.json(body, {
    status: init?.status,
    headers: noStoreHeaders(init?.headers),
  });
}

export type SyncErrorBody = {
  error: string;
  current_version?: number;
};

type JsonErrorOptions = {
  fallbackCode?: string;      // default: 'server_error'
  logLabel?: string;          // short tag to identify where it happened
};

/**
 * Standardized "catch(err)" JSON response for the sync routes.
 * 409 bodies also carry the record's current version so the client knows what to re-resolve against.
 */
export function jsonErrorFromThrowable(err: unknown, opt?: JsonErrorOptions): NextResponse {
  const status = getErrorStatus(err);

  const publicCode = getPublicErrorCode(err);
  const code = publicCode ?? opt?.fallbackCode ?? 'server_error';

  // Only log unexpected/internal errors (helps debugging without leaking to client).
  if (!publicCode) {
    const label = opt?.logLabel ? `[${opt.logLabel}] ` : '';
    console.error(`${label}unexpected error`, err);
  }

  const body: SyncErrorBody = { error: code };
  if (isSyncError(err) && err.currentVersion !== undefined)
    body.current_version = err.currentVersion;

  return NextResponse.json(body, { status, headers: noStoreHeaders(getErrorHeaders(err)) });
}
