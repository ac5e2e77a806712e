// src/server/sync/syncAuth.ts

import type { NextRequest } from 'next/server';
import { getToken } from 'next-auth/jwt';

import { makeHttpError } from '~/server/http/error';
import type { SyncUserId } from './syncTypes';

/**
 * Sync actor = `sub` of the next-auth JWT session cookie.
 * Sessions are issued elsewhere; this only verifies them with NEXTAUTH_SECRET.
 */
export async function requireSyncAuthOrThrow(req: NextRequest): Promise<{ userId: SyncUserId }> {
  const secret = process.env.NEXTAUTH_SECRET;

  // 503: server misconfigured (cannot validate sessions)
  if (!secret)
    throw makeHttpError(503, 'server_misconfigured');

  const token = await getToken({ req, secret });
  const userId = typeof token?.sub === 'string' && token.sub ? token.sub : null;

  if (!userId)
    throw makeHttpError(401, 'unauthorized');

  return { userId };
}
