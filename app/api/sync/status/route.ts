// app/api/sync/status/route.ts

import type { NextRequest } from 'next/server';

import { jsonErrorFromThrowable, jsonNoStore } from '~/server/http/routeResponses';
import { requireSyncAuthOrThrow } from '~/server/sync/syncAuth';
import { getSyncEngine } from '~/server/sync/syncEngine';
import type { SyncStatusResponse } from '~/server/sync/syncTypes';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

/**
 * GET /api/sync/status
 * Server clock, so clients can detect skew before trusting a `since` watermark.
 */
export async function GET(req: NextRequest) {
  try {
    await requireSyncAuthOrThrow(req);

    const body: SyncStatusResponse = {
      status: 'online',
      server_time: await getSyncEngine().serverTime(),
    };
    return jsonNoStore(body);
  } catch (err: unknown) {
    return jsonErrorFromThrowable(err, { logLabel: 'sync:status', fallbackCode: 'status_failed' });
  }
}
