// app/api/sync/changes/route.ts

import type { NextRequest } from 'next/server';

import { jsonErrorFromThrowable, jsonNoStore } from '~/server/http/routeResponses';
import { requireSyncAuthOrThrow } from '~/server/sync/syncAuth';
import { getSyncEngine } from '~/server/sync/syncEngine';
import type { SyncChangesResponse } from '~/server/sync/syncTypes';
import { toWireRecord } from '~/server/sync/syncTypes';
import { parseChangesQuery } from '~/server/sync/syncValidation';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

/**
 * GET /api/sync/changes?since=<ISO-8601>&entity_type=<type>
 * Records changed after the watermark, plus the next watermark (`as_of`).
 */
export async function GET(req: NextRequest) {
  try {
    await requireSyncAuthOrThrow(req);

    const { since, entityType } = parseChangesQuery(req.nextUrl.searchParams);
    const changes = await getSyncEngine().changesSince({ since, entityType });

    const body: SyncChangesResponse = {
      records: changes.records.map(toWireRecord),
      as_of: changes.asOf,
      has_more: changes.hasMore,
    };
    return jsonNoStore(body);
  } catch (err: unknown) {
    return jsonErrorFromThrowable(err, { logLabel: 'sync:changes', fallbackCode: 'changes_failed' });
  }
}
