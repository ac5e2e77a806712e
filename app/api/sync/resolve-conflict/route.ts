// app/api/sync/resolve-conflict/route.ts

import type { NextRequest } from 'next/server';

import { jsonErrorFromThrowable, jsonNoStore } from '~/server/http/routeResponses';
import { readJsonWithLimit } from '~/server/security/bodyLimit';
import { requireSameOriginWriteOrThrow } from '~/server/security/originGuard';
import { requireSyncWriteBudgetOrThrow } from '~/server/security/rateLimit';
import { securityConfig } from '~/server/security/securityConfig';
import { requireSyncAuthOrThrow } from '~/server/sync/syncAuth';
import { getSyncEngine } from '~/server/sync/syncEngine';
import type { SyncResolveResponse } from '~/server/sync/syncTypes';
import { toWireRecord } from '~/server/sync/syncTypes';
import { parseResolveRequest } from '~/server/sync/syncValidation';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

/**
 * POST /api/sync/resolve-conflict
 * Settle a conflict returned by POST /api/sync with server_wins | client_wins | merge.
 *
 * 409 means the record moved again while resolving; the body carries `current_version`.
 */
export async function POST(req: NextRequest) {
  try {
    const { userId } = await requireSyncAuthOrThrow(req);
    requireSameOriginWriteOrThrow(req);
    requireSyncWriteBudgetOrThrow(userId, req.headers);

    const body = await readJsonWithLimit(req, securityConfig.sync.maxWriteBodyBytes);
    const input = parseResolveRequest(body);

    const { strategy, record } = await getSyncEngine().resolveConflict(input, userId);

    const response: SyncResolveResponse = {
      status: 'resolved',
      strategy,
      entity_type: record.entityType,
      server_id: record.serverId,
      version: record.version,
      data: toWireRecord(record),
    };
    return jsonNoStore(response);
  } catch (err: unknown) {
    return jsonErrorFromThrowable(err, { logLabel: 'sync:resolve', fallbackCode: 'resolve_failed' });
  }
}
