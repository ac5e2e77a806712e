// app/api/sync/route.ts

import type { NextRequest } from 'next/server';

import { jsonErrorFromThrowable, jsonNoStore } from '~/server/http/routeResponses';
import { readJsonWithLimit } from '~/server/security/bodyLimit';
import { requireSameOriginWriteOrThrow } from '~/server/security/originGuard';
import { requireSyncWriteBudgetOrThrow } from '~/server/security/rateLimit';
import { securityConfig } from '~/server/security/securityConfig';
import { requireSyncAuthOrThrow } from '~/server/sync/syncAuth';
import { getSyncEngine } from '~/server/sync/syncEngine';
import type { SyncBatchResponse } from '~/server/sync/syncTypes';
import { parseSyncBatchRequest } from '~/server/sync/syncValidation';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

/**
 * POST /api/sync
 * Apply a batch of offline mutations with optimistic concurrency.
 *
 * 200 does not mean every item went through: clients must read
 * `success`, `conflicts` and `errors`.
 */
export async function POST(req: NextRequest) {
  try {
    const { userId } = await requireSyncAuthOrThrow(req);
    requireSameOriginWriteOrThrow(req);
    requireSyncWriteBudgetOrThrow(userId, req.headers);

    const body = await readJsonWithLimit(req, securityConfig.sync.maxWriteBodyBytes);
    const { items, rejected } = parseSyncBatchRequest(body);

    const result = await getSyncEngine().syncBatch(items, userId);

    const response: SyncBatchResponse = {
      success: result.success,
      conflicts: result.conflicts,
      errors: [...rejected, ...result.errors],
    };
    return jsonNoStore(response);
  } catch (err: unknown) {
    return jsonErrorFromThrowable(err, { logLabel: 'sync:batch', fallbackCode: 'sync_failed' });
  }
}
