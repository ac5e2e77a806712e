// src/server/sync/syncConflict.ts

import type { SyncConflictRecord, SyncFields, SyncRecord } from './syncTypes';
import { toWireRecord } from './syncTypes';

export type SyncDetectResult =
  | { kind: 'match' }
  | { kind: 'conflict'; conflict: SyncConflictRecord };

/**
 * Optimistic-concurrency check of a client write against the stored record.
 *
 * `stored` must be freshly read for this request. Pure: no I/O, no mutation of
 * either argument; the caller decides whether to write.
 */
export function detectConflict(
  stored: SyncRecord,
  clientVersion: number,
  clientData: SyncFields,
  localId: string | null = null,
): SyncDetectResult {
  if (stored.version === clientVersion)
    return { kind: 'match' };

  return {
    kind: 'conflict',
    conflict: {
      entityType: stored.entityType,
      serverId: stored.serverId,
      localId,
      localVersion: clientVersion,
      serverVersion: stored.version,
      serverData: toWireRecord(stored),
      clientData: { ...clientData },
    },
  };
}
