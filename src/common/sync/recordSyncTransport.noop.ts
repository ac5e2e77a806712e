// src/common/sync/recordSyncTransport.noop.ts

import type {
  RecordSyncResult,
  RecordSyncTransport,
} from '~/common/sync/recordSyncTransport';
import type {
  SyncBatchResponse,
  SyncChangesResponse,
  SyncResolveResponse,
  SyncStatusResponse,
} from '~/server/sync/syncTypes';

export function createRecordSyncTransportNoop(): RecordSyncTransport {
  const disabled = <T,>(what: string): RecordSyncResult<T> => ({
    ok: false,
    error: `sync disabled (${what})`,
    retryable: false,
  });

  return {
    mode: 'disabled',

    syncBatch: async () => disabled<SyncBatchResponse>('syncBatch'),
    resolveConflict: async () => disabled<SyncResolveResponse>('resolveConflict'),

    getChanges: async () => disabled<SyncChangesResponse>('getChanges'),
    getStatus: async () => disabled<SyncStatusResponse>('getStatus'),
  };
}
