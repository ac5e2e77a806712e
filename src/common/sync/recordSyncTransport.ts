// src/common/sync/recordSyncTransport.ts

import type {
  SyncBatchResponse,
  SyncChangesResponse,
  SyncEntityType,
  SyncFields,
  SyncResolutionStrategy,
  SyncResolveResponse,
  SyncServerId,
  SyncStatusResponse,
} from '~/server/sync/syncTypes';

/**
 * Transport result wrapper.
 *
 * `error` is the server's public code when it sent one, else a readable message.
 */
export type RecordSyncResult<T> =
  | { ok: true; value: T }
  | {
    ok: false;
    error: string;
    status?: number;
    retryable?: boolean;

    /** Parsed response body, if any. */
    body?: unknown;

    /** Present on a 409 from resolve-conflict: the version to re-resolve against. */
    currentVersion?: number;
  };

/** One pending offline mutation, as POSTed to /api/sync. */
export interface RecordSyncItem {
  entity_type?: SyncEntityType;
  local_id?: string | null;
  id?: SyncServerId | null;
  version?: number;
  fields: SyncFields;
}

export interface RecordSyncBatchRequest {
  entity_type?: SyncEntityType;
  items: RecordSyncItem[];
}

export interface RecordSyncResolveRequest {
  entity_type: SyncEntityType;
  server_id: SyncServerId;
  strategy: SyncResolutionStrategy;
  client_data: SyncFields;
}

export interface RecordSyncChangesQuery {
  since?: string | null;
  entity_type?: SyncEntityType | null;
}

/**
 * Field-device side of the sync API.
 *
 * - mode='disabled' means: no network calls; the device keeps its queue.
 */
export interface RecordSyncTransport {
  mode: 'disabled' | 'http';

  syncBatch(req: RecordSyncBatchRequest): Promise<RecordSyncResult<SyncBatchResponse>>;
  resolveConflict(req: RecordSyncResolveRequest): Promise<RecordSyncResult<SyncResolveResponse>>;

  getChanges(query?: RecordSyncChangesQuery): Promise<RecordSyncResult<SyncChangesResponse>>;
  getStatus(): Promise<RecordSyncResult<SyncStatusResponse>>;
}
