// src/server/sync/syncTypes.ts

export type SyncUserId = string;
export type SyncServerId = number;

export type SyncEntityType = 'supplier' | 'product' | 'collection' | 'payment';

export const SYNC_ENTITY_TYPES: readonly SyncEntityType[] = ['supplier', 'product', 'collection', 'payment'];

export type SyncFieldValue = string | number | boolean | null | SyncFieldValue[] | { [key: string]: SyncFieldValue };

/** Domain payload of a record; opaque to the engine apart from entity validation. */
export type SyncFields = Record<string, SyncFieldValue>;

/**
 * Contract notes:
 * - version starts at 1 and moves by exactly +1 per accepted write (update or resolution).
 * - A write against version v succeeds only if the stored version is still v.
 * - createdAt / updatedAt are ISO strings set by the store.
 */
export interface SyncRecord {
  readonly entityType: SyncEntityType;
  readonly serverId: SyncServerId;
  readonly version: number;
  readonly fields: SyncFields;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export function withVersion(record: SyncRecord, version: number): SyncRecord {
  return { ...record, version };
}

/**
 * One unit of client work. Transient: consumed once by syncBatch, never stored.
 * serverId === null means "create".
 */
export interface SyncBatchItem {
  entityType: SyncEntityType;
  localId: string | null;
  serverId: SyncServerId | null;
  clientVersion: number;
  fields: SyncFields;
}

export interface SyncConflictRecord {
  entityType: SyncEntityType;
  serverId: SyncServerId;
  localId: string | null;
  localVersion: number;
  serverVersion: number;
  serverData: SyncWireRecord;
  clientData: SyncFields;
}

export type SyncResolutionStrategy = 'server_wins' | 'client_wins' | 'merge';

export const SYNC_RESOLUTION_STRATEGIES: readonly SyncResolutionStrategy[] = ['server_wins', 'client_wins', 'merge'];

export type SyncAuditAction = 'create' | 'update' | `resolve_${SyncResolutionStrategy}`;

// ---- Wire format (snake_case, as sent to / received from field clients) ----

/** Record as serialized for clients: domain fields plus sync metadata. */
export type SyncWireRecord = SyncFields & {
  id: SyncServerId;
  entity_type: SyncEntityType;
  version: number;
  created_at: string;
  updated_at: string;
};

export interface SyncSuccessEntry {
  action: 'created' | 'updated';
  entity_type: SyncEntityType;
  local_id: string | null;
  server_id: SyncServerId;
  version: number;
  data: SyncWireRecord;
}

export interface SyncConflictEntry {
  entity_type: SyncEntityType;
  local_id: string | null;
  server_id: SyncServerId;
  local_version: number;
  server_version: number;
  server_data: SyncWireRecord;
  client_data: SyncFields;
}

export interface SyncErrorEntry {
  entity_type?: SyncEntityType;
  local_id?: string;
  server_id?: SyncServerId;
  code: 'not_found' | 'validation_failed';
  message: string;
}

/** POST /api/sync response. Callers must inspect all three buckets: a 200 can carry per-item failures. */
export interface SyncBatchResponse {
  success: SyncSuccessEntry[];
  conflicts: SyncConflictEntry[];
  errors: SyncErrorEntry[];
}

export interface SyncResolveResponse {
  status: 'resolved';
  strategy: SyncResolutionStrategy;
  entity_type: SyncEntityType;
  server_id: SyncServerId;
  version: number;
  data: SyncWireRecord;
}

export interface SyncChangesResponse {
  records: SyncWireRecord[];
  as_of: string;
  has_more: boolean;
}

export interface SyncStatusResponse {
  status: 'online';
  server_time: string;
}

export function toWireRecord(record: SyncRecord): SyncWireRecord {
  return {
    ...record.fields,
    id: record.serverId,
    entity_type: record.entityType,
    version: record.version,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
  };
}
