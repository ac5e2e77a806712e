// src/server/sync/syncOrchestrator.ts

import { isExpectedSyncError, isSyncError, makeSyncError } from '~/server/http/error';
import type { SyncErrorLike } from '~/server/http/error';
import type { SyncAuditEmitter, SyncAuditEvent } from './syncAudit';
import { flushAuditEvents } from './syncAudit';
import { generateRecordCode } from './syncCode';
import { detectConflict } from './syncConflict';
import type { SyncDetectResult } from './syncConflict';
import { getSyncEntity, mergeNonNullFields, validateEntityFields } from './syncEntities';
import type { SyncRecordStore } from './syncStore';
import type {
  SyncBatchItem,
  SyncBatchResponse,
  SyncConflictEntry,
  SyncConflictRecord,
  SyncErrorEntry,
  SyncFields,
  SyncRecord,
  SyncUserId,
} from './syncTypes';
import { toWireRecord } from './syncTypes';

export interface SyncOrchestratorOptions {
  store: SyncRecordStore;
  audit: SyncAuditEmitter;

  /** Called once per accepted write, after commit (realtime fan-out). */
  onCommitted?: (record: SyncRecord) => void;

  generateCode?: (prefix: string) => string;
}

type ItemOutcome =
  | { kind: 'created' | 'updated'; record: SyncRecord; event: SyncAuditEvent }
  | { kind: 'conflict'; conflict: SyncConflictRecord };

type BatchResult = {
  response: SyncBatchResponse;
  events: SyncAuditEvent[];
  written: SyncRecord[];
};

export function toConflictEntry(c: SyncConflictRecord): SyncConflictEntry {
  return {
    entity_type: c.entityType,
    local_id: c.localId,
    server_id: c.serverId,
    local_version: c.localVersion,
    server_version: c.serverVersion,
    server_data: c.serverData,
    client_data: c.clientData,
  };
}

function toErrorEntry(item: SyncBatchItem, err: SyncErrorLike): SyncErrorEntry {
  const entry: SyncErrorEntry = {
    entity_type: item.entityType,
    code: err.kind === 'not_found' ? 'not_found' : 'validation_failed',
    message: err.detail,
  };
  if (item.localId !== null) entry.local_id = item.localId;
  if (item.serverId !== null) entry.server_id = item.serverId;
  return entry;
}

function isBlank(value: SyncFields[string] | undefined): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Applies a batch of offline mutations.
 *
 * Per item, in submission order, inside ONE store transaction:
 * - no serverId: create at version 1
 * - serverId: read, detect conflict, conditional write at stored.version
 *
 * Expected failures (not_found, validation_failed) and conflicts stay with their item
 * and the batch still commits. Anything else rolls back every write of the call.
 */
export function createSyncOrchestrator(options: SyncOrchestratorOptions) {
  const { store, audit, onCommitted } = options;
  const generateCode = options.generateCode ?? generateRecordCode;

  async function createItem(tx: SyncRecordStore, item: SyncBatchItem, actor: SyncUserId): Promise<ItemOutcome> {
    const def = getSyncEntity(item.entityType);

    const fields: SyncFields = { ...item.fields };
    for (const [key, value] of Object.entries(def.createDefaults ?? {})) {
      if (isBlank(fields[key])) fields[key] = value;
    }
    if (def.codePrefix && isBlank(fields.code))
      fields.code = generateCode(def.codePrefix);

    validateEntityFields(item.entityType, fields);

    const record = await tx.create(item.entityType, fields);
    return {
      kind: 'created',
      record,
      event: {
        action: 'create',
        entityType: record.entityType,
        entityId: record.serverId,
        oldValues: null,
        newValues: record.fields,
        description: `${def.label} created via sync`,
        actor,
      },
    };
  }

  async function updateItem(tx: SyncRecordStore, item: SyncBatchItem & { serverId: number }, actor: SyncUserId): Promise<ItemOutcome> {
    const def = getSyncEntity(item.entityType);

    const stored = await tx.findById(item.entityType, item.serverId);
    if (!stored)
      throw makeSyncError('not_found', `${def.label} ${item.serverId} not found`);

    const detected = detectConflict(stored, item.clientVersion, item.fields, item.localId);
    if (detected.kind === 'conflict')
      return { kind: 'conflict', conflict: detected.conflict };

    const next = mergeNonNullFields(stored.fields, item.fields);
    validateEntityFields(item.entityType, next);

    const written = await tx.conditionalUpdate(item.entityType, item.serverId, stored.version, next);
    if (!written.ok) {
      if (written.kind === 'notfound')
        throw makeSyncError('not_found', `${def.label} ${item.serverId} not found`);

      // Another writer committed between our read and our write.
      const raced: SyncDetectResult = detectConflict(written.current, item.clientVersion, item.fields, item.localId);
      if (raced.kind === 'conflict')
        return { kind: 'conflict', conflict: raced.conflict };

      throw makeSyncError('store_failure', `conditional update of ${def.label} ${item.serverId} rejected a matching version`);
    }

    return {
      kind: 'updated',
      record: written.record,
      event: {
        action: 'update',
        entityType: written.record.entityType,
        entityId: written.record.serverId,
        oldValues: stored.fields,
        newValues: written.record.fields,
        description: `${def.label} updated via sync`,
        actor,
      },
    };
  }

  function syncItem(tx: SyncRecordStore, item: SyncBatchItem, actor: SyncUserId): Promise<ItemOutcome> {
    const { serverId } = item;
    if (serverId === null) return createItem(tx, item, actor);
    return updateItem(tx, { ...item, serverId }, actor);
  }

  async function runBatch(tx: SyncRecordStore, items: readonly SyncBatchItem[], actor: SyncUserId): Promise<BatchResult> {
    const result: BatchResult = {
      response: { success: [], conflicts: [], errors: [] },
      events: [],
      written: [],
    };

    for (const item of items) {
      let outcome: ItemOutcome;
      try {
        outcome = await syncItem(tx, item, actor);
      } catch (err) {
        // Unexpected faults escape and roll back the whole batch.
        if (!isExpectedSyncError(err)) throw err;
        result.response.errors.push(toErrorEntry(item, err));
        continue;
      }

      if (outcome.kind === 'conflict') {
        result.response.conflicts.push(toConflictEntry(outcome.conflict));
        continue;
      }

      result.response.success.push({
        action: outcome.kind,
        entity_type: outcome.record.entityType,
        local_id: item.localId,
        server_id: outcome.record.serverId,
        version: outcome.record.version,
        data: toWireRecord(outcome.record),
      });
      result.events.push(outcome.event);
      result.written.push(outcome.record);
    }

    return result;
  }

  async function syncBatch(items: readonly SyncBatchItem[], actor: SyncUserId): Promise<SyncBatchResponse> {
    let result: BatchResult;
    try {
      result = await store.transaction(tx => runBatch(tx, items, actor));
    } catch (err) {
      console.error('[sync:batch] aborted, all writes rolled back', { actor, items: items.length }, err);
      if (isSyncError(err) && err.kind === 'store_failure') throw err;
      throw makeSyncError('store_failure', 'sync batch failed', { cause: err });
    }

    const { response } = result;
    console.info('[sync:batch] committed', {
      actor,
      success: response.success.length,
      conflicts: response.conflicts.length,
      errors: response.errors.length,
    });

    await flushAuditEvents(audit, result.events);
    if (onCommitted) result.written.forEach(onCommitted);

    return response;
  }

  return { syncBatch };
}

export type SyncOrchestrator = ReturnType<typeof createSyncOrchestrator>;
