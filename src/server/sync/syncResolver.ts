// src/server/sync/syncResolver.ts

import { isSyncError, makeSyncError } from '~/server/http/error';
import type { SyncAuditEmitter, SyncAuditEvent } from './syncAudit';
import { flushAuditEvents } from './syncAudit';
import { getSyncEntity, mergeNonNullFields, overwriteFields, validateEntityFields } from './syncEntities';
import type { SyncRecordStore } from './syncStore';
import type {
  SyncEntityType,
  SyncFields,
  SyncRecord,
  SyncResolutionStrategy,
  SyncServerId,
  SyncUserId,
} from './syncTypes';
import { SYNC_RESOLUTION_STRATEGIES } from './syncTypes';

export interface SyncResolveInput {
  entityType: SyncEntityType;
  serverId: SyncServerId;
  clientData: SyncFields;

  /** Checked by the resolver; an unknown name fails with invalid_strategy. */
  strategy: string;
}

export interface SyncResolution {
  strategy: SyncResolutionStrategy;
  record: SyncRecord;
}

export interface SyncResolverOptions {
  store: SyncRecordStore;
  audit: SyncAuditEmitter;
  onCommitted?: (record: SyncRecord) => void;
}

export function isResolutionStrategy(value: unknown): value is SyncResolutionStrategy {
  return typeof value === 'string' && (SYNC_RESOLUTION_STRATEGIES as readonly string[]).includes(value);
}

/**
 * Fields a strategy would store, or null when the server copy stays as is.
 */
export function resolveFields(strategy: SyncResolutionStrategy, serverFields: SyncFields, clientData: SyncFields): SyncFields | null {
  switch (strategy) {
    case 'server_wins':
      return null;
    case 'client_wins':
      return overwriteFields(serverFields, clientData);
    case 'merge':
      return mergeNonNullFields(serverFields, clientData);
  }
}

const DESCRIPTIONS: Record<SyncResolutionStrategy, string> = {
  server_wins: 'Conflict resolved: server wins',
  client_wins: 'Conflict resolved: client wins',
  merge: 'Conflict resolved: merged',
};

/**
 * Settles a conflict previously returned by syncBatch.
 *
 * The resolution is computed against the record as stored now and written with a
 * conditional update at that version; if someone else writes in between, the
 * call fails with `conflict` and the caller re-resolves against the new copy.
 */
export function createSyncResolver(options: SyncResolverOptions) {
  const { store, audit, onCommitted } = options;

  async function resolveInTransaction(
    tx: SyncRecordStore,
    input: SyncResolveInput,
    strategy: SyncResolutionStrategy,
    actor: SyncUserId,
  ): Promise<{ record: SyncRecord; event: SyncAuditEvent; written: boolean }> {
    const def = getSyncEntity(input.entityType);

    const stored = await tx.findById(input.entityType, input.serverId);
    if (!stored)
      throw makeSyncError('not_found', `${def.label} ${input.serverId} not found`);

    const event: SyncAuditEvent = {
      action: `resolve_${strategy}`,
      entityType: stored.entityType,
      entityId: stored.serverId,
      oldValues: stored.fields,
      newValues: stored.fields,
      description: DESCRIPTIONS[strategy],
      actor,
    };

    const next = resolveFields(strategy, stored.fields, input.clientData);
    if (next === null)
      return { record: stored, event, written: false };

    validateEntityFields(input.entityType, next);

    const written = await tx.conditionalUpdate(input.entityType, input.serverId, stored.version, next);
    if (!written.ok) {
      if (written.kind === 'notfound')
        throw makeSyncError('not_found', `${def.label} ${input.serverId} not found`);
      throw makeSyncError('conflict', `${def.label} ${input.serverId} changed during resolution`, {
        currentVersion: written.current.version,
      });
    }

    return {
      record: written.record,
      event: { ...event, newValues: written.record.fields },
      written: true,
    };
  }

  async function resolveConflict(input: SyncResolveInput, actor: SyncUserId): Promise<SyncResolution> {
    const { strategy } = input;
    if (!isResolutionStrategy(strategy))
      throw makeSyncError('invalid_strategy', `unknown resolution strategy: ${strategy}`);

    let outcome: { record: SyncRecord; event: SyncAuditEvent; written: boolean };
    try {
      outcome = await store.transaction(tx => resolveInTransaction(tx, input, strategy, actor));
    } catch (err) {
      if (isSyncError(err) && err.expected) throw err;
      console.error('[sync:resolve] failed', { actor, entityType: input.entityType, serverId: input.serverId, strategy }, err);
      if (isSyncError(err)) throw err;
      throw makeSyncError('store_failure', 'conflict resolution failed', { cause: err });
    }

    await flushAuditEvents(audit, [outcome.event]);
    if (outcome.written && onCommitted) onCommitted(outcome.record);

    return { strategy, record: outcome.record };
  }

  return { resolveConflict };
}

export type SyncResolver = ReturnType<typeof createSyncResolver>;
