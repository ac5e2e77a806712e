// src/server/sync/syncAudit.ts

import type { SyncAuditAction, SyncEntityType, SyncFields, SyncServerId, SyncUserId } from './syncTypes';

/**
 * Before/after snapshot of one accepted mutation (or a server_wins resolution,
 * which changes nothing but is still recorded).
 */
export interface SyncAuditEvent {
  action: SyncAuditAction;
  entityType: SyncEntityType;
  entityId: SyncServerId;
  oldValues: SyncFields | null;
  newValues: SyncFields | null;
  description: string;
  actor: SyncUserId;
}

/**
 * Where audit events go. Durable storage and querying of the trail live outside the engine.
 */
export interface SyncAuditEmitter {
  log(event: SyncAuditEvent): Promise<void>;
}

/** Default emitter: one structured line per event on stdout. */
export function createConsoleSyncAuditEmitter(): SyncAuditEmitter {
  return {
    async log(event) {
      console.info('[sync:audit]', JSON.stringify(event));
    },
  };
}

export interface MemorySyncAuditEmitter extends SyncAuditEmitter {
  readonly events: SyncAuditEvent[];
}

export function createMemorySyncAuditEmitter(): MemorySyncAuditEmitter {
  const events: SyncAuditEvent[] = [];
  return {
    events,
    async log(event) {
      events.push(event);
    },
  };
}

/**
 * Audit events are emitted after the surrounding transaction committed.
 * By then the write is durable, so a failing emitter is logged, not propagated.
 */
export async function flushAuditEvents(emitter: SyncAuditEmitter, events: SyncAuditEvent[]): Promise<void> {
  for (const event of events) {
    try {
      await emitter.log(event);
    } catch (err) {
      console.error('[sync:audit] emitter failed', { action: event.action, entityType: event.entityType, entityId: event.entityId }, err);
    }
  }
}
