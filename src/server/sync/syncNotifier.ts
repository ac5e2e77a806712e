// src/server/sync/syncNotifier.ts

/**
 * In-memory pubsub for "a record changed, pull the change feed".
 *
 * NOTE:
 * - Single-instance deployment => in-memory is sufficient.
 * - Multi-instance deployments swap this module for Redis / PG NOTIFY; callers only see publish/subscribe.
 */

import type { SyncEntityType, SyncRecord, SyncServerId } from './syncTypes';

export type SyncRealtimeEvent = {
  type: 'record_changed';
  entityType: SyncEntityType;
  serverId: SyncServerId;
  version: number;
  updatedAt: string;
};

type Subscriber = (event: SyncRealtimeEvent) => void;

const GLOBAL_KEY = '__ledgerSyncRealtimeSubscribers__';

declare global {
  // eslint-disable-next-line no-var
  var __ledgerSyncRealtimeSubscribers__: Set<Subscriber> | undefined;
}

function getSubscribers(): Set<Subscriber> {
  // Shared records: every authenticated device listens on the same channel.
  const existing = globalThis[GLOBAL_KEY];
  if (existing) return existing;

  const created = new Set<Subscriber>();
  globalThis[GLOBAL_KEY] = created;
  return created;
}

export function subscribeSyncRealtime(fn: Subscriber): () => void {
  const subscribers = getSubscribers();
  subscribers.add(fn);
  return () => {
    subscribers.delete(fn);
  };
}

export function publishSyncRealtime(event: SyncRealtimeEvent): void {
  // One subscriber must not break the others.
  for (const fn of getSubscribers()) {
    try {
      fn(event);
    } catch (err) {
      console.error('[sync:notifier] subscriber threw', err);
    }
  }
}

export function publishRecordChanged(record: SyncRecord): void {
  publishSyncRealtime({
    type: 'record_changed',
    entityType: record.entityType,
    serverId: record.serverId,
    version: record.version,
    updatedAt: record.updatedAt,
  });
}
