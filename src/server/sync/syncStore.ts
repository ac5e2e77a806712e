// src/server/sync/syncStore.ts

import type { SyncEntityType, SyncFields, SyncRecord, SyncServerId } from './syncTypes';

export type SyncWriteResult =
  | { ok: true; record: SyncRecord }
  | { ok: false; kind: 'conflict'; current: SyncRecord }
  | { ok: false; kind: 'notfound' };

/**
 * Persistence seam of the sync engine. The store is the only source of truth:
 * the engine never keeps records across calls.
 */
export interface SyncRecordStore {
  findById(entityType: SyncEntityType, serverId: SyncServerId): Promise<SyncRecord | null>;

  /** Inserts with version 1; the store assigns serverId and timestamps. */
  create(entityType: SyncEntityType, fields: SyncFields): Promise<SyncRecord>;

  /**
   * Compare-and-write in one atomic step: replaces fields and bumps version to
   * expectedVersion + 1 only if the stored version is still expectedVersion.
   */
  conditionalUpdate(
    entityType: SyncEntityType,
    serverId: SyncServerId,
    expectedVersion: number,
    fields: SyncFields,
  ): Promise<SyncWriteResult>;

  /** updatedAt > since (everything when null), ordered by (updatedAt, serverId), at most `limit` rows. */
  listChangedSince(entityType: SyncEntityType | null, since: string | null, limit: number): Promise<SyncRecord[]>;

  /** Store clock, ISO-8601. */
  clock(): Promise<string>;

  /**
   * Highest timestamp a change-feed reader may hand out as its watermark: the store
   * clock, capped below the start of the oldest write transaction still open.
   * Rows those transactions commit later carry updatedAt > watermark.
   */
  watermark(): Promise<string>;

  /**
   * Runs fn against a transaction-scoped store: commit when fn resolves, roll back when it rejects.
   * Nested calls join the outer transaction.
   */
  transaction<T>(fn: (tx: SyncRecordStore) => Promise<T>): Promise<T>;
}
