// src/server/sync/syncMemoryStore.ts

import type { SyncRecordStore, SyncWriteResult } from './syncStore';
import type { SyncEntityType, SyncFields, SyncRecord, SyncServerId } from './syncTypes';
import { withVersion } from './syncTypes';

export interface MemorySyncRecordStoreOptions {
  /** Injected clock (ms since epoch); tests use it to control updatedAt and watermarks. */
  now?: () => number;

  /** Rows to start with, e.g. fixtures. */
  seed?: SyncRecord[];
}

export interface MemorySyncRecordStore extends SyncRecordStore {
  /** Committed rows, ordered by serverId. Test/diagnostic helper. */
  snapshot(): SyncRecord[];
}

type Rows = Map<SyncServerId, SyncRecord>;

/**
 * In-process record store with the same semantics as the Postgres store.
 *
 * - Records are immutable values; a write replaces the map entry, and callers
 *   only ever get copies in or out.
 * - transaction() works on a copy of the row map and swaps it in on commit,
 *   so a rejected fn leaves committed state untouched.
 * - Transactions are serialized, and writes outside one run as a single-statement
 *   transaction, which makes every conditionalUpdate atomic.
 */
export function createMemorySyncRecordStore(options: MemorySyncRecordStoreOptions = {}): MemorySyncRecordStore {
  const now = options.now ?? (() => Date.now());

  let committed: Rows = new Map();
  let nextId = 1;
  let lastStamp = 0;

  // Stamp current when each running transaction began; its own writes stamp above it.
  const openSince = new Set<number>();

  for (const r of options.seed ?? []) {
    committed.set(r.serverId, r);
    nextId = Math.max(nextId, r.serverId + 1);
  }

  // Strictly increasing stamps: two writes never share an updatedAt.
  function stamp(): string {
    lastStamp = Math.max(now(), lastStamp + 1);
    return new Date(lastStamp).toISOString();
  }

  const copy = (r: SyncRecord): SyncRecord => structuredClone(r);

  let queue: Promise<unknown> = Promise.resolve();

  function storeOn(getRows: () => Rows, transaction: SyncRecordStore['transaction']): SyncRecordStore {
    const find = (entityType: SyncEntityType, serverId: SyncServerId): SyncRecord | null => {
      const r = getRows().get(serverId);
      return r && r.entityType === entityType ? r : null;
    };

    return {
      async findById(entityType, serverId) {
        const r = find(entityType, serverId);
        return r && copy(r);
      },

      async create(entityType: SyncEntityType, fields: SyncFields): Promise<SyncRecord> {
        const at = stamp();
        const record: SyncRecord = {
          entityType,
          serverId: nextId++,
          version: 1,
          fields: structuredClone(fields),
          createdAt: at,
          updatedAt: at,
        };
        getRows().set(record.serverId, record);
        return copy(record);
      },

      async conditionalUpdate(entityType, serverId, expectedVersion, fields): Promise<SyncWriteResult> {
        const current = find(entityType, serverId);
        if (!current) return { ok: false, kind: 'notfound' };
        if (current.version !== expectedVersion) return { ok: false, kind: 'conflict', current: copy(current) };

        const record: SyncRecord = {
          ...withVersion(current, expectedVersion + 1),
          fields: structuredClone(fields),
          updatedAt: stamp(),
        };
        getRows().set(serverId, record);
        return { ok: true, record: copy(record) };
      },

      async listChangedSince(entityType, since, limit) {
        const sinceMs = since === null ? null : Date.parse(since);
        return [...getRows().values()]
          .filter(r => entityType === null || r.entityType === entityType)
          .filter(r => sinceMs === null || Date.parse(r.updatedAt) > sinceMs)
          .sort((a, b) => Date.parse(a.updatedAt) - Date.parse(b.updatedAt) || a.serverId - b.serverId)
          .slice(0, limit)
          .map(copy);
      },

      async clock() {
        return new Date(Math.max(now(), lastStamp)).toISOString();
      },

      async watermark() {
        return new Date(Math.min(Math.max(now(), lastStamp), ...openSince)).toISOString();
      },

      transaction,
    };
  }

  async function runTransaction<T>(fn: (tx: SyncRecordStore) => Promise<T>): Promise<T> {
    const working: Rows = new Map(committed);
    const tx: SyncRecordStore = storeOn(() => working, inner => inner(tx));

    const startedAt = lastStamp;
    openSince.add(startedAt);
    try {
      // Like a Postgres sequence, ids handed out by a rolled-back transaction are not reused.
      const result = await fn(tx);
      committed = working;
      return result;
    } finally {
      openSince.delete(startedAt);
    }
  }

  function transaction<T>(fn: (tx: SyncRecordStore) => Promise<T>): Promise<T> {
    const run = queue.then(() => runTransaction(fn));
    // The chain only orders transactions; the outcome (and any error) belongs to the caller of `run`.
    queue = run.then(() => undefined, () => undefined);
    return run;
  }

  const reads = storeOn(() => committed, transaction);

  return {
    ...reads,
    create: (entityType, fields) => transaction(tx => tx.create(entityType, fields)),
    conditionalUpdate: (entityType, serverId, expectedVersion, fields) =>
      transaction(tx => tx.conditionalUpdate(entityType, serverId, expectedVersion, fields)),
    snapshot: () => [...committed.values()].sort((a, b) => a.serverId - b.serverId).map(copy),
  };
}
