// src/server/sync/syncRepo.ts

import type { QueryResult, QueryResultRow } from 'pg';

import { makeSyncError } from '~/server/http/error';
import { isSyncEntityType } from './syncEntities';
import type { SyncRecordStore, SyncWriteResult } from './syncStore';
import type { SyncEntityType, SyncFields, SyncRecord, SyncServerId } from './syncTypes';

/**
 * The slice of pg's Pool / PoolClient the store needs.
 * A real `Pool` satisfies SyncPgPool; tests pass a scripted fake.
 */
export interface SyncPgQueryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface SyncPgPool extends SyncPgQueryable {
  connect(): Promise<SyncPgQueryable & { release(err?: Error | boolean): void }>;
}

type SyncRecordRow = {
  id: string | number;
  entity_type: string;
  version: number;
  data: SyncFields | null;
  created_at: string;
  updated_at: string;
};

// Timestamps leave Postgres as microsecond-precision UTC strings, so a watermark
// handed back by a client compares exactly against updated_at.
const RECORD_COLUMNS = `
  id,
  entity_type,
  version,
  data,
  to_char(created_at AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.US"Z"') AS created_at,
  to_char(updated_at AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.US"Z"') AS updated_at
`;

function rowToRecord(r: SyncRecordRow): SyncRecord {
  if (!isSyncEntityType(r.entity_type))
    throw makeSyncError('store_failure', `unknown entity_type in sync_records: ${r.entity_type}`);

  return {
    entityType: r.entity_type,
    serverId: typeof r.id === 'string' ? Number(r.id) : r.id,
    version: r.version,
    fields: r.data ?? {},
    createdAt: r.created_at,
    updatedAt: r.updated_at,
  };
}

function createStoreOn(db: SyncPgQueryable, transaction: SyncRecordStore['transaction']): SyncRecordStore {
  const store: SyncRecordStore = {
    async findById(entityType: SyncEntityType, serverId: SyncServerId): Promise<SyncRecord | null> {
      const res = await db.query<SyncRecordRow>(
        `
          SELECT ${RECORD_COLUMNS}
          FROM sync_records
          WHERE entity_type = $1 AND id = $2
          LIMIT 1
        `,
        [entityType, serverId],
      );

      const row = res.rows[0];
      return row ? rowToRecord(row) : null;
    },

    async create(entityType: SyncEntityType, fields: SyncFields): Promise<SyncRecord> {
      const res = await db.query<SyncRecordRow>(
        `
          INSERT INTO sync_records (entity_type, version, data, created_at, updated_at)
          VALUES ($1, 1, $2::jsonb, clock_timestamp(), clock_timestamp())
          RETURNING ${RECORD_COLUMNS}
        `,
        [entityType, JSON.stringify(fields)],
      );

      const row = res.rows[0];
      if (!row) throw makeSyncError('store_failure', 'insert returned no row');
      return rowToRecord(row);
    },

    /**
     * Version check and write are one statement: two writers holding the same
     * version cannot both match `version = $3`.
     */
    async conditionalUpdate(
      entityType: SyncEntityType,
      serverId: SyncServerId,
      expectedVersion: number,
      fields: SyncFields,
    ): Promise<SyncWriteResult> {
      const updated = await db.query<SyncRecordRow>(
        `
          UPDATE sync_records
          SET
            version = version + 1,
            data = $4::jsonb,
            updated_at = clock_timestamp()
          WHERE entity_type = $1 AND id = $2 AND version = $3
          RETURNING ${RECORD_COLUMNS}
        `,
        [entityType, serverId, expectedVersion, JSON.stringify(fields)],
      );

      const row = updated.rows[0];
      if (row) return { ok: true, record: rowToRecord(row) };

      // version moved or row missing
      const current = await store.findById(entityType, serverId);
      if (!current) return { ok: false, kind: 'notfound' };
      return { ok: false, kind: 'conflict', current };
    },

    async listChangedSince(entityType: SyncEntityType | null, since: string | null, limit: number): Promise<SyncRecord[]> {
      const res = await db.query<SyncRecordRow>(
        `
          SELECT ${RECORD_COLUMNS}
          FROM sync_records
          WHERE ($1::text IS NULL OR entity_type = $1)
            AND ($2::timestamptz IS NULL OR sync_records.updated_at > $2::timestamptz)
          ORDER BY sync_records.updated_at ASC, id ASC
          LIMIT $3
        `,
        [entityType, since, limit],
      );

      return res.rows.map(rowToRecord);
    },

    async clock(): Promise<string> {
      const res = await db.query<{ now: string }>(
        `SELECT to_char(clock_timestamp() AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.US"Z"') AS now`,
      );

      const row = res.rows[0];
      if (!row) throw makeSyncError('store_failure', 'clock query returned no row');
      return row.now;
    },

    async watermark(): Promise<string> {
      // Sessions that hold a transaction id have written. Their rows are stamped at or
      // after xact_start and stay invisible until commit. LEAST skips the NULL when none is open.
      const res = await db.query<{ watermark: string }>(
        `
          SELECT to_char(
            LEAST(
              clock_timestamp(),
              (
                SELECT min(xact_start)
                FROM pg_stat_activity
                WHERE datname = current_database()
                  AND backend_xid IS NOT NULL
              ) - interval '1 microsecond'
            ) AT TIME ZONE 'UTC',
            'YYYY-MM-DD"T"HH24:MI:SS.US"Z"'
          ) AS watermark
        `,
      );

      const row = res.rows[0];
      if (!row) throw makeSyncError('store_failure', 'watermark query returned no row');
      return row.watermark;
    },

    transaction,
  };

  return store;
}

/**
 * Postgres-backed record store over the `sync_records` table (db/schema.sql).
 *
 * Transactions check out one client for their whole duration; every statement
 * of a batch runs on it between BEGIN and COMMIT/ROLLBACK.
 */
export function createPgSyncRecordStore(pool: SyncPgPool): SyncRecordStore {
  return createStoreOn(pool, async <T>(fn: (tx: SyncRecordStore) => Promise<T>): Promise<T> => {
    const client = await pool.connect();
    let releaseErr: Error | undefined;

    try {
      await client.query('BEGIN');

      // Nested transaction() calls join this one.
      const tx: SyncRecordStore = createStoreOn(client, inner => inner(tx));

      const result = await fn(tx);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        // The connection is in an unknown state: have the pool discard it.
        releaseErr = rollbackErr instanceof Error ? rollbackErr : new Error('rollback failed');
        console.error('[sync:pg] rollback failed', rollbackErr);
      }
      throw err;
    } finally {
      client.release(releaseErr);
    }
  });
}
