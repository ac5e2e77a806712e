// src/server/sync/syncChangeFeed.ts

import type { SyncRecordStore } from './syncStore';
import type { SyncEntityType, SyncRecord } from './syncTypes';

export interface SyncChangesInput {
  /** Client watermark (ISO-8601); null or absent pulls from the beginning. */
  since?: string | null;
  entityType?: SyncEntityType | null;
}

export interface SyncChanges {
  records: SyncRecord[];

  /** Next watermark for the client to store. */
  asOf: string;

  /** More rows are waiting: pull again with `since = asOf`. */
  hasMore: boolean;
}

export interface SyncChangeFeedOptions {
  store: SyncRecordStore;
  pageSize: number;
}

/**
 * Cut a full page so it does not end inside a run of records sharing one updatedAt:
 * the next pull asks for `updatedAt > asOf` and would skip the rest of that run.
 * A page made of a single run is returned whole.
 */
export function trimPageToTimestampBoundary(page: SyncRecord[], next: SyncRecord): SyncRecord[] {
  let end = page.length;
  while (end > 0 && page[end - 1]?.updatedAt === next.updatedAt) end--;

  if (end === 0) {
    console.warn('[sync:changes] page holds a single updatedAt run; rows beyond the page share its timestamp', {
      updatedAt: next.updatedAt,
      pageSize: page.length,
    });
    return page;
  }
  return page.slice(0, end);
}

/**
 * Pull-based catch-up: "what changed since my watermark".
 */
export function createSyncChangeFeed(options: SyncChangeFeedOptions) {
  const { store } = options;
  const pageSize = Math.max(1, options.pageSize);

  async function changesSince(input: SyncChangesInput = {}): Promise<SyncChanges> {
    const since = input.since ?? null;
    const entityType = input.entityType ?? null;

    // One extra row tells us whether the page is complete.
    const rows = await store.listChangedSince(entityType, since, pageSize + 1);

    // Read after the query, and never past a write transaction that has yet to commit.
    const watermark = await store.watermark();

    const next = rows[pageSize];
    if (!next)
      return { records: rows, asOf: watermark, hasMore: false };

    const records = trimPageToTimestampBoundary(rows.slice(0, pageSize), next);
    const last = records[records.length - 1];
    if (!last || last.updatedAt > watermark) {
      // Rows past the watermark come again on the next pull. Paging resumes once the writer finishes.
      return { records, asOf: watermark, hasMore: false };
    }
    return { records, asOf: last.updatedAt, hasMore: true };
  }

  return { changesSince };
}

export type SyncChangeFeed = ReturnType<typeof createSyncChangeFeed>;
