// src/server/sync/syncEngine.ts

import { getPgPool } from '~/server/db/pgPool';
import { securityConfig } from '~/server/security/securityConfig';
import type { SyncAuditEmitter } from './syncAudit';
import { createConsoleSyncAuditEmitter } from './syncAudit';
import { createSyncChangeFeed } from './syncChangeFeed';
import type { SyncChangeFeed } from './syncChangeFeed';
import { publishRecordChanged } from './syncNotifier';
import { createSyncOrchestrator } from './syncOrchestrator';
import type { SyncOrchestrator } from './syncOrchestrator';
import { createPgSyncRecordStore } from './syncRepo';
import { createSyncResolver } from './syncResolver';
import type { SyncResolver } from './syncResolver';
import type { SyncRecordStore } from './syncStore';
import type { SyncRecord } from './syncTypes';

export interface SyncEngine {
  syncBatch: SyncOrchestrator['syncBatch'];
  resolveConflict: SyncResolver['resolveConflict'];
  changesSince: SyncChangeFeed['changesSince'];

  /** Store clock; clients compare it with their own before picking a watermark. */
  serverTime(): Promise<string>;
}

export interface SyncEngineOptions {
  store: SyncRecordStore;
  audit?: SyncAuditEmitter;
  onCommitted?: (record: SyncRecord) => void;
  changesPageSize?: number;
  generateCode?: (prefix: string) => string;
}

export function createSyncEngine(options: SyncEngineOptions): SyncEngine {
  const { store, onCommitted, generateCode } = options;
  const audit = options.audit ?? createConsoleSyncAuditEmitter();

  const orchestrator = createSyncOrchestrator({ store, audit, onCommitted, generateCode });
  const resolver = createSyncResolver({ store, audit, onCommitted });
  const feed = createSyncChangeFeed({
    store,
    pageSize: options.changesPageSize ?? securityConfig.sync.changesPageSize,
  });

  return {
    syncBatch: orchestrator.syncBatch,
    resolveConflict: resolver.resolveConflict,
    changesSince: feed.changesSince,
    serverTime: () => store.clock(),
  };
}

declare global {
  // eslint-disable-next-line no-var
  var __ledgerSyncEngine: SyncEngine | undefined;
}

/**
 * Process-wide engine over Postgres, created on first use
 * (kept on globalThis for the same dev-reload reason as the pool).
 */
export function getSyncEngine(): SyncEngine {
  if (globalThis.__ledgerSyncEngine)
    return globalThis.__ledgerSyncEngine;

  const engine = createSyncEngine({
    store: createPgSyncRecordStore(getPgPool()),
    onCommitted: publishRecordChanged,
  });

  globalThis.__ledgerSyncEngine = engine;
  return engine;
}
