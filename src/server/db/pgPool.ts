// src/server/db/pgPool.ts

import { Pool } from 'pg';
import { securityConfig } from '~/server/security/securityConfig';

/**
 * Shared Postgres pool for the sync engine.
 *
 * Next.js dev mode may reload modules; to avoid creating too many pools,
 * we keep a singleton on globalThis.
 */
declare global {
  // eslint-disable-next-line no-var
  var __ledgerSyncPgPool: Pool | undefined;
}

export function getPgPool(): Pool {
  if (globalThis.__ledgerSyncPgPool)
    return globalThis.__ledgerSyncPgPool;

  // Read lazily: builds and tests never need a database.
  const url = process.env.PG_DATABASE_URL;
  if (!url)
    throw new Error('PG_DATABASE_URL not configured');

  const statementTimeout = securityConfig.pg.statementTimeoutMs;
  const pgOptions = statementTimeout > 0
    ? `-c statement_timeout=${statementTimeout}`
    : undefined;

  const pool = new Pool({
    connectionString: url,
    max: securityConfig.pg.poolMax,
    connectionTimeoutMillis: securityConfig.pg.connectionTimeoutMs,
    idleTimeoutMillis: securityConfig.pg.idleTimeoutMs,

    // Guardrail: caps any single statement, so a batch stuck on a row lock gives its client back.
    // PG_STATEMENT_TIMEOUT_MS=0 turns it off.
    options: pgOptions,
  });

  // An idle client losing its connection must not crash the process.
  pool.on('error', err => {
    console.error('[pg] idle client error', err);
  });

  globalThis.__ledgerSyncPgPool = pool;
  return pool;
}
