// src/server/security/securityConfig.ts

function envInt(name: string, def: number): number {
  const raw = process.env[name];
  if (!raw) return def;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : def;
}

function envBool(name: string, def: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) return def;
  return raw === '1' || raw.toLowerCase() === 'true' || raw.toLowerCase() === 'yes';
}

/**
 * Centralized server defaults (env-overridable).
 * Route handlers and the sync engine read limits from here, never from process.env directly.
 */
export const securityConfig = {
  // Behind a reverse proxy, set LS_TRUST_PROXY=1 to trust X-Forwarded-For / X-Real-IP.
  trustProxy: envBool('LS_TRUST_PROXY', false),

  sync: {
    // App-level payload cap for POST bodies (proxy should also enforce).
    maxWriteBodyBytes: envInt('LS_SYNC_MAX_BODY_BYTES', 8 * 1024 * 1024),

    // Items accepted in one POST /api/sync call.
    maxBatchItems: envInt('LS_SYNC_MAX_BATCH_ITEMS', 500),

    // Upper bound for one change-feed page; a full-table pull is never unbounded.
    changesPageSize: envInt('LS_SYNC_CHANGES_PAGE_SIZE', 500),

    // Per-user write rate limit (sync + resolve), fixed window.
    writeRateLimit: {
      maxPerWindow: envInt('LS_SYNC_WRITE_MAX_PER_WINDOW', 120),
      windowMs: envInt('LS_SYNC_WRITE_WINDOW_MS', 60 * 1000),
      blockMs: envInt('LS_SYNC_WRITE_BLOCK_MS', 60 * 1000),
    },

    // Same-origin enforcement for cookie-auth write endpoints.
    // Default: on in production.
    requireSameOriginWrites: envBool(
      'LS_SYNC_REQUIRE_SAME_ORIGIN_WRITES',
      process.env.NODE_ENV === 'production',
    ),

    // Client correlation tokens are echoed back verbatim; keep them small.
    localIdMaxLen: envInt('LS_SYNC_LOCAL_ID_MAX_LEN', 128),
  },

  // ---- Postgres pool guardrails ----
  pg: {
    poolMax: envInt('PG_POOL_MAX', 10),
    connectionTimeoutMs: envInt('PG_POOL_CONNECTION_TIMEOUT_MS', 3000),
    idleTimeoutMs: envInt('PG_POOL_IDLE_TIMEOUT_MS', 30_000),

    // Set 0 to disable.
    statementTimeoutMs: envInt('PG_STATEMENT_TIMEOUT_MS', 8000),
  },
};
