// src/server/http/error.ts

export type HttpErrorLike = Error & { status?: number; headers?: Record<string, string> };

export function isHttpErrorLike(err: unknown): err is HttpErrorLike {
  return err instanceof Error && typeof (err as HttpErrorLike).status === 'number';
}

export function makeHttpError(status: number, message: string, headers?: Record<string, string>): HttpErrorLike {
  const err: HttpErrorLike = new Error(message);
  err.status = status;
  if (headers) err.headers = headers;
  return err;
}

/**
 * Sync failure taxonomy.
 *
 * - not_found / validation_failed / invalid_strategy / conflict are "expected":
 *   the orchestrator contains them to the single item that raised them.
 * - store_failure is anything else; it aborts (and rolls back) the whole batch.
 */
export type SyncErrorKind =
  | 'not_found'
  | 'validation_failed'
  | 'invalid_strategy'
  | 'conflict'
  | 'store_failure';

const SYNC_ERROR_STATUS: Record<SyncErrorKind, number> = {
  not_found: 404,
  validation_failed: 422,
  invalid_strategy: 400,
  conflict: 409,
  store_failure: 500,
};

export type SyncErrorLike = HttpErrorLike & {
  kind: SyncErrorKind;
  expected: boolean;

  /** Human-readable reason; reported in per-item `errors`, never as the public code. */
  detail: string;

  /** Present on `conflict`: the version the record has now. */
  currentVersion?: number;
};

/**
 * The Error message is the public code (== kind), so routeResponses can expose it as-is.
 */
export function makeSyncError(
  kind: SyncErrorKind,
  detail: string,
  options?: { cause?: unknown; currentVersion?: number },
): SyncErrorLike {
  const err = new Error(kind, options?.cause !== undefined ? { cause: options.cause } : undefined);
  return Object.assign(err, {
    status: SYNC_ERROR_STATUS[kind],
    kind,
    expected: kind !== 'store_failure',
    detail,
    ...(options?.currentVersion !== undefined ? { currentVersion: options.currentVersion } : {}),
  });
}

export function isSyncError(err: unknown): err is SyncErrorLike {
  return isHttpErrorLike(err)
    && typeof (err as SyncErrorLike).kind === 'string'
    && typeof (err as SyncErrorLike).expected === 'boolean';
}

export function isExpectedSyncError(err: unknown): err is SyncErrorLike {
  return isSyncError(err) && err.expected;
}
