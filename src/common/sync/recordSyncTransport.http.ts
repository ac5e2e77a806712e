// src/common/sync/recordSyncTransport.http.ts

import type {
  RecordSyncBatchRequest,
  RecordSyncChangesQuery,
  RecordSyncResolveRequest,
  RecordSyncResult,
  RecordSyncTransport,
} from '~/common/sync/recordSyncTransport';
import type {
  SyncBatchResponse,
  SyncChangesResponse,
  SyncResolveResponse,
  SyncStatusResponse,
} from '~/server/sync/syncTypes';

export interface RecordSyncHttpTransportOptions {
  /** Defaults to same-origin. */
  baseUrl?: string;

  /** Extra headers on every request (e.g. a bearer token for non-browser clients). */
  headers?: Record<string, string>;
}

function isRetryableHttpStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

async function readBodySafely(res: Response): Promise<unknown> {
  const ct = res.headers.get('content-type') || '';
  try {
    if (ct.includes('application/json'))
      return await res.json();
    const text = await res.text();
    return text ? { error: text } : null;
  } catch {
    return null;
  }
}

export function createRecordSyncTransportHttp(options: RecordSyncHttpTransportOptions = {}): RecordSyncTransport {
  const baseUrl = options.baseUrl ?? '';
  const extraHeaders = options.headers ?? {};

  async function doFetchJson<T>(path: string, init: RequestInit): Promise<RecordSyncResult<T>> {
    let res: Response;
    try {
      res = await fetch(`${baseUrl}${path}`, {
        ...init,
        credentials: 'same-origin',
        headers: {
          'Content-Type': 'application/json',
          ...extraHeaders,
        },
      });
    } catch (err: unknown) {
      // network / DNS / offline
      return {
        ok: false,
        error: err instanceof Error && err.message ? err.message : 'network error',
        retryable: true,
      };
    }

    const body = await readBodySafely(res);

    if (!res.ok) {
      const error = isObject(body) && typeof body.error === 'string' && body.error
        ? body.error
        : `http ${res.status} ${res.statusText}`;

      return {
        ok: false,
        error,
        status: res.status,
        retryable: isRetryableHttpStatus(res.status),
        body,
        ...(isObject(body) && typeof body.current_version === 'number' ? { currentVersion: body.current_version } : {}),
      };
    }

    if (body === null)
      return { ok: false, error: 'empty response', status: res.status, retryable: true };

    return { ok: true, value: body as T };
  }

  return {
    mode: 'http',

    syncBatch: async (req: RecordSyncBatchRequest) =>
      doFetchJson<SyncBatchResponse>('/api/sync', {
        method: 'POST',
        body: JSON.stringify(req),
      }),

    resolveConflict: async (req: RecordSyncResolveRequest) =>
      doFetchJson<SyncResolveResponse>('/api/sync/resolve-conflict', {
        method: 'POST',
        body: JSON.stringify(req),
      }),

    getChanges: async (query: RecordSyncChangesQuery = {}) => {
      const params = new URLSearchParams();
      if (query.since) params.set('since', query.since);
      if (query.entity_type) params.set('entity_type', query.entity_type);
      const qs = params.toString();
      return doFetchJson<SyncChangesResponse>(`/api/sync/changes${qs ? `?${qs}` : ''}`, { method: 'GET' });
    },

    getStatus: async () =>
      doFetchJson<SyncStatusResponse>('/api/sync/status', { method: 'GET' }),
  };
}
