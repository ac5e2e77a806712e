import { afterEach, describe, expect, it, vi } from 'vitest';

import { createRecordSyncTransportHttp } from './recordSyncTransport.http';
import { createRecordSyncTransportNoop } from './recordSyncTransport.noop';

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

function stubFetch(impl: (url: string, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('createRecordSyncTransportHttp', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts a batch and returns the parsed buckets', async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ success: [], conflicts: [], errors: [] }));
    const transport = createRecordSyncTransportHttp({ baseUrl: 'https://ledger.test', headers: { Authorization: 'Bearer test-token' } });

    const res = await transport.syncBatch({ items: [{ local_id: 'x1', id: null, version: 1, fields: { name: 'Acme' } }] });

    expect(res).toEqual({ ok: true, value: { success: [], conflicts: [], errors: [] } });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://ledger.test/api/sync');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"items":[{"local_id":"x1","id":null,"version":1,"fields":{"name":"Acme"}}]}');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-token' });
  });

  it('builds the change-feed query string', async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ records: [], as_of: '2026-05-01T00:00:00.000000Z', has_more: false }));
    const transport = createRecordSyncTransportHttp();

    await transport.getChanges({ since: '2026-05-01T10:00:00+02:00', entity_type: 'product' });
    await transport.getChanges();

    expect(fetchMock.mock.calls.map(c => c[0])).toEqual([
      '/api/sync/changes?since=2026-05-01T10%3A00%3A00%2B02%3A00&entity_type=product',
      '/api/sync/changes',
    ]);
  });

  it('surfaces the server code and current version of a resolve conflict', async () => {
    stubFetch(async () => jsonResponse({ error: 'conflict', current_version: 6 }, 409));
    const transport = createRecordSyncTransportHttp();

    const res = await transport.resolveConflict({ entity_type: 'supplier', server_id: 1, strategy: 'merge', client_data: {} });

    expect(res).toEqual({
      ok: false,
      error: 'conflict',
      status: 409,
      retryable: false,
      body: { error: 'conflict', current_version: 6 },
      currentVersion: 6,
    });
  });

  it('marks 429 and 5xx as retryable', async () => {
    stubFetch(async () => jsonResponse({ error: 'rate_limited' }, 429));
    expect(await createRecordSyncTransportHttp().getStatus()).toMatchObject({ ok: false, error: 'rate_limited', retryable: true });

    stubFetch(async () => new Response('upstream down', { status: 502, statusText: 'Bad Gateway' }));
    expect(await createRecordSyncTransportHttp().getStatus()).toMatchObject({
      ok: false,
      error: 'upstream down',
      status: 502,
      retryable: true,
    });
  });

  it('does not retry client errors', async () => {
    stubFetch(async () => jsonResponse({ error: 'missing_items' }, 400));
    expect(await createRecordSyncTransportHttp().syncBatch({ items: [] })).toMatchObject({ retryable: false, status: 400 });
  });

  it('reports network failures as retryable', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed');
    });
    expect(await createRecordSyncTransportHttp().getStatus()).toEqual({ ok: false, error: 'fetch failed', retryable: true });
  });
});

describe('createRecordSyncTransportNoop', () => {
  it('fails every call without retrying', async () => {
    const transport = createRecordSyncTransportNoop();
    expect(transport.mode).toBe('disabled');
    expect(await transport.getChanges()).toEqual({ ok: false, error: 'sync disabled (getChanges)', retryable: false });
    expect(await transport.syncBatch({ items: [] })).toEqual({ ok: false, error: 'sync disabled (syncBatch)', retryable: false });
  });
});
