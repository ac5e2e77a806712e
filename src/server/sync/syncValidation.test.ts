import { afterEach, describe, expect, it } from 'vitest';

import { isHttpErrorLike } from '~/server/http/error';
import { securityConfig } from '~/server/security/securityConfig';
import { parseChangesQuery, parseResolveRequest, parseSyncBatchRequest } from './syncValidation';

function statusOf(fn: () => unknown): number | undefined {
  try {
    fn();
  } catch (err) {
    if (isHttpErrorLike(err)) return err.status;
    throw err;
  }
  return undefined;
}

describe('parseSyncBatchRequest', () => {
  const maxBatchItems = securityConfig.sync.maxBatchItems;

  afterEach(() => {
    securityConfig.sync.maxBatchItems = maxBatchItems;
  });

  it('parses nested and flat items with supplier as the default type', () => {
    const parsed = parseSyncBatchRequest({
      items: [
        { local_id: 'x1', id: null, version: 1, fields: { name: 'Acme' } },
        { local_id: 'x2', id: 4, version: 2, name: 'Flat', updated_at: '2026-01-01' },
      ],
    });

    expect(parsed.rejected).toEqual([]);
    expect(parsed.items).toEqual([
      { entityType: 'supplier', localId: 'x1', serverId: null, clientVersion: 1, fields: { name: 'Acme' } },
      { entityType: 'supplier', localId: 'x2', serverId: 4, clientVersion: 2, fields: { name: 'Flat' } },
    ]);
  });

  it('takes the entity type from the envelope, and per item when given', () => {
    const parsed = parseSyncBatchRequest({
      entity_type: 'product',
      items: [{ fields: {} }, { entity_type: 'payment', fields: {} }],
    });
    expect(parsed.items.map(i => i.entityType)).toEqual(['product', 'payment']);
  });

  it('defaults a missing version to 1 and accepts server_id as the id key', () => {
    const [item] = parseSyncBatchRequest({ items: [{ server_id: 9, fields: {} }] }).items;
    expect(item).toMatchObject({ serverId: 9, clientVersion: 1, localId: null });
  });

  it('rejects malformed items individually', () => {
    const parsed = parseSyncBatchRequest({
      items: [
        { local_id: 'ok', fields: { name: 'Acme' } },
        { local_id: 'bad-version', version: 0, fields: {} },
        { local_id: 'bad-type', entity_type: 'invoice', fields: {} },
        { id: 3, version: 1, fields: 'nope' },
        'not an item',
      ],
    });

    expect(parsed.items.map(i => i.localId)).toEqual(['ok']);
    expect(parsed.rejected).toEqual([
      { entity_type: 'supplier', local_id: 'bad-version', code: 'validation_failed', message: 'version must be an integer >= 1' },
      { entity_type: 'supplier', local_id: 'bad-type', code: 'validation_failed', message: 'unknown entity_type: invoice' },
      { entity_type: 'supplier', server_id: 3, code: 'validation_failed', message: 'fields must be an object' },
      { entity_type: 'supplier', code: 'validation_failed', message: 'item must be an object' },
    ]);
  });

  it('rejects an overlong local_id', () => {
    const parsed = parseSyncBatchRequest({ items: [{ local_id: 'x'.repeat(129), fields: {} }] });
    expect(parsed.rejected[0]?.message).toBe('local_id too long');
  });

  it('fails the whole request on a broken envelope', () => {
    expect(() => parseSyncBatchRequest([])).toThrow('invalid_body');
    expect(() => parseSyncBatchRequest({})).toThrow('missing_items');
    expect(() => parseSyncBatchRequest({ entity_type: 'invoice', items: [] })).toThrow('invalid_entity_type');
    expect(statusOf(() => parseSyncBatchRequest({ items: 'x' }))).toBe(400);
  });

  it('caps the number of items', () => {
    securityConfig.sync.maxBatchItems = 2;
    expect(() => parseSyncBatchRequest({ items: [{}, {}, {}] })).toThrow('too_many_items');
  });
});

describe('parseResolveRequest', () => {
  it('parses a well-formed request and leaves the strategy to the resolver', () => {
    expect(parseResolveRequest({
      entity_type: 'collection',
      server_id: 5,
      strategy: 'newest_wins',
      client_data: { quantity: 12, id: 5 },
    })).toEqual({ entityType: 'collection', serverId: 5, strategy: 'newest_wins', clientData: { quantity: 12 } });
  });

  it('rejects bad fields with 400 codes', () => {
    expect(() => parseResolveRequest({ strategy: 'merge', client_data: {} })).toThrow('invalid_server_id');
    expect(() => parseResolveRequest({ server_id: 1, client_data: {} })).toThrow('missing_strategy');
    expect(() => parseResolveRequest({ server_id: 1, strategy: 'merge', client_data: [] })).toThrow('invalid_client_data');
    expect(statusOf(() => parseResolveRequest({ server_id: 1, strategy: 'merge' }))).toBe(400);
  });
});

describe('parseChangesQuery', () => {
  it('returns nulls when nothing is given', () => {
    expect(parseChangesQuery(new URLSearchParams(''))).toEqual({ since: null, entityType: null });
  });

  it('restores a + offset that arrived as a space', () => {
    const q = parseChangesQuery(new URLSearchParams('since=2026-05-01T10:00:00+02:00&entity_type=product'));
    expect(q).toEqual({ since: '2026-05-01T10:00:00+02:00', entityType: 'product' });
  });

  it('accepts last_synced_at as an alias', () => {
    const q = parseChangesQuery(new URLSearchParams('last_synced_at=2026-05-01T00:00:00.123456Z'));
    expect(q.since).toBe('2026-05-01T00:00:00.123456Z');
  });

  it('rejects an unparseable watermark and an unknown entity type', () => {
    expect(() => parseChangesQuery(new URLSearchParams('since=yesterday'))).toThrow('invalid_since');
    expect(() => parseChangesQuery(new URLSearchParams('entity_type=invoice'))).toThrow('invalid_entity_type');
  });
});
