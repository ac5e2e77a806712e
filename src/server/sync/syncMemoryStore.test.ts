import { describe, expect, it } from 'vitest';

import { createMemorySyncRecordStore } from './syncMemoryStore';

const T0 = Date.parse('2026-05-01T00:00:00.000Z');

describe('createMemorySyncRecordStore', () => {
  it('assigns ids and strictly increasing timestamps under a frozen clock', async () => {
    const store = createMemorySyncRecordStore({ now: () => T0 });
    const a = await store.create('supplier', { name: 'A' });
    const b = await store.create('supplier', { name: 'B' });

    expect([a.serverId, b.serverId]).toEqual([1, 2]);
    expect(a.updatedAt).toBe('2026-05-01T00:00:00.000Z');
    expect(b.updatedAt).toBe('2026-05-01T00:00:00.001Z');
    expect(await store.clock()).toBe('2026-05-01T00:00:00.001Z');
  });

  it('only updates at the expected version', async () => {
    const store = createMemorySyncRecordStore({ now: () => T0 });
    await store.create('supplier', { name: 'A' });

    const stale = await store.conditionalUpdate('supplier', 1, 2, { name: 'X' });
    expect(stale.ok).toBe(false);

    const fresh = await store.conditionalUpdate('supplier', 1, 1, { name: 'B' });
    expect(fresh.ok && fresh.record.version).toBe(2);

    expect(await store.conditionalUpdate('product', 1, 2, {})).toEqual({ ok: false, kind: 'notfound' });
  });

  it('scopes lookups to the entity type', async () => {
    const store = createMemorySyncRecordStore();
    await store.create('supplier', { name: 'A' });
    expect(await store.findById('product', 1)).toBeNull();
    expect((await store.findById('supplier', 1))?.fields).toEqual({ name: 'A' });
  });

  it('discards the writes of a rejected transaction without reusing its ids', async () => {
    const store = createMemorySyncRecordStore({ now: () => T0 });
    await store.create('supplier', { name: 'Kept' });

    await expect(store.transaction(async tx => {
      await tx.create('supplier', { name: 'Dropped' });
      await tx.conditionalUpdate('supplier', 1, 1, { name: 'Dropped too' });
      throw new Error('abort');
    })).rejects.toThrow('abort');

    expect(store.snapshot().map(r => [r.serverId, r.fields.name])).toEqual([[1, 'Kept']]);
    const next = await store.create('supplier', { name: 'Next' });
    expect(next.serverId).toBe(3);
  });

  it('does not share field objects with callers', async () => {
    const store = createMemorySyncRecordStore();
    const fields = { name: 'A', tags: ['x'] };
    await store.create('supplier', fields);
    fields.tags.push('y');

    expect(store.snapshot()[0]?.fields).toEqual({ name: 'A', tags: ['x'] });
  });

  it('hands out copies that cannot reach the stored rows', async () => {
    const store = createMemorySyncRecordStore({ now: () => T0 });
    await store.create('supplier', { name: 'A', tags: ['x'] });

    const found = await store.findById('supplier', 1);
    const listed = await store.listChangedSince(null, null, 10);
    const stale = await store.conditionalUpdate('supplier', 1, 7, {});
    const current = !stale.ok && stale.kind === 'conflict' ? stale.current : null;
    expect(current?.version).toBe(1);

    for (const r of [found, listed[0], current]) {
      const tags = r?.fields.tags;
      if (Array.isArray(tags)) tags.push('leak');
    }

    expect((await store.findById('supplier', 1))?.fields).toEqual({ name: 'A', tags: ['x'] });
  });

  it('keeps the watermark below the stamps of an open transaction', async () => {
    let clock = T0;
    const store = createMemorySyncRecordStore({ now: () => clock });
    await store.create('supplier', { name: 'A' });
    clock = T0 + 50;

    let release = () => {};
    const gate = new Promise<void>(resolve => { release = resolve; });
    let started = () => {};
    const written = new Promise<void>(resolve => { started = resolve; });

    const pending = store.transaction(async tx => {
      await tx.create('supplier', { name: 'B' });
      started();
      await gate;
    });
    await written;

    expect(await store.clock()).toBe('2026-05-01T00:00:00.050Z');
    expect(await store.watermark()).toBe('2026-05-01T00:00:00.000Z');

    release();
    await pending;
    expect(await store.watermark()).toBe('2026-05-01T00:00:00.050Z');
  });
});
