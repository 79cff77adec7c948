import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryRecordStore } from '../src/storage/memoryRecordStore';

describe('MemoryRecordStore', () => {
  let store: MemoryRecordStore;

  beforeEach(async () => {
    store = new MemoryRecordStore();
    await store.init();
  });

  it('starts empty', async () => {
    expect(await store.list()).toEqual([]);
  });

  it('assigns increasing ids and lists them in order', async () => {
    const a = await store.insert({ name: 'Chip', size: 'small' });
    const b = await store.insert({ name: 'Dale', size: 'small' });
    expect(a).toEqual({ ok: true, value: { id: 1, name: 'Chip', size: 'small' } });
    expect(b).toEqual({ ok: true, value: { id: 2, name: 'Dale', size: 'small' } });
    expect((await store.list()).map((r) => r.id)).toEqual([1, 2]);
  });

  it('does not reuse an id after delete', async () => {
    await store.insert({ name: 'Chip', size: 'small' });
    await store.delete('1');
    const next = await store.insert({ name: 'Dale', size: 'small' });
    expect(next.ok && next.value.id).toBe(2);
  });

  it('treats non-numeric and unknown ids as missing', async () => {
    await store.insert({ name: 'Chip', size: 'small' });
    expect(await store.get('abc')).toBeNull();
    expect(await store.get('01')).toBeNull();
    expect(await store.update('7', { name: 'x', size: 'y' })).toEqual({ ok: false, error: { code: 'not_found' } });
    expect(await store.delete('7')).toEqual({ ok: false, error: { code: 'not_found' } });
  });

  it('updates in place', async () => {
    await store.insert({ name: 'Chip', size: 'small' });
    const res = await store.update('1', { name: 'Chip', size: 'large' });
    expect(res).toEqual({ ok: true, value: { id: 1, name: 'Chip', size: 'large' } });
    expect(await store.get('1')).toEqual({ id: 1, name: 'Chip', size: 'large' });
  });

  it('hands out copies', async () => {
    await store.insert({ name: 'Chip', size: 'small' });
    const copy = await store.get('1');
    if (copy) copy.name = 'mutated';
    expect(await store.get('1')).toEqual({ id: 1, name: 'Chip', size: 'small' });
  });

  it('reports store_failed for mutations once closed', async () => {
    await store.close();
    expect(await store.insert({ name: 'Chip', size: 'small' })).toEqual({
      ok: false,
      error: { code: 'store_failed', detail: 'store not initialised' },
    });
    await expect(store.list()).rejects.toThrow('store not initialised');
  });
});
