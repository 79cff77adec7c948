import { describe, expect, it, vi } from 'vitest';

vi.mock('../src/config', () => ({
  config: {
    store: { driver: 'memory', redisUrl: 'redis://localhost:6379', keyPrefix: 'squirrels' },
  },
}));

describe('getRecordStore', () => {
  it('builds the configured store once per process', async () => {
    const { getRecordStore } = await import('../src/storage');
    const { MemoryRecordStore } = await import('../src/storage/memoryRecordStore');

    const first = getRecordStore();
    expect(first).toBeInstanceOf(MemoryRecordStore);
    expect(getRecordStore()).toBe(first);
  });
});
