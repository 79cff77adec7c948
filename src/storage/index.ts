import type { RecordStore } from '../contracts/recordStore';
import { MemoryRecordStore } from './memoryRecordStore';
import { RedisRecordStore } from './redisRecordStore';
import { config } from '../config';

let _store: RecordStore | null = null;

export function getRecordStore(): RecordStore {
  if (_store) return _store;

  switch (config.store.driver) {
    case 'redis':
      _store = new RedisRecordStore();
      return _store;
    case 'memory':
      _store = new MemoryRecordStore();
      return _store;
    default:
      throw new Error(`Unsupported store driver: ${String(config.store.driver)}`);
  }
}
