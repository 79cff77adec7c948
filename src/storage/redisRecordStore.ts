import { closeRedis } from '../redis/client';
import { ensureSquirrelKeys } from '../redis/schema';
import { deleteSquirrel, getSquirrel, insertSquirrel, listSquirrels, updateSquirrel } from '../redis/kv';
import { storeFailed, storeOk } from '../contracts/recordStore';
import type { RecordStore, StoreResult } from '../contracts/recordStore';
import type { SquirrelFields, SquirrelId, SquirrelRecord } from '../types';

/**
 * Implements `RecordStore` on top of the Redis helpers.
 * Mutations catch client errors and hand them back as `store_failed` results.
 */
export class RedisRecordStore implements RecordStore {
  async init() {
    await ensureSquirrelKeys();
  }

  async list() {
    return listSquirrels();
  }

  async get(id: string) {
    return getSquirrel(id);
  }

  async insert(fields: SquirrelFields): Promise<StoreResult<SquirrelRecord>> {
    try {
      return storeOk(await insertSquirrel(fields));
    } catch (err) {
      return storeFailed('store_failed', err);
    }
  }

  async update(id: string, fields: SquirrelFields): Promise<StoreResult<SquirrelRecord>> {
    try {
      const record = await updateSquirrel(id, fields);
      if (!record) return storeFailed('not_found');
      return storeOk(record);
    } catch (err) {
      return storeFailed('store_failed', err);
    }
  }

  async delete(id: string): Promise<StoreResult<SquirrelId>> {
    try {
      const removed = await deleteSquirrel(id);
      if (!removed) return storeFailed('not_found');
      return storeOk(Number(id));
    } catch (err) {
      return storeFailed('store_failed', err);
    }
  }

  async close() {
    await closeRedis();
  }
}
