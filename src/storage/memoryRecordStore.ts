import { storeFailed, storeOk } from '../contracts/recordStore';
import type { RecordStore, StoreResult } from '../contracts/recordStore';
import type { SquirrelFields, SquirrelId, SquirrelRecord } from '../types';

/** Process-local store. Same id rules as the Redis store: a counter that only moves forward. */
export class MemoryRecordStore implements RecordStore {
  private records = new Map<string, SquirrelRecord>();
  private lastId = 0;
  private ready = false;

  async init() {
    this.ready = true;
  }

  async list() {
    this.assertReady();
    return [...this.records.values()].sort((a, b) => a.id - b.id).map((r) => ({ ...r }));
  }

  async get(id: string) {
    this.assertReady();
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async insert(fields: SquirrelFields): Promise<StoreResult<SquirrelRecord>> {
    if (!this.ready) return storeFailed('store_failed', 'store not initialised');
    this.lastId += 1;
    const record: SquirrelRecord = { id: this.lastId, name: fields.name, size: fields.size };
    this.records.set(String(record.id), record);
    return storeOk({ ...record });
  }

  async update(id: string, fields: SquirrelFields): Promise<StoreResult<SquirrelRecord>> {
    if (!this.ready) return storeFailed('store_failed', 'store not initialised');
    const existing = this.records.get(id);
    if (!existing) return storeFailed('not_found');
    existing.name = fields.name;
    existing.size = fields.size;
    return storeOk({ ...existing });
  }

  async delete(id: string): Promise<StoreResult<SquirrelId>> {
    if (!this.ready) return storeFailed('store_failed', 'store not initialised');
    const existing = this.records.get(id);
    if (!existing) return storeFailed('not_found');
    this.records.delete(id);
    return storeOk(existing.id);
  }

  async close() {
    this.ready = false;
  }

  private assertReady() {
    if (!this.ready) throw new Error('store not initialised');
  }
}
