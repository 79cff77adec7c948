import { getRedis } from './client';
import { squirrelKeys } from './schema';
import type { SquirrelFields, SquirrelId, SquirrelRecord } from '../types';

type ExecEntries = [Error | null, unknown][];

function assertExec(results: ExecEntries | null): asserts results is ExecEntries {
  if (!results) throw new Error('transaction aborted');
  for (const [err] of results) {
    if (err) throw err;
  }
}

function toRecord(hash: Record<string, string>): SquirrelRecord | null {
  if (!hash || Object.keys(hash).length === 0) return null;
  const id = Number(hash.id);
  if (!Number.isInteger(id)) return null;
  return { id, name: hash.name ?? '', size: hash.size ?? '' };
}

export async function insertSquirrel(fields: SquirrelFields): Promise<SquirrelRecord> {
  const redis = getRedis();
  const id: SquirrelId = await redis.incr(squirrelKeys.nextId());
  const key = squirrelKeys.record(String(id));

  const results = await redis
    .multi()
    .hset(key, { id: String(id), name: fields.name, size: fields.size })
    .zadd(squirrelKeys.ids(), id, String(id))
    .exec();
  assertExec(results);

  return { id, name: fields.name, size: fields.size };
}

export async function getSquirrel(id: string): Promise<SquirrelRecord | null> {
  const redis = getRedis();
  const hash = await redis.hgetall(squirrelKeys.record(id));
  return toRecord(hash);
}

export async function listSquirrels(): Promise<SquirrelRecord[]> {
  const redis = getRedis();
  // scores are the ids, so ZRANGE already yields ascending id order
  const ids = await redis.zrange(squirrelKeys.ids(), 0, -1);
  if (ids.length === 0) return [];

  const pipeline = redis.pipeline();
  for (const id of ids) pipeline.hgetall(squirrelKeys.record(id));
  const results = await pipeline.exec();
  if (!results) return [];

  const records: SquirrelRecord[] = [];
  for (const [err, hash] of results) {
    if (err) throw err;
    if (!isStringHash(hash)) continue;
    const record = toRecord(hash);
    if (record) records.push(record);
  }
  return records;
}

export async function updateSquirrel(id: string, fields: SquirrelFields): Promise<SquirrelRecord | null> {
  const redis = getRedis();
  const key = squirrelKeys.record(id);
  const exists = await redis.exists(key);
  if (exists === 0) return null;

  await redis.hset(key, { name: fields.name, size: fields.size });
  return getSquirrel(id);
}

export async function deleteSquirrel(id: string): Promise<boolean> {
  const redis = getRedis();
  const results = await redis
    .multi()
    .del(squirrelKeys.record(id))
    .zrem(squirrelKeys.ids(), id)
    .exec();
  assertExec(results);

  const [, deleted] = results[0] ?? [null, 0];
  return deleted === 1;
}

function isStringHash(value: unknown): value is Record<string, string> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
