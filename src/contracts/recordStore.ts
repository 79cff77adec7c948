import type { SquirrelFields, SquirrelId, SquirrelRecord } from '../types';

/** Known failure codes reported by store mutations. */
export type StoreErrorCode = 'not_found' | 'store_failed';

export interface StoreError {
  code: StoreErrorCode;
  detail?: string;
}

/** Mutations report failure as a value so routes can map it straight to a status. */
export type StoreResult<T> = { ok: true; value: T } | { ok: false; error: StoreError };

/**
 * Persistence collaborator for squirrel records.
 * Ids arrive as the raw path segment; anything that is not a stored id reads as missing.
 */
export interface RecordStore {
  /** Creates the backing resource if it does not exist yet. Safe to call more than once. */
  init(): Promise<void>;
  list(): Promise<SquirrelRecord[]>;
  get(id: string): Promise<SquirrelRecord | null>;
  insert(fields: SquirrelFields): Promise<StoreResult<SquirrelRecord>>;
  update(id: string, fields: SquirrelFields): Promise<StoreResult<SquirrelRecord>>;
  delete(id: string): Promise<StoreResult<SquirrelId>>;
  close(): Promise<void>;
}

export function storeOk<T>(value: T): StoreResult<T> {
  return { ok: true, value };
}

export function storeFailed<T>(code: StoreErrorCode, err?: unknown): StoreResult<T> {
  if (typeof err === 'undefined') return { ok: false, error: { code } };
  const detail = err instanceof Error ? err.message : String(err);
  return { ok: false, error: { code, detail } };
}
