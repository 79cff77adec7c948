import { getRedis } from './client';
import { config } from '../config';

const prefix = () => config.store.keyPrefix;

export const squirrelKeys = {
  nextId: () => `${prefix()}:next_id`,
  ids: () => `${prefix()}:ids`,
  record: (id: string) => `${prefix()}:record:${id}`,
};

let keysReady = false;
let ensuring: Promise<void> | null = null;

/**
 * Seeds the id counter the first time the store is opened.
 * SETNX leaves an existing counter alone, so ids keep growing across restarts.
 */
export async function ensureSquirrelKeys(): Promise<void> {
  if (keysReady) return;
  if (!ensuring) {
    ensuring = doEnsure()
      .then(() => {
        keysReady = true;
      })
      .finally(() => {
        ensuring = null;
      });
  }
  return ensuring;
}

async function doEnsure(): Promise<void> {
  const redis = getRedis();
  await redis.setnx(squirrelKeys.nextId(), '0');
}

// Tests reopen the store against fresh mocks
export function resetSquirrelKeysState(): void {
  keysReady = false;
  ensuring = null;
}
