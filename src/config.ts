import 'dotenv/config';

export type StoreDriver = 'redis' | 'memory';

function parseStoreDriver(raw: string | undefined): StoreDriver {
  const value = (raw || 'redis').toLowerCase();
  if (value === 'redis' || value === 'memory') return value;
  throw new Error(`Unsupported store driver: ${raw}`);
}

export const config = {
  port: parseInt(process.env.PORT || '8080', 10),
  host: process.env.HOST || '127.0.0.1',
  logLevel: process.env.LOG_LEVEL || 'info',
  store: {
    driver: parseStoreDriver(process.env.STORE_DRIVER),
    redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
    keyPrefix: process.env.STORE_KEY_PREFIX || 'squirrels',
  },
};
