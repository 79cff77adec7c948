import Fastify from 'fastify';
import { handleFrameworkError, registerSquirrelRoutes } from './routes/squirrels';
import { getRecordStore } from './storage';
import type { RecordStore } from './contracts/recordStore';

export interface BuildAppOptions {
  /** Injected store; the caller keeps ownership and closes it. */
  store?: RecordStore;
  logger?: boolean | { level: string };
  bodyLimit?: number;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const store = options.store ?? getRecordStore();
  await store.init();

  const app = Fastify({
    logger: options.logger ?? false,
    exposeHeadRoutes: false,
    ...(options.bodyLimit ? { bodyLimit: options.bodyLimit } : {}),
    frameworkErrors: (err, req, reply) => handleFrameworkError(store, err, req, reply),
  });

  if (!options.store) {
    app.addHook('onClose', async () => {
      await store.close();
    });
  }

  await registerSquirrelRoutes(app, store);
  return app;
}
