import { buildApp } from './server';
import { config } from './config';

/**
 * Main entrypoint for the squirrel API.
 * Opens the configured store, registers the squirrel routes and listens on configured host/port.
 */
async function main() {
  const app = await buildApp({ logger: { level: config.logLevel } });

  // --- Shutdown on signal ---
  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Shutting down squirrel server');
    await app.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        app.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Squirrel server listening on http://${config.host}:${config.port} (store: ${config.store.driver})`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting squirrel server:', err);
  process.exit(1);
});
