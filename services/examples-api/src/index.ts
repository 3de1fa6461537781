import { loadConfig } from './config';
import { createRedis } from './redis/client';
import { buildApp } from './server';
import { createExampleStore } from './storage';

/**
 * Main entrypoint for the examples service.
 * Builds config once, opens the configured store, and listens on configured host/port.
 */
async function main() {
  const config = loadConfig();
  const { store, close } = createExampleStore(config, createRedis);
  const app = await buildApp({ config, store, onClose: close });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Examples service listening on http://${config.host}:${config.port} (store: ${config.store.backend})`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting examples service:', err);
  process.exit(1);
});
