import Fastify, { type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import type { AppConfig } from './config';
import type { ExampleStore } from './contracts/exampleStore';
import { createApiKeyGate } from './auth/apiKey';
import { createHttpErrorHandler } from './errors/errorHandler';
import { registerExampleRoutes } from './routes/examples';
import { registerHealthRoutes } from './routes/health';

export type BuildAppOptions = {
  config: AppConfig;
  store: ExampleStore;
  logger?: FastifyServerOptions['logger'];
  // runs when the app closes, e.g. to release the store connection
  onClose?: () => Promise<void>;
};

export async function buildApp(options: BuildAppOptions) {
  const { config, store } = options;
  const app = Fastify({
    logger: options.logger ?? { level: config.logLevel },
  });

  app.setErrorHandler(createHttpErrorHandler());

  const { onClose } = options;
  if (onClose) {
    app.addHook('onClose', async () => {
      await onClose();
    });
  }

  await app.register(cors, {
    origin: config.cors.origins,
  });

  app.addHook('onRequest', createApiKeyGate(config.auth.apiKeys));

  await registerHealthRoutes(app, store);
  await registerExampleRoutes(app, {
    store,
    pageSize: config.pagination.pageSize,
    publicBaseUrl: config.publicBaseUrl,
  });
  return app;
}
