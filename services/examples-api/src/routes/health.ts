import type { FastifyInstance } from 'fastify';
import type { ExampleStore } from '../contracts/exampleStore';

export async function registerHealthRoutes(app: FastifyInstance, store: ExampleStore) {
  app.get('/health', async (req) => {
    try {
      await store.ping();
      return { status: 'ok', store: 'ok' };
    } catch (err) {
      req.log.error({ err }, 'Store health check failed');
      return { status: 'degraded', store: 'error' };
    }
  });
}
