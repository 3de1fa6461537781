import type Redis from 'ioredis';
import type { AppConfig } from '../config';
import type { ExampleStore } from '../contracts/exampleStore';
import { MemoryExampleStore } from './memoryExampleStore';
import { RedisExampleStore } from './redisExampleStore';

export type StoreHandle = {
  store: ExampleStore;
  close(): Promise<void>;
};

/**
 * Picks the storage backend named in config.
 * `createRedis` is only called for the redis backend.
 */
export function createExampleStore(config: AppConfig, createRedis: (url: string) => Redis): StoreHandle {
  switch (config.store.backend) {
    case 'memory':
      return { store: new MemoryExampleStore(), close: async () => {} };
    case 'redis': {
      const redis = createRedis(config.store.redisUrl);
      return {
        store: new RedisExampleStore(redis, { keyPrefix: config.store.keyPrefix }),
        close: async () => {
          await redis.quit();
        },
      };
    }
    default: {
      const unsupported: never = config.store.backend;
      throw new Error(`Unsupported store backend: ${String(unsupported)}`);
    }
  }
}
