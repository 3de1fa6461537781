import type Redis from 'ioredis';
import {
  allocateId,
  countExamples,
  exampleKeys,
  insertExample,
  listExampleIds,
  readExample,
  removeExample,
  writeExample,
  type ExampleKeys,
} from '../redis/kv';
import {
  RecordNotFoundError,
  applyPatch,
  type Clock,
  type ExamplePage,
  type ExampleStore,
} from '../contracts/exampleStore';
import type { ExampleId, ExamplePatch, ExampleRecord, NewExample } from '../types';

export interface RedisExampleStoreOptions {
  keyPrefix?: string;
  now?: Clock;
}

/**
 * Implements `ExampleStore` on top of the Redis helpers.
 * Each record is a hash; a sorted set scored by the id counter gives the default order and the count.
 */
export class RedisExampleStore implements ExampleStore {
  private readonly keys: ExampleKeys;
  private readonly now: Clock;

  constructor(private readonly redis: Redis, options: RedisExampleStoreOptions = {}) {
    this.keys = exampleKeys(options.keyPrefix ?? 'examples');
    this.now = options.now ?? Date.now;
  }

  async list(offset: number, limit: number): Promise<ExamplePage> {
    const [ids, total] = await Promise.all([
      listExampleIds(this.redis, this.keys, offset, limit),
      countExamples(this.redis, this.keys),
    ]);
    const records = await Promise.all(ids.map((id) => readExample(this.redis, this.keys, id)));
    // a record deleted between the scan and the read is skipped
    const items = records.filter((record): record is ExampleRecord => record !== null);
    return { items, total };
  }

  async create(input: NewExample): Promise<ExampleRecord> {
    const id = await allocateId(this.redis, this.keys);
    const now = new Date(this.now());
    const record: ExampleRecord = { id, ...input, created_at: now, updated_at: now };
    await insertExample(this.redis, this.keys, record);
    return record;
  }

  async get(id: ExampleId): Promise<ExampleRecord> {
    const record = await readExample(this.redis, this.keys, id);
    if (!record) throw new RecordNotFoundError(id);
    return record;
  }

  async update(id: ExampleId, patch: ExamplePatch): Promise<ExampleRecord> {
    const current = await this.get(id);
    const updated = applyPatch(current, patch, this.now());
    const written = await writeExample(this.redis, this.keys, updated);
    // deleted between the read and the write
    if (!written) throw new RecordNotFoundError(id);
    return updated;
  }

  async delete(id: ExampleId): Promise<void> {
    const removed = await removeExample(this.redis, this.keys, id);
    if (!removed) throw new RecordNotFoundError(id);
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }
}
