import type Redis from 'ioredis';
import type { ExampleId, ExampleRecord } from '../types';

export interface ExampleKeys {
  seq: string;
  index: string;
  item(id: ExampleId): string;
}

export function exampleKeys(prefix: string): ExampleKeys {
  return {
    seq: `${prefix}:seq`,
    index: `${prefix}:index`,
    item: (id) => `${prefix}:item:${id}`,
  };
}

type ExampleHash = {
  name: string;
  description: string;
  is_active: '1' | '0';
  created_at: string;
  updated_at: string;
};

export function toHash(record: Omit<ExampleRecord, 'id'>): ExampleHash {
  return {
    name: record.name,
    description: record.description,
    is_active: record.is_active ? '1' : '0',
    created_at: String(record.created_at.getTime()),
    updated_at: String(record.updated_at.getTime()),
  };
}

export async function allocateId(redis: Redis, keys: ExampleKeys): Promise<ExampleId> {
  const next = await redis.incr(keys.seq);
  return String(next);
}

export async function insertExample(redis: Redis, keys: ExampleKeys, record: ExampleRecord): Promise<void> {
  const results = await redis
    .multi()
    .hset(keys.item(record.id), toHash(record))
    .zadd(keys.index, Number(record.id), record.id)
    .exec();
  assertCommitted(results);
}

export async function readExample(redis: Redis, keys: ExampleKeys, id: ExampleId): Promise<ExampleRecord | null> {
  const hash = await redis.hgetall(keys.item(id));
  if (!hash || Object.keys(hash).length === 0) return null;

  return {
    id,
    name: hash.name ?? '',
    description: hash.description ?? '',
    is_active: hash.is_active === '1',
    created_at: new Date(Number(hash.created_at)),
    updated_at: new Date(Number(hash.updated_at)),
  };
}

// Writes the mutable fields only while the hash still exists
const UPDATE_IF_EXISTS = `
if redis.call('EXISTS', KEYS[1]) == 0 then
  return 0
end
redis.call('HSET', KEYS[1], 'name', ARGV[1], 'description', ARGV[2], 'is_active', ARGV[3], 'updated_at', ARGV[4])
return 1
`;

export async function writeExample(redis: Redis, keys: ExampleKeys, record: ExampleRecord): Promise<boolean> {
  const hash = toHash(record);
  const applied = await redis.eval(
    UPDATE_IF_EXISTS,
    1,
    keys.item(record.id),
    hash.name,
    hash.description,
    hash.is_active,
    hash.updated_at,
  );
  return Number(applied) === 1;
}

export async function removeExample(redis: Redis, keys: ExampleKeys, id: ExampleId): Promise<boolean> {
  const results = await redis.multi().del(keys.item(id)).zrem(keys.index, id).exec();
  const [removed] = assertCommitted(results);
  return removed === 1;
}

// Newest first: the index is scored by the allocation counter
export async function listExampleIds(
  redis: Redis,
  keys: ExampleKeys,
  offset: number,
  limit: number,
): Promise<ExampleId[]> {
  if (limit <= 0) return [];
  return redis.zrevrange(keys.index, offset, offset + limit - 1);
}

export async function countExamples(redis: Redis, keys: ExampleKeys): Promise<number> {
  return redis.zcard(keys.index);
}

function assertCommitted(results: [Error | null, unknown][] | null): unknown[] {
  if (!results) {
    throw new Error('Redis transaction was aborted');
  }
  return results.map(([err, value]) => {
    if (err) throw err;
    return value;
  });
}
