import { beforeEach, describe, expect, it } from 'vitest';
import IORedisMock from 'ioredis-mock';
import type { Redis } from 'ioredis';
import { RecordNotFoundError, type ExampleStore } from '../src/contracts/exampleStore';
import { MemoryExampleStore } from '../src/storage/memoryExampleStore';
import { RedisExampleStore } from '../src/storage/redisExampleStore';

const T0 = Date.UTC(2024, 0, 1, 12, 0, 0);

type Clock = { now: number };

const backends: Array<[string, (clock: Clock) => Promise<ExampleStore>]> = [
  ['memory', async (clock) => new MemoryExampleStore(() => clock.now)],
  [
    'redis',
    async (clock) => {
      const redis = new IORedisMock() as unknown as Redis;
      await redis.flushall();
      return new RedisExampleStore(redis, { keyPrefix: 'test-examples', now: () => clock.now });
    },
  ],
];

describe.each(backends)('%s example store', (_name, createStore) => {
  let clock: Clock;
  let store: ExampleStore;

  beforeEach(async () => {
    clock = { now: T0 };
    store = await createStore(clock);
  });

  it('assigns ids and stamps both timestamps on create', async () => {
    const created = await store.create({ name: 'First', description: '', is_active: true });
    expect(created).toEqual({
      id: '1',
      name: 'First',
      description: '',
      is_active: true,
      created_at: new Date(T0),
      updated_at: new Date(T0),
    });

    const second = await store.create({ name: 'Second', description: 'x', is_active: false });
    expect(second.id).toBe('2');
  });

  it('reads back what was created', async () => {
    const created = await store.create({ name: 'Stored', description: 'persisted', is_active: false });
    await expect(store.get(created.id)).resolves.toEqual(created);
  });

  it('lists newest first with the overall total', async () => {
    for (const name of ['a', 'b', 'c']) {
      await store.create({ name, description: '', is_active: true });
    }

    const page = await store.list(0, 3);
    expect(page.total).toBe(3);
    expect(page.items.map((item) => item.name)).toEqual(['c', 'b', 'a']);
  });

  it('slices pages by offset and limit', async () => {
    for (let i = 1; i <= 25; i += 1) {
      clock.now = T0 + i;
      await store.create({ name: `item-${i}`, description: '', is_active: true });
    }

    const first = await store.list(0, 20);
    expect(first.total).toBe(25);
    expect(first.items).toHaveLength(20);
    expect(first.items[0]?.name).toBe('item-25');

    const second = await store.list(20, 20);
    expect(second.total).toBe(25);
    expect(second.items.map((item) => item.name)).toEqual(['item-5', 'item-4', 'item-3', 'item-2', 'item-1']);

    const beyond = await store.list(40, 20);
    expect(beyond).toEqual({ items: [], total: 25 });
  });

  it('updates only the supplied fields and moves updated_at forward', async () => {
    const created = await store.create({ name: 'Before', description: 'keep me', is_active: false });

    const sameTick = await store.update(created.id, { name: 'After' });
    expect(sameTick).toEqual({
      ...created,
      name: 'After',
      updated_at: new Date(T0 + 1),
    });

    clock.now = T0 + 5_000;
    const later = await store.update(created.id, { is_active: true });
    expect(later.name).toBe('After');
    expect(later.description).toBe('keep me');
    expect(later.is_active).toBe(true);
    expect(later.created_at).toEqual(new Date(T0));
    expect(later.updated_at).toEqual(new Date(T0 + 5_000));

    await expect(store.get(created.id)).resolves.toEqual(later);
  });

  it('refreshes updated_at on an empty patch', async () => {
    const created = await store.create({ name: 'Touch', description: '', is_active: true });
    const touched = await store.update(created.id, {});
    expect(touched.updated_at.getTime()).toBeGreaterThan(created.updated_at.getTime());
  });

  it('removes records permanently', async () => {
    const kept = await store.create({ name: 'kept', description: '', is_active: true });
    const doomed = await store.create({ name: 'doomed', description: '', is_active: true });

    await store.delete(doomed.id);

    await expect(store.get(doomed.id)).rejects.toBeInstanceOf(RecordNotFoundError);
    const page = await store.list(0, 20);
    expect(page.total).toBe(1);
    expect(page.items.map((item) => item.id)).toEqual([kept.id]);
  });

  it('reports missing ids on get, update and delete', async () => {
    await store.create({ name: 'only', description: '', is_active: true });

    await expect(store.get('999')).rejects.toBeInstanceOf(RecordNotFoundError);
    await expect(store.update('999', { name: 'x' })).rejects.toBeInstanceOf(RecordNotFoundError);
    await expect(store.delete('999')).rejects.toBeInstanceOf(RecordNotFoundError);

    const page = await store.list(0, 20);
    expect(page.total).toBe(1);
  });

  it('keeps a record deleted while an update is in flight', async () => {
    const created = await store.create({ name: 'a', description: '', is_active: true });

    const [updated, deleted] = await Promise.allSettled([
      store.update(created.id, { name: 'b' }),
      store.delete(created.id),
    ]);

    expect(deleted.status).toBe('fulfilled');
    if (updated.status === 'rejected') {
      expect(updated.reason).toBeInstanceOf(RecordNotFoundError);
    }
    await expect(store.get(created.id)).rejects.toBeInstanceOf(RecordNotFoundError);
    expect(await store.list(0, 20)).toEqual({ items: [], total: 0 });
  });

  it('does not hand out ids again after a delete', async () => {
    const first = await store.create({ name: 'one', description: '', is_active: true });
    await store.delete(first.id);
    const next = await store.create({ name: 'two', description: '', is_active: true });
    expect(next.id).toBe('2');
  });

  it('answers a ping', async () => {
    await expect(store.ping()).resolves.toBeUndefined();
  });
});

describe('redis example store updates', () => {
  it('does not bring back a record deleted before the write lands', async () => {
    const redis = new IORedisMock() as unknown as Redis;
    await redis.flushall();
    const store = new RedisExampleStore(redis, { keyPrefix: 'race-test', now: () => T0 });
    const created = await store.create({ name: 'a', description: '', is_active: true });

    // delete lands right after the update has read the record
    const hgetall = redis.hgetall.bind(redis);
    const readThenDelete = async (key: string) => {
      const hash = await hgetall(key);
      await redis.multi().del(key).zrem('race-test:index', created.id).exec();
      return hash;
    };
    Object.assign(redis, { hgetall: readThenDelete });

    await expect(store.update(created.id, { name: 'b' })).rejects.toBeInstanceOf(RecordNotFoundError);
    await expect(redis.exists('race-test:item:1')).resolves.toBe(0);
  });
});
