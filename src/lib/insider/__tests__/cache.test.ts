import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  DEFAULT_NEGATIVE_TTL_MS,
  DEFAULT_POSITIVE_TTL_MS,
  IdentityCache,
  MemoryCacheBackend,
  RedisCacheBackend,
  canonicalCacheKey,
  type CacheBackend,
  type CacheRedisClient,
} from '../cache';
import { FakeClock, sampleIdentity } from './helpers';

class FakeRedis implements CacheRedisClient {
  readonly store = new Map<string, string>();
  readonly setexCalls: Array<[string, number]> = [];

  async get(key: string): Promise<string | null> {
    return this.store.get(key) ?? null;
  }

  async setex(key: string, seconds: number, value: string): Promise<string> {
    this.setexCalls.push([key, seconds]);
    this.store.set(key, value);
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.store.delete(key)) removed++;
    }
    return removed;
  }

  async keys(pattern: string): Promise<string[]> {
    const prefix = pattern.replace(/\*$/, '');
    return [...this.store.keys()].filter((key) => key.startsWith(prefix));
  }
}

class BrokenBackend implements CacheBackend {
  async read(): Promise<string | null> {
    throw new Error('connection refused');
  }
  async write(): Promise<void> {
    throw new Error('connection refused');
  }
  async remove(): Promise<void> {}
  async clear(): Promise<void> {}
}

describe('canonicalCacheKey', () => {
  it('trims, lowercases and collapses whitespace', () => {
    assert.equal(canonicalCacheKey('  Gale   KLAPPA \t'), 'gale klappa');
  });
});

describe('IdentityCache', () => {
  it('returns a stored value until its TTL elapses', async () => {
    const clock = new FakeClock();
    const backend = new MemoryCacheBackend(clock);
    const cache = new IdentityCache({ backend, clock });
    const value = sampleIdentity();

    const entry = await cache.put('gale klappa', value);
    assert.equal(entry.ttlClass, 'positive');
    assert.equal(entry.ttlMs, DEFAULT_POSITIVE_TTL_MS);

    const immediate = await cache.get('gale klappa');
    assert.equal(immediate.hit, true);
    assert.deepEqual(immediate.hit && immediate.value, value);

    clock.advance(DEFAULT_POSITIVE_TTL_MS - 1);
    assert.equal((await cache.get('gale klappa')).hit, true);

    clock.advance(1);
    assert.deepEqual(await cache.get('gale klappa'), { hit: false });
    assert.equal(backend.size, 0);
  });

  it('uses the shorter negative TTL for not-found results', async () => {
    const clock = new FakeClock();
    const cache = new IdentityCache({ clock });

    const entry = await cache.put('nobody', sampleIdentity('not_found'));
    assert.equal(entry.ttlClass, 'negative');
    assert.equal(entry.ttlMs, DEFAULT_NEGATIVE_TTL_MS);

    clock.advance(DEFAULT_NEGATIVE_TTL_MS);
    assert.deepEqual(await cache.get('nobody'), { hit: false });
  });

  it('honours an explicit TTL', async () => {
    const clock = new FakeClock();
    const cache = new IdentityCache({ clock });

    await cache.put('gale klappa', sampleIdentity(), 1_000);
    clock.advance(999);
    assert.equal((await cache.get('gale klappa')).hit, true);
    clock.advance(1);
    assert.equal((await cache.get('gale klappa')).hit, false);
  });

  it('treats undecodable entries as misses and deletes them', async () => {
    const backend = new MemoryCacheBackend();
    const cache = new IdentityCache({ backend, clock: new FakeClock() });

    await backend.write('broken', 'not json');
    await backend.write('wrong-shape', JSON.stringify({ key: 'wrong-shape', value: { status: 'maybe' } }));

    assert.deepEqual(await cache.get('broken'), { hit: false });
    assert.deepEqual(await cache.get('wrong-shape'), { hit: false });
    assert.equal(backend.size, 0);
  });

  it('reads a backend failure as a miss', async () => {
    const cache = new IdentityCache({ backend: new BrokenBackend(), clock: new FakeClock() });

    await cache.put('gale klappa', sampleIdentity());
    assert.deepEqual(await cache.get('gale klappa'), { hit: false });
  });

  it('deletes and clears entries', async () => {
    const cache = new IdentityCache({ clock: new FakeClock() });
    await cache.put('a', sampleIdentity());
    await cache.put('b', sampleIdentity());

    await cache.delete('a');
    assert.equal((await cache.get('a')).hit, false);
    assert.equal((await cache.get('b')).hit, true);

    await cache.clear();
    assert.equal((await cache.get('b')).hit, false);
  });
});

describe('MemoryCacheBackend', () => {
  it('drops expired payloads on the next write without reading them', async () => {
    const clock = new FakeClock();
    const backend = new MemoryCacheBackend(clock);

    await backend.write('a', 'first', 1_000);
    await backend.write('b', 'second', 5_000);
    assert.equal(backend.size, 2);

    clock.advance(1_000);
    await backend.write('c', 'third', 5_000);

    assert.equal(backend.size, 2);
    assert.equal(await backend.read('a'), null);
    assert.equal(await backend.read('b'), 'second');
  });

  it('reads an expired payload as missing', async () => {
    const clock = new FakeClock();
    const backend = new MemoryCacheBackend(clock);

    await backend.write('a', 'first', 1_000);
    clock.advance(999);
    assert.equal(await backend.read('a'), 'first');
    clock.advance(1);
    assert.equal(await backend.read('a'), null);
    assert.equal(backend.size, 0);
  });

  it('keeps payloads written without a TTL', async () => {
    const clock = new FakeClock();
    const backend = new MemoryCacheBackend(clock);

    await backend.write('a', 'first');
    clock.advance(DEFAULT_POSITIVE_TTL_MS * 10);
    await backend.write('b', 'second', 1);

    assert.equal(await backend.read('a'), 'first');
  });
});

describe('RedisCacheBackend', () => {
  it('stores prefixed JSON entries with SETEX', async () => {
    const redis = new FakeRedis();
    const clock = new FakeClock();
    const cache = new IdentityCache({ backend: new RedisCacheBackend(redis), clock });
    const value = sampleIdentity();

    await cache.put('gale klappa', value);

    assert.deepEqual(redis.setexCalls, [['insider:identity:gale klappa', 14_400]]);
    const stored = JSON.parse(redis.store.get('insider:identity:gale klappa') ?? '{}');
    assert.deepEqual(stored, {
      key: 'gale klappa',
      value,
      createdAt: clock.now(),
      ttlMs: DEFAULT_POSITIVE_TTL_MS,
      ttlClass: 'positive',
    });

    const lookup = await cache.get('gale klappa');
    assert.deepEqual(lookup.hit && lookup.value, value);
  });

  it('clears only its own prefix', async () => {
    const redis = new FakeRedis();
    redis.store.set('other:key', '1');
    const cache = new IdentityCache({ backend: new RedisCacheBackend(redis), clock: new FakeClock() });
    await cache.put('gale klappa', sampleIdentity());

    await cache.clear();

    assert.deepEqual([...redis.store.keys()], ['other:key']);
  });
});
