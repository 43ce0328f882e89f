// ═══════════════════════════════════════════════════════════════════════════════
// CACHE TESTS — TTL Cache Facade and Key Builders
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { CacheKeys, TtlCache } from '../cache/index.js';
import { MemoryStore } from '../storage/index.js';
import { MalformedResponse, StorageFailure } from '../types/errors.js';
import { FlakyStore, TestClock } from './fakes.js';

const ItemsSchema = z.array(z.object({ summary: z.string() }));

describe('CacheKeys', () => {
  it('should namespace keys by purpose', () => {
    expect(CacheKeys.api('physics')).toBe('api_physics');
    expect(CacheKeys.academic('physics')).toBe('academic_physics');
  });
});

describe('TtlCache', () => {
  let clock: TestClock;
  let store: MemoryStore;
  let cache: TtlCache;

  beforeEach(() => {
    clock = new TestClock();
    store = new MemoryStore(clock.nowMs);
    cache = new TtlCache(store);
  });

  it('should return null for an absent key', async () => {
    expect(await cache.get('academic_physics')).toBeNull();
  });

  it('should return a stored value within its TTL', async () => {
    await cache.set('api_physics', 'payload', 3600);
    clock.advance(3599 * 1000);
    expect(await cache.get('api_physics')).toBe('payload');
  });

  it('should treat an expired entry as absent', async () => {
    await cache.set('api_physics', 'payload', 3600);
    clock.advance(3600 * 1000);
    expect(await cache.get('api_physics')).toBeNull();
  });

  it('should overwrite unconditionally', async () => {
    await cache.set('api_physics', 'first', 3600);
    await cache.set('api_physics', 'second', 3600);
    expect(await cache.get('api_physics')).toBe('second');
  });

  it('should reject a non-positive TTL', async () => {
    await expect(cache.set('k', 'v', 0)).rejects.toThrow(RangeError);
    await expect(cache.set('k', 'v', 1.5)).rejects.toThrow(RangeError);
  });

  describe('JSON helpers', () => {
    it('should round-trip a validated payload', async () => {
      await cache.setJson('academic_physics', [{ summary: 'Orbits' }], 3600);
      expect(await cache.getJson('academic_physics', ItemsSchema)).toEqual([{ summary: 'Orbits' }]);
    });

    it('should return null for a miss', async () => {
      expect(await cache.getJson('academic_physics', ItemsSchema)).toBeNull();
    });

    it('should reject non-JSON entries as malformed', async () => {
      await store.set('academic_physics', '{not json', 3600);
      await expect(cache.getJson('academic_physics', ItemsSchema)).rejects.toBeInstanceOf(MalformedResponse);
    });

    it('should reject entries of the wrong shape as malformed', async () => {
      await store.set('academic_physics', JSON.stringify({ summary: 'not a list' }), 3600);
      await expect(cache.getJson('academic_physics', ItemsSchema)).rejects.toBeInstanceOf(MalformedResponse);
    });
  });

  describe('store failures', () => {
    it('should surface read and write failures as StorageFailure', async () => {
      const flaky = new FlakyStore();
      const flakyCache = new TtlCache(flaky);
      flaky.failing.add('get');
      flaky.failing.add('set');

      await expect(flakyCache.get('k')).rejects.toBeInstanceOf(StorageFailure);
      await expect(flakyCache.set('k', 'v', 10)).rejects.toBeInstanceOf(StorageFailure);
    });
  });
});
