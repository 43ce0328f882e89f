// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE TESTS — Memory Store and Store Manager
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryStore, StoreManager } from '../storage/index.js';
import { TestClock } from './fakes.js';

// ─────────────────────────────────────────────────────────────────────────────────
// MEMORY STORE TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('MemoryStore', () => {
  let clock: TestClock;
  let store: MemoryStore;

  beforeEach(() => {
    clock = new TestClock();
    store = new MemoryStore(clock.nowMs);
  });

  describe('Basic Operations', () => {
    it('should set and get values', async () => {
      await store.set('key1', 'value1');
      expect(await store.get('key1')).toBe('value1');
    });

    it('should return null for missing keys', async () => {
      expect(await store.get('nonexistent')).toBeNull();
    });

    it('should overwrite a value', async () => {
      await store.set('key1', 'value1');
      await store.set('key1', 'value2');
      expect(await store.get('key1')).toBe('value2');
    });
  });

  describe('TTL Operations', () => {
    it('should keep a value until its TTL elapses', async () => {
      await store.set('expiring', 'value', 60);
      clock.advance(59_999);
      expect(await store.get('expiring')).toBe('value');
    });

    it('should expire a value once its TTL elapses', async () => {
      await store.set('expiring', 'value', 60);
      clock.advance(60_000);
      expect(await store.get('expiring')).toBeNull();
    });

    it('should keep a value without TTL indefinitely', async () => {
      await store.set('forever', 'value');
      clock.advance(365 * 24 * 60 * 60 * 1000);
      expect(await store.get('forever')).toBe('value');
    });

    it('should replace the TTL when a key is overwritten', async () => {
      await store.set('key', 'old', 10);
      await store.set('key', 'new');
      clock.advance(20_000);
      expect(await store.get('key')).toBe('new');
    });
  });

  describe('List Operations', () => {
    it('should push and read in insertion order', async () => {
      expect(await store.rpush('list', 'a', 'b')).toBe(2);
      expect(await store.rpush('list', 'c')).toBe(3);
      expect(await store.lrange('list', 0, -1)).toEqual(['a', 'b', 'c']);
    });

    it('should support negative indices', async () => {
      await store.rpush('list', 'a', 'b', 'c', 'd');
      expect(await store.lrange('list', -2, -1)).toEqual(['c', 'd']);
      expect(await store.lrange('list', 1, 10)).toEqual(['b', 'c', 'd']);
    });

    it('should trim to the newest entries', async () => {
      await store.rpush('list', 'a', 'b', 'c', 'd');
      await store.ltrim('list', -2, -1);
      expect(await store.lrange('list', 0, -1)).toEqual(['c', 'd']);
    });

    it('should return an empty list for a missing key', async () => {
      expect(await store.lrange('missing', 0, -1)).toEqual([]);
    });
  });

  describe('Set Operations', () => {
    it('should count only new members', async () => {
      expect(await store.sadd('set', 'a', 'b')).toBe(2);
      expect(await store.sadd('set', 'b', 'c')).toBe(1);
      expect(await store.sadd('set', 'a', 'b', 'c')).toBe(0);
    });

    it('should keep sets and lists apart from string keys', async () => {
      await store.sadd('shared', 'member');
      await store.rpush('shared', 'item');
      expect(await store.get('shared')).toBeNull();
      expect(await store.lrange('shared', 0, -1)).toEqual(['item']);
    });
  });

  describe('Utility', () => {
    it('should answer ping', async () => {
      expect(await store.ping()).toBe('PONG');
    });
  });

  it('should expose only the operations the service uses', () => {
    const operations = Object.getOwnPropertyNames(MemoryStore.prototype)
      .filter(name => name !== 'constructor')
      .sort();

    expect(operations).toEqual(['get', 'lrange', 'ltrim', 'ping', 'rpush', 'sadd', 'set']);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// STORE MANAGER TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('StoreManager', () => {
  it('should open the memory backend', async () => {
    const manager = await StoreManager.open({
      backend: 'memory',
      redis: { host: 'localhost', port: 6379, db: 0, connectTimeoutMs: 100 },
    });
    expect(manager.backend).toBe('memory');
    expect(await manager.getStore().ping()).toBe('PONG');
    await manager.close();
  });

  it('should wrap an existing store', async () => {
    const store = new MemoryStore();
    const manager = StoreManager.fromStore(store);
    expect(manager.backend).toBe('memory');
    expect(manager.getStore()).toBe(store);
  });
});
