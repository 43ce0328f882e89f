// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE MODULE — Backend Selection and Lifecycle
// ═══════════════════════════════════════════════════════════════════════════════

import type { KnowledgeConfig } from '../config/index.js';
import { loggers } from '../observability/logging/index.js';
import { MemoryStore } from './memory.js';
import { RedisStore } from './redis.js';
import type { KeyValueStore, StorageBackend } from './types.js';

export type { KeyValueStore, StorageBackend } from './types.js';
export { MemoryStore } from './memory.js';
export { RedisStore, type RedisStoreConfig } from './redis.js';

/**
 * Owns the process's key-value connection. Created once at startup; the
 * store it hands out is shared by the topic store, record stores and cache.
 */
export class StoreManager {
  private constructor(
    private readonly store: KeyValueStore,
    readonly backend: StorageBackend
  ) {}

  /**
   * Build and connect the configured backend.
   */
  static async open(config: KnowledgeConfig['storage']): Promise<StoreManager> {
    if (config.backend === 'redis') {
      const redis = new RedisStore(config.redis);
      await redis.connect();
      loggers.storage.info('Connected to Redis', {
        host: config.redis.host,
        port: config.redis.port,
        db: config.redis.db,
      });
      return new StoreManager(redis, 'redis');
    }

    loggers.storage.warn('Using in-memory storage; data is lost on restart');
    return new StoreManager(new MemoryStore(), 'memory');
  }

  /**
   * Wrap an existing store (tests, embedding).
   */
  static fromStore(store: KeyValueStore): StoreManager {
    return new StoreManager(store, store instanceof RedisStore ? 'redis' : 'memory');
  }

  getStore(): KeyValueStore {
    return this.store;
  }

  async close(): Promise<void> {
    if (this.store instanceof RedisStore) {
      await this.store.disconnect();
    }
  }
}
