// ═══════════════════════════════════════════════════════════════════════════════
// REDIS STORE — ioredis-Backed KeyValueStore
// ═══════════════════════════════════════════════════════════════════════════════

import { Redis, type RedisOptions } from 'ioredis';
import type { KeyValueStore } from './types.js';
import { loggers } from '../observability/logging/index.js';

export interface RedisStoreConfig {
  host: string;
  port: number;
  db: number;
  password?: string;
  connectTimeoutMs: number;
}

export class RedisStore implements KeyValueStore {
  private readonly client: Redis;

  constructor(config: RedisStoreConfig | Redis) {
    if (config instanceof Redis) {
      this.client = config;
      return;
    }

    const options: RedisOptions = {
      host: config.host,
      port: config.port,
      db: config.db,
      password: config.password,
      connectTimeout: config.connectTimeoutMs,
      lazyConnect: true,
      maxRetriesPerRequest: 2,
    };
    this.client = new Redis(options);
    this.client.on('error', (error: Error) => {
      loggers.storage.error('Redis connection error', error);
    });
  }

  /**
   * Open the connection. Called once during service initialization.
   */
  async connect(): Promise<void> {
    if (this.client.status === 'wait') {
      await this.client.connect();
    }
  }

  async disconnect(): Promise<void> {
    if (this.client.status !== 'end') {
      await this.client.quit();
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // STRING OPERATIONS
  // ─────────────────────────────────────────────────────────────────────────────

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds) {
      await this.client.set(key, value, 'EX', ttlSeconds);
    } else {
      await this.client.set(key, value);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // LIST OPERATIONS
  // ─────────────────────────────────────────────────────────────────────────────

  async rpush(key: string, ...values: string[]): Promise<number> {
    return this.client.rpush(key, ...values);
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.client.lrange(key, start, stop);
  }

  async ltrim(key: string, start: number, stop: number): Promise<void> {
    await this.client.ltrim(key, start, stop);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SET OPERATIONS
  // ─────────────────────────────────────────────────────────────────────────────

  async sadd(key: string, ...members: string[]): Promise<number> {
    return this.client.sadd(key, ...members);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // UTILITY
  // ─────────────────────────────────────────────────────────────────────────────

  async ping(): Promise<string> {
    return this.client.ping();
  }
}
