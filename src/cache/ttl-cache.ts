// ═══════════════════════════════════════════════════════════════════════════════
// TTL CACHE — Expiring String Cache over the Key-Value Store
// ═══════════════════════════════════════════════════════════════════════════════
//
// get / set / absent only. No read-modify-write: every caller either
// populates on a miss or overwrites unconditionally.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { ZodType, ZodTypeDef } from 'zod';
import type { KeyValueStore } from '../storage/index.js';
import { MalformedResponse, StorageFailure, errorMessage } from '../types/errors.js';

export class TtlCache {
  constructor(private readonly store: KeyValueStore) {}

  /**
   * Cached value, or null when absent or expired.
   * @throws StorageFailure when the backing store fails
   */
  async get(key: string): Promise<string | null> {
    try {
      return await this.store.get(key);
    } catch (error) {
      throw new StorageFailure(`Cache read failed for ${key}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Store `value` under `key`, replacing any previous entry.
   * @throws StorageFailure when the backing store fails
   */
  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new RangeError(`ttlSeconds must be a positive integer, got ${ttlSeconds}`);
    }
    try {
      await this.store.set(key, value, ttlSeconds);
    } catch (error) {
      throw new StorageFailure(`Cache write failed for ${key}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Read and validate a JSON entry.
   * @throws MalformedResponse when the entry is not JSON or fails `schema`
   */
  async getJson<T>(key: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T | null> {
    const raw = await this.get(key);
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new MalformedResponse(`Cached entry ${key} is not valid JSON`, { cause: error });
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new MalformedResponse(`Cached entry ${key} has an unexpected shape`, {
        cause: result.error,
      });
    }
    return result.data;
  }

  async setJson(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    await this.set(key, JSON.stringify(value), ttlSeconds);
  }
}
