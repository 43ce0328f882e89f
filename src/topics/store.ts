// ═══════════════════════════════════════════════════════════════════════════════
// TOPIC STORE — Sector-Keyed Topics over the Key-Value Store
// ═══════════════════════════════════════════════════════════════════════════════
//
// Layout:
//   topic:<sector>    JSON record
//   topics:sectors    set of known sectors
//   topics:order      list of sectors in first-insert order (scan order)
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import type { KeyValueStore } from '../storage/index.js';
import { StorageFailure, errorMessage } from '../types/errors.js';
import { loggers } from '../observability/logging/index.js';
import type { Topic, TopicWrite } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// INTERFACE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Every method rejects with StorageFailure when the backing store fails.
 */
export interface TopicStore {
  get(sector: string): Promise<Topic | null>;
  upsert(sector: string, fields: TopicWrite): Promise<Topic>;
  /** All readable topics in stable insertion order */
  scan(): Promise<Topic[]>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// KEYS & SERIALIZATION
// ─────────────────────────────────────────────────────────────────────────────────

const TopicKeys = {
  record: (sector: string): string => `topic:${sector}`,
  sectors: 'topics:sectors',
  order: 'topics:order',
} as const;

const StoredTopicSchema = z.object({
  sector: z.string(),
  content: z.string(),
  furtherReading: z.string(),
  lastUpdate: z.string().datetime(),
});

type StoredTopic = z.infer<typeof StoredTopicSchema>;

function serialize(topic: Topic): string {
  const stored: StoredTopic = {
    sector: topic.sector,
    content: topic.content,
    furtherReading: topic.furtherReading,
    lastUpdate: topic.lastUpdate.toISOString(),
  };
  return JSON.stringify(stored);
}

function deserialize(key: string, raw: string): Topic {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StorageFailure(`Stored topic ${key} is not valid JSON`, { cause: error });
  }

  const result = StoredTopicSchema.safeParse(parsed);
  if (!result.success) {
    throw new StorageFailure(`Stored topic ${key} is corrupt`, { cause: result.error });
  }

  return {
    sector: result.data.sector,
    content: result.data.content,
    furtherReading: result.data.furtherReading,
    lastUpdate: new Date(result.data.lastUpdate),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// KEY-VALUE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

export class KeyValueTopicStore implements TopicStore {
  constructor(private readonly store: KeyValueStore) {}

  async get(sector: string): Promise<Topic | null> {
    const key = TopicKeys.record(sector);
    const raw = await this.run(`read topic ${sector}`, () => this.store.get(key));
    return raw === null ? null : deserialize(key, raw);
  }

  async upsert(sector: string, fields: TopicWrite): Promise<Topic> {
    const topic: Topic = { sector, ...fields };

    await this.run(`write topic ${sector}`, async () => {
      await this.store.set(TopicKeys.record(sector), serialize(topic));
      // sadd reports 1 only for the first writer of a sector
      const added = await this.store.sadd(TopicKeys.sectors, sector);
      if (added > 0) {
        await this.store.rpush(TopicKeys.order, sector);
      }
    });

    loggers.storage.debug('Topic upserted', { sector });
    return topic;
  }

  async scan(): Promise<Topic[]> {
    const sectors = await this.run('list sectors', () => this.store.lrange(TopicKeys.order, 0, -1));
    const topics: Topic[] = [];

    for (const sector of sectors) {
      const key = TopicKeys.record(sector);
      const raw = await this.run(`read topic ${sector}`, () => this.store.get(key));
      if (raw === null) continue;

      // A corrupt record is skipped; a failing store still rejects
      try {
        topics.push(deserialize(key, raw));
      } catch (error) {
        loggers.storage.warn('Skipping unreadable topic', { key, error: errorMessage(error) });
      }
    }

    return topics;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StorageFailure) throw error;
      throw new StorageFailure(`Failed to ${operation}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
