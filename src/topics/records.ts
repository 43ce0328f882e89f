// ═══════════════════════════════════════════════════════════════════════════════
// RECORD STORES — Study Progress and Search History
// ═══════════════════════════════════════════════════════════════════════════════
//
// Append-only audit records. Each list is capped at `limit` entries, oldest
// dropped first.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { KeyValueStore } from '../storage/index.js';
import { StorageFailure, errorMessage } from '../types/errors.js';
import { loggers } from '../observability/logging/index.js';
import type { SearchHistoryEntry, UserProgress, UserProgressInput } from './types.js';

const DEFAULT_RECORD_LIMIT = 1000;

const RecordKeys = {
  progress: (sector: string): string => `progress:${sector}`,
  searchHistory: 'search:history',
} as const;

async function appendCapped(store: KeyValueStore, key: string, value: string, limit: number): Promise<void> {
  try {
    const length = await store.rpush(key, value);
    if (length > limit) {
      await store.ltrim(key, -limit, -1);
    }
  } catch (error) {
    throw new StorageFailure(`Failed to append to ${key}: ${errorMessage(error)}`, { cause: error });
  }
}

async function readAll(store: KeyValueStore, key: string): Promise<string[]> {
  try {
    return await store.lrange(key, 0, -1);
  } catch (error) {
    throw new StorageFailure(`Failed to read ${key}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Parse each raw entry, skipping any that no longer match the schema.
 */
function parseEntries<T>(key: string, raws: string[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  const entries: T[] = [];
  for (const raw of raws) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      loggers.storage.warn('Skipping unreadable record', { key, error: errorMessage(error) });
      continue;
    }
    const result = schema.safeParse(parsed);
    if (result.success) {
      entries.push(result.data);
    } else {
      loggers.storage.warn('Skipping record with unexpected shape', { key });
    }
  }
  return entries;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PROGRESS
// ─────────────────────────────────────────────────────────────────────────────────

const StoredProgressSchema = z.object({
  id: z.string(),
  sector: z.string(),
  lastStudyDate: z.string().datetime(),
  performance: z.number(),
  notes: z.string(),
}).transform((stored): UserProgress => ({
  ...stored,
  lastStudyDate: new Date(stored.lastStudyDate),
}));

export class ProgressStore {
  constructor(
    private readonly store: KeyValueStore,
    private readonly limit: number = DEFAULT_RECORD_LIMIT
  ) {}

  async record(input: UserProgressInput, now: Date = new Date()): Promise<UserProgress> {
    const progress: UserProgress = {
      id: uuidv4(),
      sector: input.sector,
      lastStudyDate: input.lastStudyDate ?? now,
      performance: input.performance,
      notes: input.notes ?? '',
    };

    await appendCapped(
      this.store,
      RecordKeys.progress(progress.sector),
      JSON.stringify({ ...progress, lastStudyDate: progress.lastStudyDate.toISOString() }),
      this.limit
    );
    return progress;
  }

  /** Oldest first */
  async list(sector: string): Promise<UserProgress[]> {
    const key = RecordKeys.progress(sector);
    return parseEntries(key, await readAll(this.store, key), StoredProgressSchema);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SEARCH HISTORY
// ─────────────────────────────────────────────────────────────────────────────────

const StoredSearchHistorySchema = z.object({
  id: z.string(),
  query: z.string(),
  timestamp: z.string().datetime(),
}).transform((stored): SearchHistoryEntry => ({
  ...stored,
  timestamp: new Date(stored.timestamp),
}));

export class SearchHistoryStore {
  constructor(
    private readonly store: KeyValueStore,
    private readonly limit: number = DEFAULT_RECORD_LIMIT
  ) {}

  async append(query: string, now: Date = new Date()): Promise<SearchHistoryEntry> {
    const entry: SearchHistoryEntry = { id: uuidv4(), query, timestamp: now };
    await appendCapped(
      this.store,
      RecordKeys.searchHistory,
      JSON.stringify({ ...entry, timestamp: now.toISOString() }),
      this.limit
    );
    return entry;
  }

  /** Oldest first */
  async list(): Promise<SearchHistoryEntry[]> {
    const key = RecordKeys.searchHistory;
    return parseEntries(key, await readAll(this.store, key), StoredSearchHistorySchema);
  }
}
