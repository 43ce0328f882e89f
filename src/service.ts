// ═══════════════════════════════════════════════════════════════════════════════
// KNOWLEDGE SERVICE — Process-Wide Owner of Store, Cache and Pipelines
// ═══════════════════════════════════════════════════════════════════════════════
//
// Built once at startup by createKnowledgeService() and passed to the HTTP
// layer. Holds the only references to the store connection and the cache.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { TtlCache } from './cache/index.js';
import {
  HttpEnrichmentClient,
  HttpExternalRefreshClient,
  type EnrichmentClient,
  type ExternalRefreshClient,
  type FetchLike,
} from './clients/index.js';
import { isProductionLike, stalenessWindowMs, type KnowledgeConfig } from './config/index.js';
import { configureLogger, loggers } from './observability/logging/index.js';
import {
  RetrievalOrchestrator,
  createAnswerer,
  type Answerer,
  type TopicContentRequest,
  type TopicContentResolution,
} from './retrieval/index.js';
import {
  SearchRanker,
  createRelevancePolicy,
  type RelevancePolicy,
  type SearchPreferences,
  type SearchResult,
} from './search/index.js';
import { StoreManager, type KeyValueStore } from './storage/index.js';
import {
  KeyValueTopicStore,
  ProgressStore,
  SearchHistoryStore,
  type TopicStore,
  type UserProgress,
  type UserProgressInput,
} from './topics/index.js';
import { StorageFailure, errorMessage } from './types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Replacements for the collaborators built from configuration.
 */
export interface KnowledgeServiceOverrides {
  /** Use this store instead of opening the configured backend */
  readonly store?: KeyValueStore;
  readonly topics?: TopicStore;
  readonly refreshClient?: ExternalRefreshClient;
  readonly enrichmentClient?: EnrichmentClient;
  readonly answerer?: Answerer;
  readonly relevance?: RelevancePolicy;
  /** Passed to the default HTTP clients */
  readonly fetchImpl?: FetchLike;
  readonly clock?: () => Date;
}

export interface HealthStatus {
  readonly status: 'ok' | 'degraded';
  readonly storage: {
    readonly backend: StoreManager['backend'];
    readonly reachable: boolean;
    readonly error?: string;
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SERVICE
// ─────────────────────────────────────────────────────────────────────────────────

export class KnowledgeService {
  private readonly orchestrator: RetrievalOrchestrator;
  private readonly ranker: SearchRanker;
  private readonly progress: ProgressStore;
  private readonly history: SearchHistoryStore;
  private readonly clock: () => Date;

  constructor(
    readonly config: KnowledgeConfig,
    private readonly storeManager: StoreManager,
    overrides: Omit<KnowledgeServiceOverrides, 'store'> = {}
  ) {
    const store = storeManager.getStore();
    const topics = overrides.topics ?? new KeyValueTopicStore(store);
    this.clock = overrides.clock ?? (() => new Date());

    this.orchestrator = new RetrievalOrchestrator(
      {
        topics,
        cache: new TtlCache(store),
        refreshClient: overrides.refreshClient ?? new HttpExternalRefreshClient({
          ...config.externalApi,
          fetchImpl: overrides.fetchImpl,
        }),
        enrichmentClient: overrides.enrichmentClient ?? new HttpEnrichmentClient({
          ...config.academicApi,
          fetchImpl: overrides.fetchImpl,
        }),
        answerer: overrides.answerer ?? createAnswerer(config.answerer),
        clock: this.clock,
      },
      {
        stalenessWindowMs: stalenessWindowMs(config),
        apiTtlSeconds: config.cache.apiTtlSeconds,
        academicTtlSeconds: config.cache.academicTtlSeconds,
        dedupeRefreshes: config.features.dedupeRefreshes,
      }
    );

    this.ranker = new SearchRanker(
      topics,
      overrides.relevance ?? createRelevancePolicy(config.search.relevancePolicy),
      { maxResults: config.search.maxResults, clock: this.clock }
    );

    this.progress = new ProgressStore(store, config.search.historyLimit);
    this.history = new SearchHistoryStore(store, config.search.historyLimit);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // CONTENT & SEARCH
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Never rejects; failures come back as an errored resolution.
   */
  getTopicContent(request: TopicContentRequest): Promise<TopicContentResolution> {
    return this.orchestrator.getTopicContent(request);
  }

  /**
   * Ranked topics for `query`. A store failure yields an empty list.
   */
  async advancedSearch(query: string, preferences: SearchPreferences | null = null): Promise<SearchResult[]> {
    const logger = loggers.search;

    try {
      await this.history.append(query, this.clock());
    } catch (error) {
      logger.warn('Search history not recorded', { error: errorMessage(error) });
    }

    try {
      return await this.ranker.search(query, preferences);
    } catch (error) {
      if (!(error instanceof StorageFailure)) throw error;
      logger.error('Search failed; returning no results', error);
      return [];
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // PROGRESS
  // ═══════════════════════════════════════════════════════════════════════════════

  recordProgress(input: UserProgressInput): Promise<UserProgress> {
    return this.progress.record(input, this.clock());
  }

  listProgress(sector: string): Promise<UserProgress[]> {
    return this.progress.list(sector);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════════════════

  async health(): Promise<HealthStatus> {
    const backend = this.storeManager.backend;
    try {
      await this.storeManager.getStore().ping();
      return { status: 'ok', storage: { backend, reachable: true } };
    } catch (error) {
      return { status: 'degraded', storage: { backend, reachable: false, error: errorMessage(error) } };
    }
  }

  async close(): Promise<void> {
    await this.storeManager.close();
    loggers.storage.info('Storage closed');
  }
}

/**
 * Configure logging, open storage and wire every collaborator. Resolves once
 * the service can take requests.
 */
export async function createKnowledgeService(
  config: KnowledgeConfig,
  overrides: KnowledgeServiceOverrides = {}
): Promise<KnowledgeService> {
  configureLogger({
    level: config.features.debugMode ? 'debug' : config.logging.level,
    pretty: config.logging.pretty,
    redact: config.logging.redact,
    environment: config.environment,
  });

  const { store, ...rest } = overrides;
  const storeManager = store
    ? StoreManager.fromStore(store)
    : await StoreManager.open(config.storage);

  if (storeManager.backend === 'memory' && isProductionLike(config.environment)) {
    loggers.storage.error('In-memory storage in a production-like environment', {
      environment: config.environment,
    });
  }

  return new KnowledgeService(config, storeManager, rest);
}
