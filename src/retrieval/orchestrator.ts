// ═══════════════════════════════════════════════════════════════════════════════
// RETRIEVAL ORCHESTRATOR — Staleness-Aware Topic Content Pipeline
// ═══════════════════════════════════════════════════════════════════════════════
//
//   START → (offline ? SKIP_REFRESH : CHECK_FRESHNESS) → [REFRESHING]
//         → READ_TOPIC → (found ? BUILD_CONTEXT : NOT_FOUND)
//         → [ENRICHING] → ANSWERED
//
// Any unexpected failure ends in ERRORED. Nothing is thrown to the caller.
// Retries belong to the client transport; the pipeline runs each step once.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { CacheKeys, type TtlCache } from '../cache/index.js';
import {
  EnrichmentPayloadSchema,
  type EnrichmentClient,
  type EnrichmentItem,
  type ExternalRefreshClient,
} from '../clients/index.js';
import { SingleFlight } from '../infrastructure/single-flight.js';
import { loggers, runWithLoggingContext } from '../observability/logging/index.js';
import { DEFAULT_STALENESS_WINDOW_MS, needsRefresh, type TopicStore } from '../topics/index.js';
import { MalformedResponse, StorageFailure, errorMessage } from '../types/errors.js';
import type { Answerer } from './answerer.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export const NOT_FOUND_ANSWER = "I'm sorry, I don't have information on that sector.";

export type ResolutionOutcome = 'answered' | 'not_found' | 'errored';

export interface TopicContentRequest {
  readonly question: string;
  readonly sector: string;
  /** Skip every network call and answer from stored content only */
  readonly offlineMode?: boolean;
}

export interface TopicContentResolution {
  readonly answer: string;
  /** Further-reading link; null when unknown or empty */
  readonly link: string | null;
  readonly outcome: ResolutionOutcome;
  /** A refresh succeeded and was written during this call */
  readonly refreshed: boolean;
  /** At least one enrichment summary was appended to the context */
  readonly enriched: boolean;
}

export interface OrchestratorDependencies {
  readonly topics: TopicStore;
  readonly cache: TtlCache;
  readonly refreshClient: ExternalRefreshClient;
  readonly enrichmentClient: EnrichmentClient;
  readonly answerer: Answerer;
  readonly clock?: () => Date;
}

export interface OrchestratorOptions {
  readonly stalenessWindowMs: number;
  readonly apiTtlSeconds: number;
  readonly academicTtlSeconds: number;
  /** Share one in-flight refresh per sector */
  readonly dedupeRefreshes: boolean;
}

export const DEFAULT_ORCHESTRATOR_OPTIONS: OrchestratorOptions = {
  stalenessWindowMs: DEFAULT_STALENESS_WINDOW_MS,
  apiTtlSeconds: 3600,
  academicTtlSeconds: 3600,
  dedupeRefreshes: false,
};

// ─────────────────────────────────────────────────────────────────────────────────
// ORCHESTRATOR
// ─────────────────────────────────────────────────────────────────────────────────

export class RetrievalOrchestrator {
  private readonly options: OrchestratorOptions;
  private readonly clock: () => Date;
  private readonly refreshes = new SingleFlight<boolean>();

  constructor(
    private readonly deps: OrchestratorDependencies,
    options: Partial<OrchestratorOptions> = {}
  ) {
    this.options = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...options };
    this.clock = deps.clock ?? (() => new Date());
  }

  getTopicContent(request: TopicContentRequest): Promise<TopicContentResolution> {
    return runWithLoggingContext({ sector: request.sector }, () => this.resolve(request));
  }

  private async resolve(request: TopicContentRequest): Promise<TopicContentResolution> {
    const { question, sector } = request;
    const offline = request.offlineMode ?? false;
    const logger = loggers.retrieval;

    try {
      const refreshed = offline ? false : await this.refreshIfStale(sector);

      const topic = await this.deps.topics.get(sector);
      if (!topic) {
        logger.info('No stored topic for sector', { offline });
        return { answer: NOT_FOUND_ANSWER, link: null, outcome: 'not_found', refreshed, enriched: false };
      }

      let context = topic.content;
      let enriched = false;
      if (!offline) {
        const summaries = (await this.loadEnrichment(sector)).map(item => item.summary);
        if (summaries.length > 0) {
          context += '\n' + summaries.join('\n');
          enriched = true;
        }
      }

      const answer = await this.deps.answerer.answer(context, question);
      logger.debug('Answered', { offline, refreshed, enriched });

      return {
        answer,
        link: topic.furtherReading === '' ? null : topic.furtherReading,
        outcome: 'answered',
        refreshed,
        enriched,
      };
    } catch (error) {
      logger.error('Error retrieving content', error);
      return {
        answer: `An error occurred: ${errorMessage(error)}`,
        link: null,
        outcome: 'errored',
        refreshed: false,
        enriched: false,
      };
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // REFRESH
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Rejects only when the freshness read fails.
   */
  private async refreshIfStale(sector: string): Promise<boolean> {
    const now = this.clock();
    const current = await this.deps.topics.get(sector);
    if (!needsRefresh(current, now, this.options.stalenessWindowMs)) {
      return false;
    }

    if (this.options.dedupeRefreshes) {
      return this.refreshes.run(sector, () => this.refresh(sector, now));
    }
    return this.refresh(sector, now);
  }

  /**
   * Never rejects. A failed fetch or write leaves the stored topic as it was.
   */
  private async refresh(sector: string, now: Date): Promise<boolean> {
    const logger = loggers.retrieval;
    const result = await this.deps.refreshClient.fetch(sector);

    if (!result.ok) {
      logger.warn('Refresh failed; using stored content', {
        code: result.error.code,
        error: result.error.message,
      });
      return false;
    }

    try {
      await this.deps.topics.upsert(sector, {
        content: result.value.content,
        furtherReading: result.value.further_reading ?? '',
        lastUpdate: now,
      });
    } catch (error) {
      logger.warn('Refreshed topic could not be stored', { error: errorMessage(error) });
      return false;
    }

    try {
      await this.deps.cache.setJson(CacheKeys.api(sector), result.value, this.options.apiTtlSeconds);
    } catch (error) {
      loggers.cache.warn('Refresh payload not cached', { error: errorMessage(error) });
    }

    logger.info('Topic refreshed');
    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // ENRICHMENT
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Cached items, else freshly fetched ones. Empty when neither is available.
   */
  private async loadEnrichment(sector: string): Promise<EnrichmentItem[]> {
    const key = CacheKeys.academic(sector);

    try {
      const cached = await this.deps.cache.getJson(key, EnrichmentPayloadSchema);
      if (cached !== null) return cached;
    } catch (error) {
      if (error instanceof MalformedResponse) {
        loggers.cache.warn('Ignoring malformed cached enrichment', { key, code: error.code });
      } else if (error instanceof StorageFailure) {
        loggers.cache.warn('Enrichment cache read failed', { key, error: error.message });
      } else {
        throw error;
      }
    }

    const result = await this.deps.enrichmentClient.fetch(sector);
    if (!result.ok) {
      loggers.retrieval.warn('Enrichment unavailable', {
        code: result.error.code,
        error: result.error.message,
      });
      return [];
    }

    try {
      await this.deps.cache.setJson(key, result.value, this.options.academicTtlSeconds);
    } catch (error) {
      if (!(error instanceof StorageFailure)) throw error;
      loggers.cache.warn('Enrichment cache write failed', { key, error: error.message });
    }

    return result.value;
  }
}
