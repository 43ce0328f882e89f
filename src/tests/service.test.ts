// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE TESTS — Wiring, Search History, Progress, Health
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { loadTestConfig } from '../config/index.js';
import { TEMPLATE_ANSWER } from '../retrieval/index.js';
import { createKnowledgeService, type KnowledgeService } from '../service.js';
import { SearchHistoryStore } from '../topics/index.js';
import { ok } from '../types/result.js';
import { FakeEnrichmentClient, FakeRefreshClient, FlakyStore, TestClock } from './fakes.js';

describe('KnowledgeService', () => {
  let clock: TestClock;
  let store: FlakyStore;
  let refresh: FakeRefreshClient;
  let service: KnowledgeService;

  beforeEach(async () => {
    clock = new TestClock();
    store = new FlakyStore(clock.nowMs);
    refresh = new FakeRefreshClient();
    service = await createKnowledgeService(loadTestConfig(), {
      store,
      refreshClient: refresh,
      enrichmentClient: new FakeEnrichmentClient(),
      clock: clock.now,
    });
  });

  describe('getTopicContent', () => {
    it('should answer with the configured template answerer', async () => {
      refresh.respondWith(() => ok({ content: 'Orbits are ellipses', further_reading: 'http://kepler' }));

      const result = await service.getTopicContent({ question: 'Why orbits?', sector: 'astronomy' });

      expect(result.answer).toBe(TEMPLATE_ANSWER);
      expect(result.link).toBe('http://kepler');
    });
  });

  describe('advancedSearch', () => {
    beforeEach(async () => {
      refresh.respondWith(sector => ok({ content: `Notes on gravity in ${sector}`, further_reading: null }));
      await service.getTopicContent({ question: 'q', sector: 'physics' });
      refresh.respondWith(() => ok({ content: 'Cells divide', further_reading: null }));
      await service.getTopicContent({ question: 'q', sector: 'biology' });
    });

    it('should rank matching topics with term overlap', async () => {
      const results = await service.advancedSearch('gravity');

      expect(results.map(r => r.sector)).toEqual(['physics']);
    });

    it('should record each query in the search history', async () => {
      await service.advancedSearch('gravity');
      clock.advance(1000);
      await service.advancedSearch('cells', { sectors: ['biology'] });

      const history = await new SearchHistoryStore(store, 1000).list();
      expect(history.map(h => h.query)).toEqual(['gravity', 'cells']);
      expect(history[1]?.timestamp).toEqual(clock.now());
    });

    it('should still search when the history write fails', async () => {
      store.failing.add('rpush');

      const results = await service.advancedSearch('cells');

      expect(results.map(r => r.sector)).toEqual(['biology']);
    });

    it('should return no results when the store fails', async () => {
      store.failing.add('lrange');

      expect(await service.advancedSearch('gravity')).toEqual([]);
    });
  });

  describe('progress', () => {
    it('should record and list progress per sector', async () => {
      const recorded = await service.recordProgress({ sector: 'physics', performance: 0.9 });
      await service.recordProgress({ sector: 'chemistry', performance: 0.4, notes: 'review bonds' });

      expect(recorded.lastStudyDate).toEqual(clock.now());
      expect(await service.listProgress('physics')).toEqual([recorded]);
      expect((await service.listProgress('chemistry'))[0]?.notes).toBe('review bonds');
    });
  });

  describe('health', () => {
    it('should report ok while the store answers', async () => {
      expect(await service.health()).toEqual({
        status: 'ok',
        storage: { backend: 'memory', reachable: true },
      });
    });

    it('should report degraded when the store fails', async () => {
      store.failing.add('ping');

      expect(await service.health()).toEqual({
        status: 'degraded',
        storage: { backend: 'memory', reachable: false, error: 'store ping unavailable' },
      });
    });
  });
});
