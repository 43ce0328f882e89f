// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TESTS — Schema Validation and Environment Loading
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  KnowledgeConfigSchema,
  validateConfig,
  safeValidateConfig,
  formatConfigErrors,
} from '../schema.js';
import {
  loadConfig,
  getConfig,
  isConfigLoaded,
  resetConfig,
  loadTestConfig,
  stalenessWindowMs,
  isProductionLike,
  DAY_MS,
} from '../index.js';
import { KnowledgeError } from '../../types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('Configuration Schema', () => {
  it('should accept empty object with all defaults', () => {
    const result = KnowledgeConfigSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.environment).toBe('development');
      expect(result.data.server.port).toBe(8080);
      expect(result.data.storage.backend).toBe('memory');
      expect(result.data.freshness.windowDays).toBe(7);
      expect(result.data.cache.apiTtlSeconds).toBe(3600);
      expect(result.data.cache.academicTtlSeconds).toBe(3600);
      expect(result.data.search.maxResults).toBe(10);
      expect(result.data.search.snippetLength).toBe(200);
      expect(result.data.search.relevancePolicy).toBe('term-overlap');
      expect(result.data.answerer.provider).toBe('template');
      expect(result.data.answerer.timeoutMs).toBe(30_000);
      expect(result.data.answerer.maxRetries).toBe(1);
      expect(result.data.features.dedupeRefreshes).toBe(false);
    }
  });

  it('should reject invalid port number', () => {
    expect(KnowledgeConfigSchema.safeParse({ server: { port: 99999 } }).success).toBe(false);
  });

  it('should reject invalid environment', () => {
    expect(KnowledgeConfigSchema.safeParse({ environment: 'invalid' }).success).toBe(false);
  });

  it('should reject a non-positive freshness window', () => {
    expect(KnowledgeConfigSchema.safeParse({ freshness: { windowDays: 0 } }).success).toBe(false);
  });

  it('should reject a malformed source URL', () => {
    const result = KnowledgeConfigSchema.safeParse({ externalApi: { url: 'not a url' } });
    expect(result.success).toBe(false);
  });

  it('should require an API key for the openai answerer', () => {
    const result = safeValidateConfig({ answerer: { provider: 'openai' } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatConfigErrors(result.error)).toEqual([
        'answerer.openaiApiKey: openaiApiKey is required when answerer.provider is "openai"',
      ]);
    }
  });

  it('should return validated config from validateConfig', () => {
    expect(validateConfig({ environment: 'staging' }).environment).toBe('staging');
  });

  it('should throw from validateConfig on invalid input', () => {
    expect(() => validateConfig({ server: { port: -1 } })).toThrow();
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// LOADER TESTS
// ─────────────────────────────────────────────────────────────────────────────────

const ENV_KEYS = [
  'NODE_ENV',
  'PORT',
  'REDIS_HOST',
  'STORAGE_BACKEND',
  'FRESHNESS_WINDOW_DAYS',
  'EXTERNAL_API_URL',
  'ACADEMIC_RESOURCES_API',
  'OPENAI_API_KEY',
  'ANSWERER_PROVIDER',
  'OPENAI_TIMEOUT_MS',
  'OPENAI_MAX_RETRIES',
  'DEDUPE_REFRESHES',
  'SEARCH_RELEVANCE_POLICY',
  'LOG_PRETTY',
];

describe('Config Loader', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    resetConfig();
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    resetConfig();
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('should load defaults from an empty environment', () => {
    const config = loadConfig();
    expect(config.environment).toBe('development');
    expect(config.storage.backend).toBe('memory');
    expect(config.externalApi.url).toBeUndefined();
    expect(config.logging.pretty).toBe(true);
  });

  it('should read values from environment variables', () => {
    process.env.NODE_ENV = 'production';
    process.env.PORT = '9090';
    process.env.FRESHNESS_WINDOW_DAYS = '3';
    process.env.EXTERNAL_API_URL = 'http://refresh.test/topics';
    process.env.ACADEMIC_RESOURCES_API = 'http://academic.test/summaries';
    process.env.DEDUPE_REFRESHES = 'true';
    process.env.SEARCH_RELEVANCE_POLICY = 'constant';

    const config = loadConfig();
    expect(config.environment).toBe('production');
    expect(config.server.port).toBe(9090);
    expect(config.freshness.windowDays).toBe(3);
    expect(config.externalApi.url).toBe('http://refresh.test/topics');
    expect(config.academicApi.url).toBe('http://academic.test/summaries');
    expect(config.features.dedupeRefreshes).toBe(true);
    expect(config.search.relevancePolicy).toBe('constant');
    expect(config.logging.pretty).toBe(false);
  });

  it('should select redis when REDIS_HOST is set', () => {
    process.env.REDIS_HOST = 'redis.internal';
    const config = loadConfig();
    expect(config.storage.backend).toBe('redis');
    expect(config.storage.redis.host).toBe('redis.internal');
  });

  it('should select the openai answerer when an API key is present', () => {
    process.env.OPENAI_API_KEY = 'test-key';
    const config = loadConfig();
    expect(config.answerer.provider).toBe('openai');
    expect(config.answerer.openaiApiKey).toBe('test-key');
  });

  it('should read the answerer timeout and retries', () => {
    process.env.OPENAI_TIMEOUT_MS = '15000';
    process.env.OPENAI_MAX_RETRIES = '0';
    const config = loadConfig();
    expect(config.answerer.timeoutMs).toBe(15_000);
    expect(config.answerer.maxRetries).toBe(0);
  });

  it('should ignore a non-numeric PORT', () => {
    process.env.PORT = 'eighty';
    expect(loadConfig().server.port).toBe(8080);
  });

  it('should throw a configuration error for invalid values', () => {
    process.env.SEARCH_RELEVANCE_POLICY = 'magic';
    expect(() => loadConfig()).toThrow(KnowledgeError);
    expect(() => loadConfig()).toThrow(/search\.relevancePolicy/);
  });

  it('should cache the loaded config', () => {
    const first = loadConfig();
    process.env.PORT = '9191';
    expect(loadConfig()).toBe(first);
    expect(getConfig()).toBe(first);
    expect(isConfigLoaded()).toBe(true);
  });

  it('should throw from getConfig before loading', () => {
    expect(isConfigLoaded()).toBe(false);
    expect(() => getConfig()).toThrow('Configuration not loaded');
  });

  it('should freeze the loaded config', () => {
    const config = loadConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.freshness)).toBe(true);
  });
});

describe('loadTestConfig', () => {
  it('should apply overrides on top of test defaults', () => {
    const config = loadTestConfig({ freshness: { windowDays: 2 } });
    expect(config.environment).toBe('test');
    expect(config.freshness.windowDays).toBe(2);
    expect(isConfigLoaded()).toBe(false);
  });
});

describe('Derived values', () => {
  it('should convert the freshness window to milliseconds', () => {
    expect(stalenessWindowMs(loadTestConfig())).toBe(7 * DAY_MS);
  });

  it('should treat staging and production as production-like', () => {
    expect(isProductionLike('production')).toBe(true);
    expect(isProductionLike('staging')).toBe(true);
    expect(isProductionLike('development')).toBe(false);
  });
});
