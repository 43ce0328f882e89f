// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG LOADER — Environment Variables → Validated, Frozen Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { ZodError } from 'zod';
import {
  KnowledgeConfigSchema,
  formatConfigErrors,
  type Environment,
  type KnowledgeConfig,
  type KnowledgeConfigInput,
} from './schema.js';
import { KnowledgeError, ErrorCode } from '../types/errors.js';

export {
  KnowledgeConfigSchema,
  validateConfig,
  safeValidateConfig,
  formatConfigErrors,
  type Environment,
  type KnowledgeConfig,
  type KnowledgeConfigInput,
  type RemoteSourceConfig,
} from './schema.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────
//
// Each helper returns undefined for an unset variable so the schema default
// applies.

function envBool(key: string): boolean | undefined {
  const value = process.env[key]?.toLowerCase();
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1' || value === 'yes';
}

function envNumber(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function envString(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RAW CONFIG FROM ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

function readEnvironment(): Record<string, unknown> {
  const environment = envString('NODE_ENV') ?? 'development';
  const redisHost = envString('REDIS_HOST');
  const openaiApiKey = envString('OPENAI_API_KEY');

  return {
    environment,
    server: {
      port: envNumber('PORT'),
      host: envString('HOST'),
      shutdownTimeoutMs: envNumber('SHUTDOWN_TIMEOUT_MS'),
    },
    storage: {
      backend: envString('STORAGE_BACKEND') ?? (redisHost ? 'redis' : undefined),
      redis: {
        host: redisHost,
        port: envNumber('REDIS_PORT'),
        db: envNumber('REDIS_DB'),
        password: envString('REDIS_PASSWORD'),
        connectTimeoutMs: envNumber('REDIS_CONNECT_TIMEOUT_MS'),
      },
    },
    freshness: {
      windowDays: envNumber('FRESHNESS_WINDOW_DAYS'),
    },
    cache: {
      apiTtlSeconds: envNumber('CACHE_API_TTL_SECONDS'),
      academicTtlSeconds: envNumber('CACHE_ACADEMIC_TTL_SECONDS'),
    },
    externalApi: {
      url: envString('EXTERNAL_API_URL'),
      timeoutMs: envNumber('EXTERNAL_API_TIMEOUT_MS'),
      maxRetries: envNumber('EXTERNAL_API_MAX_RETRIES'),
    },
    academicApi: {
      url: envString('ACADEMIC_RESOURCES_API'),
      timeoutMs: envNumber('ACADEMIC_API_TIMEOUT_MS'),
      maxRetries: envNumber('ACADEMIC_API_MAX_RETRIES'),
    },
    search: {
      maxResults: envNumber('SEARCH_MAX_RESULTS'),
      snippetLength: envNumber('SEARCH_SNIPPET_LENGTH'),
      relevancePolicy: envString('SEARCH_RELEVANCE_POLICY'),
      historyLimit: envNumber('SEARCH_HISTORY_LIMIT'),
    },
    answerer: {
      provider: envString('ANSWERER_PROVIDER') ?? (openaiApiKey ? 'openai' : undefined),
      openaiApiKey,
      model: envString('OPENAI_MODEL'),
      maxTokens: envNumber('OPENAI_MAX_TOKENS'),
      timeoutMs: envNumber('OPENAI_TIMEOUT_MS'),
      maxRetries: envNumber('OPENAI_MAX_RETRIES'),
    },
    features: {
      dedupeRefreshes: envBool('DEDUPE_REFRESHES'),
      debugMode: envBool('DEBUG'),
    },
    logging: {
      level: envString('LOG_LEVEL')?.toLowerCase(),
      pretty: envBool('LOG_PRETTY') ?? environment !== 'production',
      redact: envBool('REDACT_LOGS'),
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADER
// ─────────────────────────────────────────────────────────────────────────────────

let cachedConfig: KnowledgeConfig | null = null;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function parseOrThrow(raw: unknown): KnowledgeConfig {
  try {
    return KnowledgeConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new KnowledgeError(
        ErrorCode.CONFIGURATION_ERROR,
        `Invalid configuration:\n  ${formatConfigErrors(error).join('\n  ')}`,
        { cause: error }
      );
    }
    throw error;
  }
}

/**
 * Load configuration from the environment. Cached after the first call.
 */
export function loadConfig(): KnowledgeConfig {
  if (cachedConfig) return cachedConfig;
  cachedConfig = deepFreeze(parseOrThrow(readEnvironment()));
  return cachedConfig;
}

/**
 * Get the loaded configuration. Throws if loadConfig() has not run.
 */
export function getConfig(): KnowledgeConfig {
  if (!cachedConfig) {
    throw new KnowledgeError(ErrorCode.CONFIGURATION_ERROR, 'Configuration not loaded');
  }
  return cachedConfig;
}

export function isConfigLoaded(): boolean {
  return cachedConfig !== null;
}

export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Build a configuration from explicit values, ignoring the environment.
 * The result is not cached.
 */
export function loadTestConfig(overrides: KnowledgeConfigInput = {}): KnowledgeConfig {
  return deepFreeze(parseOrThrow({ environment: 'test', ...overrides }));
}

// ─────────────────────────────────────────────────────────────────────────────────
// DERIVED VALUES
// ─────────────────────────────────────────────────────────────────────────────────

export const DAY_MS = 24 * 60 * 60 * 1000;

export function stalenessWindowMs(config: KnowledgeConfig): number {
  return config.freshness.windowDays * DAY_MS;
}

export function isProductionLike(environment: Environment): boolean {
  return environment === 'staging' || environment === 'production';
}
