// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMA — Validated Shape of the Service Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

export const EnvironmentSchema = z.enum(['development', 'test', 'staging', 'production']);

export type Environment = z.infer<typeof EnvironmentSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// SECTIONS
// ─────────────────────────────────────────────────────────────────────────────────

const ServerSchema = z.object({
  port: z.number().int().min(1).max(65535).default(8080),
  host: z.string().min(1).default('0.0.0.0'),
  shutdownTimeoutMs: z.number().int().min(0).default(10_000),
}).default({});

const RedisSchema = z.object({
  host: z.string().min(1).default('localhost'),
  port: z.number().int().min(1).max(65535).default(6379),
  db: z.number().int().min(0).default(0),
  password: z.string().optional(),
  connectTimeoutMs: z.number().int().min(0).default(5_000),
}).default({});

const StorageSchema = z.object({
  backend: z.enum(['memory', 'redis']).default('memory'),
  redis: RedisSchema,
}).default({});

const FreshnessSchema = z.object({
  /** Age past which a stored topic is refreshed; exactly this age is still fresh */
  windowDays: z.number().positive().default(7),
}).default({});

const CacheSchema = z.object({
  apiTtlSeconds: z.number().int().positive().default(3600),
  academicTtlSeconds: z.number().int().positive().default(3600),
}).default({});

const RemoteSourceSchema = z.object({
  url: z.string().url().optional(),
  timeoutMs: z.number().int().min(100).max(120_000).default(5_000),
  maxRetries: z.number().int().min(0).max(5).default(1),
});

const SearchSchema = z.object({
  maxResults: z.number().int().min(1).max(100).default(10),
  snippetLength: z.number().int().min(1).default(200),
  relevancePolicy: z.enum(['term-overlap', 'constant']).default('term-overlap'),
  historyLimit: z.number().int().min(1).default(1000),
}).default({});

const AnswererSchema = z.object({
  provider: z.enum(['template', 'openai']).default('template'),
  openaiApiKey: z.string().optional(),
  model: z.string().min(1).default('gpt-4o-mini'),
  maxTokens: z.number().int().positive().default(500),
  timeoutMs: z.number().int().min(1_000).max(120_000).default(30_000),
  maxRetries: z.number().int().min(0).max(5).default(1),
}).default({});

const FeaturesSchema = z.object({
  dedupeRefreshes: z.boolean().default(false),
  debugMode: z.boolean().default(false),
}).default({});

const LoggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  pretty: z.boolean().default(true),
  redact: z.boolean().default(true),
}).default({});

// ─────────────────────────────────────────────────────────────────────────────────
// ROOT SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

export const KnowledgeConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  server: ServerSchema,
  storage: StorageSchema,
  freshness: FreshnessSchema,
  cache: CacheSchema,
  externalApi: RemoteSourceSchema.default({}),
  academicApi: RemoteSourceSchema.default({}),
  search: SearchSchema,
  answerer: AnswererSchema,
  features: FeaturesSchema,
  logging: LoggingSchema,
}).superRefine((config, ctx) => {
  if (config.answerer.provider === 'openai' && !config.answerer.openaiApiKey) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['answerer', 'openaiApiKey'],
      message: 'openaiApiKey is required when answerer.provider is "openai"',
    });
  }
});

export type KnowledgeConfig = z.infer<typeof KnowledgeConfigSchema>;
export type KnowledgeConfigInput = z.input<typeof KnowledgeConfigSchema>;
export type RemoteSourceConfig = z.infer<typeof RemoteSourceSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

export function validateConfig(input: unknown): KnowledgeConfig {
  return KnowledgeConfigSchema.parse(input);
}

export function safeValidateConfig(input: unknown): z.SafeParseReturnType<KnowledgeConfigInput, KnowledgeConfig> {
  return KnowledgeConfigSchema.safeParse(input);
}

/**
 * One line per issue, prefixed with the dotted path.
 */
export function formatConfigErrors(error: z.ZodError): string[] {
  return error.errors.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
