// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Leveled Logging with Context & Redaction
// ═══════════════════════════════════════════════════════════════════════════════
//
// - JSON output for production, pretty-print for development
// - Request id injected from AsyncLocalStorage
// - Secret redaction by field name
// - Component-based child loggers
//
// Usage:
//   import { getLogger } from './observability/logging/index.js';
//
//   const logger = getLogger({ component: 'retrieval' });
//   logger.info('Topic refreshed', { sector: 'physics' });
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLoggingContext } from './context.js';
import { redact, type RedactionOptions } from './redaction.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Numeric log level values (Pino-compatible).
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  redact?: boolean;
  redactionOptions?: RedactionOptions;
  serviceName?: string;
  environment?: string;
  timestamp?: boolean;
}

export interface LoggerOptions {
  component?: string;
  /** Request ID (taken from the logging context when not given) */
  requestId?: string;
  context?: Record<string, unknown>;
}

export interface ILogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;
  child(options: LoggerOptions): ILogger;
  isLevelEnabled(level: LogLevel): boolean;
}

export interface RequestLogData {
  method: string;
  path: string;
  statusCode: number;
  duration: number;
  requestId?: string;
  userAgent?: string;
  ip?: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {
  level: 'info',
  pretty: process.env.NODE_ENV !== 'production',
  redact: true,
  serviceName: 'sector-knowledge',
  environment: process.env.NODE_ENV ?? 'development',
  timestamp: true,
};

export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
  rootLogger = null;
}

export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * LOG_LEVEL wins over the configured level.
 */
function getEffectiveLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return globalConfig.level ?? 'info';
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────────────────────────

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
      ...(error.cause ? { errorCause: String(error.cause) } : {}),
    };
  }

  if (typeof error === 'string') {
    return { errorMessage: error };
  }

  return { errorMessage: String(error) };
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component?: string
): Record<string, unknown> {
  const entry: Record<string, unknown> = {
    level,
    levelNum: LOG_LEVELS[level],
    time: globalConfig.timestamp ? new Date().toISOString() : undefined,
    msg: message,
    service: globalConfig.serviceName,
    env: globalConfig.environment,
    ...(component ? { component } : {}),
    ...getLoggingContext(),
    ...context,
  };

  if (globalConfig.redact) {
    return redact(entry, globalConfig.redactionOptions);
  }

  return entry;
}

const STANDARD_FIELDS = new Set(['level', 'levelNum', 'time', 'msg', 'service', 'env', 'component', 'requestId']);

function prettyPrint(level: LogLevel, entry: Record<string, unknown>): string {
  const colors: Record<LogLevel, string> = {
    trace: '\x1b[90m',  // Gray
    debug: '\x1b[36m',  // Cyan
    info: '\x1b[32m',   // Green
    warn: '\x1b[33m',   // Yellow
    error: '\x1b[31m',  // Red
    fatal: '\x1b[35m',  // Magenta
  };
  const reset = '\x1b[0m';
  const dim = '\x1b[2m';

  const time = typeof entry.time === 'string' ? entry.time : '';
  const timeStr = time.split('T')[1]?.replace('Z', '') ?? '';
  const componentStr = typeof entry.component === 'string' ? `[${entry.component}]` : '';
  const requestIdStr = typeof entry.requestId === 'string' ? `[${entry.requestId.slice(0, 8)}]` : '';

  const contextFields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!STANDARD_FIELDS.has(key) && value !== undefined) {
      contextFields[key] = value;
    }
  }

  const contextStr = Object.keys(contextFields).length > 0
    ? ` ${dim}${JSON.stringify(contextFields)}${reset}`
    : '';

  return `${dim}${timeStr}${reset} ${colors[level]}${level.toUpperCase().padEnd(5)}${reset} ${requestIdStr}${componentStr} ${String(entry.msg)}${contextStr}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

function writeLog(level: LogLevel, entry: Record<string, unknown>): void {
  const output = globalConfig.pretty ? prettyPrint(level, entry) : JSON.stringify(entry);

  if (level === 'error' || level === 'fatal') {
    console.error(output);
  } else if (level === 'warn') {
    console.warn(output);
  } else {
    console.log(output);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function createLoggerImpl(options: LoggerOptions = {}): ILogger {
  const { component, requestId, context: baseContext = {} } = options;

  const levelNum = LOG_LEVELS[getEffectiveLevel()];

  const log = (
    level: LogLevel,
    message: string,
    context: Record<string, unknown> = {},
    error?: unknown
  ): void => {
    if (LOG_LEVELS[level] < levelNum) {
      return;
    }

    const fullContext = {
      ...(requestId ? { requestId } : {}),
      ...baseContext,
      ...context,
      ...(error !== undefined ? formatError(error) : {}),
    };

    writeLog(level, formatLogEntry(level, message, fullContext, component));
  };

  return {
    trace: (message, context) => log('trace', message, context),
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => log('error', message, context, error),
    fatal: (message, error, context) => log('fatal', message, context, error),

    child: (childOptions: LoggerOptions): ILogger => createLoggerImpl({
      component: childOptions.component ?? component,
      requestId: childOptions.requestId ?? requestId,
      context: { ...baseContext, ...childOptions.context },
    }),

    isLevelEnabled: (level: LogLevel): boolean => LOG_LEVELS[level] >= levelNum,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: ILogger | null = null;

/**
 * Get the root logger or create a child logger.
 */
export function getLogger(options?: LoggerOptions): ILogger {
  if (!rootLogger) {
    rootLogger = createLoggerImpl();
  }

  if (options) {
    return rootLogger.child(options);
  }

  return rootLogger;
}

/**
 * Reset the root logger (for testing).
 */
export function resetLogger(): void {
  rootLogger = null;
}

/**
 * Component loggers. Getters so a reconfigured level is picked up.
 */
export const loggers = {
  get http(): ILogger { return getLogger({ component: 'http' }); },
  get retrieval(): ILogger { return getLogger({ component: 'retrieval' }); },
  get search(): ILogger { return getLogger({ component: 'search' }); },
  get storage(): ILogger { return getLogger({ component: 'storage' }); },
  get cache(): ILogger { return getLogger({ component: 'cache' }); },
  get clients(): ILogger { return getLogger({ component: 'clients' }); },
  get llm(): ILogger { return getLogger({ component: 'llm' }); },
};

// ─────────────────────────────────────────────────────────────────────────────────
// REQUEST LOGGING
// ─────────────────────────────────────────────────────────────────────────────────

export function logRequest(data: RequestLogData): void {
  const logger = getLogger({ component: 'http' });

  const context: Record<string, unknown> = {
    method: data.method,
    path: data.path,
    statusCode: data.statusCode,
    durationMs: data.duration,
  };

  if (data.requestId) context.requestId = data.requestId;
  if (data.userAgent) context.userAgent = data.userAgent;
  if (data.ip) context.ip = data.ip;

  const message = `${data.method} ${data.path} ${data.statusCode}`;

  if (data.statusCode >= 500) {
    logger.error(message, undefined, context);
  } else if (data.statusCode >= 400) {
    logger.warn(message, context);
  } else {
    logger.info(message, context);
  }
}
