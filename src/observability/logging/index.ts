// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MODULE — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type LogLevel,
  type LoggerConfig,
  type LoggerOptions,
  type ILogger,
  type RequestLogData,
  LOG_LEVELS,
  configureLogger,
  getLoggerConfig,
  getLogger,
  resetLogger,
  loggers,
  logRequest,
} from './logger.js';

export {
  type LoggingContext,
  runWithLoggingContext,
  getLoggingContext,
  getRequestId,
} from './context.js';

export {
  type RedactionOptions,
  redact,
} from './redaction.js';
