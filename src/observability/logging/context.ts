// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING CONTEXT — Request Correlation via AsyncLocalStorage
// ═══════════════════════════════════════════════════════════════════════════════

import { AsyncLocalStorage } from 'node:async_hooks';

export interface LoggingContext {
  requestId?: string;
  sector?: string;
}

const storage = new AsyncLocalStorage<LoggingContext>();

/**
 * Run `fn` with `context` visible to every log line written inside it,
 * including lines written after an await.
 */
export function runWithLoggingContext<T>(context: LoggingContext, fn: () => T): T {
  const parent = storage.getStore();
  return storage.run({ ...parent, ...context }, fn);
}

export function getLoggingContext(): LoggingContext {
  return storage.getStore() ?? {};
}

export function getRequestId(): string | undefined {
  return storage.getStore()?.requestId;
}
