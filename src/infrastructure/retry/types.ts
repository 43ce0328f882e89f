// ═══════════════════════════════════════════════════════════════════════════════
// RETRY TYPES — Retry Policy Types and Configuration
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// JITTER
// ─────────────────────────────────────────────────────────────────────────────────

export type JitterType =
  | 'none'           // No jitter
  | 'full';          // Random between 0 and delay

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface RetryConfig {
  /** Retries after the initial attempt */
  readonly maxRetries: number;

  /** Delay before the first retry */
  readonly initialDelayMs: number;

  readonly maxDelayMs: number;

  readonly jitter: JitterType;

  /** Multiplier for exponential backoff */
  readonly backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 1,
  initialDelayMs: 200,
  maxDelayMs: 2000,
  jitter: 'full',
  backoffMultiplier: 2,
};

// ─────────────────────────────────────────────────────────────────────────────────
// RESULT
// ─────────────────────────────────────────────────────────────────────────────────

export type RetryResult<T> =
  | { success: true; value: T; attempts: number; totalTimeMs: number }
  | { success: false; error: Error; attempts: number; totalTimeMs: number; allErrors: Error[] };

// ─────────────────────────────────────────────────────────────────────────────────
// INTERFACES
// ─────────────────────────────────────────────────────────────────────────────────

export interface RetryPolicy {
  /** Execute and report every attempt's outcome instead of throwing */
  executeWithResult<T>(fn: () => Promise<T>): Promise<RetryResult<T>>;

  getConfig(): RetryConfig;
}

export interface BackoffCalculator {
  /** Delay after the given failed attempt (1-based) */
  calculate(attempt: number): number;
}
