// ═══════════════════════════════════════════════════════════════════════════════
// RETRY POLICY — Retry with Backoff Implementation
// ═══════════════════════════════════════════════════════════════════════════════

import {
  type BackoffCalculator,
  type RetryConfig,
  type RetryPolicy,
  type RetryResult,
  DEFAULT_RETRY_CONFIG,
} from './types.js';
import { BackoffCalculatorImpl, formatDelay, sleep } from './backoff.js';
import { getLogger } from '../../observability/logging/index.js';
import { MalformedResponse, TransportFailure } from '../../types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// DEFAULT RETRYABLE ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Transport failures carry their own verdict. Malformed payloads are final.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TransportFailure) return error.retryable;
  if (error instanceof MalformedResponse) return false;
  return true;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RETRY POLICY IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

export class RetryPolicyImpl implements RetryPolicy {
  private readonly config: RetryConfig;
  private readonly backoff: BackoffCalculator;

  constructor(
    config: Partial<RetryConfig> = {},
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.backoff = new BackoffCalculatorImpl(this.config);
  }

  getConfig(): RetryConfig {
    return this.config;
  }

  async executeWithResult<T>(fn: () => Promise<T>): Promise<RetryResult<T>> {
    const logger = getLogger({ component: 'retry' });
    const startTime = Date.now();
    const errors: Error[] = [];
    let attempt = 0;

    for (;;) {
      attempt++;

      try {
        const value = await fn();
        const totalTimeMs = Date.now() - startTime;

        if (attempt > 1) {
          logger.debug('Retry succeeded', { attempt, totalTimeMs });
        }

        return { success: true, value, attempts: attempt, totalTimeMs };
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        errors.push(err);

        const elapsed = Date.now() - startTime;
        const retryable = isRetryableError(error);

        if (!retryable || attempt > this.config.maxRetries) {
          logger.debug('Giving up', { attempts: attempt, error: err.message, retryable });
          return { success: false, error: err, attempts: attempt, totalTimeMs: elapsed, allErrors: errors };
        }

        const delayMs = this.backoff.calculate(attempt);
        logger.debug('Retrying', {
          attempt,
          maxRetries: this.config.maxRetries,
          error: err.message,
          delay: formatDelay(delayMs),
        });

        await this.wait(delayMs);
      }
    }
  }
}
