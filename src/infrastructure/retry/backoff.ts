// ═══════════════════════════════════════════════════════════════════════════════
// BACKOFF — Exponential Backoff with Jitter
// ═══════════════════════════════════════════════════════════════════════════════

import type { BackoffCalculator, RetryConfig } from './types.js';

type BackoffConfig = Pick<RetryConfig, 'initialDelayMs' | 'maxDelayMs' | 'jitter' | 'backoffMultiplier'>;

export class BackoffCalculatorImpl implements BackoffCalculator {
  constructor(
    private readonly config: BackoffConfig,
    private readonly random: () => number = Math.random
  ) {}

  calculate(attempt: number): number {
    // delay = initialDelay * multiplier^(attempt-1)
    const baseDelay = this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);

    return Math.min(this.applyJitter(baseDelay), this.config.maxDelayMs);
  }

  private applyJitter(delay: number): number {
    switch (this.config.jitter) {
      case 'none':
        return delay;
      case 'full':
        return this.random() * delay;
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format delay for logging.
 */
export function formatDelay(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}
