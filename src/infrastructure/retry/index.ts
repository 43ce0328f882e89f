// ═══════════════════════════════════════════════════════════════════════════════
// RETRY MODULE INDEX — Retry Policy Exports
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type JitterType,
  type RetryConfig,
  DEFAULT_RETRY_CONFIG,
  type RetryResult,
  type RetryPolicy,
  type BackoffCalculator,
} from './types.js';

export {
  BackoffCalculatorImpl,
  sleep,
  formatDelay,
} from './backoff.js';

export {
  isRetryableError,
  RetryPolicyImpl,
} from './policy.js';
