// ═══════════════════════════════════════════════════════════════════════════════
// RETRY TESTS — Backoff and Retry Policy
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  BackoffCalculatorImpl,
  RetryPolicyImpl,
  formatDelay,
  isRetryableError,
} from '../infrastructure/retry/index.js';
import { MalformedResponse, TransportFailure } from '../types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// BACKOFF
// ─────────────────────────────────────────────────────────────────────────────────

describe('BackoffCalculatorImpl', () => {
  const base = {
    initialDelayMs: 100,
    maxDelayMs: 350,
    backoffMultiplier: 2,
  };

  it('should grow exponentially and cap at the maximum', () => {
    const backoff = new BackoffCalculatorImpl({ ...base, jitter: 'none' });

    expect(backoff.calculate(1)).toBe(100);
    expect(backoff.calculate(2)).toBe(200);
    expect(backoff.calculate(3)).toBe(350);
  });

  it('should apply full jitter from the random source', () => {
    const full = new BackoffCalculatorImpl({ ...base, jitter: 'full' }, () => 0.25);

    expect(full.calculate(1)).toBe(25);
    expect(full.calculate(2)).toBe(50);
  });
});

describe('formatDelay', () => {
  it('should format milliseconds and seconds', () => {
    expect(formatDelay(250.4)).toBe('250ms');
    expect(formatDelay(1500)).toBe('1.5s');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// RETRYABILITY
// ─────────────────────────────────────────────────────────────────────────────────

describe('isRetryableError', () => {
  it('should follow the transport failure verdict', () => {
    expect(isRetryableError(new TransportFailure('busy', { status: 503, retryable: true }))).toBe(true);
    expect(isRetryableError(new TransportFailure('gone', { status: 404, retryable: false }))).toBe(false);
  });

  it('should never retry malformed payloads', () => {
    expect(isRetryableError(new MalformedResponse('bad body'))).toBe(false);
  });

  it('should retry unknown errors', () => {
    expect(isRetryableError(new Error('socket hang up'))).toBe(true);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// POLICY
// ─────────────────────────────────────────────────────────────────────────────────

describe('RetryPolicyImpl', () => {
  function policy(maxRetries: number, delays: number[]): RetryPolicyImpl {
    return new RetryPolicyImpl(
      { maxRetries, initialDelayMs: 10, jitter: 'none' },
      async (ms) => {
        delays.push(ms);
      }
    );
  }

  it('should return the first success without waiting', async () => {
    const delays: number[] = [];

    const result = await policy(3, delays).executeWithResult(async () => 'done');

    expect(result).toMatchObject({ success: true, value: 'done', attempts: 1 });
    expect(delays).toEqual([]);
  });

  it('should make maxRetries attempts after the first', async () => {
    const delays: number[] = [];
    let calls = 0;

    const result = await policy(2, delays).executeWithResult(async () => {
      calls++;
      throw new Error(`failure ${calls}`);
    });

    expect(calls).toBe(3);
    expect(result.attempts).toBe(3);
    if (result.success) throw new Error('expected failure');
    expect(result.error.message).toBe('failure 3');
    expect(result.allErrors).toHaveLength(3);
    expect(delays).toEqual([10, 20]);
  });

  it('should succeed after a transient failure', async () => {
    const delays: number[] = [];
    let calls = 0;

    const result = await policy(2, delays).executeWithResult(async () => {
      calls++;
      if (calls === 1) throw new TransportFailure('busy', { status: 503, retryable: true });
      return calls;
    });

    expect(result).toMatchObject({ success: true, value: 2, attempts: 2 });
  });

  it('should stop at a non-retryable error', async () => {
    const delays: number[] = [];
    let calls = 0;

    const result = await policy(5, delays).executeWithResult(async () => {
      calls++;
      throw new MalformedResponse('bad body');
    });

    expect(calls).toBe(1);
    expect(result.success).toBe(false);
  });

  it('should make a single attempt when maxRetries is 0', async () => {
    const delays: number[] = [];
    let calls = 0;

    const result = await policy(0, delays).executeWithResult(async () => {
      calls++;
      throw new TransportFailure('busy', { status: 503, retryable: true });
    });

    expect(calls).toBe(1);
    expect(result.attempts).toBe(1);
    expect(delays).toEqual([]);
  });

  it('should default to one retry', () => {
    expect(new RetryPolicyImpl().getConfig().maxRetries).toBe(1);
  });
});
