// ═══════════════════════════════════════════════════════════════════════════════
// JSON SOURCE — Sector-Parameterized JSON GET with Timeout and Retry
// ═══════════════════════════════════════════════════════════════════════════════
//
// GET <url>?sector=<sector>, bounded by a per-attempt timeout, retried with
// backoff for retryable transport failures. Never throws: every outcome is a
// Result.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { ZodType, ZodTypeDef } from 'zod';
import { RetryPolicyImpl } from '../infrastructure/retry/index.js';
import { loggers } from '../observability/logging/index.js';
import { ok, err, type AsyncResult } from '../types/result.js';
import {
  MalformedResponse,
  TransportFailure,
  errorMessage,
  type ClientError,
} from '../types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface JsonSourceOptions {
  /** Used in log lines and error messages */
  readonly name: string;
  /** Unset means the source is not configured and every call fails */
  readonly url?: string;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly fetchImpl?: FetchLike;
  /** Replaces the backoff sleep (tests) */
  readonly wait?: (ms: number) => Promise<void>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// JSON SOURCE
// ─────────────────────────────────────────────────────────────────────────────────

export class JsonSource {
  private readonly fetchImpl: FetchLike;
  private readonly retryPolicy: RetryPolicyImpl;

  constructor(private readonly options: JsonSourceOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.retryPolicy = new RetryPolicyImpl(
      { maxRetries: options.maxRetries },
      options.wait
    );
  }

  async get<T>(sector: string, schema: ZodType<T, ZodTypeDef, unknown>): AsyncResult<T, ClientError> {
    const { name, url } = this.options;
    if (url === undefined) {
      return err(new TransportFailure(`${name} URL is not configured`, { retryable: false }));
    }

    const target = new URL(url);
    target.searchParams.set('sector', sector);

    const result = await this.retryPolicy.executeWithResult(() => this.attempt(target.toString(), schema));
    if (result.success) {
      loggers.clients.debug('Source responded', { source: name, sector, attempts: result.attempts });
      return ok(result.value);
    }

    const error = result.error;
    if (error instanceof TransportFailure || error instanceof MalformedResponse) {
      return err(error);
    }
    return err(new TransportFailure(`${name} request failed: ${error.message}`, { cause: error }));
  }

  /**
   * One request. Throws ClientError so the retry policy can classify it.
   */
  private async attempt<T>(url: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    const { name, timeoutMs } = this.options;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let body: string;
    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });

      if (!response.ok) {
        // Release the connection; the error body is not used
        await response.body?.cancel();
        throw new TransportFailure(`${name} responded with HTTP ${response.status}`, {
          status: response.status,
          context: { url },
        });
      }

      body = await response.text();
    } catch (error) {
      if (error instanceof TransportFailure) throw error;
      if (controller.signal.aborted) {
        throw new TransportFailure(`${name} timed out after ${timeoutMs}ms`, { cause: error, context: { url } });
      }
      throw new TransportFailure(`${name} request failed: ${errorMessage(error)}`, { cause: error, context: { url } });
    } finally {
      clearTimeout(timeoutId);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      throw new MalformedResponse(`${name} returned a non-JSON body`, { cause: error, context: { url } });
    }

    const validated = schema.safeParse(parsed);
    if (!validated.success) {
      throw new MalformedResponse(`${name} returned an unexpected payload`, {
        cause: validated.error,
        context: { url, issues: validated.error.issues.map(issue => issue.message) },
      });
    }
    return validated.data;
  }
}
