// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN — Graceful Shutdown Coordinator
// ═══════════════════════════════════════════════════════════════════════════════
//
// - Signal handlers (SIGTERM, SIGINT)
// - Prioritized hooks, higher priority first
// - One failing hook does not stop the others
// - Global timeout
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type ShutdownPriority =
  | 'critical'    // Stop accepting requests
  | 'high'        // Close connections
  | 'normal';

const PRIORITY_VALUES: Record<ShutdownPriority, number> = {
  critical: 100,
  high: 75,
  normal: 50,
};

export type ShutdownHookFn = () => Promise<void> | void;

export interface ShutdownConfig {
  readonly timeoutMs: number;
  readonly signals: NodeJS.Signals[];
  /** Replaced in tests; defaults to process.exit */
  readonly exit: (code: number) => void;
}

export interface ShutdownResult {
  readonly success: boolean;
  readonly totalDurationMs: number;
  readonly failed: string[];
  readonly timedOut: boolean;
}

export const DEFAULT_SHUTDOWN_CONFIG: ShutdownConfig = {
  timeoutMs: 10_000,
  signals: ['SIGTERM', 'SIGINT'],
  exit: (code) => process.exit(code),
};

interface RegisteredHook {
  readonly name: string;
  readonly fn: ShutdownHookFn;
  readonly priority: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// COORDINATOR
// ─────────────────────────────────────────────────────────────────────────────────

export class ShutdownCoordinator {
  private readonly config: ShutdownConfig;
  private readonly hooks: RegisteredHook[] = [];
  private shutdownPromise: Promise<ShutdownResult> | null = null;

  constructor(config: Partial<ShutdownConfig> = {}) {
    this.config = { ...DEFAULT_SHUTDOWN_CONFIG, ...config };
  }

  get isShuttingDown(): boolean {
    return this.shutdownPromise !== null;
  }

  register(name: string, fn: ShutdownHookFn, priority: ShutdownPriority = 'normal'): void {
    this.hooks.push({ name, fn, priority: PRIORITY_VALUES[priority] });
  }

  /**
   * Exit with 0 after a clean shutdown, 1 otherwise.
   */
  installSignalHandlers(): void {
    const logger = getLogger({ component: 'shutdown' });

    for (const signal of this.config.signals) {
      process.once(signal, () => {
        logger.info('Received shutdown signal', { signal });
        this.shutdown(signal)
          .then(result => this.config.exit(result.success ? 0 : 1))
          .catch((error: unknown) => {
            logger.fatal('Shutdown failed', error);
            this.config.exit(1);
          });
      });
    }
  }

  /**
   * Run every hook once. Repeated calls share the first run.
   */
  shutdown(reason = 'manual'): Promise<ShutdownResult> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.perform(reason);
    }
    return this.shutdownPromise;
  }

  private async perform(reason: string): Promise<ShutdownResult> {
    const logger = getLogger({ component: 'shutdown' });
    const startedAt = Date.now();
    logger.info('Starting graceful shutdown', { reason, timeoutMs: this.config.timeoutMs });

    const failed: string[] = [];
    const ordered = [...this.hooks].sort((a, b) => b.priority - a.priority);

    const runHooks = async (): Promise<'done'> => {
      for (const hook of ordered) {
        try {
          await hook.fn();
          logger.debug('Shutdown hook completed', { hook: hook.name });
        } catch (error) {
          failed.push(hook.name);
          logger.error('Shutdown hook failed', error, { hook: hook.name });
        }
      }
      return 'done';
    };

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), this.config.timeoutMs);
    });

    const outcome = await Promise.race([runHooks(), timeout]);
    clearTimeout(timer);

    const result: ShutdownResult = {
      success: outcome === 'done' && failed.length === 0,
      totalDurationMs: Date.now() - startedAt,
      failed,
      timedOut: outcome === 'timeout',
    };

    if (result.timedOut) {
      logger.error('Shutdown timed out', undefined, { timeoutMs: this.config.timeoutMs });
    } else if (result.success) {
      logger.info('Graceful shutdown completed', { totalDurationMs: result.totalDurationMs });
    } else {
      logger.warn('Shutdown completed with failures', { failed });
    }

    return result;
  }
}
