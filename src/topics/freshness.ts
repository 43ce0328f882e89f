// ═══════════════════════════════════════════════════════════════════════════════
// FRESHNESS POLICY — When a Stored Topic Must Be Refreshed
// ═══════════════════════════════════════════════════════════════════════════════

import type { Topic } from './types.js';

export const DEFAULT_STALENESS_WINDOW_DAYS = 7;

export const DEFAULT_STALENESS_WINDOW_MS = DEFAULT_STALENESS_WINDOW_DAYS * 24 * 60 * 60 * 1000;

/**
 * True when the topic is absent or older than `windowMs`.
 * A topic exactly `windowMs` old is still fresh.
 */
export function needsRefresh(
  topic: Pick<Topic, 'lastUpdate'> | null,
  now: Date,
  windowMs: number = DEFAULT_STALENESS_WINDOW_MS
): boolean {
  if (topic === null) return true;
  return now.getTime() - topic.lastUpdate.getTime() > windowMs;
}

/**
 * Days elapsed since the last update, clamped at zero.
 */
export function daysSinceUpdate(topic: Pick<Topic, 'lastUpdate'>, now: Date): number {
  const elapsedMs = now.getTime() - topic.lastUpdate.getTime();
  return Math.max(0, elapsedMs / (24 * 60 * 60 * 1000));
}
