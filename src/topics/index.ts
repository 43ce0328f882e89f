export type { Topic, TopicWrite, UserProgress, UserProgressInput, SearchHistoryEntry } from './types.js';
export { type TopicStore, KeyValueTopicStore } from './store.js';
export { ProgressStore, SearchHistoryStore } from './records.js';
export {
  needsRefresh,
  daysSinceUpdate,
  DEFAULT_STALENESS_WINDOW_DAYS,
  DEFAULT_STALENESS_WINDOW_MS,
} from './freshness.js';
