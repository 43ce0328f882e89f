// ═══════════════════════════════════════════════════════════════════════════════
// TOPIC TYPES — Stored Knowledge and Audit Records
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Stored knowledge for one sector. Absence of a topic is the valid
 * "unknown sector" state; a persisted topic always has `lastUpdate`.
 */
export interface Topic {
  /** Unique, case-sensitive */
  readonly sector: string;
  readonly content: string;
  /** Possibly empty */
  readonly furtherReading: string;
  readonly lastUpdate: Date;
}

/**
 * Fields written by a refresh. Creates the topic or overwrites all three.
 */
export interface TopicWrite {
  readonly content: string;
  readonly furtherReading: string;
  readonly lastUpdate: Date;
}

export interface UserProgress {
  readonly id: string;
  readonly sector: string;
  readonly lastStudyDate: Date;
  readonly performance: number;
  readonly notes: string;
}

export interface UserProgressInput {
  readonly sector: string;
  readonly performance: number;
  readonly notes?: string;
  /** Defaults to the time of recording */
  readonly lastStudyDate?: Date;
}

export interface SearchHistoryEntry {
  readonly id: string;
  readonly query: string;
  readonly timestamp: Date;
}
