// ═══════════════════════════════════════════════════════════════════════════════
// CACHE KEYS — Purpose-Namespaced Keys
// ═══════════════════════════════════════════════════════════════════════════════

export const CacheKeys = {
  /** Last payload fetched from the external refresh source */
  api: (sector: string): string => `api_${sector}`,

  /** Enrichment items fetched from the academic resources source */
  academic: (sector: string): string => `academic_${sector}`,
} as const;
