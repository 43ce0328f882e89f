// ═══════════════════════════════════════════════════════════════════════════════
// ENRICHMENT CLIENT — Academic Resource Summaries for a Sector
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import type { AsyncResult } from '../types/result.js';
import type { ClientError } from '../types/errors.js';
import { JsonSource, type JsonSourceOptions } from './http.js';

export const EnrichmentItemSchema = z.object({
  summary: z.string(),
}).passthrough();

/** Order is significant: summaries are appended as received */
export const EnrichmentPayloadSchema = z.array(EnrichmentItemSchema);

export type EnrichmentItem = z.infer<typeof EnrichmentItemSchema>;

export interface EnrichmentClient {
  fetch(sector: string): AsyncResult<EnrichmentItem[], ClientError>;
}

export class HttpEnrichmentClient implements EnrichmentClient {
  private readonly source: JsonSource;

  constructor(options: Omit<JsonSourceOptions, 'name'>) {
    this.source = new JsonSource({ name: 'academic resources source', ...options });
  }

  fetch(sector: string): AsyncResult<EnrichmentItem[], ClientError> {
    return this.source.get(sector, EnrichmentPayloadSchema);
  }
}
