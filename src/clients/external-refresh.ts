// ═══════════════════════════════════════════════════════════════════════════════
// EXTERNAL REFRESH CLIENT — Current Content for a Sector
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import type { AsyncResult } from '../types/result.js';
import type { ClientError } from '../types/errors.js';
import { JsonSource, type JsonSourceOptions } from './http.js';

/**
 * Unknown fields are kept so the cached payload matches what was received.
 */
export const RefreshPayloadSchema = z.object({
  content: z.string(),
  further_reading: z.string().nullable().optional(),
}).passthrough();

export type RefreshPayload = z.infer<typeof RefreshPayloadSchema>;

export interface ExternalRefreshClient {
  fetch(sector: string): AsyncResult<RefreshPayload, ClientError>;
}

export class HttpExternalRefreshClient implements ExternalRefreshClient {
  private readonly source: JsonSource;

  constructor(options: Omit<JsonSourceOptions, 'name'>) {
    this.source = new JsonSource({ name: 'external refresh source', ...options });
  }

  fetch(sector: string): AsyncResult<RefreshPayload, ClientError> {
    return this.source.get(sector, RefreshPayloadSchema);
  }
}
