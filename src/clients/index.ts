export { JsonSource, type JsonSourceOptions, type FetchLike } from './http.js';
export {
  HttpExternalRefreshClient,
  RefreshPayloadSchema,
  type ExternalRefreshClient,
  type RefreshPayload,
} from './external-refresh.js';
export {
  HttpEnrichmentClient,
  EnrichmentItemSchema,
  EnrichmentPayloadSchema,
  type EnrichmentClient,
  type EnrichmentItem,
} from './enrichment.js';
