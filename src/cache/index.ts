export { TtlCache } from './ttl-cache.js';
export { CacheKeys } from './keys.js';
