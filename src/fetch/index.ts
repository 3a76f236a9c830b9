/**
 * Documentation fetching: bounded, retrying HTTP client plus URL cache.
 */

export {
  DocumentFetcher,
  abortableSleep,
  computeBackoff,
  parseRetryAfter,
  type DocumentFetcherOptions,
  type FetchImpl,
  type SleepFn,
} from "./fetcher.js";

export { ContentCache, CacheEntrySchema, type CacheEntry, type ContentCacheOptions } from "./cache.js";
