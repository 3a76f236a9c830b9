/**
 * Fetch result definitions.
 */

import type { FetchTarget } from "./target.js";

/**
 * ok      → content retrieved (network or cache)
 * error   → permanent failure, or transient failures until attempts ran out
 * timeout → aborted by run cancellation while in flight
 */
export type FetchStatus = "ok" | "error" | "timeout";

export interface FetchResult {
  readonly target: FetchTarget;
  readonly status: FetchStatus;
  /** Response body, null unless status is ok */
  readonly content: string | null;
  readonly contentType: string | null;
  readonly httpStatus: number | null;
  /** ISO timestamp of the response, or of the cache write for cache hits */
  readonly fetchedAt: string;
  /** Network attempts made; 0 for cache hits and never-started targets */
  readonly attempts: number;
  readonly error: string | null;
  readonly fromCache: boolean;
}
