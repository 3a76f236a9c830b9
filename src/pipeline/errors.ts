/**
 * Pipeline error taxonomy.
 *
 *   FetchFailure      → one HTTP attempt failed; retried, then recorded on the
 *                       FetchResult. Never escapes the Fetcher.
 *   ExtractionSkip    → a document could not be parsed; logged, yields zero
 *                       fragments. Never escapes the Extractor.
 *   ResolverExhausted → not an exception: recorded as bundle.exhaustion with
 *                       status=incomplete (see types/bundle.ts).
 *   FatalConfigError  → the run cannot start (blank domain, no fallback
 *                       target set, unwritable output). Thrown before any
 *                       fetch begins; the CLI exits with code 2.
 */

import { ConfigError } from "../config/env.js";

export class FatalConfigError extends ConfigError {
  constructor(message: string) {
    super(message);
    this.name = "FatalConfigError";
  }
}

/**
 * transient → timeout, 5xx, 429, connection-level failure; worth retrying
 * permanent → any other 4xx, oversized body; retrying cannot help
 */
export type FailureKind = "transient" | "permanent";

export class FetchFailure extends Error {
  public readonly kind: FailureKind;
  public readonly httpStatus: number | null;
  /** Server-requested delay (Retry-After), when one was sent */
  public readonly retryAfterMs: number | null;

  constructor(
    message: string,
    kind: FailureKind,
    httpStatus: number | null = null,
    retryAfterMs: number | null = null
  ) {
    super(message);
    this.name = "FetchFailure";
    this.kind = kind;
    this.httpStatus = httpStatus;
    this.retryAfterMs = retryAfterMs;
  }
}

export class ExtractionSkip extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExtractionSkip";
  }
}
