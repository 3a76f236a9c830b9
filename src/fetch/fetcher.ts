/**
 * Documentation fetcher.
 *
 * Produces exactly one FetchResult per target:
 *
 *   cache hit            → ok, attempts 0, fetchedAt = cache write time
 *   2xx                  → ok, body cached
 *   4xx (not 429)        → error immediately, no retry
 *   429 / 5xx / timeout /
 *   connection failure   → retried with exponential backoff + jitter, then
 *                          error once attempts run out
 *   run cancelled        → timeout when in flight, error when never started
 *
 * Concurrency is bounded twice: a per-host limiter (so one documentation
 * site never sees more than perHostLimit requests) wrapping a global pool
 * of `concurrency` slots. A task holds its host slot while it waits for a
 * global slot, never the other way round, so waiting on a busy host does
 * not starve other hosts of pool slots.
 */

import pLimit from "p-limit";
import type { FetchSettings, RetrySettings } from "../config/pipeline/schema.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import { FetchFailure } from "../pipeline/errors.js";
import type { FetchResult } from "../types/fetch.js";
import type { FetchTarget } from "../types/target.js";
import type { ContentCache } from "./cache.js";

/** Convenience alias describing the limiter returned by `p-limit`. */
type Limit = ReturnType<typeof pLimit>;

export type FetchImpl = (url: string, init: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface DocumentFetcherOptions {
  fetch: FetchSettings;
  retry: RetrySettings;
  /** Null or absent disables caching */
  cache?: ContentCache | null;
  logger?: Logger;
  /** HTTP implementation; defaults to the global fetch */
  fetchImpl?: FetchImpl;
  /** Backoff delay; defaults to an abortable setTimeout */
  sleep?: SleepFn;
  /** Jitter source in [0, 1) */
  random?: () => number;
  now?: () => Date;
}

interface FetchedBody {
  content: string;
  contentType: string | null;
  httpStatus: number;
}

/**
 * Resolve after `ms`, or reject with the signal's reason when it aborts first.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(value: string | null, now: Date): number | null {
  if (value === null || value.trim() === "") {
    return null;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.max(0, date - now.getTime());
}

/**
 * Backoff before retry number `attempt` (1 = the delay after the first
 * failure): base * factor^(attempt-1) + jitter, never below a server
 * Retry-After, never above maxDelayMs.
 */
export function computeBackoff(
  retry: RetrySettings,
  attempt: number,
  random: () => number,
  retryAfterMs: number | null = null
): number {
  const exponential = retry.baseDelayMs * Math.pow(retry.factor, attempt - 1);
  const jitter = Math.floor(random() * retry.jitterMs);
  const delay = Math.max(exponential + jitter, retryAfterMs ?? 0);
  return Math.min(delay, retry.maxDelayMs);
}

function hostOf(url: string): string {
  return new URL(url).host;
}

export class DocumentFetcher {
  private readonly settings: FetchSettings;
  private readonly retry: RetrySettings;
  private readonly cache: ContentCache | null;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchImpl;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly pool: Limit;
  private readonly hostLimiters = new Map<string, Limit>();

  constructor(options: DocumentFetcherOptions) {
    this.settings = options.fetch;
    this.retry = options.retry;
    this.cache = options.cache ?? null;
    this.logger = options.logger ?? createSilentLogger();
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? abortableSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.pool = pLimit(this.settings.concurrency);
  }

  /**
   * Fetch every target through the bounded pools. Results come back in
   * target order, but nothing downstream may rely on that.
   */
  async fetchAll(targets: readonly FetchTarget[], signal?: AbortSignal): Promise<FetchResult[]> {
    return Promise.all(
      targets.map((target) =>
        this.hostLimiter(target.url)(() => this.pool(() => this.fetchTarget(target, signal)))
      )
    );
  }

  /**
   * Fetch one target: cache first, then the network with retries.
   */
  async fetchTarget(target: FetchTarget, signal?: AbortSignal): Promise<FetchResult> {
    if (signal?.aborted) {
      return this.result(target, "error", { error: "Run cancelled before fetch started" });
    }

    const cached = await this.readCache(target.url);
    if (cached) {
      this.logger.debug("Cache hit", { url: target.url });
      return this.result(target, "ok", {
        content: cached.content,
        contentType: cached.contentType,
        httpStatus: cached.httpStatus,
        fetchedAt: cached.storedAt,
        fromCache: true,
      });
    }

    let lastFailure: FetchFailure | null = null;

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      try {
        const body = await this.attempt(target.url, signal);
        const fetchedAt = this.now().toISOString();
        await this.writeCache(target.url, body);
        this.logger.debug("Fetched", { url: target.url, attempt, status: body.httpStatus });
        return this.result(target, "ok", { ...body, fetchedAt, attempts: attempt });
      } catch (err) {
        if (signal?.aborted) {
          return this.result(target, "timeout", {
            attempts: attempt,
            error: "Run cancelled while request was in flight",
          });
        }
        if (!(err instanceof FetchFailure)) {
          throw err;
        }

        lastFailure = err;
        if (err.kind === "permanent") {
          this.logger.warn("Fetch failed permanently", { url: target.url, error: err.message });
          return this.result(target, "error", {
            attempts: attempt,
            httpStatus: err.httpStatus,
            error: err.message,
          });
        }

        if (attempt < this.retry.maxAttempts) {
          const delay = computeBackoff(this.retry, attempt, this.random, err.retryAfterMs);
          this.logger.warn("Transient fetch failure, retrying", {
            url: target.url,
            attempt,
            delayMs: delay,
            error: err.message,
          });
          try {
            await this.sleep(delay, signal);
          } catch (sleepErr) {
            if (!signal?.aborted) {
              throw sleepErr;
            }
            return this.result(target, "timeout", {
              attempts: attempt,
              error: "Run cancelled during retry backoff",
            });
          }
        }
      }
    }

    const detail = lastFailure?.message ?? "Unknown failure";
    this.logger.warn("Fetch gave up", { url: target.url, attempts: this.retry.maxAttempts, error: detail });
    return this.result(target, "error", {
      attempts: this.retry.maxAttempts,
      httpStatus: lastFailure?.httpStatus ?? null,
      error: `${detail} (gave up after ${this.retry.maxAttempts} attempts)`,
    });
  }

  private hostLimiter(url: string): Limit {
    const host = hostOf(url);
    let limiter = this.hostLimiters.get(host);
    if (!limiter) {
      limiter = pLimit(this.settings.perHostLimit);
      this.hostLimiters.set(host, limiter);
    }
    return limiter;
  }

  /**
   * One HTTP GET. Throws FetchFailure for anything short of a usable body;
   * rethrows as-is when the run signal aborted the request.
   */
  private async attempt(url: string, signal?: AbortSignal): Promise<FetchedBody> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.settings.timeoutMs);
    const onRunAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onRunAbort, { once: true });

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: "GET",
          headers: {
            "User-Agent": this.settings.userAgent,
            Accept: "text/html,text/markdown,text/plain;q=0.9,*/*;q=0.5",
          },
          redirect: "follow",
          signal: controller.signal,
        });
      } catch (err) {
        if (timedOut) {
          throw new FetchFailure(`Request timed out after ${this.settings.timeoutMs}ms`, "transient");
        }
        if (signal?.aborted) {
          throw err;
        }
        throw new FetchFailure(
          `Network error: ${err instanceof Error ? err.message : String(err)}`,
          "transient"
        );
      }

      if (!response.ok) {
        await this.discardBody(response, url);
        const message = `HTTP ${response.status}${response.statusText ? `: ${response.statusText}` : ""}`;
        if (response.status === 429 || response.status >= 500) {
          const retryAfter = parseRetryAfter(response.headers.get("retry-after"), this.now());
          throw new FetchFailure(message, "transient", response.status, retryAfter);
        }
        throw new FetchFailure(message, "permanent", response.status);
      }

      const content = await this.readBody(response, controller.signal, () => timedOut);
      return {
        content,
        contentType: response.headers.get("content-type"),
        httpStatus: response.status,
      };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onRunAbort);
    }
  }

  /**
   * Read the body, enforcing maxBodyBytes.
   */
  private async readBody(
    response: Response,
    signal: AbortSignal,
    timedOut: () => boolean
  ): Promise<string> {
    const limit = this.settings.maxBodyBytes;
    const declared = response.headers.get("content-length");
    if (declared !== null && Number(declared) > limit) {
      await this.discardBody(response, response.url);
      throw new FetchFailure(`Response too large: ${declared} bytes`, "permanent", response.status);
    }

    const reader = response.body?.getReader();
    if (!reader) {
      return "";
    }

    const chunks: Uint8Array[] = [];
    let total = 0;
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        total += value.byteLength;
        if (total > limit) {
          await reader.cancel();
          throw new FetchFailure(`Response exceeded ${limit} bytes`, "permanent", response.status);
        }
        chunks.push(value);
      }
    } catch (err) {
      if (err instanceof FetchFailure) {
        throw err;
      }
      if (timedOut()) {
        throw new FetchFailure(`Body read timed out after ${this.settings.timeoutMs}ms`, "transient");
      }
      if (signal.aborted) {
        throw err;
      }
      throw new FetchFailure(
        `Body read failed: ${err instanceof Error ? err.message : String(err)}`,
        "transient"
      );
    } finally {
      reader.releaseLock();
    }

    return new TextDecoder("utf-8").decode(Buffer.concat(chunks));
  }

  private async discardBody(response: Response, url: string): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (err) {
      this.logger.debug("Discarding response body failed", { url, error: String(err) });
    }
  }

  private async readCache(url: string): Promise<{
    content: string;
    contentType: string | null;
    httpStatus: number;
    storedAt: string;
  } | null> {
    if (!this.cache) {
      return null;
    }
    return this.cache.get(url);
  }

  private async writeCache(url: string, body: FetchedBody): Promise<void> {
    if (!this.cache) {
      return;
    }
    try {
      await this.cache.set({ url, ...body });
    } catch (err) {
      this.logger.warn("Cache write failed", { url, error: String(err) });
    }
  }

  private result(
    target: FetchTarget,
    status: FetchResult["status"],
    fields: Partial<Omit<FetchResult, "target" | "status">>
  ): FetchResult {
    return Object.freeze({
      target,
      status,
      content: fields.content ?? null,
      contentType: fields.contentType ?? null,
      httpStatus: fields.httpStatus ?? null,
      fetchedAt: fields.fetchedAt ?? this.now().toISOString(),
      attempts: fields.attempts ?? 0,
      error: fields.error ?? null,
      fromCache: fields.fromCache ?? false,
    });
  }
}
