/**
 * URL content cache.
 *
 * One JSON file per URL under the cache directory, named by a SHA-256 of
 * the URL. Entries are immutable once written: a write goes to a unique
 * temp file that is renamed over the final name, so two workers storing
 * the same URL at once both succeed and the survivor is a complete entry.
 * No lock is taken.
 *
 * Only successful fetches are cached. Expired, corrupt or mismatched
 * entries read as misses.
 */

import { createHash, randomBytes } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { createSilentLogger, type Logger } from "../logging/index.js";

export const CacheEntrySchema = z
  .object({
    url: z.string().min(1),
    content: z.string(),
    contentType: z.string().nullable(),
    httpStatus: z.number().int(),
    /** ISO timestamp of the write; becomes FetchResult.fetchedAt on a hit */
    storedAt: z.string().datetime(),
  })
  .strict();

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

export interface ContentCacheOptions {
  directory: string;
  ttlMs: number;
  logger?: Logger;
  now?: () => Date;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export class ContentCache {
  private readonly directory: string;
  private readonly ttlMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ContentCacheOptions) {
    this.directory = options.directory;
    this.ttlMs = options.ttlMs;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
  }

  /** Cache key for a URL (first 32 hex characters of its SHA-256). */
  keyFor(url: string): string {
    return createHash("sha256").update(url, "utf-8").digest("hex").slice(0, 32);
  }

  pathFor(url: string): string {
    return join(this.directory, `${this.keyFor(url)}.json`);
  }

  /**
   * Look up a fresh entry for the URL.
   *
   * @returns the entry, or null on a miss (absent, expired, unreadable)
   */
  async get(url: string): Promise<CacheEntry | null> {
    const path = this.pathFor(url);

    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        return null;
      }
      this.logger.warn("Cache read failed, treating as miss", { url, error: String(err) });
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.warn("Corrupt cache entry ignored", { url, error: String(err) });
      return null;
    }

    const result = CacheEntrySchema.safeParse(parsed);
    if (!result.success || result.data.url !== url) {
      this.logger.warn("Cache entry does not match schema or URL, ignored", { url, path });
      return null;
    }

    const age = this.now().getTime() - Date.parse(result.data.storedAt);
    if (age > this.ttlMs) {
      this.logger.debug("Cache entry expired", { url, ageMs: age });
      return null;
    }

    return result.data;
  }

  /**
   * Store a fetched document. storedAt is stamped here.
   */
  async set(entry: Omit<CacheEntry, "storedAt">): Promise<CacheEntry> {
    const stored: CacheEntry = { ...entry, storedAt: this.now().toISOString() };
    const finalPath = this.pathFor(entry.url);
    const tempPath = `${finalPath}.${randomBytes(4).toString("hex")}.tmp`;

    await mkdir(this.directory, { recursive: true });
    try {
      await writeFile(tempPath, JSON.stringify(stored), "utf-8");
      await rename(tempPath, finalPath);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw err;
    }

    return stored;
  }
}
