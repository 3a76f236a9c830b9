/**
 * Target catalog schema and loader.
 *
 * The catalog is the URL lookup data behind the Target Resolver: the
 * core-framework pages every run needs, the pages each architecture
 * pattern adds, and a supplemental pool drawn on when coverage falls
 * short. It lives in config/target-catalog.json so that documentation
 * moves can be fixed without touching code.
 *
 * Priorities are NOT part of the catalog; they come from the resolver's
 * pattern lookup table.
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { ArchitecturePattern, Category, DocArea } from "../config/pipeline/enums.js";

/** Default catalog location, relative to the working directory. */
export const DEFAULT_CATALOG_PATH = "config/target-catalog.json";

const HttpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//.test(value), { message: "URL must use http or https" });

export const CoreEntrySchema = z
  .object({
    url: HttpUrl,
    area: DocArea,
  })
  .strict();

export const PatternEntrySchema = z
  .object({
    url: HttpUrl,
    category: Category,
    area: DocArea,
  })
  .strict();

export const SupplementalEntrySchema = z
  .object({
    url: HttpUrl,
    category: Category,
    area: DocArea,
    /** Restrict the entry to these patterns; absent = every pattern */
    patterns: z.array(ArchitecturePattern).min(1).optional(),
  })
  .strict();

export const TargetCatalogSchema = z
  .object({
    version: z.string().regex(/^\d+\.\d+\.\d+$/),
    /** Documentation set the catalog describes (informational) */
    framework: z.string().min(1),
    core: z.array(CoreEntrySchema),
    patterns: z.record(ArchitecturePattern, z.array(PatternEntrySchema)),
    supplemental: z.array(SupplementalEntrySchema),
  })
  .strict();

export type CoreEntry = z.infer<typeof CoreEntrySchema>;
export type PatternEntry = z.infer<typeof PatternEntrySchema>;
export type SupplementalEntry = z.infer<typeof SupplementalEntrySchema>;
export type TargetCatalog = z.infer<typeof TargetCatalogSchema>;

/**
 * Catalog file could not be read or failed validation.
 */
export class CatalogError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "CatalogError";
    this.issues = issues;
  }

  format(): string {
    return [this.message, ...this.issues.map((issue) => `  - ${issue}`)].join("\n");
  }
}

/**
 * Validate a raw catalog object.
 *
 * @throws CatalogError listing every schema issue
 */
export function parseTargetCatalog(input: unknown): TargetCatalog {
  const result = TargetCatalogSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
    );
    throw new CatalogError(`Invalid target catalog: ${issues.length} validation error(s)`, issues);
  }
  return result.data;
}

/**
 * Read and validate a catalog file.
 *
 * @param path - Catalog JSON path (default: config/target-catalog.json)
 * @throws CatalogError if the file is missing, not JSON, or invalid
 */
export function loadTargetCatalog(path: string = DEFAULT_CATALOG_PATH): TargetCatalog {
  const fullPath = resolve(path);
  let raw: string;
  try {
    raw = readFileSync(fullPath, "utf-8");
  } catch (err) {
    throw new CatalogError(
      `Failed to read target catalog ${fullPath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CatalogError(
      `Target catalog ${fullPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseTargetCatalog(parsed);
}
