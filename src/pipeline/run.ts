/**
 * Research run orchestration.
 *
 *   resolve → fetch → extract → aggregate → validate
 *                 ↑                              │ incomplete
 *                 └── resolve supplemental ◄─────┘ (bounded)
 *   → write bundle
 *
 * One controller per run: the caller's signal and the run timeout both
 * abort it. Cancellation keeps every result collected so far, skips any
 * further supplemental pass and still validates and writes the bundle.
 *
 * Fatal problems (blank domain, no core-framework targets, unwritable
 * output directory) throw FatalConfigError before the first fetch.
 */

import { aggregateFragments } from "../aggregate/aggregator.js";
import type { Category } from "../config/pipeline/enums.js";
import { deepFreeze } from "../config/pipeline/loader.js";
import type { PipelineConfig } from "../config/pipeline/schema.js";
import { validateCoverage } from "../coverage/validator.js";
import { ensureWritableDirectory, writeBundle, type BundleArtifacts } from "../bundle/writer.js";
import { extractAll } from "../extract/extractor.js";
import { ContentCache } from "../fetch/cache.js";
import { DocumentFetcher } from "../fetch/fetcher.js";
import { createSilentLogger, generateRunId, type Logger } from "../logging/index.js";
import type { TargetCatalog } from "../targets/catalog.js";
import { resolveSupplementalTargets, resolveTargets } from "../targets/resolver.js";
import type { PassRecord, ResearchBundle, ResolverExhaustion } from "../types/bundle.js";
import type { CoverageReport } from "../types/coverage.js";
import type { DocumentExtraction } from "../types/extraction.js";
import type { FetchResult } from "../types/fetch.js";
import type { FetchTarget, ResearchRequest } from "../types/target.js";

export interface RunResearchOptions {
  config: Readonly<PipelineConfig>;
  catalog: TargetCatalog;
  /** Directory the bundle is written to */
  outputDir: string;
  logger?: Logger;
  /** Defaults to a fetcher built from config, with the URL cache when enabled */
  fetcher?: DocumentFetcher;
  /** Caller cancellation */
  signal?: AbortSignal;
  /** Defaults to a fresh ID for every call */
  runId?: string;
  now?: () => Date;
}

/**
 * 0 → complete bundle written
 * 1 → incomplete bundle written
 * (fatal configuration errors throw; the CLI maps them to 2)
 */
export type RunExitCode = 0 | 1;

export interface ResearchOutcome {
  readonly bundle: ResearchBundle;
  readonly exitCode: RunExitCode;
  readonly artifacts: BundleArtifacts;
}

function categoryScores(report: CoverageReport): Record<Category, number> {
  const scores: Record<Category, number> = {
    "core-framework": 0,
    integration: 0,
    "pattern-specific": 0,
  };
  for (const c of report.categories) {
    scores[c.category] = c.score;
  }
  return scores;
}

/**
 * Build the fetcher a run uses when the caller does not supply one.
 */
export function createFetcher(config: Readonly<PipelineConfig>, logger: Logger): DocumentFetcher {
  const cache = config.cache.enabled
    ? new ContentCache({
        directory: config.cache.directory,
        ttlMs: config.cache.ttlMs,
        logger: logger.child("cache"),
      })
    : null;
  return new DocumentFetcher({
    fetch: config.fetch,
    retry: config.retry,
    cache,
    logger: logger.child("fetch"),
  });
}

/**
 * Run the research pipeline for one request and write its bundle.
 *
 * @throws FatalConfigError before any fetch when the run cannot start
 */
export async function runResearch(
  request: ResearchRequest,
  options: RunResearchOptions
): Promise<ResearchOutcome> {
  const { config, catalog } = options;
  const now = options.now ?? (() => new Date());
  const runId = options.runId ?? generateRunId(now());
  const logger = options.logger ?? createSilentLogger();
  const log = logger.child("pipeline");

  const initialTargets = resolveTargets(request, catalog);
  ensureWritableDirectory(options.outputDir);

  const fetcher = options.fetcher ?? createFetcher(config, logger);
  const extractLogger = logger.child("extract");

  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new Error(`Run exceeded ${config.runTimeoutMs}ms`)),
    config.runTimeoutMs
  );
  const onCancel = (): void => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    controller.abort(options.signal.reason);
  } else {
    options.signal?.addEventListener("abort", onCancel, { once: true });
  }

  const targets: FetchTarget[] = [];
  const results: FetchResult[] = [];
  const extractions: DocumentExtraction[] = [];
  const passes: PassRecord[] = [];

  const runPass = async (batch: readonly FetchTarget[], pass: number): Promise<CoverageReport> => {
    log.info("Starting pass", { pass, targets: batch.length });
    const fetched = await fetcher.fetchAll(batch, controller.signal);
    targets.push(...batch);
    results.push(...fetched);
    extractions.push(...extractAll(fetched, extractLogger));

    const fragments = aggregateFragments(targets, results, extractions);
    const report = validateCoverage(targets, fragments, config.coverage);
    passes.push({
      pass,
      targetsAdded: batch.length,
      overallScore: report.overallScore,
      categoryScores: categoryScores(report),
    });
    log.info("Pass scored", {
      pass,
      overallScore: report.overallScore,
      status: report.status,
      underCovered: report.underCovered,
      droppedFragments: fragments.dropped,
    });
    return report;
  };

  const runPasses = async (): Promise<{
    report: CoverageReport;
    exhaustion: ResolverExhaustion | null;
  }> => {
    let report = await runPass(initialTargets, 0);
    let pass = 0;
    while (report.status === "incomplete" && !controller.signal.aborted) {
      if (pass >= config.coverage.maxSupplementalPasses) {
        return {
          report,
          exhaustion: { passes: pass, missingCategories: report.underCovered, reason: "bound" },
        };
      }
      const extra = resolveSupplementalTargets(request, catalog, {
        underCovered: report.underCovered,
        resolvedUrls: new Set(targets.map((t) => t.url)),
        pass: pass + 1,
        batchSize: config.coverage.supplementalBatchSize,
      });
      if (extra.length === 0) {
        return {
          report,
          exhaustion: { passes: pass, missingCategories: report.underCovered, reason: "no-targets" },
        };
      }
      pass++;
      report = await runPass(extra, pass);
    }
    return { report, exhaustion: null };
  };

  const { report, exhaustion } = await runPasses().finally(() => {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onCancel);
  });

  const cancelled = controller.signal.aborted;
  if (cancelled) {
    log.warn("Run cancelled; bundle reflects results collected so far", {
      reason: String(controller.signal.reason),
    });
  }
  if (exhaustion) {
    log.warn("Supplemental passes exhausted", {
      reason: exhaustion.reason,
      passes: exhaustion.passes,
      missingCategories: exhaustion.missingCategories,
    });
  }

  const fragments = aggregateFragments(targets, results, extractions);
  const bundle = deepFreeze<ResearchBundle>({
    runId,
    request,
    createdAt: now().toISOString(),
    targets,
    fetchResults: results,
    patterns: fragments.patterns,
    gotchas: fragments.gotchas,
    coverage: report,
    overallScore: report.overallScore,
    status: report.status,
    passes,
    exhaustion,
    cancelled,
  });

  const artifacts = writeBundle(bundle, options.outputDir, config.coverage);
  const exitCode: RunExitCode = bundle.status === "complete" ? 0 : 1;

  log.info("Bundle written", {
    directory: artifacts.directory,
    status: bundle.status,
    overallScore: bundle.overallScore,
    passes: passes.length,
  });
  if (bundle.status === "incomplete") {
    for (const reason of report.reasons) {
      log.warn(reason);
    }
  }

  return { bundle, exitCode, artifacts };
}
