/**
 * Documentation research pipeline.
 *
 * Resolves the reference documentation a project needs, fetches and
 * mines it for code patterns and gotchas, scores coverage per category
 * and writes a research bundle that downstream tools gate on.
 *
 * Usage:
 *   import { createResearchRequest, loadTargetCatalog, pipelineConfigFromEnv, runResearch } from "doc-research-pipeline";
 *
 *   const outcome = await runResearch(createResearchRequest("contact-manager", "simple_crud"), {
 *     config: pipelineConfigFromEnv(),
 *     catalog: loadTargetCatalog(),
 *     outputDir: "output/bundle",
 *   });
 */

export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./types/index.js";
export * from "./targets/index.js";
export * from "./fetch/index.js";
export * from "./extract/index.js";
export * from "./aggregate/index.js";
export * from "./coverage/index.js";
export * from "./bundle/index.js";
export * from "./pipeline/index.js";
