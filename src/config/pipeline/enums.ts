/**
 * Domain enumerations for the documentation research pipeline.
 *
 * Every category, priority and signal the pipeline reasons about is a
 * member of one of these enums. Resolver tables, coverage requirements
 * and the bundle layout are all keyed on them, so adding a member here
 * means updating those tables too (the compiler will point at them).
 */

import { z } from "zod";

/**
 * Architecture patterns a research request can name.
 *
 * "unknown" is a real member rather than an error: requests whose pattern
 * cannot be recognized still resolve to the core-framework target set.
 */
export const ArchitecturePattern = z.enum([
  "social_platform",
  "e_commerce",
  "content_management",
  "dashboard_analytics",
  "simple_crud",
  "unknown",
]);
export type ArchitecturePattern = z.infer<typeof ArchitecturePattern>;

/**
 * Logical grouping of documentation used for coverage scoring.
 *
 *   core-framework   → the framework's own building blocks (data, auth, storage)
 *   integration      → services wired into the framework (realtime, payments, ...)
 *   pattern-specific → guidance particular to one architecture pattern
 */
export const Category = z.enum([
  "core-framework",
  "integration",
  "pattern-specific",
]);
export type Category = z.infer<typeof Category>;

/**
 * Fetch priority tiers, strongest first.
 */
export const Priority = z.enum(["critical", "important", "supplementary"]);
export type Priority = z.infer<typeof Priority>;

/** Coverage weight of each priority tier. */
export const PRIORITY_WEIGHT: Readonly<Record<Priority, number>> = {
  critical: 3,
  important: 2,
  supplementary: 1,
};

/** Lower rank = stronger tier. */
export const PRIORITY_RANK: Readonly<Record<Priority, number>> = {
  critical: 0,
  important: 1,
  supplementary: 2,
};

/**
 * Sub-area of the framework a documentation page covers.
 */
export const DocArea = z.enum([
  "data",
  "auth",
  "storage",
  "functions",
  "realtime",
  "media",
  "payments",
  "search",
  "content",
  "analytics",
  "ui",
  "hosting",
  "general",
]);
export type DocArea = z.infer<typeof DocArea>;

/**
 * Sub-areas every core-framework research bundle must cover.
 */
export const CORE_AREAS: readonly DocArea[] = ["data", "auth", "storage"];

/**
 * Kinds of evidence the completeness validator looks for.
 */
export const SignalKind = z.enum(["has-pattern", "has-gotcha", "has-example"]);
export type SignalKind = z.infer<typeof SignalKind>;
