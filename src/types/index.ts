/**
 * Shared type foundations for the documentation research pipeline.
 */

export * from "./target.js";
export * from "./fetch.js";
export * from "./extraction.js";
export * from "./coverage.js";
export * from "./bundle.js";
