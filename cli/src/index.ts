/**
 * Main entry point for treecrawl
 */

export * from "@treecrawl/types";
export * from "./types.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./db.js";
export * from "./store/index.js";
export * from "./freshness.js";
export * from "./graph.js";
export * from "./tree.js";
export * from "./failure-log.js";
export * from "./data-provider.js";
export * from "./timings.js";
export * from "./crawler/crawl-state.js";
export * from "./crawler/work-pool.js";
export * from "./crawler/engine.js";
