/**
 * relationalizer: infer a relational schema from JSON documents and load them into SQLite
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/data-model.js";
export * from "./types/config.js";

// Modules
export * from "./lib/normalizer/index.js";
export * from "./lib/profiler/index.js";
export * from "./lib/merger/index.js";
export * from "./lib/splitter/index.js";
export * from "./lib/ddl/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/store/index.js";
export * from "./lib/pipeline/index.js";
export * from "./lib/reporter/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
export * from "./utils/content-hash.js";
export * from "./utils/key-patterns.js";
