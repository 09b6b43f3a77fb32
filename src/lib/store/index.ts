/**
 * Store module - SQLite access for raw documents and relational output
 */
export * from "./types.js";
export * from "./raw-store.js";
export * from "./output-store.js";
