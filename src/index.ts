/**
 * Eventsmith: transform-driven import of flat and JSON-stream files
 * into an event store
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/transform/index.js";
export * from "./lib/translator/index.js";
export * from "./lib/reader/index.js";
export * from "./lib/sink/index.js";
export * from "./lib/importer/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
