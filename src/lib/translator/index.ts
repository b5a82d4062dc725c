/**
 * Translator module - turns raw records into output records
 */
export * from "./engine.js";
export * from "./expression-evaluator.js";
export * from "./capability-loader.js";
export * from "./output-path.js";
