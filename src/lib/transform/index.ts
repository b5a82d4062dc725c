/**
 * Transform module - compiles declarative transforms into field rules
 */
export * from "./coercions.js";
export * from "./compiler.js";
export * from "./locator.js";
