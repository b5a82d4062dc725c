/**
 * Importer module - orchestrates reading, translation, validation and
 * delivery
 */
export * from "./importer.js";
export * from "./record-validator.js";
export * from "./run-import.js";
