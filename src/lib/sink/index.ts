/**
 * Sink module - destinations for translated records
 * Includes the MongoDB event store sink and file/stream writers
 */
export * from "./types.js";
export * from "./mongo-sink.js";
export * from "./stream-sink.js";
export * from "./record-encoder.js";
