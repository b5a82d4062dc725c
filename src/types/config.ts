/**
 * Configuration types for Eventsmith
 */

import type { LogLevel } from '../utils/logger.js';

export type FileType = 'csv' | 'tsv' | 'json';

export type OutputFormat = 'ndjson' | 'json';

/**
 * Required-field checks applied to every translated record
 */
export interface ValidationConfig {
  idField: string; // must hold a number > 0
  timestampField: string; // must be present and not null
}

/**
 * Event store (MongoDB) destination
 */
export interface TargetConfig {
  uri: string;
  database: string;
  batchSize: number;
  writeConcern: string;
}

/**
 * File or stdout destination
 */
export interface OutputConfig {
  format: OutputFormat;
  path: string; // File path or 'stdout'
}

/**
 * ImportConfig - everything one import run needs
 */
export interface ImportConfig {
  files: string[];
  transform: string; // transform name or path
  transformsDir?: string; // where named transforms live
  fileType?: FileType;
  headers?: string[];
  separator?: string;
  table: string; // collection name in the event store
  validation: ValidationConfig;
  expressionTimeoutMs: number;
  output: OutputConfig;
  target?: TargetConfig;
  logLevel?: LogLevel;
}

export const DEFAULT_VALIDATION: ValidationConfig = {
  idField: 'object_id',
  timestampField: 'timestamp',
};

export const DEFAULT_EXPRESSION_TIMEOUT_MS = 1000;

export const DEFAULT_BATCH_SIZE = 1000;

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'ndjson' || value === 'json';
}
