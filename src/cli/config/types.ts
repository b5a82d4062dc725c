/**
 * CLI configuration types
 */

import type {
  FileType,
  OutputFormat,
  ValidationConfig,
} from "../../types/config.js";

/**
 * Event store section of a config file
 */
export interface TargetFileConfig {
  uri?: string;
  database?: string;
  batchSize?: number;
  writeConcern?: string;
}

/**
 * `import` section of a config file
 */
export interface ImportFileConfig {
  transform?: string;
  transformsDir?: string;
  fileType?: FileType;
  headers?: string[];
  separator?: string;
  table?: string;
  validation?: Partial<ValidationConfig>;
  expressionTimeoutMs?: number;
  output?: {
    format?: OutputFormat;
    path?: string;
  };
  target?: TargetFileConfig;
}

/**
 * Complete configuration file structure
 */
export interface EventsmithConfigFile {
  import?: ImportFileConfig;
}

/**
 * CLI command options (from commander)
 */
export interface ImportCommandOptions {
  transform?: string;
  transformsDir?: string;
  fileType?: string;
  headers?: string; // Comma-separated
  separator?: string;
  table?: string;
  idField?: string;
  timestampField?: string;
  expressionTimeout?: number;
  outputFormat?: string;
  outputPath?: string;
  targetUri?: string;
  targetDb?: string;
  batchSize?: number;
  writeConcern?: string;
  config?: string;
}

export interface InspectCommandOptions {
  transformsDir?: string;
}
