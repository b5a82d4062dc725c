/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { EventsmithConfigFile, ImportFileConfig } from "./types.js";
import { isPlainObject } from "../../types/records.js";
import { isOutputFormat } from "../../types/config.js";
import { isFileType } from "../../lib/reader/file-type.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): EventsmithConfigFile {
  logger.info("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  const config = toConfigFile(parsed ?? {}, filePath);
  logger.info("Configuration file parsed successfully", {
    hasImportConfig: !!config.import,
  });
  return config;
}

function toConfigFile(value: unknown, filePath: string): EventsmithConfigFile {
  if (!isPlainObject(value)) {
    throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
  }
  const section = value.import;
  if (section === undefined || section === null) return {};
  if (!isPlainObject(section)) {
    throw new ConfigError(`'import' section must be a mapping: ${filePath}`);
  }
  return { import: readImportSection(section, filePath) };
}

function readImportSection(
  section: { [key: string]: unknown },
  filePath: string,
): ImportFileConfig {
  const str = (key: string, value: unknown): string | undefined => {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "string") {
      throw new ConfigError(`'import.${key}' must be a string in ${filePath}`);
    }
    return value;
  };
  const num = (key: string, value: unknown): number | undefined => {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new ConfigError(`'import.${key}' must be a number in ${filePath}`);
    }
    return value;
  };
  const positive = (key: string, value: unknown): number | undefined => {
    const parsed = num(key, value);
    if (parsed !== undefined && (!Number.isSafeInteger(parsed) || parsed <= 0)) {
      throw new ConfigError(`'import.${key}' must be a positive integer in ${filePath}`);
    }
    return parsed;
  };
  const mapping = (key: string): { [key: string]: unknown } => {
    const value = section[key];
    if (value === undefined || value === null) return {};
    if (!isPlainObject(value)) {
      throw new ConfigError(`'import.${key}' must be a mapping in ${filePath}`);
    }
    return value;
  };

  const headers = section.headers;
  if (
    headers !== undefined &&
    headers !== null &&
    !(Array.isArray(headers) && headers.every((h) => typeof h === "string"))
  ) {
    throw new ConfigError(`'import.headers' must be a list of strings in ${filePath}`);
  }

  const fileType = str("fileType", section.fileType);
  if (!(fileType === undefined || isFileType(fileType))) {
    throw new ConfigError(`'import.fileType' must be csv, tsv or json in ${filePath}`);
  }

  const validation = mapping("validation");
  const output = mapping("output");
  const outputFormat = str("output.format", output.format);
  if (!(outputFormat === undefined || isOutputFormat(outputFormat))) {
    throw new ConfigError(`'import.output.format' must be ndjson or json in ${filePath}`);
  }
  const target = mapping("target");

  return {
    transform: str("transform", section.transform),
    transformsDir: str("transformsDir", section.transformsDir),
    fileType,
    headers: Array.isArray(headers) ? headers.map(String) : undefined,
    separator: str("separator", section.separator),
    table: str("table", section.table),
    validation: {
      idField: str("validation.idField", validation.idField),
      timestampField: str("validation.timestampField", validation.timestampField),
    },
    expressionTimeoutMs: positive("expressionTimeoutMs", section.expressionTimeoutMs),
    output: {
      format: outputFormat,
      path: str("output.path", output.path),
    },
    target: {
      uri: str("target.uri", target.uri),
      database: str("target.database", target.database),
      batchSize: positive("target.batchSize", target.batchSize),
      writeConcern: str("target.writeConcern", target.writeConcern),
    },
  };
}
