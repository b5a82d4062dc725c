/**
 * Import CLI command
 */

import { Command, Option } from "commander";
import { runImport } from "../../lib/importer/run-import.js";
import { isFileType } from "../../lib/reader/file-type.js";
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_EXPRESSION_TIMEOUT_MS,
  DEFAULT_VALIDATION,
  isOutputFormat,
  type ImportConfig,
} from "../../types/config.js";
import { ConfigError, EventsmithError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { parseConfigFile } from "../config/parser.js";
import type { ImportCommandOptions, ImportFileConfig } from "../config/types.js";

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`Expected an integer, got '${value}'`);
  }
  return parsed;
}

function requirePositive(name: string, value: number): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function splitList(value: string): string[] {
  return value.split(",").map((item) => item.trim());
}

/**
 * Merge CLI options with config file (CLI options take precedence)
 */
export function mergeImportConfig(
  files: string[],
  options: ImportCommandOptions,
  configFile: ImportFileConfig = {},
): ImportConfig {
  const transform = options.transform ?? configFile.transform;
  if (!transform) {
    throw new ConfigError("A transform is required (--transform <name|path>)");
  }
  if (files.length === 0) {
    throw new ConfigError("At least one input file is required");
  }

  const fileType = options.fileType ?? configFile.fileType;
  if (!(fileType === undefined || isFileType(fileType))) {
    throw new ConfigError(`Unknown file type: ${fileType}. Use csv, tsv or json`);
  }

  const outputFormat = options.outputFormat ?? configFile.output?.format ?? "ndjson";
  if (!isOutputFormat(outputFormat)) {
    throw new ConfigError(`Unknown output format: ${outputFormat}. Use ndjson or json`);
  }

  const targetUri = options.targetUri ?? configFile.target?.uri;
  const targetDb = options.targetDb ?? configFile.target?.database;
  const table = options.table ?? configFile.table;

  if (targetUri && (!targetDb || !table)) {
    throw new ConfigError("--target-db and --table are required with --target-uri");
  }

  return {
    files,
    transform,
    transformsDir: options.transformsDir ?? configFile.transformsDir,
    fileType,
    headers: options.headers ? splitList(options.headers) : configFile.headers,
    separator: options.separator ?? configFile.separator,
    table: table ?? "events",
    validation: {
      idField:
        options.idField ?? configFile.validation?.idField ?? DEFAULT_VALIDATION.idField,
      timestampField:
        options.timestampField ??
        configFile.validation?.timestampField ??
        DEFAULT_VALIDATION.timestampField,
    },
    expressionTimeoutMs: requirePositive(
      "Expression timeout",
      options.expressionTimeout ??
        configFile.expressionTimeoutMs ??
        DEFAULT_EXPRESSION_TIMEOUT_MS,
    ),
    output: {
      format: outputFormat,
      path: options.outputPath ?? configFile.output?.path ?? "stdout",
    },
    target:
      targetUri && targetDb
        ? {
            uri: targetUri,
            database: targetDb,
            batchSize: requirePositive(
              "Batch size",
              options.batchSize ?? configFile.target?.batchSize ?? DEFAULT_BATCH_SIZE,
            ),
            writeConcern:
              options.writeConcern ?? configFile.target?.writeConcern ?? "majority",
          }
        : undefined,
  };
}

/**
 * Create import command
 * @returns Commander Command
 */
export function createImportCommand(): Command {
  return new Command("import")
    .description("Translate input files with a transform and import the events")
    .argument("<files...>", "CSV, TSV, or JSON-stream files to import")
    .option("-t, --transform <name|path>", "Named transform or path to a transform file")
    .option("--transforms-dir <path>", "Directory holding named transforms")
    .addOption(
      new Option("--file-type <type>", "Input type, overriding the extension").choices([
        "csv",
        "tsv",
        "json",
      ]),
    )
    .option("--headers <names>", "Comma-separated column names; every line is data")
    .option("--separator <char>", "Column separator for delimited files")
    .option("--table <name>", "Event store table (collection) to import into")
    .option("--id-field <name>", "Output field holding the positive object id")
    .option("--timestamp-field <name>", "Output field holding the event timestamp")
    .option(
      "--expression-timeout <ms>",
      "Time limit for each scripted expression",
      parseInteger,
    )
    .addOption(
      new Option("--output-format <format>", "Output format when not writing to the event store").choices([
        "ndjson",
        "json",
      ]),
    )
    .option("--output-path <path>", 'Output path (or "stdout")')
    .option("--target-uri <uri>", "MongoDB URI of the event store")
    .option("--target-db <database>", "Event store database name")
    .option("--batch-size <number>", "Records per bulk insert", parseInteger)
    .option("--write-concern <concern>", "Write concern for event store inserts")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (files: string[], opts: ImportCommandOptions) => {
      try {
        const configFile = opts.config ? parseConfigFile(opts.config).import : undefined;
        const config = mergeImportConfig(files, opts, configFile);

        const summary = await runImport(config);

        const result = JSON.stringify(
          { status: "success", phase: "import", output: summary },
          null,
          2,
        );
        // Keep stdout clean when it carries the records
        if (!config.target && config.output.path === "stdout") {
          process.stderr.write(result + "\n");
        } else {
          console.log(result);
        }
      } catch (error) {
        logger.error("Import command error", error instanceof Error ? error.message : error);
        if (error instanceof EventsmithError) {
          console.error(JSON.stringify(error.toResponse("import"), null, 2));
        }
        process.exitCode = 1;
      }
    });
}
