/**
 * Wires a full import run from an ImportConfig
 */

import { dirname } from "path";
import type { ImportConfig } from "../../types/config.js";
import { compileTransform } from "../transform/compiler.js";
import { loadTransformSource } from "../transform/locator.js";
import { createTranslationEngine } from "../translator/engine.js";
import { resolveFileType } from "../reader/file-type.js";
import { createMongoSink } from "../sink/mongo-sink.js";
import { createStreamSink } from "../sink/stream-sink.js";
import type { EventSink } from "../sink/types.js";
import { Importer, type ImportSummary } from "./importer.js";

/**
 * Event store sink when a target is configured, else a file or stdout
 */
export async function createSink(config: ImportConfig): Promise<EventSink> {
  if (config.target) {
    return createMongoSink({
      uri: config.target.uri,
      database: config.target.database,
      collection: config.table,
      batchSize: config.target.batchSize,
      writeConcern: config.target.writeConcern,
    });
  }
  return createStreamSink(config.output.path, config.output.format);
}

/**
 * Load and compile the transform, then import every file. Startup
 * problems (missing transform, bad transform, unsupported file) fail
 * before the sink is opened.
 */
export async function runImport(
  config: ImportConfig,
  sink?: EventSink,
): Promise<ImportSummary> {
  const source = await loadTransformSource(config.transform, {
    transformsDir: config.transformsDir,
  });
  const spec = compileTransform(source.text);
  const engine = await createTranslationEngine(spec, {
    baseDir: dirname(source.path),
    timeoutMs: config.expressionTimeoutMs,
  });

  for (const file of config.files) {
    resolveFileType(file, config.fileType);
  }

  const importer = new Importer({
    engine,
    sink: sink ?? (await createSink(config)),
    validation: config.validation,
    fileType: config.fileType,
    headers: config.headers,
    separator: config.separator,
  });

  return importer.import(config.files);
}
