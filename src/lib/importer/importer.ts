/**
 * Importer - reads input files, translates each record, validates it
 * and forwards it to the sink
 */

import type { FileType, ValidationConfig } from "../../types/config.js";
import { DEFAULT_VALIDATION } from "../../types/config.js";
import { readRecords } from "../reader/index.js";
import type { TranslationEngine } from "../translator/engine.js";
import type { EventSink, SinkMetrics } from "../sink/types.js";
import { InvalidRecordError, errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { RecordValidator } from "./record-validator.js";

const log = logger.child("import");

export interface ImporterOptions {
  engine: TranslationEngine;
  sink: EventSink;
  validation?: ValidationConfig;
  fileType?: FileType;
  headers?: readonly string[];
  separator?: string;
}

/**
 * One skipped record
 */
export interface ImportDiagnostic {
  file: string;
  line: number;
  field: string;
  message: string;
}

export interface ImportSummary {
  files: number;
  recordsRead: number;
  recordsImported: number;
  recordsSkipped: number;
  diagnostics: ImportDiagnostic[];
  sink: SinkMetrics;
}

export class Importer {
  private readonly validator: RecordValidator;

  constructor(private readonly options: ImporterOptions) {
    this.validator = new RecordValidator(options.validation ?? DEFAULT_VALIDATION);
  }

  /**
   * Import files in order. Invalid records are skipped with a
   * diagnostic; any other error aborts the run. The sink is closed
   * either way.
   */
  async import(files: string | readonly string[]): Promise<ImportSummary> {
    const fileList = typeof files === "string" ? [files] : files;
    const { engine, sink } = this.options;
    const diagnostics: ImportDiagnostic[] = [];
    let recordsRead = 0;
    let recordsImported = 0;

    try {
      for (const file of fileList) {
        log.info("Importing file", { file });
        let fileRecords = 0;

        const records = readRecords(file, {
          fileType: this.options.fileType,
          headers: this.options.headers,
          separator: this.options.separator,
        });

        for await (const { record, line } of records) {
          recordsRead++;
          fileRecords++;

          const output = engine.translate(record);
          const invalidField = this.validator.check(output);
          if (invalidField !== undefined) {
            const error = new InvalidRecordError(file, line, invalidField);
            log.error(error.message);
            diagnostics.push({ file, line, field: invalidField, message: error.message });
            continue;
          }

          await sink.write(output);
          recordsImported++;
        }

        log.debug("Finished file", { file, records: fileRecords });
      }
    } catch (error) {
      await sink.close().catch((closeError: unknown) => {
        log.error("Failed to close sink after import error", errorMessage(closeError));
      });
      throw error;
    }

    const sinkMetrics = await sink.close();
    const summary: ImportSummary = {
      files: fileList.length,
      recordsRead,
      recordsImported,
      recordsSkipped: diagnostics.length,
      diagnostics,
      sink: sinkMetrics,
    };

    log.info("Import complete", {
      files: summary.files,
      recordsRead,
      recordsImported,
      recordsSkipped: summary.recordsSkipped,
    });

    return summary;
  }
}
