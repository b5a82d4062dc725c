/**
 * Delimited text reader (CSV, TSV)
 */

import { createReadStream } from "fs";
import { parse } from "csv-parse";
import type { RawRecord, SourceRecord } from "../../types/records.js";
import { InputReadError } from "../../utils/errors.js";

export interface DelimitedReadOptions {
  separator: string;
  headers?: readonly string[]; // when set, the first line is data too
}

interface ParsedRow {
  record: string[];
  info: { lines: number };
}

function isParsedRow(value: unknown): value is ParsedRow {
  return (
    typeof value === "object" &&
    value !== null &&
    "record" in value &&
    Array.isArray(value.record) &&
    "info" in value &&
    typeof value.info === "object" &&
    value.info !== null &&
    "lines" in value.info &&
    typeof value.info.lines === "number"
  );
}

/**
 * Zip a row against header names by position. Short rows leave the
 * trailing keys out; columns past the last header are dropped.
 */
export function zipRow(headers: readonly string[], row: readonly string[]): RawRecord {
  const record: RawRecord = {};
  const width = Math.min(headers.length, row.length);
  for (let i = 0; i < width; i++) {
    record[headers[i]] = row[i];
  }
  return record;
}

/**
 * Stream records from a delimited file. Without explicit headers the
 * first row names the columns.
 */
export async function* readDelimitedRecords(
  file: string,
  options: DelimitedReadOptions,
): AsyncGenerator<SourceRecord> {
  const source = createReadStream(file);
  const parser = parse({
    delimiter: options.separator,
    bom: true,
    info: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });
  source.on("error", (error) => parser.destroy(error));
  source.pipe(parser);

  let headers = options.headers;

  try {
    for await (const chunk of parser) {
      const row: unknown = chunk;
      if (!isParsedRow(row)) continue;

      if (headers === undefined) {
        headers = row.record;
        continue;
      }

      yield { record: zipRow(headers, row.record), line: row.info.lines };
    }
  } catch (error) {
    if (error instanceof InputReadError) throw error;
    throw new InputReadError(`Failed to read delimited file: ${file}`, { file }, {
      cause: error,
    });
  } finally {
    source.destroy();
    parser.destroy();
  }
}
