/**
 * JSON-stream reader: one record per top-level JSON value
 */

import { createReadStream } from "fs";
import type { FieldValue, SourceRecord } from "../../types/records.js";
import { isFieldObject } from "../../types/records.js";
import { InputReadError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { JsonValueScanner, type ScannedValue } from "./json-value-scanner.js";

const log = logger.child("reader");

function toSourceRecord(
  file: string,
  value: ScannedValue,
): SourceRecord | undefined {
  let parsed: FieldValue;
  try {
    parsed = JSON.parse(value.text);
  } catch (error) {
    throw new InputReadError(
      `Invalid JSON value on line ${value.line} of ${file}`,
      { file, line: value.line },
      { cause: error },
    );
  }

  if (!isFieldObject(parsed)) {
    log.warn("Skipping top-level JSON value that is not an object", {
      file,
      line: value.line,
    });
    return undefined;
  }
  return { record: parsed, line: value.line };
}

/**
 * Stream records from a file of concatenated JSON values (NDJSON,
 * pretty-printed objects back to back, or a mix)
 */
export async function* readJsonRecords(
  file: string,
): AsyncGenerator<SourceRecord> {
  const stream = createReadStream(file, { encoding: "utf8" });
  const scanner = new JsonValueScanner(file);

  try {
    for await (const chunk of stream) {
      for (const value of scanner.push(String(chunk))) {
        const record = toSourceRecord(file, value);
        if (record) yield record;
      }
    }
    for (const value of scanner.end()) {
      const record = toSourceRecord(file, value);
      if (record) yield record;
    }
  } catch (error) {
    if (error instanceof InputReadError) throw error;
    throw new InputReadError(`Failed to read JSON file: ${file}`, { file }, {
      cause: error,
    });
  } finally {
    stream.destroy();
  }
}
