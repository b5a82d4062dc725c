/**
 * Reader module - lazy record streams from input files
 */

import type { FileType } from "../../types/config.js";
import type { SourceRecord } from "../../types/records.js";
import { readDelimitedRecords } from "./delimited-reader.js";
import { readJsonRecords } from "./json-stream-reader.js";
import { resolveFileType } from "./file-type.js";

export * from "./file-type.js";
export * from "./delimited-reader.js";
export * from "./json-stream-reader.js";
export * from "./json-value-scanner.js";

export interface ReadOptions {
  fileType?: FileType;
  headers?: readonly string[];
  separator?: string; // overrides the file type's default
}

const DEFAULT_SEPARATORS: Record<Exclude<FileType, "json">, string> = {
  csv: ",",
  tsv: "\t",
};

/**
 * Records of `file`, read with the variant its type calls for. Each
 * call starts a fresh pass over the file.
 */
export function readRecords(
  file: string,
  options: ReadOptions = {},
): AsyncGenerator<SourceRecord> {
  const fileType = resolveFileType(file, options.fileType);

  if (fileType === "json") {
    return readJsonRecords(file);
  }

  return readDelimitedRecords(file, {
    separator: options.separator ?? DEFAULT_SEPARATORS[fileType],
    headers: options.headers,
  });
}
