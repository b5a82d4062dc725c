/**
 * Input file type resolution by extension
 */

import { extname } from "path";
import type { FileType } from "../../types/config.js";
import { UnsupportedFileTypeError } from "../../utils/errors.js";

const EXTENSION_TYPES: Record<string, FileType> = {
  ".csv": "csv",
  ".tsv": "tsv",
  ".txt": "tsv",
  ".json": "json",
  ".ndjson": "json",
  ".jsonl": "json",
};

export const FILE_TYPES: readonly FileType[] = ["csv", "tsv", "json"];

export function isFileType(value: unknown): value is FileType {
  return typeof value === "string" && FILE_TYPES.some((type) => type === value);
}

/**
 * Pick the reader variant for `file`. An explicit override wins over
 * the extension.
 */
export function resolveFileType(file: string, override?: string): FileType {
  if (override !== undefined) {
    if (isFileType(override)) return override;
    throw new UnsupportedFileTypeError(file, override);
  }

  const extension = extname(file).toLowerCase();
  const fileType = EXTENSION_TYPES[extension];
  if (fileType === undefined) {
    throw new UnsupportedFileTypeError(file, extension || "(none)");
  }
  return fileType;
}
