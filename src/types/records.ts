/**
 * Record shapes flowing through an import
 */

/**
 * Dynamically typed value of an input or output field
 */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

/**
 * One input record as produced by a format reader. Short delimited
 * rows leave trailing keys undefined.
 */
export type RawRecord = { [key: string]: FieldValue | undefined };

/**
 * Structured record built by the translation engine
 */
export type OutputRecord = { [key: string]: FieldValue };

/**
 * Raw record tagged with its position in the source file
 */
export interface SourceRecord {
  record: RawRecord;
  line: number; // 1-based
}

export function isPlainObject(
  value: unknown,
): value is { [key: string]: unknown } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isFieldObject(
  value: FieldValue | undefined,
): value is { [key: string]: FieldValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
