/**
 * Type coercions applied by extraction rules
 */

import type { FieldValue } from "../../types/records.js";
import { CoercionError } from "../../utils/errors.js";

/**
 * Converts one present (non-null) input value. Throws CoercionError
 * when the value cannot be converted.
 */
export type Coercion = (value: FieldValue, field: string) => FieldValue;

const INTEGER_PATTERN = /^[+-]?\d+$/;

const TRUTHY = new Set(["true", "yes", "y", "t", "on", "1"]);
const FALSY = new Set(["false", "no", "n", "f", "off", "0"]);

export const toInteger: Coercion = (value, field) => {
  // Integers past 2^53 would be rounded
  if (typeof value === "number" && Number.isSafeInteger(value)) return value;
  if (typeof value === "string" && INTEGER_PATTERN.test(value.trim())) {
    const parsed = Number.parseInt(value.trim(), 10);
    if (Number.isSafeInteger(parsed)) return parsed;
  }
  throw new CoercionError(field, value, "int");
};

export const toFloat: Coercion = (value, field) => {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new CoercionError(field, value, "float");
};

export const toStringValue: Coercion = (value) => {
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return value;
};

export const toBoolean: Coercion = (value, field) => {
  if (typeof value === "boolean") return value;
  if (value === 1 || value === 0) return value === 1;
  if (typeof value === "string") {
    const token = value.trim().toLowerCase();
    if (TRUTHY.has(token)) return true;
    if (FALSY.has(token)) return false;
  }
  throw new CoercionError(field, value, "boolean");
};

export const toTimestamp: Coercion = (value, field) => {
  const date =
    typeof value === "number"
      ? new Date(value)
      : typeof value === "string"
        ? new Date(value.trim())
        : undefined;
  if (date === undefined || Number.isNaN(date.getTime())) {
    throw new CoercionError(field, value, "date");
  }
  return date.toISOString();
};

export const passthrough: Coercion = (value) => value;

interface CoercionEntry {
  coerce: Coercion;
  // Empty input text counts as a missing value
  emptyIsMissing: boolean;
}

/**
 * Registry of coercion tags. Tags are case-insensitive; `register`
 * is the extension point for custom types.
 */
export class CoercionRegistry {
  private entries = new Map<string, CoercionEntry>();

  constructor() {
    this.register(["int", "integer"], toInteger);
    this.register(["float", "double", "number"], toFloat);
    this.register(["string", "str"], toStringValue, false);
    this.register(["bool", "boolean"], toBoolean);
    this.register(["date", "timestamp"], toTimestamp);
    this.register(["raw"], passthrough, false);
  }

  register(
    tags: string | string[],
    coerce: Coercion,
    emptyIsMissing = true,
  ): this {
    for (const tag of Array.isArray(tags) ? tags : [tags]) {
      this.entries.set(tag.toLowerCase(), { coerce, emptyIsMissing });
    }
    return this;
  }

  has(tag: string): boolean {
    return this.entries.has(tag.toLowerCase());
  }

  /**
   * Apply the coercion named by `tag` (string when absent). Missing
   * values come back as null; unknown tags pass the value through.
   */
  apply(
    tag: string | undefined,
    value: FieldValue | undefined,
    field: string,
  ): FieldValue {
    if (value === undefined || value === null) return null;

    const entry = this.entries.get((tag ?? "string").toLowerCase());
    if (!entry) return value;
    if (entry.emptyIsMissing && value === "") return null;
    return entry.coerce(value, field);
  }
}

export const defaultCoercions = new CoercionRegistry();
