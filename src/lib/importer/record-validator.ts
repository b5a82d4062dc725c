/**
 * Required-field validation of translated records using Ajv
 */

import AjvModule from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import type { ValidationConfig } from "../../types/config.js";
import type { OutputRecord } from "../../types/records.js";

const Ajv = AjvModule.default;

function decodePointerSegment(segment: string): string {
  return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}

/**
 * Top-level field an Ajv error refers to
 */
function failingField(error: ErrorObject): string {
  if (error.keyword === "required") {
    return String(error.params.missingProperty);
  }
  const [, first = ""] = error.instancePath.split("/");
  return decodePointerSegment(first);
}

/**
 * Checks that a record carries a positive numeric identifier and a
 * timestamp before it is sent to the event store
 */
export class RecordValidator {
  private readonly validateFn: ValidateFunction;

  constructor(private readonly config: ValidationConfig) {
    const ajv = new Ajv({
      allErrors: true,
      strict: false,
      strictNumbers: true, // NaN and Infinity are not valid identifiers
    });

    this.validateFn = ajv.compile({
      type: "object",
      required: [config.idField, config.timestampField],
      properties: {
        [config.idField]: { type: "number", exclusiveMinimum: 0 },
        [config.timestampField]: { not: { type: "null" } },
      },
    });
  }

  /**
   * Name of the required field the record fails on, identifier first,
   * or undefined when the record is valid
   */
  check(record: OutputRecord): string | undefined {
    if (this.validateFn(record)) return undefined;

    const failing = new Set((this.validateFn.errors ?? []).map(failingField));
    if (failing.has(this.config.idField)) return this.config.idField;
    return this.config.timestampField;
  }
}
