/**
 * Nested writes into an output record
 */

import type { FieldValue, OutputRecord } from "../../types/records.js";
import { isFieldObject } from "../../types/records.js";
import type { OutputPath } from "../../types/transform.js";

/**
 * Set `value` at `path`, creating intermediate objects on demand. Only
 * the leaf key is overwritten; siblings under a shared prefix survive.
 * A non-object value sitting on the path is replaced by an object.
 */
export function writeOutputPath(
  output: OutputRecord,
  path: OutputPath,
  value: FieldValue,
): void {
  let target: { [key: string]: FieldValue } = output;

  for (let i = 0; i < path.length - 1; i++) {
    const key = path[i];
    const next = Object.hasOwn(target, key) ? target[key] : undefined;
    if (isFieldObject(next)) {
      target = next;
    } else {
      const created: { [key: string]: FieldValue } = {};
      target[key] = created;
      target = created;
    }
  }

  target[path[path.length - 1]] = value;
}

/**
 * Read the value at `path`, or undefined when any segment is missing
 */
export function readOutputPath(
  output: OutputRecord,
  path: readonly string[],
): FieldValue | undefined {
  let current: FieldValue | undefined = output;
  for (const key of path) {
    if (!isFieldObject(current) || !Object.hasOwn(current, key)) return undefined;
    current = current[key];
  }
  return current;
}
