/**
 * Transform compiler
 *
 * Turns a nested transform document into a flat, ordered list of field
 * rules. Each leaf of `fields` becomes one rule whose output path is the
 * chain of keys leading to it:
 *
 * ```yaml
 * fields:
 *   object_id: "user_id:int"
 *   timestamp: "ts:date"
 *   data:
 *     action: "event"
 *     total: "{output.data.total = Number(input.price) * Number(input.qty)}"
 * translate: "output.source = 'web'"
 * require:
 *   - ./helpers/geo.mjs
 * ```
 *
 * Rules keep document order, including for duplicate keys, so a later
 * rule for the same output path overrides an earlier one.
 */

import {
  parseDocument,
  isAlias,
  isMap,
  isScalar,
  isSeq,
  type Document,
} from "yaml";
import type {
  FieldRule,
  OutputPath,
  TransformSpec,
} from "../../types/transform.js";
import { isPlainObject } from "../../types/records.js";
import { TransformParseError } from "../../utils/errors.js";
import { deepFreeze } from "../../utils/deep-freeze.js";
import { logger } from "../../utils/logger.js";
import { CoercionRegistry, defaultCoercions } from "./coercions.js";

const log = logger.child("transform");

export interface CompileOptions {
  coercions?: CoercionRegistry;
}

/**
 * Source-order view of a parsed transform document
 */
type TransformNode =
  | { type: "mapping"; entries: Array<[string, TransformNode]> }
  | { type: "list"; items: TransformNode[] }
  | { type: "string"; value: string }
  | { type: "other"; typeName: string };

const TOP_LEVEL_KEYS = new Set(["fields", "translate", "require"]);

// Entire value wrapped in a single pair of braces
const EXPRESSION_PATTERN = /^\s*\{([\s\S]*)\}\s*$/;

/**
 * Compile transform text (YAML, or JSON as its subset)
 */
export function compileTransform(
  text: string,
  options: CompileOptions = {},
): TransformSpec {
  const doc = parseDocument(text, { uniqueKeys: false });
  const [firstError] = doc.errors;
  if (firstError) {
    throw new TransformParseError(
      `Invalid transform document: ${firstError.message}`,
      undefined,
      { cause: firstError },
    );
  }

  const root: TransformNode =
    doc.contents === null
      ? { type: "mapping", entries: [] }
      : fromYamlNode(doc.contents, doc);
  return compileRoot(root, options);
}

/**
 * Compile an already-parsed transform object (object key order)
 */
export function compileTransformDocument(
  value: unknown,
  options: CompileOptions = {},
): TransformSpec {
  return compileRoot(fromPlainValue(value), options);
}

function compileRoot(
  root: TransformNode,
  options: CompileOptions,
): TransformSpec {
  if (root.type !== "mapping") {
    throw new TransformParseError(
      `Transform must be a mapping, got ${describeNode(root)}`,
    );
  }

  // Top-level keys behave like a hash: the last occurrence wins
  const top = new Map(root.entries);
  for (const key of top.keys()) {
    if (!TOP_LEVEL_KEYS.has(key)) {
      log.warn("Ignoring unknown transform key", { key });
    }
  }

  const rules: FieldRule[] = [];
  const fields = top.get("fields");
  if (fields !== undefined && !isNull(fields)) {
    if (fields.type !== "mapping") {
      throw new TransformParseError(
        `Invalid data type for 'fields' in transform file: ${describeNode(fields)}`,
        { key: "fields", type: describeNode(fields) },
      );
    }
    compileFields(fields.entries, [], rules, options.coercions ?? defaultCoercions);
  }

  const translate = compileTranslate(top.get("translate"));
  const spec: TransformSpec = {
    rules,
    ...(translate !== undefined ? { translate } : {}),
    require: compileRequire(top.get("require")),
  };

  log.debug("Compiled transform", {
    rules: rules.length,
    translate: translate !== undefined,
    require: spec.require.length,
  });

  return deepFreeze(spec);
}

function compileFields(
  entries: Array<[string, TransformNode]>,
  prefix: readonly string[],
  rules: FieldRule[],
  coercions: CoercionRegistry,
): void {
  for (const [key, value] of entries) {
    const outputPath = extendPath(prefix, key);
    if (key === "__proto__") {
      throw new TransformParseError(
        `Reserved key '__proto__' in output path '${outputPath.join(".")}'`,
        { key: outputPath.join(".") },
      );
    }

    if (value.type === "mapping") {
      compileFields(value.entries, outputPath, rules, coercions);
      continue;
    }

    if (value.type !== "string") {
      const typeName = describeNode(value);
      throw new TransformParseError(
        `Invalid data type for '${outputPath.join(".")}' in transform file: ${typeName}`,
        { key: outputPath.join("."), type: typeName },
      );
    }

    const match = EXPRESSION_PATTERN.exec(value.value);
    if (match) {
      rules.push({ kind: "expression", outputPath, code: match[1] ?? "" });
      continue;
    }

    rules.push(compileExtraction(value.value, outputPath, coercions));
  }
}

function compileExtraction(
  text: string,
  outputPath: OutputPath,
  coercions: CoercionRegistry,
): FieldRule {
  const colon = text.indexOf(":");
  const inputField = (colon < 0 ? text : text.slice(0, colon)).trim();
  const coercion = colon < 0 ? "" : text.slice(colon + 1).trim();

  if (inputField === "") {
    throw new TransformParseError(
      `Missing input field for '${outputPath.join(".")}' in transform file`,
      { key: outputPath.join(".") },
    );
  }

  if (coercion === "") {
    return { kind: "extraction", outputPath, inputField };
  }

  if (!coercions.has(coercion)) {
    log.warn("Unknown coercion type, values pass through unchanged", {
      field: outputPath.join("."),
      coercion,
    });
  }
  return { kind: "extraction", outputPath, inputField, coercion };
}

function compileTranslate(node: TransformNode | undefined): string | undefined {
  if (node === undefined || isNull(node)) return undefined;
  if (node.type !== "string") {
    throw new TransformParseError(
      `Invalid data type for 'translate' in transform file: ${describeNode(node)}`,
      { key: "translate", type: describeNode(node) },
    );
  }
  const match = EXPRESSION_PATTERN.exec(node.value);
  return match ? (match[1] ?? "") : node.value;
}

function compileRequire(node: TransformNode | undefined): string[] {
  if (node === undefined || isNull(node)) return [];
  if (node.type === "string") return [node.value];
  if (node.type !== "list") {
    throw new TransformParseError(
      `Invalid data type for 'require' in transform file: ${describeNode(node)}`,
      { key: "require", type: describeNode(node) },
    );
  }

  return node.items.map((item, index) => {
    if (item.type !== "string") {
      throw new TransformParseError(
        `Invalid data type for 'require[${index}]' in transform file: ${describeNode(item)}`,
        { key: `require[${index}]`, type: describeNode(item) },
      );
    }
    return item.value;
  });
}

function extendPath(prefix: readonly string[], key: string): OutputPath {
  return prefix.length === 0 ? [key] : [prefix[0], ...prefix.slice(1), key];
}

function isNull(node: TransformNode): boolean {
  return node.type === "other" && node.typeName === "null";
}

function describeNode(node: TransformNode): string {
  switch (node.type) {
    case "mapping":
      return "mapping";
    case "list":
      return "array";
    case "string":
      return "string";
    case "other":
      return node.typeName;
  }
}

function fromYamlNode(node: unknown, doc: Document): TransformNode {
  if (isAlias(node)) {
    return fromYamlNode(node.resolve(doc), doc);
  }

  if (isMap(node)) {
    const entries: Array<[string, TransformNode]> = [];
    for (const pair of node.items) {
      if (!isScalar(pair.key)) {
        throw new TransformParseError(
          "Transform mapping keys must be plain scalars",
        );
      }
      entries.push([String(pair.key.value), fromYamlNode(pair.value, doc)]);
    }
    return { type: "mapping", entries };
  }

  if (isSeq(node)) {
    return {
      type: "list",
      items: node.items.map((item) => fromYamlNode(item, doc)),
    };
  }

  if (isScalar(node)) {
    return fromPlainValue(node.value);
  }

  return fromPlainValue(node ?? null);
}

function fromPlainValue(value: unknown): TransformNode {
  if (typeof value === "string") return { type: "string", value };
  if (value === null || value === undefined) {
    return { type: "other", typeName: "null" };
  }
  if (Array.isArray(value)) {
    return { type: "list", items: value.map(fromPlainValue) };
  }
  if (isPlainObject(value)) {
    return {
      type: "mapping",
      entries: Object.entries(value).map(([key, child]) => [
        key,
        fromPlainValue(child),
      ]),
    };
  }
  return {
    type: "other",
    typeName: typeof value === "bigint" ? "number" : typeof value,
  };
}
