/**
 * Translation engine - applies a compiled transform to raw records
 */

import type { OutputRecord, RawRecord } from "../../types/records.js";
import type {
  ExpressionRule,
  ExtractionRule,
  TransformSpec,
} from "../../types/transform.js";
import { deepFreeze } from "../../utils/deep-freeze.js";
import {
  CoercionRegistry,
  defaultCoercions,
} from "../transform/coercions.js";
import {
  VmExpressionEvaluator,
  type CompiledExpression,
  type ExpressionEvaluator,
} from "./expression-evaluator.js";
import { loadCapabilities } from "./capability-loader.js";
import { writeOutputPath } from "./output-path.js";

export interface TranslationEngineOptions {
  evaluator?: ExpressionEvaluator;
  coercions?: CoercionRegistry;
}

export interface CreateEngineOptions {
  baseDir?: string; // resolves relative `require` paths
  timeoutMs?: number;
  coercions?: CoercionRegistry;
}

type Step =
  | { rule: ExtractionRule }
  | { rule: ExpressionRule; expression: CompiledExpression };

/**
 * Translates one raw record at a time. Expressions are compiled once
 * here, so a broken script fails before any record is read.
 */
export class TranslationEngine {
  private readonly steps: Step[];
  private readonly catchAll?: CompiledExpression;
  private readonly coercions: CoercionRegistry;

  constructor(
    readonly spec: TransformSpec,
    options: TranslationEngineOptions = {},
  ) {
    const evaluator = options.evaluator ?? new VmExpressionEvaluator();
    this.coercions = options.coercions ?? defaultCoercions;

    this.steps = spec.rules.map((rule): Step => {
      if (rule.kind === "extraction") return { rule };
      return {
        rule,
        expression: evaluator.compile(rule.code, rule.outputPath.join(".")),
      };
    });

    if (spec.translate !== undefined) {
      this.catchAll = evaluator.compile(spec.translate, "translate");
    }
  }

  translate(raw: RawRecord): OutputRecord {
    const input = deepFreeze(raw);
    const output: OutputRecord = {};

    for (const step of this.steps) {
      if ("expression" in step) {
        step.expression.run({ input, output });
        continue;
      }

      const { outputPath, inputField, coercion } = step.rule;
      // Inherited properties such as `constructor` are not fields
      const value = Object.hasOwn(input, inputField) ? input[inputField] : undefined;
      writeOutputPath(
        output,
        outputPath,
        this.coercions.apply(coercion, value, inputField),
      );
    }

    this.catchAll?.run({ input, output });

    return output;
  }
}

/**
 * Build an engine whose expressions can use the modules the transform
 * requires
 */
export async function createTranslationEngine(
  spec: TransformSpec,
  options: CreateEngineOptions = {},
): Promise<TranslationEngine> {
  const capabilities = await loadCapabilities(spec.require, options.baseDir);
  return new TranslationEngine(spec, {
    evaluator: new VmExpressionEvaluator({
      capabilities,
      timeoutMs: options.timeoutMs,
    }),
    coercions: options.coercions,
  });
}

/**
 * Translate a single record without keeping an engine around
 */
export function translate(
  raw: RawRecord,
  spec: TransformSpec,
  evaluator?: ExpressionEvaluator,
): OutputRecord {
  return new TranslationEngine(spec, { evaluator }).translate(raw);
}
