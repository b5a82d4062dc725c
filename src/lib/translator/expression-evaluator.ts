/**
 * Scripted expressions for field rules and the catch-all translate step
 *
 * Expressions are JavaScript statements run in a separate vm context.
 * They see two bindings, `input` (the frozen raw record) and `output`
 * (the record being built), plus one global per required capability.
 */

import { createContext, Script, type Context } from "vm";
import type { OutputRecord, RawRecord } from "../../types/records.js";
import { DEFAULT_EXPRESSION_TIMEOUT_MS } from "../../types/config.js";
import {
  ExpressionEvaluationError,
  errorMessage,
} from "../../utils/errors.js";

export interface ExpressionBindings {
  input: Readonly<RawRecord>;
  output: OutputRecord;
}

export interface CompiledExpression {
  readonly label: string;
  run(bindings: ExpressionBindings): void;
}

/**
 * Narrow seam between the engine and whatever runs expression code
 */
export interface ExpressionEvaluator {
  compile(code: string, label: string): CompiledExpression;
}

export interface VmEvaluatorOptions {
  capabilities?: Record<string, unknown>;
  timeoutMs?: number;
}

const INPUT_GLOBAL = "__eventsmithInput";
const OUTPUT_GLOBAL = "__eventsmithOutput";

export class VmExpressionEvaluator implements ExpressionEvaluator {
  private readonly context: Context;
  private readonly timeoutMs: number;

  constructor(options: VmEvaluatorOptions = {}) {
    this.context = createContext({ ...options.capabilities });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EXPRESSION_TIMEOUT_MS;
  }

  compile(code: string, label: string): CompiledExpression {
    let script: Script;
    try {
      script = new Script(
        `(function (input, output) { "use strict";\n${code}\n})(${INPUT_GLOBAL}, ${OUTPUT_GLOBAL});`,
        { filename: `transform:${label}`, lineOffset: -1 },
      );
    } catch (error) {
      throw new ExpressionEvaluationError(label, errorMessage(error), {
        cause: error,
      });
    }

    return {
      label,
      run: (bindings) => this.run(script, label, bindings),
    };
  }

  private run(
    script: Script,
    label: string,
    bindings: ExpressionBindings,
  ): void {
    this.context[INPUT_GLOBAL] = bindings.input;
    this.context[OUTPUT_GLOBAL] = bindings.output;
    try {
      script.runInContext(this.context, { timeout: this.timeoutMs });
    } catch (error) {
      throw new ExpressionEvaluationError(label, errorMessage(error), {
        cause: error,
      });
    } finally {
      delete this.context[INPUT_GLOBAL];
      delete this.context[OUTPUT_GLOBAL];
    }
  }
}
