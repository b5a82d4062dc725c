/**
 * Compiled transform types
 */

/**
 * Output path as a sequence of keys, never empty
 */
export type OutputPath = readonly [string, ...string[]];

/**
 * Copy an input field to the output, optionally coercing its type
 */
export interface ExtractionRule {
  readonly kind: "extraction";
  readonly outputPath: OutputPath;
  readonly inputField: string;
  readonly coercion?: string;
}

/**
 * Run a script with `input` and `output` bound; the script writes
 * into `output` itself
 */
export interface ExpressionRule {
  readonly kind: "expression";
  readonly outputPath: OutputPath;
  readonly code: string;
}

export type FieldRule = ExtractionRule | ExpressionRule;

/**
 * TransformSpec - compiled form of a user transform, shared read-only
 * for a whole import run
 */
export interface TransformSpec {
  readonly rules: readonly FieldRule[];
  readonly translate?: string; // catch-all expression run after all rules
  readonly require: readonly string[]; // capability modules for expressions
}
