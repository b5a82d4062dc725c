/**
 * Inspect CLI command - prints the compiled rules of a transform
 */

import { Command } from "commander";
import { compileTransform } from "../../lib/transform/compiler.js";
import { loadTransformSource } from "../../lib/transform/locator.js";
import type { TransformSpec } from "../../types/transform.js";
import { EventsmithError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { InspectCommandOptions } from "../config/types.js";

/**
 * Plain listing of a compiled transform, one line per rule
 */
export function describeTransform(spec: TransformSpec) {
  return {
    rules: spec.rules.map((rule) =>
      rule.kind === "extraction"
        ? {
            output: rule.outputPath.join("."),
            input: rule.inputField,
            coercion: rule.coercion ?? "string",
          }
        : { output: rule.outputPath.join("."), expression: rule.code.trim() },
    ),
    translate: spec.translate?.trim() ?? null,
    require: [...spec.require],
  };
}

export function createInspectCommand(): Command {
  return new Command("inspect")
    .description("Compile a transform and print its field rules")
    .argument("<transform>", "Named transform or path to a transform file")
    .option("--transforms-dir <path>", "Directory holding named transforms")
    .action(async (ref: string, opts: InspectCommandOptions) => {
      try {
        const source = await loadTransformSource(ref, {
          transformsDir: opts.transformsDir,
        });
        const spec = compileTransform(source.text);
        console.log(JSON.stringify(describeTransform(spec), null, 2));
      } catch (error) {
        logger.error("Inspect command error", error instanceof Error ? error.message : error);
        if (error instanceof EventsmithError) {
          console.error(JSON.stringify(error.toResponse("inspect"), null, 2));
        }
        process.exitCode = 1;
      }
    });
}
