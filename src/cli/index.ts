#!/usr/bin/env node

/**
 * Eventsmith CLI - transform-driven event import
 */

import { Command } from "commander";
import { createImportCommand } from "./commands/import.js";
import { createInspectCommand } from "./commands/inspect.js";
import { errorMessage } from "../utils/errors.js";
import { isLogLevel, logger } from "../utils/logger.js";

const pkg = {
  name: "eventsmith",
  version: "0.1.0",
  description:
    "Import CSV, TSV and JSON-stream files into an event store through declarative transforms",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug (default: LOG_LEVEL or info)")
    .hook("preAction", (thisCommand) => {
      const level: unknown = thisCommand.opts().logLevel;
      if (isLogLevel(level)) {
        logger.setLevel(level);
      }
    });

  program.addCommand(createImportCommand());
  program.addCommand(createInspectCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  logger.error("Unexpected error", { error: errorMessage(error) });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message: errorMessage(error),
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
