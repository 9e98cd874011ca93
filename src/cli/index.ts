#!/usr/bin/env node

/**
 * schemax CLI - rule-based validation of dataset schema files
 */

import { Command, CommanderError, Option } from "commander";
import { createValidateCommand, EXIT_CONFIG_ERROR } from "./commands/validate.js";
import { LOG_LEVELS, isLogLevel, logger } from "../utils/logger.js";

const pkg = {
  name: "schemax",
  version: "0.1.0",
  description: "Rule-based validation of dataset schema files",
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
    .addOption(
      new Option("--log-level <level>", "Logging verbosity").choices([...LOG_LEVELS]),
    )
    .exitOverride()
    .hook("preAction", (thisCommand) => {
      const level: unknown = thisCommand.opts().logLevel;
      if (isLogLevel(level)) {
        logger.setLevel(level);
      }
    });

  program.addCommand(createValidateCommand().exitOverride());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  // Commander has already printed usage errors, help and version
  if (error instanceof CommanderError) {
    process.exit(error.exitCode === 0 ? 0 : EXIT_CONFIG_ERROR);
  }
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(EXIT_CONFIG_ERROR);
});
