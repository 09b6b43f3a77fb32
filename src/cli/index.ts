#!/usr/bin/env node

/**
 * relationalizer CLI - turn stored JSON documents into a relational SQLite database
 */

import { Command } from "commander";
import { createAnalyzeCommand } from "./commands/analyze.js";
import { createConvertCommand } from "./commands/convert.js";
import { TOOL_NAME, TOOL_VERSION } from "../lib/reporter/index.js";
import { logger } from "../utils/logger.js";

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description("Analyze raw JSON documents and convert them into relational SQLite tables")
    .version(TOOL_VERSION);

  program.addCommand(createAnalyzeCommand());
  program.addCommand(createConvertCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
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
  process.exit(1);
});
