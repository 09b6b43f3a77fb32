/**
 * Analyze command - profile raw databases and describe the relational schema
 */

import { Command } from "commander";
import { discoverSchema } from "../../lib/pipeline/index.js";
import { buildSchemaReport, writeJsonArtifact } from "../../lib/reporter/index.js";
import { logger } from "../../utils/logger.js";
import type { AnalyzeCommandOptions } from "../config/types.js";
import { failCommand, openRawSources, resolveConfig } from "./shared.js";

export interface AnalyzeOutput {
  status: "success";
  phase: "analysis";
  ddl: string[];
  artifacts: {
    report?: string;
  };
  summary: {
    documentsAnalyzed: number;
    documentsSkipped: number;
    tables: number;
    columns: number;
    shapeConflicts: number;
    durationMs: number;
  };
}

/**
 * Run the analysis without printing, for reuse and tests
 */
export async function runAnalyze(
  databases: string[],
  options: AnalyzeCommandOptions,
): Promise<AnalyzeOutput> {
  const startTime = Date.now();
  const config = resolveConfig(options);

  const opened = openRawSources(databases);
  try {
    const discovery = await discoverSchema(opened.sources, config, { limit: options.limit });

    if (options.report) {
      await writeJsonArtifact(options.report, buildSchemaReport(discovery));
      logger.info("Schema report written", { path: options.report });
    }

    return {
      status: "success",
      phase: "analysis",
      ddl: discovery.ddl,
      artifacts: options.report ? { report: options.report } : {},
      summary: {
        documentsAnalyzed: discovery.metadata.documentsAnalyzed,
        documentsSkipped: discovery.failures.length,
        tables: discovery.graph.tables.length,
        columns: discovery.graph.tables.reduce((sum, t) => sum + t.columns.length, 0),
        shapeConflicts: discovery.conflicts.length,
        durationMs: Date.now() - startTime,
      },
    };
  } finally {
    opened.close();
  }
}

async function executeAnalyze(databases: string[], options: AnalyzeCommandOptions): Promise<void> {
  try {
    const result = await runAnalyze(databases, options);
    if (options.printSql) {
      console.log(result.ddl.join("\n"));
    } else {
      console.log(JSON.stringify(result, null, 2));
    }
    process.exit(0);
  } catch (error) {
    failCommand(error, "analysis");
  }
}

/**
 * Create analyze command
 */
export function createAnalyzeCommand(): Command {
  const command = new Command("analyze");

  command
    .description("Profile raw document databases and derive the relational schema")
    .argument("<raw-db...>", "Raw SQLite databases holding a listings table")
    .option("--print-sql", "Print the CREATE TABLE statements instead of the JSON summary")
    .option("--report <path>", "Write a JSON schema report with tables, conflicts and skipped documents")
    .option("--limit <count>", "Only analyze the first documents of each database", (val) =>
      parseInt(val, 10),
    )
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--root-table <name>", "Name of the table holding top-level documents")
    .option("--link-mode <mode>", "Child table linking: embedded, foreignKey")
    .option("--type-policy <policy>", "Column typing: text, auto")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .action(executeAnalyze);

  return command;
}
