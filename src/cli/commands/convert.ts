/**
 * Convert command - load raw databases into a relational SQLite database
 */

import { Command } from "commander";
import { DEFAULT_MINIMAL } from "../../types/config.js";
import { SqlScriptFile } from "../../lib/emitter/sql-writer.js";
import { convertDocuments } from "../../lib/pipeline/index.js";
import type { ConvertResult, ConvertSummary } from "../../lib/pipeline/types.js";
import { RunReporter } from "../../lib/reporter/index.js";
import { SqliteOutputStore } from "../../lib/store/output-store.js";
import { logger } from "../../utils/logger.js";
import type { ConvertCommandOptions } from "../config/types.js";
import { failCommand, openRawSources, resolveConfig, type OpenedSources } from "./shared.js";

export interface ConvertOutput {
  status: "success";
  phase: "conversion";
  artifacts: {
    output: string;
    sql?: string;
    manifest?: string;
  };
  summary: ConvertSummary & {
    tables: number;
    durationMs: number;
  };
}

/**
 * Run the conversion without printing, for reuse and tests
 */
export async function runConvert(
  databases: string[],
  options: ConvertCommandOptions,
): Promise<ConvertOutput> {
  const startTime = Date.now();
  let config = resolveConfig(options);
  if (options.minimal) {
    config = { ...config, minimal: config.minimal ?? DEFAULT_MINIMAL };
  }

  const script = options.sql ? await SqlScriptFile.open(options.sql) : null;
  let opened: OpenedSources;
  let output: SqliteOutputStore;
  try {
    opened = openRawSources(databases);
  } catch (error) {
    await script?.abort();
    throw error;
  }
  try {
    output = new SqliteOutputStore({ path: options.output });
  } catch (error) {
    opened.close();
    await script?.abort();
    throw error;
  }

  let result: ConvertResult;
  try {
    result = await convertDocuments(opened.sources, output, config, {
      mode: options.update ? "incremental" : "rebuild",
      skipExisting: options.skipExisting ?? false,
      onDiscovery: (discovery) => {
        script?.start(discovery.ddl);
      },
      onEmission: async (emission) => {
        await script?.write(emission);
      },
    });
  } catch (error) {
    await script?.abort();
    throw error;
  } finally {
    opened.close();
    output.close();
  }
  await script?.close();

  const artifacts: ConvertOutput["artifacts"] = { output: options.output };
  if (options.sql) {
    artifacts.sql = options.sql;
  }

  if (options.manifest !== false) {
    const reporter = new RunReporter("conversion", config, databases);
    await reporter.addArtifact("output", options.output);
    if (options.sql) {
      await reporter.addArtifact("sql", options.sql);
    }
    reporter.setSummary({ ...result.summary, failures: result.failures });
    artifacts.manifest = await reporter.save(options.output);
  }

  logger.info("Conversion finished", { output: options.output });

  return {
    status: "success",
    phase: "conversion",
    artifacts,
    summary: {
      ...result.summary,
      tables: result.discovery.graph.tables.length,
      durationMs: Date.now() - startTime,
    },
  };
}

async function executeConvert(databases: string[], options: ConvertCommandOptions): Promise<void> {
  try {
    const result = await runConvert(databases, options);
    console.log(JSON.stringify(result, null, 2));
    process.exit(0);
  } catch (error) {
    failCommand(error, "conversion");
  }
}

/**
 * Create convert command
 */
export function createConvertCommand(): Command {
  const command = new Command("convert");

  command
    .description("Convert raw document databases into a relational SQLite database")
    .argument("<raw-db...>", "Raw SQLite databases holding a listings table")
    .requiredOption("-o, --output <path>", "Relational SQLite database to write")
    .option("--update", "Keep existing output and only add documents newer than its watermark")
    .option("--skip-existing", "Skip documents already ingested into the output")
    .option("--minimal", "Only keep the root table (or the configured minimal columns)")
    .option("--sql <path>", "Also write the DDL and inserts as a SQL script")
    .option("--no-manifest", "Do not write a run manifest beside the output")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--root-table <name>", "Name of the table holding top-level documents")
    .option("--link-mode <mode>", "Child table linking: embedded, foreignKey")
    .option("--type-policy <policy>", "Column typing: text, auto")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .action(executeConvert);

  return command;
}
