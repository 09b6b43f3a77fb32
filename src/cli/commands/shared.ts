/**
 * Helpers shared by CLI commands
 */

import type { RelationalizerConfig } from "../../types/config.js";
import { ConfigError, ErrorCode, toRelationalizerError } from "../../utils/errors.js";
import { loadConfig } from "../../utils/config-loader.js";
import { isLogLevel, logger } from "../../utils/logger.js";
import type { DocumentSource } from "../../lib/pipeline/types.js";
import { RawDocumentStore } from "../../lib/store/raw-store.js";
import { parseConfigFile } from "../config/parser.js";
import type { CommonCommandOptions } from "../config/types.js";

/**
 * Apply --log-level, then load configuration: CLI > config file > defaults
 */
export function resolveConfig(options: CommonCommandOptions): RelationalizerConfig {
  if (options.logLevel) {
    if (!isLogLevel(options.logLevel)) {
      throw new ConfigError(`Unknown log level: ${options.logLevel}`);
    }
    logger.setLevel(options.logLevel);
  }

  const fileContent = options.config ? parseConfigFile(options.config) : undefined;
  return loadConfig(
    {
      rootTableName: options.rootTable,
      linkMode: options.linkMode,
      typePolicy: options.typePolicy,
    },
    fileContent,
    options.config,
  );
}

export interface OpenedSources {
  sources: DocumentSource[];
  close(): void;
}

/**
 * Open raw databases read-only as document sources
 */
export function openRawSources(paths: string[]): OpenedSources {
  const stores: RawDocumentStore[] = [];
  try {
    for (const path of paths) {
      stores.push(new RawDocumentStore({ path, readonly: true }));
    }
  } catch (error) {
    stores.forEach((store) => store.close());
    throw error;
  }

  return {
    sources: stores.map((store, index) => ({
      name: paths[index] ?? `source-${index}`,
      documents: (options) => store.documents(options),
    })),
    close: () => stores.forEach((store) => store.close()),
  };
}

export function exitCodeFor(code: ErrorCode): number {
  switch (code) {
    case ErrorCode.CONFIG_ERROR:
      return 2;
    case ErrorCode.STORE_ERROR:
      return 3;
    case ErrorCode.FILE_IO_ERROR:
      return 4;
    default:
      return 1;
  }
}

/**
 * Print the error response for a phase and exit
 */
export function failCommand(error: unknown, phase: string): never {
  const wrapped = toRelationalizerError(error);
  logger.debug("Command failed", { phase, stack: wrapped.stack });
  console.error(JSON.stringify(wrapped.toResponse(phase), null, 2));
  process.exit(exitCodeFor(wrapped.code));
}
