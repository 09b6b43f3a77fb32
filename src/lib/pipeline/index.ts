/**
 * Pipeline module - discovery and conversion runs over one or more raw sources
 */

import type { DocumentFailure } from "../../types/data-model.js";
import type { RelationalizerConfig } from "../../types/config.js";
import { RelationalizerError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { generateDdl } from "../ddl/index.js";
import { RowEmitter } from "../emitter/index.js";
import { Normalizer } from "../normalizer/index.js";
import { Profiler } from "../profiler/index.js";
import { restrictGraph, splitSchema } from "../splitter/index.js";
import type { SqliteOutputStore } from "../store/output-store.js";
import type {
  ConvertOptions,
  ConvertResult,
  ConvertSummary,
  DiscoveryResult,
  DocumentSource,
} from "./types.js";

export * from "./types.js";
export * from "./sources.js";

const DEFAULT_CONVERT_OPTIONS: ConvertOptions = {
  mode: "rebuild",
  skipExisting: false,
};

/**
 * Profile every document of every source and derive the table graph and its DDL
 */
export async function discoverSchema(
  sources: DocumentSource[],
  config: RelationalizerConfig,
  options: { limit?: number } = {},
): Promise<DiscoveryResult> {
  const normalizer = new Normalizer(config);
  const profiler = new Profiler({ castStrings: config.castStrings });

  for (const source of sources) {
    logger.info("Profiling source", { source: source.name });
    for await (const entry of normalizer.normalizeStream(source.documents({ limit: options.limit }))) {
      profiler.observe(entry.document);
    }
  }

  const profile = profiler.getProfileResult();
  let graph = splitSchema(profile.schema, config.rootTableName, config);
  if (config.minimal) {
    graph = restrictGraph(graph, config.minimal);
  }
  const ddl = generateDdl(graph);

  logger.info("Discovery complete", {
    documents: profile.metadata.documentsAnalyzed,
    tables: graph.tables.length,
    conflicts: profile.conflicts.length,
    failures: normalizer.getFailures().length,
  });

  return {
    schema: profile.schema,
    graph,
    ddl,
    conflicts: profile.conflicts,
    failures: normalizer.getFailures(),
    metadata: profile.metadata,
  };
}

/**
 * Convert raw sources into the output store.
 * Each document is written in its own transaction; a failing document is
 * recorded and the run continues.
 */
export async function convertDocuments(
  sources: DocumentSource[],
  output: SqliteOutputStore,
  config: RelationalizerConfig,
  options: Partial<ConvertOptions> = {},
): Promise<ConvertResult> {
  const opts = { ...DEFAULT_CONVERT_OPTIONS, ...options };

  if (opts.mode === "rebuild") {
    output.reset();
  }
  const watermarkBefore = opts.mode === "incremental" ? output.getWatermark() : null;

  // The graph covers the whole corpus so rows already in the store keep fitting it
  const discovery = await discoverSchema(sources, config);
  output.applyDdl(discovery.ddl);
  if (opts.mode === "incremental") {
    output.reconcileSchema(discovery.graph);
  }
  opts.onDiscovery?.(discovery);

  const emitter = new RowEmitter(discovery.graph, config);
  const storeFailures: DocumentFailure[] = [];
  const summary: ConvertSummary = {
    documentsRead: 0,
    documentsWritten: 0,
    documentsSkipped: 0,
    documentsFailed: 0,
    rowsInserted: 0,
    watermarkBefore,
    watermarkAfter: watermarkBefore,
  };

  for (const source of sources) {
    logger.info("Converting source", { source: source.name, since: watermarkBefore });

    for await (const raw of source.documents({ since: watermarkBefore })) {
      summary.documentsRead++;

      if (opts.skipExisting && output.hasDocument(raw.id)) {
        summary.documentsSkipped++;
        continue;
      }

      const result = emitter.emit(raw);
      if (!result.ok) {
        summary.documentsFailed++;
        continue;
      }

      try {
        summary.rowsInserted += output.insertDocument(result.emission);
      } catch (error) {
        if (!(error instanceof RelationalizerError)) throw error;
        summary.documentsFailed++;
        storeFailures.push({
          documentId: raw.id,
          code: error.code,
          message: error.message,
          details: error.cause instanceof Error ? error.cause.message : error.details,
        });
        logger.warn("Document insert failed", { documentId: raw.id, reason: error.message });
        continue;
      }

      summary.documentsWritten++;
      await opts.onEmission?.(result.emission);
    }
  }

  summary.watermarkAfter = output.getWatermark();

  logger.info("Conversion complete", { ...summary });

  return {
    discovery,
    summary,
    failures: [...emitter.getFailures(), ...storeFailures],
  };
}
