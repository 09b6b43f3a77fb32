/**
 * Pipeline module types
 */

import type {
  AggregateSchema,
  DocumentFailure,
  RawDocument,
  ShapeConflict,
  TableGraph,
} from "../../types/data-model.js";
import type { DocumentEmission } from "../emitter/types.js";
import type { ProfilerMetadata } from "../profiler/types.js";
import type { RawReadOptions } from "../store/types.js";

/**
 * Anything that can hand out raw documents more than once
 */
export interface DocumentSource {
  name: string;
  documents(options?: RawReadOptions): Iterable<RawDocument> | AsyncIterable<RawDocument>;
}

export interface DiscoveryResult {
  schema: AggregateSchema;
  graph: TableGraph;
  ddl: string[];
  conflicts: ShapeConflict[];
  failures: DocumentFailure[];
  metadata: ProfilerMetadata;
}

export type ConvertMode = "rebuild" | "incremental";

export interface ConvertOptions {
  /** rebuild drops the output first; incremental only takes documents newer than the watermark */
  mode: ConvertMode;
  /** Skip documents whose id was already ingested */
  skipExisting: boolean;
  /** Called once the table graph is known and its DDL applied */
  onDiscovery?: (discovery: DiscoveryResult) => void;
  /** Called for every document written to the output store; awaited before the next one */
  onEmission?: (emission: DocumentEmission) => void | Promise<void>;
}

export interface ConvertSummary {
  documentsRead: number;
  documentsWritten: number;
  documentsSkipped: number;
  documentsFailed: number;
  rowsInserted: number;
  watermarkBefore: string | null;
  watermarkAfter: string | null;
}

export interface ConvertResult {
  discovery: DiscoveryResult;
  summary: ConvertSummary;
  failures: DocumentFailure[];
}
