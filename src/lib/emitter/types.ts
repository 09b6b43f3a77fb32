/**
 * Emitter module types
 */

import type { RelationalizerConfig } from "../../types/config.js";
import type { DocumentFailure, InsertStatement } from "../../types/data-model.js";

export type EmitterOptions = Pick<
  RelationalizerConfig,
  "rootTableName" | "collapseThreshold" | "delimiter" | "noiseKeys" | "fieldRules"
>;

/**
 * Insert statements produced for one raw document
 */
export interface DocumentEmission {
  documentId: string;
  lastUpdated: string;
  statements: InsertStatement[];
  /** Document paths the table graph has no column for */
  unmappedPaths: string[];
}

export type EmitResult =
  | { ok: true; emission: DocumentEmission }
  | { ok: false; failure: DocumentFailure };

export interface EmitterMetrics {
  documents: number;
  emitted: number;
  failed: number;
  statements: number;
}

export interface RowViolation {
  table: string;
  path: string;
  message: string;
}
