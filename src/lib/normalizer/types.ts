/**
 * Normalizer module types
 */

import type {
  DocumentFailure,
  NormalizedDocument,
  RawDocument,
} from "../../types/data-model.js";
import type { RelationalizerConfig } from "../../types/config.js";

export type NormalizerOptions = Pick<
  RelationalizerConfig,
  "rootTableName" | "collapseThreshold" | "delimiter" | "noiseKeys" | "fieldRules"
>;

export interface NormalizedEntry {
  raw: RawDocument;
  document: NormalizedDocument;
}

export interface NormalizerResult {
  documents: NormalizedEntry[];
  failures: DocumentFailure[];
}
