/**
 * Profiler module types
 */

import type { AggregateSchema, ShapeConflict } from "../../types/data-model.js";

/**
 * Options for the profiler
 */
export interface ProfilerOptions {
  /** Classify numeric and boolean-looking strings by the type they spell */
  castStrings: boolean;
}

export interface ProfilerMetadata {
  documentsAnalyzed: number;
  fieldPathsFound: number;
  listPathsFound: number;
  shapeConflicts: number;
}

export interface ProfilerResult {
  schema: AggregateSchema;
  conflicts: ShapeConflict[];
  metadata: ProfilerMetadata;
}
