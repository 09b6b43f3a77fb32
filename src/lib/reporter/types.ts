/**
 * Reporter module types
 */

import type {
  ColumnKind,
  DocumentFailure,
  LinkMode,
  ShapeConflict,
  SqlType,
} from "../../types/data-model.js";

export type RunPhase = "analysis" | "conversion";

export interface ColumnReport {
  name: string;
  path: string;
  sqlType: SqlType;
  nullable: boolean;
  primaryKey: boolean;
  kind: ColumnKind;
  references?: string;
}

export interface TableReport {
  name: string;
  paths: string[];
  parents: string[];
  depth: number;
  primaryKey: string | null;
  alwaysPresent: boolean;
  columns: ColumnReport[];
}

/**
 * Schema report written by `analyze --report`
 */
export interface SchemaReport {
  generatedAt: string;
  documentsAnalyzed: number;
  rootTable: string;
  linkMode: LinkMode;
  tables: TableReport[];
  conflicts: ShapeConflict[];
  failures: DocumentFailure[];
}

export interface ArtifactRecord {
  path: string;
  hash: string;
  size?: number;
}

/**
 * Run manifest for auditability: what ran, with which settings, producing which files
 */
export interface RunManifest {
  version: string;
  tool: {
    name: string;
    version: string;
  };
  run: {
    id: string;
    timestamp: string;
    phase: RunPhase;
  };
  config: Record<string, unknown>;
  sources: string[];
  artifacts: Record<string, ArtifactRecord>;
  summary: Record<string, unknown>;
}
