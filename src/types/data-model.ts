/**
 * Core data model types for relationalizer
 * These structures flow through the pipeline: raw → normalization → profiling → merge → split → DDL/DML
 */

/**
 * JSON-like tree values
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * RawDocument - One stored scrape result, owned by the raw store
 */
export interface RawDocument {
  id: string;
  body: unknown;
  lastUpdated: string; // ISO-8601 date or date-time
}

/**
 * NormalizedDocument - canonical, hashable shape of a raw document body
 */
export type NormalizedDocument = JsonObject;

/**
 * Leaf classification used while profiling
 */
export type TypeTag = "string" | "integer" | "float" | "boolean" | "null";

export const TYPE_TAGS: readonly TypeTag[] = [
  "string",
  "integer",
  "float",
  "boolean",
  "null",
];

export type TypeCounts = Partial<Record<TypeTag, number>>;

/**
 * ProfileNode - type observations at one tree position.
 * Used both for a single document (TypeProfile) and for the whole corpus (AggregateSchema).
 */
export interface ProfileNode {
  types: TypeCounts;
  /** Times this position held an object */
  objectCount: number;
  /** Times this position held a list */
  listCount: number;
  /** Times this position held an empty list */
  emptyListCount: number;
  fields: Record<string, ProfileNode>;
  /** Merged profile of every list element seen here */
  element: ProfileNode | null;
}

export type TypeProfile = ProfileNode;
export type AggregateSchema = ProfileNode;

/**
 * ShapeConflict - a path observed with more than one incompatible shape
 */
export interface ShapeConflict {
  path: string;
  scalarCount: number;
  objectCount: number;
  listCount: number;
  types: TypeCounts;
}

export type SqlType = "INTEGER" | "REAL" | "TEXT";
export type SqlValue = string | number | null;

export type LinkMode = "embedded" | "foreignKey";
export type TypePolicy = "text" | "auto";

/**
 * ColumnKind - how a column gets its value at row time
 * value: a leaf (or a JSON text fallback for shape conflicts)
 * reference: serialized list of child table keys (embedded mode)
 * parent: key of the parent row (foreignKey mode)
 */
export type ColumnKind = "value" | "reference" | "parent";

export interface ColumnSchema {
  name: string;
  /** Path segments relative to the table's row object */
  path: string[];
  sqlType: SqlType;
  nullable: boolean;
  isPrimaryKey: boolean;
  kind: ColumnKind;
  /** Leaf type observations backing this column */
  observed: TypeCounts;
  /** Objects or lists were also observed here; row values are stored as JSON text */
  mixedShape: boolean;
  /** Child table for reference columns, parent table for parent columns */
  references?: string;
}

export interface ChildLink {
  /** Path of the list, relative to the parent row */
  path: string[];
  table: string;
}

export interface TableSchema {
  name: string;
  /** List key the rows were extracted from, null for the root table */
  owner: string | null;
  /** Source paths (e.g. "$.Individual.[].Phones.[]") merged into this table */
  paths: string[];
  /** Extraction depth, root is 0 */
  depth: number;
  /** Tables that embed or own rows of this table */
  parents: string[];
  primaryKey: string | null;
  /** True when a row of this table was observed under every parent row */
  alwaysPresent: boolean;
  columns: ColumnSchema[];
  children: ChildLink[];
}

export interface TableGraph {
  rootTable: string;
  linkMode: LinkMode;
  tables: TableSchema[];
}

export interface TableRow {
  table: string;
  values: Record<string, SqlValue>;
}

export interface SplitRows {
  rows: TableRow[];
  /** Document paths that had no column in the graph */
  unmappedPaths: string[];
}

export interface InsertStatement {
  table: string;
  columns: string[];
  values: SqlValue[];
}

export interface PreparedStatement {
  sql: string;
  params: SqlValue[];
}

/**
 * DocumentFailure - a skipped document and why
 */
export interface DocumentFailure {
  documentId: string;
  code: string;
  message: string;
  details?: unknown;
}
