/**
 * Store module types
 */

import type { Database as DatabaseInstance } from "better-sqlite3";

export interface StoreConfig {
  /** Database file; ignored when `database` is given */
  path?: string;
  database?: DatabaseInstance;
  readonly?: boolean;
}

export interface RawStoreConfig extends StoreConfig {
  /** Table holding raw documents */
  table?: string;
}

export interface RawReadOptions {
  /** Only documents updated strictly after this timestamp */
  since?: string | null;
  limit?: number;
}

export interface IngestionRecord {
  documentId: string;
  lastUpdated: string;
}

/**
 * Row of `PRAGMA table_info`
 */
export interface StoredColumn {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
}

export interface SchemaChanges {
  /** Columns added as "Table.Column" */
  added: string[];
  /** Columns whose NOT NULL was dropped, as "Table.Column" */
  relaxed: string[];
}
