/**
 * Relational output store - applies DDL and document inserts to SQLite
 */

import type { Database as DatabaseInstance, Statement } from "better-sqlite3";
import type { ColumnSchema, SqlType, TableGraph, TableSchema } from "../../types/data-model.js";
import { RowValidationError, StoreError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { createTableStatement } from "../ddl/index.js";
import { quoteIdentifier } from "../ddl/sql.js";
import type { DocumentEmission } from "../emitter/types.js";
import { toPreparedStatement } from "../emitter/statements.js";
import { openDatabase } from "./raw-store.js";
import type { IngestionRecord, SchemaChanges, StoreConfig, StoredColumn } from "./types.js";

export const INGESTION_TABLE = "_ingestion";
const REBUILD_SUFFIX = "__rebuild";

function toSqlType(declared: string): SqlType {
  const upper = declared.toUpperCase();
  return upper === "INTEGER" || upper === "REAL" ? upper : "TEXT";
}

/**
 * Insertion result metrics
 */
export interface InsertionMetrics {
  documents: number;
  statements: number;
  insertedRows: number;
  failedDocuments: number;
}

export class SqliteOutputStore {
  private readonly db: DatabaseInstance;
  private readonly statements = new Map<string, Statement>();
  private readonly notNullColumns = new Map<string, Set<string>>();
  private metrics: InsertionMetrics = {
    documents: 0,
    statements: 0,
    insertedRows: 0,
    failedDocuments: 0,
  };

  constructor(config: StoreConfig) {
    this.db = config.database ?? openDatabase(config.path, false);
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(
      `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(INGESTION_TABLE)} (document_id TEXT PRIMARY KEY, last_updated TEXT NOT NULL)`,
    );
  }

  private prepare(sql: string): Statement {
    let statement = this.statements.get(sql);
    if (!statement) {
      statement = this.db.prepare(sql);
      this.statements.set(sql, statement);
    }
    return statement;
  }

  /**
   * Drop every table for a full rebuild
   */
  reset(): void {
    const tables = this.tableNames(true);
    this.statements.clear();
    this.notNullColumns.clear();

    // Child tables may reference the tables dropped before them
    const enforced = this.db.pragma("foreign_keys", { simple: true }) === 1;
    this.db.pragma("foreign_keys = OFF");
    try {
      this.db.transaction(() => {
        for (const table of tables) {
          this.db.exec(`DROP TABLE IF EXISTS ${quoteIdentifier(table)}`);
        }
      })();
    } finally {
      this.db.pragma(`foreign_keys = ${enforced ? "ON" : "OFF"}`);
    }
    this.initSchema();
    logger.info("Output store reset", { droppedTables: tables.length });
  }

  applyDdl(ddl: string[]): void {
    try {
      this.db.transaction(() => {
        for (const statement of ddl) {
          this.db.exec(statement);
        }
      })();
    } catch (error) {
      throw new StoreError("Failed to apply DDL", { statements: ddl.length }, { cause: error });
    }
  }

  private columnInfo(table: string): StoredColumn[] {
    return this.db
      .prepare<[], StoredColumn>(`PRAGMA table_info(${quoteIdentifier(table)})`)
      .all();
  }

  /**
   * Bring tables already in the store in line with the graph. Columns the graph
   * gained are added as nullable, since rows already stored have no value for
   * them. Columns the graph now allows to be null lose their NOT NULL, which
   * SQLite can only do by copying the table.
   *
   * @returns Changed columns as "Table.Column"
   */
  reconcileSchema(graph: TableGraph): SchemaChanges {
    const changes: SchemaChanges = { added: [], relaxed: [] };
    const existing = new Set(this.tableNames());

    for (const table of graph.tables) {
      if (!existing.has(table.name)) continue;

      const stored = new Map(this.columnInfo(table.name).map((column) => [column.name, column]));
      const relaxed = table.columns.filter((column) => {
        const current = stored.get(column.name);
        return current !== undefined && current.notnull === 1 && column.nullable && !column.isPrimaryKey;
      });

      const missing = table.columns.filter((column) => !stored.has(column.name));
      changes.added.push(...missing.map((column) => `${table.name}.${column.name}`));

      if (relaxed.length > 0) {
        this.rebuildTable(table, [...stored.values()], graph);
        changes.relaxed.push(...relaxed.map((column) => `${table.name}.${column.name}`));
        continue;
      }

      for (const column of missing) {
        this.db.exec(
          `ALTER TABLE ${quoteIdentifier(table.name)} ADD COLUMN ${quoteIdentifier(column.name)} ${column.sqlType}`,
        );
      }
    }

    if (changes.added.length > 0 || changes.relaxed.length > 0) {
      this.statements.clear();
      this.notNullColumns.clear();
      logger.info("Reconciled stored tables with the schema", { ...changes });
    }
    return changes;
  }

  /**
   * Recreate a table from the graph and copy its rows over. Columns new to the
   * table are nullable, and stored columns the graph no longer has are kept.
   */
  private rebuildTable(table: TableSchema, stored: StoredColumn[], graph: TableGraph): void {
    const present = new Set(stored.map((column) => column.name));
    const columns = table.columns.map((column) =>
      present.has(column.name) ? column : { ...column, nullable: true },
    );
    const known = new Set(table.columns.map((column) => column.name));
    const extra: ColumnSchema[] = stored
      .filter((column) => !known.has(column.name))
      .map((column): ColumnSchema => ({
        name: column.name,
        path: [],
        sqlType: toSqlType(column.type),
        nullable: true,
        isPrimaryKey: false,
        kind: "value",
        observed: {},
        mixedShape: false,
      }));

    const staging = `${table.name}${REBUILD_SUFFIX}`;
    const create = createTableStatement(
      { ...table, name: staging, columns: [...columns, ...extra] },
      new Map(graph.tables.map((t) => [t.name, t])),
    );
    if (!create) return;

    const copied = stored
      .map((column) => quoteIdentifier(column.name))
      .join(", ");

    const enforced = this.db.pragma("foreign_keys", { simple: true }) === 1;
    this.db.pragma("foreign_keys = OFF");
    try {
      this.db.transaction(() => {
        this.db.exec(`DROP TABLE IF EXISTS ${quoteIdentifier(staging)}`);
        this.db.exec(create);
        this.db.exec(
          `INSERT INTO ${quoteIdentifier(staging)} (${copied}) SELECT ${copied} FROM ${quoteIdentifier(table.name)}`,
        );
        this.db.exec(`DROP TABLE ${quoteIdentifier(table.name)}`);
        this.db.exec(`ALTER TABLE ${quoteIdentifier(staging)} RENAME TO ${quoteIdentifier(table.name)}`);
      })();
    } catch (error) {
      throw new StoreError(`Failed to rebuild table ${table.name}`, { table: table.name }, { cause: error });
    } finally {
      this.db.pragma(`foreign_keys = ${enforced ? "ON" : "OFF"}`);
    }
    logger.info("Rebuilt table to relax NOT NULL", { table: table.name });
  }

  /**
   * NOT NULL columns of a stored table, primary keys included
   */
  private requiredColumns(table: string): Set<string> {
    let required = this.notNullColumns.get(table);
    if (!required) {
      required = new Set(
        this.columnInfo(table)
          .filter((column) => column.notnull === 1)
          .map((column) => column.name),
      );
      this.notNullColumns.set(table, required);
    }
    return required;
  }

  /**
   * NOT NULL columns of the stored tables a document leaves empty.
   * `INSERT OR IGNORE` would silently drop such rows.
   */
  private missingRequired(emission: DocumentEmission): string[] {
    const missing: string[] = [];
    for (const statement of emission.statements) {
      for (const name of this.requiredColumns(statement.table)) {
        const index = statement.columns.indexOf(name);
        if (index === -1 || statement.values[index] === null) {
          missing.push(`${statement.table}.${name}`);
        }
      }
    }
    return missing;
  }

  /**
   * Insert one document's statements and its ingestion record in a single transaction
   *
   * @returns Rows actually inserted
   * @throws RowValidationError when a row lacks a value the stored table requires
   * @throws StoreError when any statement fails; nothing of the document is kept
   */
  insertDocument(emission: DocumentEmission): number {
    this.metrics.documents++;
    const missing = this.missingRequired(emission);
    if (missing.length > 0) {
      this.metrics.failedDocuments++;
      throw new RowValidationError(
        `Document ${emission.documentId} has no value for NOT NULL column(s): ${missing.join(", ")}`,
        { documentId: emission.documentId, columns: missing },
      );
    }

    const run = this.db.transaction((doc: DocumentEmission) => {
      let inserted = 0;
      for (const statement of doc.statements) {
        const prepared = toPreparedStatement(statement);
        inserted += this.prepare(prepared.sql).run(...prepared.params).changes;
      }
      this.recordIngestion({ documentId: doc.documentId, lastUpdated: doc.lastUpdated });
      return inserted;
    });

    try {
      const inserted = run(emission);
      this.metrics.statements += emission.statements.length;
      this.metrics.insertedRows += inserted;
      return inserted;
    } catch (error) {
      this.metrics.failedDocuments++;
      throw new StoreError(
        `Failed to insert document ${emission.documentId}`,
        { documentId: emission.documentId },
        { cause: error },
      );
    }
  }

  recordIngestion(record: IngestionRecord): void {
    this.prepare(
      `INSERT OR REPLACE INTO ${quoteIdentifier(INGESTION_TABLE)} (document_id, last_updated) VALUES (?, ?)`,
    ).run(record.documentId, record.lastUpdated);
  }

  /**
   * Latest lastUpdated ingested so far, null for an empty store
   */
  getWatermark(): string | null {
    const row = this.db
      .prepare<[], { watermark: string | null }>(
        `SELECT MAX(last_updated) AS watermark FROM ${quoteIdentifier(INGESTION_TABLE)}`,
      )
      .get();
    return row?.watermark ?? null;
  }

  hasDocument(documentId: string): boolean {
    const row = this.db
      .prepare<[string], { found: number }>(
        `SELECT 1 AS found FROM ${quoteIdentifier(INGESTION_TABLE)} WHERE document_id = ?`,
      )
      .get(documentId);
    return row !== undefined;
  }

  /**
   * Tables in the store, the ingestion table only when asked for
   */
  tableNames(includeIngestion = false): string[] {
    const rows = this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      )
      .all();
    return rows
      .map((row) => row.name)
      .filter((name) => includeIngestion || name !== INGESTION_TABLE);
  }

  countRows(table: string): number {
    const row = this.db
      .prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${quoteIdentifier(table)}`)
      .get();
    return row?.total ?? 0;
  }

  /**
   * All rows of a table, for inspection and tests
   */
  selectAll(table: string): Record<string, unknown>[] {
    return this.db
      .prepare<[], Record<string, unknown>>(`SELECT * FROM ${quoteIdentifier(table)} ORDER BY rowid`)
      .all();
  }

  getMetrics(): InsertionMetrics {
    return { ...this.metrics };
  }

  close(): void {
    this.db.close();
  }
}
