/**
 * Raw document store - reads scrape results kept as JSON text in SQLite
 */

import type { Database as DatabaseInstance, Statement } from "better-sqlite3";
import Database from "better-sqlite3";
import type { RawDocument } from "../../types/data-model.js";
import { StoreError } from "../../utils/errors.js";
import { quoteIdentifier } from "../ddl/sql.js";
import type { RawReadOptions, RawStoreConfig } from "./types.js";

interface RawRow {
  id: number | string;
  details: string;
  last_updated: string;
}

export const DEFAULT_RAW_TABLE = "listings";

export function openDatabase(path: string | undefined, readonly = false): DatabaseInstance {
  if (!path) {
    throw new StoreError("A database path or instance is required");
  }
  try {
    return new Database(path, { readonly, fileMustExist: readonly });
  } catch (error) {
    throw new StoreError(`Failed to open database: ${path}`, { path }, { cause: error });
  }
}

export class RawDocumentStore {
  private readonly db: DatabaseInstance;
  private readonly table: string;

  constructor(config: RawStoreConfig) {
    // Files are opened read-only unless asked otherwise; handed-in databases are writable
    const readonly = config.readonly ?? config.database === undefined;
    this.db = config.database ?? openDatabase(config.path, readonly);
    this.table = quoteIdentifier(config.table ?? DEFAULT_RAW_TABLE);
    if (!readonly) {
      this.initSchema();
    }
  }

  private initSchema(): void {
    this.db.exec(
      `CREATE TABLE IF NOT EXISTS ${this.table} (id INTEGER PRIMARY KEY, details TEXT NOT NULL, last_updated TEXT NOT NULL)`,
    );
  }

  /**
   * Add a raw document; an existing id is left untouched
   */
  insert(doc: RawDocument): void {
    const details = typeof doc.body === "string" ? doc.body : JSON.stringify(doc.body);
    const id = /^\d+$/.test(doc.id) ? Number(doc.id) : doc.id;
    this.db
      .prepare(`INSERT OR IGNORE INTO ${this.table} (id, details, last_updated) VALUES (?, ?, ?)`)
      .run(id, details, doc.lastUpdated);
  }

  count(): number {
    const row = this.db
      .prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${this.table}`)
      .get();
    return row?.total ?? 0;
  }

  /**
   * Most recent update timestamp in the store
   */
  latestUpdate(): string | null {
    const row = this.db
      .prepare<[], { latest: string | null }>(`SELECT MAX(last_updated) AS latest FROM ${this.table}`)
      .get();
    return row?.latest ?? null;
  }

  /**
   * Iterate raw documents in id order. Bodies stay JSON text; the normalizer parses them.
   */
  *documents(options: RawReadOptions = {}): Generator<RawDocument> {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (options.since) {
      clauses.push("last_updated > ?");
      params.push(options.since);
    }

    let sql = `SELECT id, details, last_updated FROM ${this.table}`;
    if (clauses.length > 0) sql += ` WHERE ${clauses.join(" AND ")}`;
    sql += " ORDER BY id";
    if (options.limit !== undefined) {
      sql += " LIMIT ?";
      params.push(options.limit);
    }

    for (const row of this.prepareRead(sql).iterate(...params)) {
      yield {
        id: String(row.id),
        body: row.details,
        lastUpdated: row.last_updated,
      };
    }
  }

  private prepareRead(sql: string): Statement<Array<string | number>, RawRow> {
    try {
      return this.db.prepare<Array<string | number>, RawRow>(sql);
    } catch (error) {
      throw new StoreError("Raw store is missing its document table", { sql }, { cause: error });
    }
  }

  close(): void {
    this.db.close();
  }
}
