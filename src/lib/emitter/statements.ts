/**
 * Insert statement building and rendering
 */

import type {
  InsertStatement,
  PreparedStatement,
  TableGraph,
  TableRow,
} from "../../types/data-model.js";
import { orderTables } from "../ddl/index.js";
import { quoteIdentifier, sqlLiteral } from "../ddl/sql.js";

/**
 * Turn split rows into insert statements, tables in creation order and rows in
 * traversal order within a table. Columns follow the table's column order.
 */
export function buildInsertStatements(rows: TableRow[], graph: TableGraph): InsertStatement[] {
  const statements: InsertStatement[] = [];

  for (const table of orderTables(graph)) {
    for (const row of rows) {
      if (row.table !== table.name) continue;

      const columns = table.columns
        .map((column) => column.name)
        .filter((name) => name in row.values);
      // Tables without columns are never created
      if (columns.length === 0) continue;
      statements.push({
        table: table.name,
        columns,
        values: columns.map((name) => row.values[name] ?? null),
      });
    }
  }
  return statements;
}

/**
 * @example
 * renderInsert({ table: "Listings", columns: ["Id"], values: ["A"] })
 * // Returns: 'INSERT OR IGNORE INTO "Listings" ("Id") VALUES (\'A\');'
 */
export function renderInsert(statement: InsertStatement): string {
  const columns = statement.columns.map(quoteIdentifier).join(", ");
  const values = statement.values.map(sqlLiteral).join(", ");
  return `INSERT OR IGNORE INTO ${quoteIdentifier(statement.table)} (${columns}) VALUES (${values});`;
}

/**
 * Parameterized form of an insert, for the output store
 */
export function toPreparedStatement(statement: InsertStatement): PreparedStatement {
  const columns = statement.columns.map(quoteIdentifier).join(", ");
  const placeholders = statement.values.map(() => "?").join(", ");
  return {
    sql: `INSERT OR IGNORE INTO ${quoteIdentifier(statement.table)} (${columns}) VALUES (${placeholders});`,
    params: [...statement.values],
  };
}
