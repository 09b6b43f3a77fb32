/**
 * DDL generator - CREATE TABLE statements for a table graph
 */

import type { ColumnSchema, TableGraph, TableSchema } from "../../types/data-model.js";
import { ColumnNameCollisionError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { keyColumnOf } from "../splitter/schema-split.js";
import { quoteIdentifier } from "./sql.js";

export * from "./column-types.js";
export * from "./sql.js";

/**
 * Order tables for creation and insertion.
 * Embedded mode puts leaf tables first (deepest extraction first), since parents
 * hold their children's keys; foreign-key mode puts parents first.
 */
export function orderTables(graph: TableGraph): TableSchema[] {
  const direction = graph.linkMode === "foreignKey" ? 1 : -1;
  return [...graph.tables].sort(
    (a, b) =>
      direction * (a.depth - b.depth) ||
      (a.name === b.name ? 0 : a.name < b.name ? -1 : 1),
  );
}

/**
 * @throws ColumnNameCollisionError when two columns of a table share a name
 */
export function assertUniqueColumns(table: TableSchema): void {
  const seen = new Map<string, ColumnSchema>();
  for (const column of table.columns) {
    const previous = seen.get(column.name);
    if (previous) {
      throw new ColumnNameCollisionError(table.name, column.name, [
        previous.path.join("."),
        column.path.join("."),
      ]);
    }
    seen.set(column.name, column);
  }
}

function columnDefinition(column: ColumnSchema): string {
  let definition = `${quoteIdentifier(column.name)} ${column.sqlType}`;
  if (column.isPrimaryKey) {
    definition += " PRIMARY KEY";
  }
  if (!column.nullable) {
    definition += " NOT NULL";
  }
  return definition;
}

function foreignKeyClauses(table: TableSchema, byName: Map<string, TableSchema>): string[] {
  const clauses: string[] = [];
  for (const column of table.columns) {
    if (column.kind !== "parent" || !column.references) continue;
    const parent = byName.get(column.references);
    const key = parent ? keyColumnOf(parent) : null;
    // SQLite only enforces references to a primary key or unique column
    if (!parent || !key || !key.isPrimaryKey) continue;
    clauses.push(
      `FOREIGN KEY (${quoteIdentifier(column.name)}) REFERENCES ${quoteIdentifier(parent.name)} (${quoteIdentifier(key.name)})`,
    );
  }
  return clauses;
}

/**
 * Render one CREATE TABLE statement, or null for a table without columns
 */
export function createTableStatement(
  table: TableSchema,
  byName: Map<string, TableSchema> = new Map(),
): string | null {
  assertUniqueColumns(table);

  if (table.columns.length === 0) {
    logger.warn("Skipping table without columns", { table: table.name });
    return null;
  }

  const parts = [
    ...table.columns.map(columnDefinition),
    ...foreignKeyClauses(table, byName),
  ];
  return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(table.name)} (${parts.join(", ")});`;
}

/**
 * Generate the DDL for every table of a graph
 *
 * @example
 * generateDdl(graph)
 * // Returns: ['CREATE TABLE IF NOT EXISTS "Phones" (...);', 'CREATE TABLE IF NOT EXISTS "Listings" (...);']
 */
export function generateDdl(graph: TableGraph): string[] {
  const byName = new Map(graph.tables.map((t) => [t.name, t]));
  const statements: string[] = [];

  for (const table of orderTables(graph)) {
    const statement = createTableStatement(table, byName);
    if (statement) {
      statements.push(statement);
    }
  }

  logger.debug("Generated DDL", { tables: statements.length });
  return statements;
}
