/**
 * SQL text helpers
 */

import type { SqlValue } from "../../types/data-model.js";

/**
 * Quote an identifier for SQLite
 *
 * @example
 * quoteIdentifier('Order') // Returns: '"Order"'
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Render a value as a SQL literal
 *
 * @example
 * sqlLiteral("O'Neil") // Returns: "'O''Neil'"
 */
export function sqlLiteral(value: SqlValue): string {
  if (value === null) {
    return "NULL";
  }
  if (typeof value === "number") {
    return String(value);
  }
  return `'${value.replace(/'/g, "''")}'`;
}
