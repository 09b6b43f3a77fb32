/**
 * Coerce split values to what their column's SQL type stores
 */

import type { ColumnSchema, SqlValue } from "../../types/data-model.js";

const INTEGER_TEXT = /^-?\d+$/;
const REAL_TEXT = /^-?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * @example
 * coerceValue("42", integerColumn) // Returns: 42
 * coerceValue(7, textColumn) // Returns: "7"
 */
export function coerceValue(value: SqlValue, column: ColumnSchema): SqlValue {
  if (value === null) {
    return null;
  }

  switch (column.sqlType) {
    case "TEXT":
      return typeof value === "number" ? String(value) : value;
    case "INTEGER":
      if (typeof value === "string" && INTEGER_TEXT.test(value)) {
        const parsed = Number(value);
        return Number.isSafeInteger(parsed) ? parsed : value;
      }
      return value;
    case "REAL":
      if (typeof value === "string" && REAL_TEXT.test(value)) {
        return Number(value);
      }
      return value;
  }
}
