/**
 * Column SQL type inference.
 * Baseline policy is broad text; only integer-looking identifiers become INTEGER.
 * The "auto" policy follows the observed tags and falls back to TEXT on any inconsistency.
 */

import {
  TYPE_TAGS,
  type ColumnKind,
  type SqlType,
  type TypeCounts,
  type TypePolicy,
  type TypeTag,
} from "../../types/data-model.js";
import { isIdentifierKey } from "../../utils/key-patterns.js";

export interface ColumnTypeInput {
  table: string;
  name: string;
  kind: ColumnKind;
  observed: TypeCounts;
  mixedShape: boolean;
}

export interface ColumnTypeOptions {
  typePolicy: TypePolicy;
  /** Overrides keyed by "Table.Column" or "Column" */
  columnTypes: Record<string, SqlType>;
}

/**
 * Observed tags other than null, in canonical order
 */
export function observedTags(observed: TypeCounts): TypeTag[] {
  return TYPE_TAGS.filter((tag) => tag !== "null" && (observed[tag] ?? 0) > 0);
}

function onlyTags(tags: TypeTag[], allowed: TypeTag[]): boolean {
  return tags.length > 0 && tags.every((tag) => allowed.includes(tag));
}

export function inferSqlType(
  column: ColumnTypeInput,
  options: ColumnTypeOptions,
): SqlType {
  const override =
    options.columnTypes[`${column.table}.${column.name}`] ??
    options.columnTypes[column.name];
  if (override) {
    return override;
  }

  if (column.kind === "reference" || column.mixedShape) {
    return "TEXT";
  }

  const tags = observedTags(column.observed);

  if (isIdentifierKey(column.name) && onlyTags(tags, ["integer"])) {
    return "INTEGER";
  }

  if (options.typePolicy === "auto") {
    if (onlyTags(tags, ["integer"])) return "INTEGER";
    if (onlyTags(tags, ["integer", "float"])) return "REAL";
    if (onlyTags(tags, ["boolean"])) return "INTEGER";
  }

  return "TEXT";
}
