/**
 * Row mode - split one normalized document into table rows following a table graph
 */

import type {
  ColumnSchema,
  JsonObject,
  JsonValue,
  SqlValue,
  SplitRows,
  TableGraph,
  TableRow,
  TableSchema,
} from "../../types/data-model.js";
import { contentHash } from "../../utils/content-hash.js";
import { RelationalizerError, ErrorCode } from "../../utils/errors.js";
import { generatedIdKey } from "../../utils/key-patterns.js";
import { identityKeyOf, isJsonObject } from "../normalizer/index.js";
import { joinPath, pathKey } from "./paths.js";

/**
 * Per-table lookup of where each document path goes
 */
interface TablePlan {
  table: TableSchema;
  values: Map<string, ColumnSchema>;
  references: Map<string, ColumnSchema>;
  children: Map<string, string>;
  /** Parent key columns by parent table */
  parentColumns: Map<string, ColumnSchema>;
}

interface SplitState {
  graph: TableGraph;
  plans: Map<string, TablePlan>;
  rows: TableRow[];
  unmapped: string[];
}

interface ParentRef {
  table: string;
  id: SqlValue;
}

function buildPlan(table: TableSchema): TablePlan {
  const plan: TablePlan = {
    table,
    values: new Map(),
    references: new Map(),
    children: new Map(),
    parentColumns: new Map(),
  };

  for (const column of table.columns) {
    if (column.kind === "value") {
      plan.values.set(pathKey(column.path), column);
    } else if (column.kind === "reference") {
      plan.references.set(pathKey(column.path), column);
    } else if (column.references) {
      plan.parentColumns.set(column.references, column);
    }
  }
  for (const child of table.children) {
    plan.children.set(pathKey(child.path), child.table);
  }
  return plan;
}

/**
 * Convert a document value to what a column stores
 */
export function toSqlValue(value: JsonValue): SqlValue {
  if (value === null || typeof value === "string" || typeof value === "number") {
    return value;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  return JSON.stringify(value);
}

/**
 * Identity of a row: its primary key value, else its identity key's value.
 * A table keyed by generated id hashes the content of rows that lack one.
 */
function rowIdentity(row: JsonObject, table: TableSchema, rootTable: string): SqlValue {
  const key = table.primaryKey ?? identityKeyOf(row, table.owner, rootTable);
  if (key === null) return null;

  const value = row[key];
  if (value !== undefined && value !== null) {
    return toSqlValue(value);
  }
  if (key !== generatedIdKey(table.owner ?? rootTable)) {
    return null;
  }
  const content: JsonObject = Object.fromEntries(
    Object.entries(row).filter(([name]) => name !== key),
  );
  return contentHash(content);
}

function emitRow(
  row: JsonObject,
  plan: TablePlan,
  parent: ParentRef | null,
  state: SplitState,
): SqlValue {
  const id = rowIdentity(row, plan.table, state.graph.rootTable);
  const values: Record<string, SqlValue> = {};

  // Children are emitted before this row; statements are reordered by table later
  visit(row, [], plan, id, values, state);

  const key = plan.table.primaryKey;
  if (key !== null && id !== null && (values[key] === undefined || values[key] === null)) {
    values[key] = id;
  }

  if (parent) {
    const column = plan.parentColumns.get(parent.table);
    if (column) {
      values[column.name] = parent.id;
    }
  }

  state.rows.push({ table: plan.table.name, values });
  return id;
}

function visit(
  node: JsonObject,
  prefix: string[],
  plan: TablePlan,
  id: SqlValue,
  values: Record<string, SqlValue>,
  state: SplitState,
): void {
  for (const [key, value] of Object.entries(node)) {
    const relative = [...prefix, key];
    const lookup = pathKey(relative);

    const childTable = plan.children.get(lookup);
    if (childTable !== undefined && (Array.isArray(value) || value === null)) {
      const reference = plan.references.get(lookup);
      const childPlan = state.plans.get(childTable);

      if (value === null || !childPlan) {
        if (reference) values[reference.name] = null;
        if (value !== null) markUnmapped(state, plan, relative);
        continue;
      }

      const ids: SqlValue[] = [];
      value.forEach((element, index) => {
        if (isJsonObject(element)) {
          ids.push(emitRow(element, childPlan, { table: plan.table.name, id }, state));
        } else {
          markUnmapped(state, plan, [...relative, String(index)]);
        }
      });
      if (reference) {
        values[reference.name] = JSON.stringify(ids);
      }
      continue;
    }

    const column = plan.values.get(lookup);
    if (column) {
      values[column.name] = toSqlValue(value);
      continue;
    }

    if (isJsonObject(value)) {
      visit(value, relative, plan, id, values, state);
      continue;
    }
    if (value === null) {
      continue;
    }

    markUnmapped(state, plan, relative);
  }
}

function markUnmapped(state: SplitState, plan: TablePlan, segments: string[]): void {
  state.unmapped.push(`${plan.table.name}:${joinPath("$", segments)}`);
}

/**
 * Split a normalized document into rows of the graph's tables.
 * Rows come out in traversal order, children before the row that lists them.
 *
 * @throws RelationalizerError when the graph has no root table
 */
export function splitDocumentRows(doc: JsonObject, graph: TableGraph): SplitRows {
  const plans = new Map(graph.tables.map((table) => [table.name, buildPlan(table)]));
  const root = plans.get(graph.rootTable);
  if (!root) {
    throw new RelationalizerError(
      ErrorCode.GENERAL_ERROR,
      `Table graph has no root table "${graph.rootTable}"`,
    );
  }

  const state: SplitState = { graph, plans, rows: [], unmapped: [] };
  emitRow(doc, root, null, state);

  return { rows: state.rows, unmappedPaths: state.unmapped };
}
