/**
 * Minimal mode - keep a subset of the root table and optionally drop child tables
 */

import type { TableGraph } from "../../types/data-model.js";
import { logger } from "../../utils/logger.js";
import type { RestrictOptions } from "./types.js";

/**
 * Restrict a table graph. Root columns outside `columns` are dropped (the primary
 * key always stays); with `rootOnly` every child table and link goes too.
 */
export function restrictGraph(graph: TableGraph, options: RestrictOptions): TableGraph {
  const keep = new Set(options.columns);

  const tables = graph.tables
    .filter((table) => !options.rootOnly || table.name === graph.rootTable)
    .map((table) => {
      if (table.name !== graph.rootTable) {
        return table;
      }

      const columns = table.columns.filter((column) => {
        if (options.rootOnly && column.kind === "reference") return false;
        if (keep.size === 0 || column.isPrimaryKey) return true;
        return keep.has(column.name);
      });

      return {
        ...table,
        columns,
        children: options.rootOnly ? [] : table.children,
      };
    });

  const missing = options.columns.filter(
    (name) => !tables.some((t) => t.name === graph.rootTable && t.columns.some((c) => c.name === name)),
  );
  if (missing.length > 0) {
    logger.warn("Minimal mode columns not found in root table", { missing });
  }

  return { ...graph, tables };
}
