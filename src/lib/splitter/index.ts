/**
 * Table splitter module - factors normalized trees into relational tables
 */

import type { JsonObject, SplitRows, TableGraph } from "../../types/data-model.js";
import { profileDocument } from "../profiler/index.js";
import { splitDocumentRows } from "./row-split.js";
import { splitSchema } from "./schema-split.js";
import type { SplitterOptions } from "./types.js";

export * from "./types.js";
export { splitSchema, keyColumnOf } from "./schema-split.js";
export { splitDocumentRows, toSqlValue } from "./row-split.js";
export { restrictGraph } from "./restrict.js";
export { isTableList, isFlattenedObject, tableNameFor, pathKey } from "./paths.js";

/**
 * Split one normalized document into rows.
 * Given a root table name instead of a graph, the graph is derived from the
 * document's own profile.
 */
export function splitDocument(
  doc: JsonObject,
  target: TableGraph | string,
  options: Partial<SplitterOptions> = {},
): SplitRows {
  const graph =
    typeof target === "string" ? splitSchema(profileDocument(doc), target, options) : target;
  return splitDocumentRows(doc, graph);
}
