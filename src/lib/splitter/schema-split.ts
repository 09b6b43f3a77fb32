/**
 * Schema mode - factor list-valued subtrees of an aggregate schema out into tables
 */

import type {
  AggregateSchema,
  ChildLink,
  ColumnKind,
  ColumnSchema,
  ProfileNode,
  TableGraph,
  TableSchema,
  TypeCounts,
} from "../../types/data-model.js";
import { DEFAULT_CONFIG } from "../../types/config.js";
import { aggregateProfiles, emptyProfile, presenceOf } from "../merger/index.js";
import { inferSqlType, observedTags } from "../ddl/column-types.js";
import { generatedIdKey, rankIdentifierKeys } from "../../utils/key-patterns.js";
import { logger } from "../../utils/logger.js";
import {
  isFlattenedObject,
  isTableList,
  joinPath,
  pathKey,
  tableNameFor,
} from "./paths.js";
import type { SplitterOptions } from "./types.js";

const DEFAULT_OPTIONS: SplitterOptions = {
  columnSeparator: DEFAULT_CONFIG.columnSeparator,
  linkMode: DEFAULT_CONFIG.linkMode,
  typePolicy: DEFAULT_CONFIG.typePolicy,
  columnTypes: DEFAULT_CONFIG.columnTypes,
};

/**
 * One list position feeding a table
 */
interface ListSource {
  table: string;
  owner: string;
  parent: string;
  path: string;
  depth: number;
  node: ProfileNode;
  alwaysPresent: boolean;
}

interface RowScope {
  table: string;
  tablePath: string;
  depth: number;
  /** Rows observed for this table at this position */
  rows: number;
  alwaysPresent: boolean;
}

interface DraftColumn {
  name: string;
  path: string[];
  kind: ColumnKind;
  observed: TypeCounts;
  mixedShape: boolean;
  presence: number;
  nullCount: number;
  nullable: boolean;
  references?: string;
}

/**
 * Walk a table's row profile and record every list that becomes a table, at any depth
 */
function collectLists(
  node: ProfileNode,
  segments: string[],
  scope: RowScope,
  rootTable: string,
  out: ListSource[],
): void {
  for (const [key, child] of Object.entries(node.fields)) {
    const relative = [...segments, key];

    if (isTableList(child)) {
      const table = tableNameFor(key, scope.table, rootTable);
      const path = `${joinPath(scope.tablePath, relative)}.[]`;
      const alwaysPresent =
        scope.alwaysPresent &&
        child.listCount === scope.rows &&
        child.emptyListCount === 0;

      out.push({
        table,
        owner: key,
        parent: scope.table,
        path,
        depth: scope.depth + 1,
        node: child,
        alwaysPresent,
      });

      if (child.element) {
        collectLists(
          child.element,
          [],
          {
            table,
            tablePath: path,
            depth: scope.depth + 1,
            rows: child.element.objectCount,
            alwaysPresent,
          },
          rootTable,
          out,
        );
      }
    } else if (isFlattenedObject(child)) {
      collectLists(child, relative, scope, rootTable, out);
    }
  }
}

/**
 * Walk a table's row profile and collect its columns, flattening nested dicts
 */
function collectColumns(
  node: ProfileNode,
  segments: string[],
  table: string,
  rows: number,
  alwaysPresent: boolean,
  rootTable: string,
  options: SplitterOptions,
  columns: DraftColumn[],
  children: ChildLink[],
): void {
  for (const [key, child] of Object.entries(node.fields)) {
    const relative = [...segments, key];
    const nullCount = child.types.null ?? 0;
    const presence = presenceOf(child);

    if (isTableList(child)) {
      const childTable = tableNameFor(key, table, rootTable);
      children.push({ path: relative, table: childTable });

      if (options.linkMode === "embedded") {
        columns.push({
          name: relative.join(options.columnSeparator),
          path: relative,
          kind: "reference",
          observed: {},
          mixedShape: false,
          presence,
          nullCount,
          nullable: !(alwaysPresent && child.listCount === rows && nullCount === 0),
          references: childTable,
        });
      }
    } else if (isFlattenedObject(child)) {
      collectColumns(
        child,
        relative,
        table,
        rows,
        alwaysPresent,
        rootTable,
        options,
        columns,
        children,
      );
    } else {
      columns.push({
        name: relative.join(options.columnSeparator),
        path: relative,
        kind: "value",
        observed: child.types,
        mixedShape: child.objectCount > 0 || child.listCount > 0,
        presence,
        nullCount,
        nullable: !(alwaysPresent && presence === rows && nullCount === 0),
      });
    }
  }
}

/**
 * Give every column a distinct name. The shortest source path keeps the plain
 * flattened name; longer ones fall back to fuller path prefixes. Names that stay
 * duplicated are left for DDL generation to reject.
 */
function disambiguateColumns(
  table: string,
  columns: DraftColumn[],
  separator: string,
): void {
  const groups = new Map<string, DraftColumn[]>();
  for (const column of columns) {
    const group = groups.get(column.name);
    if (group) {
      group.push(column);
    } else {
      groups.set(column.name, [column]);
    }
  }

  const taken = new Set(groups.keys());
  const wide = `${separator}${separator}`;

  for (const [name, group] of groups) {
    if (group.length < 2) continue;

    const ordered = [...group].sort(
      (a, b) =>
        a.path.length - b.path.length ||
        compareText(pathKey(a.path), pathKey(b.path)),
    );

    for (const column of ordered.slice(1)) {
      const candidates = [
        column.path.join(wide),
        `${table}${wide}${column.path.join(wide)}`,
      ];
      const chosen = candidates.find((candidate) => !taken.has(candidate)) ?? name;
      if (chosen === name) {
        logger.error("Unresolvable column name collision", { table, column: name });
      } else {
        logger.warn("Column name collision resolved", {
          table,
          path: column.path,
          from: name,
          to: chosen,
        });
      }
      column.name = chosen;
      taken.add(chosen);
    }
  }
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Pick the primary key: the first ranked identifier column that is always
 * present, never null and holding only integers or strings
 */
function choosePrimaryKey(
  columns: DraftColumn[],
  owner: string | null,
  rows: number,
): string | null {
  const topLevel = columns.filter((c) => c.kind === "value" && c.path.length === 1);
  const ranked = rankIdentifierKeys(
    topLevel.map((c) => c.name),
    owner,
  );

  for (const name of ranked) {
    const column = topLevel.find((c) => c.name === name);
    if (!column || column.mixedShape || column.nullCount > 0) continue;
    if (rows === 0 || column.presence !== rows) continue;

    const tags = observedTags(column.observed);
    if (tags.length > 0 && tags.every((tag) => tag === "integer" || tag === "string")) {
      return name;
    }
  }
  return null;
}

/**
 * Make the row's generated id the key of a table no natural column can key.
 * Rows that carry a natural identity get the same content hash at row time.
 */
function adoptGeneratedKey(
  columns: DraftColumn[],
  key: string,
  rows: number,
  alwaysPresent: boolean,
): string | null {
  if (rows === 0) return null;

  const existing = columns.find((c) => c.name === key && c.kind === "value" && c.path.length === 1);
  if (existing) {
    if (existing.mixedShape) return null;
    existing.nullable = !alwaysPresent;
    existing.presence = rows;
    return key;
  }
  if (columns.some((c) => c.name === key)) return null;

  const draft: DraftColumn = {
    name: key,
    path: [key],
    kind: "value",
    observed: { integer: rows },
    mixedShape: false,
    presence: rows,
    nullCount: 0,
    nullable: !alwaysPresent,
  };
  const at = columns.findIndex((c) => compareText(c.name, key) > 0);
  columns.splice(at === -1 ? columns.length : at, 0, draft);
  return key;
}

function buildTable(
  name: string,
  owner: string | null,
  element: ProfileNode,
  sources: ListSource[],
  rootTable: string,
  options: SplitterOptions,
): TableSchema {
  const rows = element.objectCount;
  const alwaysPresent = sources.length === 0 || sources.every((s) => s.alwaysPresent);

  const drafts: DraftColumn[] = [];
  const children: ChildLink[] = [];
  collectColumns(
    element,
    [],
    name,
    rows,
    alwaysPresent,
    rootTable,
    options,
    drafts,
    children,
  );
  disambiguateColumns(name, drafts, options.columnSeparator);

  const naturalKey = choosePrimaryKey(drafts, owner, rows);
  const primaryKey =
    naturalKey ?? adoptGeneratedKey(drafts, generatedIdKey(owner ?? rootTable), rows, alwaysPresent);
  if (naturalKey === null && primaryKey !== null) {
    logger.debug("Keyed table by generated id", { table: name, key: primaryKey });
  }

  const columns: ColumnSchema[] = drafts.map((draft) => ({
    name: draft.name,
    path: draft.path,
    sqlType: inferSqlType(
      {
        table: name,
        name: draft.name,
        kind: draft.kind,
        observed: draft.observed,
        mixedShape: draft.mixedShape,
      },
      options,
    ),
    nullable: draft.nullable,
    isPrimaryKey: draft.name === primaryKey,
    kind: draft.kind,
    observed: draft.observed,
    mixedShape: draft.mixedShape,
    ...(draft.references ? { references: draft.references } : {}),
  }));

  return {
    name,
    owner,
    paths: sources.length === 0 ? ["$"] : unique(sources.map((s) => s.path)),
    depth: Math.max(0, ...sources.map((s) => s.depth)),
    parents: unique(sources.map((s) => s.parent)),
    primaryKey,
    alwaysPresent,
    columns,
    children,
  };
}

function unique(values: string[]): string[] {
  return [...new Set(values)].sort(compareText);
}

/**
 * Column naming the identity of a table's rows, used by parent key columns
 */
export function keyColumnOf(table: TableSchema): ColumnSchema | null {
  if (table.primaryKey) {
    return table.columns.find((c) => c.name === table.primaryKey) ?? null;
  }
  const topLevel = table.columns.filter((c) => c.kind === "value" && c.path.length === 1);
  const [first] = rankIdentifierKeys(
    topLevel.map((c) => c.name),
    table.owner,
  );
  return topLevel.find((c) => c.name === first) ?? null;
}

/**
 * Foreign-key mode: every child table gets one key column per parent table
 */
function addParentColumns(tables: TableSchema[], separator: string): void {
  const byName = new Map(tables.map((t) => [t.name, t]));

  for (const table of tables) {
    const taken = new Set(table.columns.map((c) => c.name));

    for (const parentName of table.parents) {
      const parent = byName.get(parentName);
      if (!parent) continue;

      const key = keyColumnOf(parent);
      let name = `${parentName}${separator}${key?.name ?? "Key"}`;
      while (taken.has(name)) {
        name = `Parent${separator}${name}`;
      }
      taken.add(name);

      table.columns.push({
        name,
        path: [],
        sqlType: key?.sqlType ?? "TEXT",
        nullable: table.parents.length !== 1,
        isPrimaryKey: false,
        kind: "parent",
        observed: key?.observed ?? {},
        mixedShape: false,
        references: parentName,
      });
    }
  }
}

/**
 * Split an aggregate schema into a graph of table schemas
 *
 * @param schema - Aggregate schema; its root object count is the corpus size
 * @param rootName - Table name for top-level documents
 */
export function splitSchema(
  schema: AggregateSchema,
  rootName: string,
  options: Partial<SplitterOptions> = {},
): TableGraph {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const sources: ListSource[] = [];
  collectLists(
    schema,
    [],
    {
      table: rootName,
      tablePath: "$",
      depth: 0,
      rows: schema.objectCount,
      alwaysPresent: true,
    },
    rootName,
    sources,
  );

  // Lists reaching the same table name from different paths share one table
  const groups = new Map<string, ListSource[]>();
  for (const source of sources) {
    const group = groups.get(source.table);
    if (group) {
      group.push(source);
    } else {
      groups.set(source.table, [source]);
    }
  }

  const tables: TableSchema[] = [
    buildTable(rootName, null, schema, [], rootName, opts),
  ];

  for (const name of [...groups.keys()].sort(compareText)) {
    const group = groups.get(name) ?? [];
    const element = aggregateProfiles(group.map((s) => s.node.element ?? emptyProfile()));
    const owner = group[0]?.owner ?? name;
    if (group.length > 1) {
      logger.debug("Merging list paths into one table", {
        table: name,
        paths: group.map((s) => s.path),
      });
    }
    tables.push(buildTable(name, owner, element, group, rootName, opts));
  }

  if (opts.linkMode === "foreignKey") {
    addParentColumns(tables, opts.columnSeparator);
  }

  logger.debug("Schema split complete", {
    tables: tables.map((t) => ({ name: t.name, columns: t.columns.length })),
  });

  return {
    rootTable: rootName,
    linkMode: opts.linkMode,
    tables,
  };
}
