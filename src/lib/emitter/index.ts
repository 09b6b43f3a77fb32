/**
 * Emitter module - turns raw documents into validated insert statements
 */

import type {
  ColumnSchema,
  DocumentFailure,
  RawDocument,
  SqlValue,
  TableGraph,
  TableRow,
} from "../../types/data-model.js";
import { DEFAULT_CONFIG } from "../../types/config.js";
import { RowValidationError, toRelationalizerError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { normalizeDocument } from "../normalizer/index.js";
import { splitDocument } from "../splitter/index.js";
import { RowValidator } from "./row-validator.js";
import { coerceValue } from "./sql-values.js";
import { buildInsertStatements } from "./statements.js";
import type { EmitResult, EmitterMetrics, EmitterOptions } from "./types.js";

export * from "./types.js";
export * from "./statements.js";
export * from "./sql-values.js";
export * from "./row-validator.js";
export * from "./sql-writer.js";

const DEFAULT_OPTIONS: EmitterOptions = {
  rootTableName: DEFAULT_CONFIG.rootTableName,
  collapseThreshold: DEFAULT_CONFIG.collapseThreshold,
  delimiter: DEFAULT_CONFIG.delimiter,
  noiseKeys: DEFAULT_CONFIG.noiseKeys,
  fieldRules: DEFAULT_CONFIG.fieldRules,
};

function coerceRows(rows: TableRow[], graph: TableGraph): TableRow[] {
  const columns = new Map<string, Map<string, ColumnSchema>>(
    graph.tables.map((t) => [t.name, new Map(t.columns.map((c) => [c.name, c]))]),
  );

  return rows.map((row) => {
    const tableColumns = columns.get(row.table);
    const values: Record<string, SqlValue> = {};
    for (const [name, value] of Object.entries(row.values)) {
      const column = tableColumns?.get(name);
      values[name] = column ? coerceValue(value, column) : value;
    }
    return { table: row.table, values };
  });
}

/**
 * Emit the insert statements for one raw document.
 * Normalization and validation problems come back as a failure, never a throw.
 */
export function emitRows(
  raw: RawDocument,
  graph: TableGraph,
  options: Partial<EmitterOptions> = {},
  validator: RowValidator = new RowValidator(graph.tables),
): EmitResult {
  const opts = { ...DEFAULT_OPTIONS, ...options, rootTableName: graph.rootTable };

  try {
    const doc = normalizeDocument(raw.body, opts);
    const split = splitDocument(doc, graph);
    const rows = coerceRows(split.rows, graph);

    const violations = validator.validateAll(rows);
    if (violations.length > 0) {
      throw new RowValidationError(`${violations.length} row violation(s)`, violations);
    }

    if (split.unmappedPaths.length > 0) {
      logger.debug("Document paths without a column", {
        documentId: raw.id,
        paths: split.unmappedPaths.length,
      });
    }

    return {
      ok: true,
      emission: {
        documentId: raw.id,
        lastUpdated: raw.lastUpdated,
        statements: buildInsertStatements(rows, graph),
        unmappedPaths: split.unmappedPaths,
      },
    };
  } catch (error) {
    const wrapped = toRelationalizerError(error);
    return {
      ok: false,
      failure: {
        documentId: raw.id,
        code: wrapped.code,
        message: wrapped.message,
        ...(wrapped.details !== undefined ? { details: wrapped.details } : {}),
      },
    };
  }
}

/**
 * Row emitter - emits documents against one table graph and keeps tallies
 */
export class RowEmitter {
  private options: EmitterOptions;
  private validator: RowValidator;
  private failures: DocumentFailure[] = [];
  private metrics: EmitterMetrics = { documents: 0, emitted: 0, failed: 0, statements: 0 };

  constructor(
    private readonly graph: TableGraph,
    options: Partial<EmitterOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.validator = new RowValidator(graph.tables);
  }

  emit(raw: RawDocument): EmitResult {
    const result = emitRows(raw, this.graph, this.options, this.validator);
    this.metrics.documents++;

    if (result.ok) {
      this.metrics.emitted++;
      this.metrics.statements += result.emission.statements.length;
    } else {
      this.metrics.failed++;
      this.failures.push(result.failure);
      logger.warn("Skipping document", {
        documentId: result.failure.documentId,
        code: result.failure.code,
        message: result.failure.message,
      });
    }
    return result;
  }

  /**
   * Emit a stream of documents; the caller may stop between documents
   */
  async *emitStream(
    raws: AsyncIterable<RawDocument> | Iterable<RawDocument>,
  ): AsyncGenerator<EmitResult> {
    for await (const raw of raws) {
      yield this.emit(raw);
    }
  }

  getFailures(): DocumentFailure[] {
    return [...this.failures];
  }

  getMetrics(): EmitterMetrics {
    return { ...this.metrics };
  }
}
