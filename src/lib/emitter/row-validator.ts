/**
 * Row validation against table schemas using Ajv
 */

import AjvModule from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import type { SqlValue, TableRow, TableSchema } from "../../types/data-model.js";
import type { RowViolation } from "./types.js";

const Ajv = AjvModule.default;

type ColumnJsonSchema = {
  type: string | string[];
};

export type RowJsonSchema = {
  type: "object";
  properties: Record<string, ColumnJsonSchema>;
  required: string[];
  additionalProperties: false;
};

/**
 * JSON Schema accepted by rows of a table: NOT NULL columns are required and
 * non-null, integer primary keys must be integers, unknown columns are rejected
 */
export function tableRowSchema(table: TableSchema): RowJsonSchema {
  const properties: Record<string, ColumnJsonSchema> = {};
  const required: string[] = [];

  for (const column of table.columns) {
    const base =
      column.isPrimaryKey && column.sqlType === "INTEGER" ? ["integer"] : ["string", "number"];
    properties[column.name] = { type: column.nullable ? [...base, "null"] : base };
    if (!column.nullable) {
      required.push(column.name);
    }
  }

  return { type: "object", properties, required, additionalProperties: false };
}

function describeError(table: string, error: ErrorObject): RowViolation {
  const path =
    error.keyword === "required" && "missingProperty" in error.params
      ? `/${String(error.params.missingProperty)}`
      : error.keyword === "additionalProperties" && "additionalProperty" in error.params
        ? `/${String(error.params.additionalProperty)}`
        : error.instancePath;

  return {
    table,
    path,
    message: `${error.message ?? "invalid"} (keyword: ${error.keyword})`,
  };
}

/**
 * Validates rows per table; validators are compiled once per table
 */
export class RowValidator {
  private ajv = new Ajv({ allErrors: true, strict: false });
  private validators = new Map<string, ValidateFunction>();
  private tables: Map<string, TableSchema>;

  constructor(tables: TableSchema[]) {
    this.tables = new Map(tables.map((t) => [t.name, t]));
  }

  private validatorFor(table: TableSchema): ValidateFunction {
    let validate = this.validators.get(table.name);
    if (!validate) {
      validate = this.ajv.compile(tableRowSchema(table));
      this.validators.set(table.name, validate);
    }
    return validate;
  }

  /**
   * Violations of one row, empty when the row is valid
   */
  validate(row: TableRow): RowViolation[] {
    const table = this.tables.get(row.table);
    if (!table) {
      return [{ table: row.table, path: "", message: "unknown table" }];
    }

    const validate = this.validatorFor(table);
    const values: Record<string, SqlValue> = row.values;
    if (validate(values)) {
      return [];
    }
    return (validate.errors ?? []).map((error) => describeError(row.table, error));
  }

  validateAll(rows: TableRow[]): RowViolation[] {
    return rows.flatMap((row) => this.validate(row));
  }
}
