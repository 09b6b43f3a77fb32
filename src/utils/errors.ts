/**
 * Standard error classes for relationalizer
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  STORE_ERROR = "STORE_ERROR",
  MALFORMED_DOCUMENT = "MALFORMED_DOCUMENT",
  COLUMN_NAME_COLLISION = "COLUMN_NAME_COLLISION",
  VALIDATION_ERROR = "VALIDATION_ERROR",
}

export interface ErrorResponse {
  status: "error";
  phase: string;
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
    cause?: string;
  };
}

export class RelationalizerError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "RelationalizerError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string): ErrorResponse {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends RelationalizerError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends RelationalizerError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class StoreError extends RelationalizerError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.STORE_ERROR, message, details, options);
    this.name = "StoreError";
  }
}

/**
 * Input is not a JSON-like tree. Skipped per document, never fatal to a batch.
 */
export class MalformedDocumentError extends RelationalizerError {
  constructor(
    message: string,
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(ErrorCode.MALFORMED_DOCUMENT, message, { path }, options);
    this.name = "MalformedDocumentError";
  }
}

export class ColumnNameCollisionError extends RelationalizerError {
  constructor(
    public readonly table: string,
    public readonly column: string,
    public readonly paths: string[],
  ) {
    super(
      ErrorCode.COLUMN_NAME_COLLISION,
      `Column "${column}" of table "${table}" is produced by more than one path: ${paths.join(", ")}`,
      { table, column, paths },
    );
    this.name = "ColumnNameCollisionError";
  }
}

export class RowValidationError extends RelationalizerError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.VALIDATION_ERROR, message, details, options);
    this.name = "RowValidationError";
  }
}

/**
 * Wrap any thrown value into a RelationalizerError
 */
export function toRelationalizerError(error: unknown): RelationalizerError {
  if (error instanceof RelationalizerError) {
    return error;
  }
  return new RelationalizerError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
