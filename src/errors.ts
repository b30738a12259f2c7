/**
 * Error types raised by the executor.
 *
 * Every error extends DatabaseError and carries a code for programmatic
 * handling. Driver errors raised outside a transaction are not wrapped.
 */

export type DatabaseErrorCode =
  | "INVALID_OPERATION"
  | "MAPPING_ERROR"
  | "MISSING_PRIMARY_KEY"
  | "COLUMN_MISMATCH"
  | "PROCEDURE_NOT_FOUND"
  | "TRANSACTION_ERROR"
  | "CONFIGURATION_ERROR";

export class DatabaseError extends Error {
  readonly code: DatabaseErrorCode;

  constructor(code: DatabaseErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DatabaseError";
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown for calls that can never succeed, such as inserting an empty
 * collection or executing blank statement text. Nothing is sent to the database.
 */
export class InvalidOperationError extends DatabaseError {
  constructor(message: string, options?: ErrorOptions) {
    super("INVALID_OPERATION", message, options);
    this.name = "InvalidOperationError";
  }
}

/**
 * Thrown when entity metadata is unusable: a second primary key, a class
 * with no mapped fields, or a name that is not a plain identifier.
 */
export class MappingError extends DatabaseError {
  readonly entityName?: string;

  constructor(message: string, entityName?: string, options?: ErrorOptions) {
    super("MAPPING_ERROR", message, options);
    this.name = "MappingError";
    this.entityName = entityName;
  }
}

export class MissingPrimaryKeyError extends DatabaseError {
  readonly entityName: string;

  constructor(entityName: string, operation: string, options?: ErrorOptions) {
    super(
      "MISSING_PRIMARY_KEY",
      `Entity ${entityName} has no primary key defined; cannot ${operation}.`,
      options,
    );
    this.name = "MissingPrimaryKeyError";
    this.entityName = entityName;
  }
}

/**
 * Thrown when a result row has no column for a mapped field.
 */
export class ColumnMismatchError extends DatabaseError {
  readonly entityName: string;
  readonly column: string;

  constructor(entityName: string, column: string, options?: ErrorOptions) {
    super(
      "COLUMN_MISMATCH",
      `Result row has no column "${column}" for entity ${entityName}.`,
      options,
    );
    this.name = "ColumnMismatchError";
    this.entityName = entityName;
    this.column = column;
  }
}

export class ProcedureNotFoundError extends DatabaseError {
  readonly procedureName: string;

  constructor(procedureName: string, options?: ErrorOptions) {
    super(
      "PROCEDURE_NOT_FOUND",
      `Procedure "${procedureName}" is not registered.`,
      options,
    );
    this.name = "ProcedureNotFoundError";
    this.procedureName = procedureName;
  }
}

/**
 * Thrown when a transactional call fails. The transaction has been rolled
 * back by the time this is thrown; the original error is the cause.
 */
export class TransactionError extends DatabaseError {
  readonly rolledBack = true;
  readonly sql: string;

  constructor(sql: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("TRANSACTION_ERROR", `Transaction rolled back: ${reason}`, { cause });
    this.name = "TransactionError";
    this.sql = sql;
  }
}

export class ConfigurationError extends DatabaseError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONFIGURATION_ERROR", message, options);
    this.name = "ConfigurationError";
  }
}
