/**
 * Core type definitions for the executor.
 * This module defines metadata keys, option shapes and value converters.
 */

import type Database from 'better-sqlite3';

/**
 * Metadata keys for storing entity and column information.
 * Using Symbols prevents naming collisions in the metadata registry.
 */
export const TABLE_KEY = Symbol('table');
export const COLUMN_KEY = Symbol('column');

/**
 * CRUD operations. Values are bit flags so a field can be skipped for
 * several operations at once: `Operation.Create | Operation.Update`.
 */
export enum Operation {
  None = 0,
  Create = 1 << 0,
  Retrieve = 1 << 1,
  Update = 1 << 2,
  Delete = 1 << 3,
  All = Create | Retrieve | Update | Delete,
}

/**
 * A mapped class. Retrieval instantiates it with no arguments.
 */
export type EntityClass<T = unknown> = new () => T;

/**
 * Declared value type of a column, used to convert values to and from
 * what SQLite stores.
 */
export type ColumnType = 'string' | 'number' | 'boolean' | 'date';

/**
 * Internal metadata for a column definition.
 * Stores the mapping between TypeScript properties and database columns.
 */
export interface ColumnMetadata {
  /** TypeScript property name */
  property: string;
  /** Database column name */
  column: string;
  /** Declared value type, when conversion is needed */
  type?: ColumnType;
  /** Whether this is the primary key */
  isPrimary: boolean;
  /** Operations this field is left out of */
  skip: Operation;
}

/**
 * A named parameter binding. `name` is written without the `@` prefix.
 */
export interface SqlParameter {
  name: string;
  value: unknown;
}

/**
 * SQL text plus the parameters it references, in the order they appear.
 */
export interface CompiledStatement {
  sql: string;
  params: SqlParameter[];
}

/**
 * Named parameters as callers pass them. Keys may carry a leading `@`.
 */
export type Parameters = Record<string, unknown>;

export interface DiagnosticEvent {
  severity: 'info' | 'warning';
  message: string;
  /** Statement text the event refers to, if any */
  sql?: string;
}

export type DiagnosticHandler = (
  connection: Database.Database,
  event: DiagnosticEvent,
) => void;

export interface Logger {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * A procedure body: one statement, or several run in order.
 */
export type ProcedureBody = string | readonly string[];

/**
 * Configuration options for Executor construction.
 */
export interface ExecutorOptions {
  /** Connection string, or path to a JSON connection settings document */
  connection: string;
  /** Wrap every call in a transaction that is rolled back on failure */
  useTransactions?: boolean;
  /** Receives statement traces and rollback warnings */
  onDiagnostic?: DiagnosticHandler;
  /** Procedure bodies keyed by procedure name */
  procedures?: Record<string, ProcedureBody>;
  /** Directory of `<name>.sql` files, one procedure per file */
  proceduresDir?: string;
  /** Log sessions and statements (for debugging) */
  logging?: boolean;
  /** Where log lines go; defaults to console */
  logger?: Logger;
}

/**
 * Converters for transforming values between TypeScript and SQLite.
 * - toDb: Prepares a value for storage (e.g., Boolean -> 0/1, Date -> ISO string)
 * - fromDb: Hydrates a value from storage (e.g., 0/1 -> Boolean, ISO string -> Date)
 */
export const VALUE_CONVERTERS: Partial<
  Record<
    ColumnType,
    { toDb: (v: unknown) => unknown; fromDb: (v: unknown) => unknown }
  >
> = {
  boolean: {
    toDb: (v: unknown) => (v === true ? 1 : v === false ? 0 : v),
    fromDb: (v: unknown) => (v === 1 ? true : v === 0 ? false : Boolean(v)),
  },
  date: {
    toDb: (v: unknown) => (v instanceof Date ? v.toISOString() : v),
    fromDb: (v: unknown) => (typeof v === 'string' ? new Date(v) : v),
  },
};

/**
 * Prepare any value for binding. better-sqlite3 binds only numbers,
 * strings, bigints, buffers and null.
 */
export function toBindable(value: unknown, type?: ColumnType): unknown {
  if (value === undefined || value === null) {
    return null;
  }
  const converter = type ? VALUE_CONVERTERS[type] : undefined;
  if (converter) {
    return converter.toDb(value);
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value;
}

/**
 * Hydrate a stored value into the declared column type.
 */
export function fromStored(value: unknown, type?: ColumnType): unknown {
  if (value == null || !type) {
    return value;
  }
  const converter = VALUE_CONVERTERS[type];
  return converter ? converter.fromDb(value) : value;
}

/**
 * Repository interface: the executor's operations for one mapped class.
 */
export interface IRepository<T extends object> {
  find(): T[];
  retrieve(text: string, params?: Parameters): T[];
  findById(id: unknown): T | undefined;
  create(items: T | readonly T[]): boolean;
  update(entity: T): number;
  delete(entity: T): boolean;
  count(): number;
}
