/**
 * crud-executor: parameterized CRUD over SQLite for decorated classes
 *
 * Core concepts:
 * - Decorators: @Entity, @Column, @PrimaryKey, @Skip declare the mapping
 * - Executor: generates and runs SQL, one connection per call
 * - Repository: typed view of the executor for one class
 * - Procedures: named SQL bodies invoked by name
 *
 * @example
 * ```typescript
 * import { Entity, PrimaryKey, Column, Skip, Operation, Executor } from 'crud-executor'
 *
 * @Entity('Driver')
 * class Driver {
 *   @PrimaryKey()
 *   id!: number
 *
 *   @Column()
 *   name!: string
 *
 *   @Skip(Operation.Create | Operation.Update)
 *   createdAt!: string
 * }
 *
 * const executor = new Executor('Data Source=fleet.db')
 *
 * const driver = new Driver()
 * driver.name = 'Ada'
 * executor.create(driver)
 *
 * const drivers = executor.retrieve(Driver)
 * drivers[0].name = 'Ada L.'
 * executor.update(drivers[0])
 * ```
 */

// Decorators: Define entity metadata
export { Entity, Column, PrimaryKey, Skip } from './decorators';
export { getTableName, getColumnMetadata } from './decorators';
export type { ColumnOptions } from './decorators';

// Mapping and SQL generation
export { fieldsFor, requirePrimaryKey } from './mapper';
export type { MappedFields } from './mapper';
export { SqliteCompiler, quoteIdent } from './sqlite-dialect';

// Execution
export { Executor } from './executor';
export { Repository } from './repository';
export { Session } from './session';
export type { SessionOptions, SessionAction } from './session';
export { SqliteAdapter } from './adapter';
export type { SqliteAdapterOptions, Bindings } from './adapter';
export { ProcedureRegistry, isProcedureName } from './procedures';
export { DbEnum } from './db-enum';

// Config: Type-safe configuration and environment helpers
export { defineConfig, env } from './config';
export {
  parseConnectionString,
  buildConnectionString,
  readSettingsDocument,
  resolveConnection,
} from './connection-string';
export type { ConnectionSettings, ConnectionMode } from './connection-string';

// Errors
export {
  DatabaseError,
  InvalidOperationError,
  MappingError,
  MissingPrimaryKeyError,
  ColumnMismatchError,
  ProcedureNotFoundError,
  TransactionError,
  ConfigurationError,
} from './errors';
export type { DatabaseErrorCode } from './errors';

// Types: Re-export commonly used types
export { Operation } from './types';
export type {
  ColumnMetadata,
  ColumnType,
  CompiledStatement,
  DiagnosticEvent,
  DiagnosticHandler,
  EntityClass,
  ExecutorOptions,
  IRepository,
  Logger,
  Parameters,
  ProcedureBody,
  SqlParameter,
} from './types';
