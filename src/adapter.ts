/**
 * SqliteAdapter: Thin abstraction over one better-sqlite3 connection.
 *
 * A session opens one adapter per call and closes it when the call ends.
 * Internal code should use the adapter, not better-sqlite3 directly.
 */

import Database from 'better-sqlite3';
import type { ConnectionSettings } from './connection-string';
import { isRow } from './type-guards';
import type { Row } from './type-guards';
import { toBindable } from './types';
import type { SqlParameter } from './types';

/**
 * Values keyed by parameter name, without prefix, as better-sqlite3 binds them.
 */
export type Bindings = Record<string, unknown>;

export interface SqliteAdapterOptions {
  settings: ConnectionSettings;
  /** Called with the text of every statement the driver executes */
  onStatement?: (sql: string) => void;
}

const PARAMETER_REFERENCE = /[@:$]([a-zA-Z_][a-zA-Z0-9_]*)/g;

/**
 * Bindings from a compiled parameter list.
 */
export function fromSqlParameters(params: readonly SqlParameter[]): Bindings {
  const bindings: Bindings = {};
  for (const { name, value } of params) {
    bindings[name] = value;
  }
  return bindings;
}

/**
 * Bindings from caller-supplied parameters. A leading `@`, `:` or `$` on a
 * key is dropped and values are converted for binding.
 */
export function fromParameters(params: object | undefined): Bindings {
  const bindings: Bindings = {};
  for (const [key, value] of Object.entries(params ?? {})) {
    bindings[key.replace(/^[@:$]/, '')] = toBindable(value);
  }
  return bindings;
}

/**
 * The subset of `bindings` that `sql` references, or undefined when it
 * references none. A statement run with no arguments binds nothing.
 */
function pick(sql: string, bindings: Bindings): Bindings | undefined {
  const picked: Bindings = {};
  let found = false;
  for (const match of sql.matchAll(PARAMETER_REFERENCE)) {
    const name = match[1];
    if (Object.prototype.hasOwnProperty.call(bindings, name)) {
      picked[name] = bindings[name];
      found = true;
    }
  }
  return found ? picked : undefined;
}

export class SqliteAdapter {
  private db: Database.Database;

  constructor(options: SqliteAdapterOptions) {
    const { settings, onStatement } = options;
    const driverOptions: Database.Options = {
      readonly: settings.mode === 'ReadOnly',
      fileMustExist: settings.mode === 'ReadWrite' || settings.mode === 'ReadOnly',
    };
    // better-sqlite3 rejects an explicit undefined timeout
    if (settings.timeout !== undefined) {
      driverOptions.timeout = settings.timeout;
    }
    if (onStatement) {
      driverOptions.verbose = (message?: unknown) => onStatement(String(message));
    }
    this.db = new Database(settings.filename, driverOptions);

    if (settings.foreignKeys !== undefined) {
      this.db.pragma(`foreign_keys = ${settings.foreignKeys ? 'ON' : 'OFF'}`);
    }
  }

  /**
   * Run a statement and return the number of rows it changed.
   */
  run(sql: string, bindings: Bindings = {}): number {
    const statement = this.db.prepare(sql);
    const args = pick(sql, bindings);
    const result = args ? statement.run(args) : statement.run();
    return result.changes;
  }

  /**
   * Run a statement and return its rows. Statements that return no data
   * are run for their effect and yield no rows.
   */
  all(sql: string, bindings: Bindings = {}): Row[] {
    const statement = this.db.prepare(sql);
    const args = pick(sql, bindings);
    if (!statement.reader) {
      if (args) {
        statement.run(args);
      } else {
        statement.run();
      }
      return [];
    }
    const rows: unknown[] = args ? statement.all(args) : statement.all();
    return rows.filter(isRow);
  }

  /**
   * Execute a function within a transaction.
   *
   * If the function throws, the transaction is rolled back and the error
   * rethrown. If it succeeds, changes are committed. Called inside another
   * transaction, it uses a savepoint.
   */
  transaction<T>(fn: () => T): T {
    const trx = this.db.transaction(fn);
    return trx();
  }

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  /**
   * Close the database connection.
   * After calling this, no further operations are possible.
   */
  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  /**
   * Get the underlying better-sqlite3 database instance.
   *
   * WARNING: Exposed for diagnostics handlers. Prefer using adapter methods.
   *
   * @internal
   */
  getDb(): Database.Database {
    return this.db;
  }
}
