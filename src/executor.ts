/**
 * Executor is the public entry point.
 *
 * Responsibilities:
 * 1. Resolves the connection settings once, at construction
 * 2. Generates parameterized SQL for mapped classes (create, retrieve, update, delete)
 * 3. Runs queries and registered procedures, each call in its own session
 * 4. Hydrates result rows into instances of the mapped class
 *
 * `useTransactions` is read at the start of every call. Set it once at
 * startup; changing it while another call is running is not guarded.
 */

import type { SqliteAdapter } from "./adapter";
import { fromParameters, fromSqlParameters } from "./adapter";
import { validateConfig } from "./config";
import { resolveConnection } from "./connection-string";
import { DbEnum } from "./db-enum";
import { InvalidOperationError } from "./errors";
import { fieldsFor, writeField } from "./mapper";
import { ProcedureRegistry, isProcedureName } from "./procedures";
import { Repository } from "./repository";
import { Session } from "./session";
import { SqliteCompiler } from "./sqlite-dialect";
import { assertRowCovers } from "./type-guards";
import type { Row } from "./type-guards";
import { Operation, fromStored } from "./types";
import type {
  ColumnMetadata,
  CompiledStatement,
  EntityClass,
  ExecutorOptions,
  Parameters,
  ProcedureBody,
} from "./types";

function isList<T>(items: T | readonly T[]): items is readonly T[] {
  return Array.isArray(items);
}

export class Executor {
  /** Wrap each call in a transaction, rolled back on failure */
  public useTransactions: boolean;
  private session: Session;
  private procedures = new ProcedureRegistry();
  private compiler = new SqliteCompiler();

  /**
   * @param connectionOrOptions - Connection string, path to a JSON
   *   connection settings document, or full options
   *
   * @example
   * ```typescript
   * const executor = new Executor({
   *   connection: "Data Source=fleet.db;Foreign Keys=True",
   *   useTransactions: true,
   *   procedures: {
   *     deactivateDriver: "UPDATE Driver SET active = 0 WHERE id = @driverId",
   *   },
   * });
   *
   * const drivers = executor.retrieve(Driver);
   * ```
   */
  constructor(connectionOrOptions: string | ExecutorOptions) {
    const options =
      typeof connectionOrOptions === "string"
        ? { connection: connectionOrOptions }
        : connectionOrOptions;
    validateConfig(options);

    this.useTransactions = options.useTransactions ?? false;

    if (options.proceduresDir) {
      this.procedures.loadDirectory(options.proceduresDir);
    }
    for (const [name, body] of Object.entries(options.procedures ?? {})) {
      this.procedures.register(name, body);
    }

    this.session = new Session({
      settings: resolveConnection(options.connection),
      onDiagnostic: options.onDiagnostic,
      logger: options.logging ? options.logger ?? console : undefined,
    });
  }

  /**
   * Register (or replace) a procedure after construction.
   */
  registerProcedure(name: string, body: ProcedureBody): this {
    this.procedures.register(name, body);
    return this;
  }

  /**
   * Insert one instance or a batch. The batch runs as one unit: either
   * every row is inserted or none is.
   *
   * @returns true if any row was inserted
   * @throws InvalidOperationError for an empty batch or one mixing classes
   *
   * @example
   * ```typescript
   * executor.create([alice, bob]);
   * ```
   */
  create<T extends object>(items: T | readonly T[]): boolean {
    if (items == null) {
      throw new InvalidOperationError("create() requires at least one instance.");
    }
    const instances = isList(items) ? items : [items];
    if (instances.length === 0) {
      throw new InvalidOperationError("create() requires at least one instance.");
    }

    const entity = instances[0].constructor;
    if (instances.some((instance) => instance.constructor !== entity)) {
      throw new InvalidOperationError(
        `create() requires instances of a single class; got ${entity.name} mixed with others.`
      );
    }

    const statements = this.compiler.compileInsert(entity, instances);
    const text = statements.map((s) => s.sql).join("\n");
    const changes = this.session.run(text, this.useTransactions, (adapter) =>
      adapter.transaction(() => this.runAll(adapter, statements))
    );
    return changes > 0;
  }

  /**
   * Read instances of `entity`.
   *
   * Without `text`, reads the whole table. Text without whitespace names a
   * registered procedure; anything else is run as a query. Every mapped
   * field must have a column of the same name in the result.
   *
   * @throws ColumnMismatchError if a row lacks a mapped field's column
   */
  retrieve<T extends object>(entity: EntityClass<T>, text?: string, params?: Parameters): T[] {
    const statement = text ?? this.compiler.compileSelect(entity).sql;
    return this.query(entity, statement, params);
  }

  /**
   * Read the instance whose primary key equals `id`.
   *
   * @throws MissingPrimaryKeyError if `entity` has no primary key
   */
  findById<T extends object>(entity: EntityClass<T>, id: unknown): T | undefined {
    const { sql, params } = this.compiler.compileSelectById(entity, id);
    const { fields } = fieldsFor(entity, Operation.Retrieve, false);
    const found = this.session.run(sql, this.useTransactions, (adapter) =>
      adapter.all(sql, fromSqlParameters(params)).map((row) => this.hydrate(entity, fields, row))
    );
    return found[0];
  }

  /**
   * Number of rows in the table of `entity`.
   */
  count(entity: Function): number {
    const { sql } = this.compiler.compileCount(entity);
    const rows = this.session.run(sql, this.useTransactions, (adapter) => adapter.all(sql));
    const count = rows[0]?.count;
    return typeof count === "number" ? count : Number(count ?? 0);
  }

  /**
   * Update the row whose primary key matches `instance`.
   *
   * @returns Number of rows changed; 0 when no row has the key
   * @throws MissingPrimaryKeyError if the class has no primary key
   */
  update<T extends object>(instance: T): number {
    const statement = this.compiler.compileUpdate(instance.constructor, instance);
    return this.session.run(statement.sql, this.useTransactions, (adapter) =>
      this.runAll(adapter, [statement])
    );
  }

  /**
   * Delete the row whose primary key matches `instance`.
   *
   * @returns true if a row was deleted
   * @throws MissingPrimaryKeyError if the class has no primary key
   */
  delete<T extends object>(instance: T): boolean {
    const statement = this.compiler.compileDelete(instance.constructor, instance);
    const changes = this.session.run(statement.sql, this.useTransactions, (adapter) =>
      this.runAll(adapter, [statement])
    );
    return changes > 0;
  }

  /**
   * Read a lookup table as name/value pairs, in row order.
   *
   * @example
   * ```typescript
   * // SELECT "Id" AS "value", "Name" AS "name" FROM "Status"
   * const statuses = executor.getEnum("Status");
   * ```
   */
  getEnum<V = number>(
    table: string,
    nameColumn = "Name",
    valueColumn = "Id"
  ): DbEnum<V>[] {
    const { sql } = this.compiler.compileEnum(table, nameColumn, valueColumn);
    return this.query<DbEnum<V>>(DbEnum, sql);
  }

  /**
   * Run a query or a registered procedure.
   *
   * @returns Number of rows changed, summed over a procedure's statements
   */
  execute(text: string, params?: Parameters): number {
    const statements = this.resolveStatements(text);
    const bindings = fromParameters(params);
    return this.session.run(text, this.useTransactions, (adapter) =>
      statements.reduce((sum, sql) => sum + adapter.run(sql, bindings), 0)
    );
  }

  /**
   * Run a registered procedure. Each own enumerable property of `params`
   * is bound as the parameter of the same name.
   *
   * @example
   * ```typescript
   * executor.executeProcedure("deactivateDriver", { driverId: 7 });
   * ```
   */
  executeProcedure(name: string, params?: object): number {
    if (!isProcedureName(name)) {
      throw new InvalidOperationError(`"${name}" is not a procedure name.`);
    }
    const bindings = fromParameters(params);
    const statements = this.resolveStatements(name);
    return this.session.run(name, this.useTransactions, (adapter) =>
      statements.reduce((sum, sql) => sum + adapter.run(sql, bindings), 0)
    );
  }

  /**
   * Get a Repository bound to an entity class.
   *
   * @example
   * ```typescript
   * const drivers = executor.getRepository(Driver);
   * const all = drivers.find();
   * ```
   */
  getRepository<T extends object>(entity: EntityClass<T>): Repository<T> {
    return new Repository(entity, this);
  }

  private query<T extends object>(entity: EntityClass<T>, text: string, params?: Parameters): T[] {
    // Mapping errors surface before a connection is opened
    const { fields } = fieldsFor(entity, Operation.Retrieve, false);
    const statements = this.resolveStatements(text);
    const bindings = fromParameters(params);

    return this.session.run(text, this.useTransactions, (adapter) =>
      statements
        .flatMap((sql) => adapter.all(sql, bindings))
        .map((row) => this.hydrate(entity, fields, row))
    );
  }

  /**
   * New instance of `entity` with every mapped field set from `row`.
   * Columns without a field are ignored.
   */
  private hydrate<T extends object>(
    entity: EntityClass<T>,
    fields: readonly ColumnMetadata[],
    row: Row
  ): T {
    assertRowCovers(row, fields, entity.name);

    const instance = new entity();
    fields.forEach((field) => {
      writeField(instance, field, fromStored(row[field.column], field.type));
    });
    return instance;
  }

  private resolveStatements(text: string): readonly string[] {
    if (text.trim().length === 0) {
      throw new InvalidOperationError("Statement text or procedure name is empty.");
    }
    return isProcedureName(text) ? this.procedures.resolve(text) : [text];
  }

  private runAll(adapter: SqliteAdapter, statements: readonly CompiledStatement[]): number {
    return statements.reduce(
      (sum, statement) => sum + adapter.run(statement.sql, fromSqlParameters(statement.params)),
      0
    );
  }
}
