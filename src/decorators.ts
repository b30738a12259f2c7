/**
 * Decorators for defining entity metadata.
 * These decorators use reflect-metadata to store schema information on the class.
 *
 * Key principle: Decorators are purely declarative. They don't execute queries—they
 * record which properties map to which columns, which one is the primary key and
 * which operations a property is skipped for. The mapper reads this back on every call.
 */

import "reflect-metadata";
import { MappingError } from "./errors";
import { TABLE_KEY, COLUMN_KEY, Operation } from "./types";
import type { ColumnMetadata, ColumnType } from "./types";

const IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Throws unless `name` is a plain SQL identifier. Table and column names are
 * interpolated into statement text, so nothing else is accepted.
 */
export function assertIdentifier(name: string, what: string): void {
  if (!IDENTIFIER.test(name)) {
    throw new MappingError(
      `Invalid ${what} "${name}". Must start with letter or underscore and contain only alphanumeric characters and underscores.`
    );
  }
}

export interface ColumnOptions {
  /** Database column name. Defaults to the property name. */
  name?: string;
  /** Value type, for columns that need conversion (boolean, date) */
  type?: ColumnType;
  /** Marks the primary key. At most one per entity. */
  primary?: boolean;
  /** Operations to leave this column out of */
  skip?: Operation;
}

/**
 * Entity decorator maps a TypeScript class to a database table.
 *
 * @param tableName - The name of the database table. Defaults to the class name.
 *
 * @example
 * ```typescript
 * @Entity("Drivers")
 * class Driver {
 *   @PrimaryKey()
 *   id!: number;
 * }
 * ```
 */
export function Entity(tableName?: string): ClassDecorator {
  return (target: Function) => {
    const name = tableName ?? target.name;
    if (name.trim().length === 0) {
      throw new MappingError(`Entity decorator requires a non-empty table name.`);
    }
    assertIdentifier(name, "table name");
    Reflect.defineMetadata(TABLE_KEY, name, target);
  };
}

/**
 * Column decorator maps a TypeScript property to a database column.
 *
 * @param nameOrOptions - Column name, or full column options
 *
 * @example
 * ```typescript
 * class Driver {
 *   @Column({ primary: true, skip: Operation.Create })
 *   id!: number;
 *
 *   @Column("full_name")
 *   name!: string;
 *
 *   @Column({ type: "boolean" })
 *   active!: boolean;
 * }
 * ```
 */
export function Column(nameOrOptions?: string | ColumnOptions): PropertyDecorator {
  const options =
    typeof nameOrOptions === "string" ? { name: nameOrOptions } : nameOrOptions ?? {};
  return (target: object, propertyKey: string | symbol) => {
    defineColumn(target, propertyKey, options);
  };
}

/**
 * Marks the primary key. Shorthand for `@Column({ primary: true })`.
 */
export function PrimaryKey(nameOrOptions?: string | ColumnOptions): PropertyDecorator {
  const options =
    typeof nameOrOptions === "string" ? { name: nameOrOptions } : nameOrOptions ?? {};
  return Column({ ...options, primary: true });
}

/**
 * Leaves a property out of the given operation(s). Also maps the property,
 * so `@Skip` alone is enough for a column with default settings.
 *
 * @example
 * ```typescript
 * @Skip(Operation.Create | Operation.Update)
 * createdAt!: string;
 * ```
 */
export function Skip(operations: Operation): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    defineColumn(target, propertyKey, { skip: operations });
  };
}

/**
 * Record or amend the metadata of one property. Several decorators on the
 * same property merge into one entry; entries keep declaration order.
 */
function defineColumn(
  target: object,
  propertyKey: string | symbol,
  options: ColumnOptions
): void {
  const entity = target.constructor;
  if (typeof propertyKey === "symbol") {
    throw new MappingError(
      `Cannot map symbol property ${String(propertyKey)} on ${entity.name}.`,
      entity.name
    );
  }

  // Copy so a subclass never appends to its parent's list
  const inherited: ColumnMetadata[] | undefined = Reflect.getMetadata(COLUMN_KEY, entity);
  const columns = [...(inherited ?? [])];

  const index = columns.findIndex((c) => c.property === propertyKey);
  const current: ColumnMetadata =
    index >= 0
      ? columns[index]
      : { property: propertyKey, column: propertyKey, isPrimary: false, skip: Operation.None };

  const next: ColumnMetadata = {
    ...current,
    column: options.name ?? current.column,
    type: options.type ?? current.type,
    isPrimary: current.isPrimary || options.primary === true,
    skip: current.skip | (options.skip ?? Operation.None),
  };
  assertIdentifier(next.column, "column name");

  if (next.isPrimary) {
    const other = columns.find((c) => c.isPrimary && c.property !== propertyKey);
    if (other) {
      throw new MappingError(
        `Entity ${entity.name} already has primary key "${other.property}"; cannot also mark "${propertyKey}".`,
        entity.name
      );
    }
  }

  if (index >= 0) {
    columns[index] = next;
  } else {
    columns.push(next);
  }
  Reflect.defineMetadata(COLUMN_KEY, columns, entity);
}

/**
 * Table name of an entity class: the `@Entity` name, or the class name.
 *
 * @throws MappingError if the class name is not a valid identifier
 */
export function getTableName(entity: Function): string {
  const table: string | undefined = Reflect.getMetadata(TABLE_KEY, entity);
  if (table) {
    return table;
  }
  assertIdentifier(entity.name, "table name");
  return entity.name;
}

/**
 * Column metadata of an entity class, in declaration order.
 *
 * @throws MappingError if the class maps no properties
 */
export function getColumnMetadata(entity: Function): ColumnMetadata[] {
  const columns: ColumnMetadata[] | undefined = Reflect.getMetadata(COLUMN_KEY, entity);
  if (!columns || columns.length === 0) {
    throw new MappingError(
      `Entity ${entity.name} has no @Column, @PrimaryKey or @Skip decorators defined.`,
      entity.name
    );
  }
  return columns;
}
