/**
 * Field discovery for mapped classes.
 *
 * Reads decorator metadata fresh on every call; nothing is cached.
 */

import { getColumnMetadata } from "./decorators";
import { MissingPrimaryKeyError } from "./errors";
import { Operation } from "./types";
import type { ColumnMetadata } from "./types";

export interface MappedFields {
  /** Fields taking part in the operation, in declaration order */
  fields: ColumnMetadata[];
  /** The primary key, if it takes part in the operation */
  primaryKey: ColumnMetadata | undefined;
}

/**
 * Fields of `entity` that take part in `operation`.
 *
 * With `excludePrimaryKey` the key is left out of `fields` but still
 * returned as `primaryKey`, e.g. for building a WHERE clause.
 */
export function fieldsFor(
  entity: Function,
  operation: Operation,
  excludePrimaryKey: boolean
): MappedFields {
  const fields = getColumnMetadata(entity).filter(
    (c) => (c.skip & operation) === 0
  );
  const primaryKey = fields.find((c) => c.isPrimary);

  return {
    fields: excludePrimaryKey ? fields.filter((c) => c !== primaryKey) : fields,
    primaryKey,
  };
}

/**
 * Like fieldsFor, but throws when no primary key takes part in `operation`.
 */
export function requirePrimaryKey(
  entity: Function,
  operation: Operation
): { fields: ColumnMetadata[]; primaryKey: ColumnMetadata } {
  const { fields, primaryKey } = fieldsFor(entity, operation, true);
  if (!primaryKey) {
    const action = Operation[operation] ?? "use";
    throw new MissingPrimaryKeyError(entity.name, action.toLowerCase());
  }
  return { fields, primaryKey };
}

/**
 * Read a mapped property from an instance.
 */
export function readField(instance: object, field: ColumnMetadata): unknown {
  return Reflect.get(instance, field.property);
}

/**
 * Write a mapped property on an instance.
 */
export function writeField(instance: object, field: ColumnMetadata, value: unknown): void {
  Reflect.set(instance, field.property, value);
}
