import { assertIdentifier, getTableName } from "./decorators";
import { InvalidOperationError } from "./errors";
import { fieldsFor, readField, requirePrimaryKey } from "./mapper";
import { Operation, toBindable } from "./types";
import type { ColumnMetadata, CompiledStatement, SqlParameter } from "./types";

/**
 * Quote an identifier using SQLite double quotes.
 */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function bind(field: ColumnMetadata, instance: object, suffix = ""): SqlParameter {
  return {
    name: field.column + suffix,
    value: toBindable(readField(instance, field), field.type),
  };
}

function equate(field: ColumnMetadata): string {
  return `${quoteIdent(field.column)} = @${field.column}`;
}

/**
 * Compiles entity metadata to SQLite SQL strings.
 * Encapsulates all SQL generation logic. Values are always bound as
 * `@name` parameters, never inlined.
 */
export class SqliteCompiler {
  /**
   * One INSERT per instance. Parameter names carry the 1-based position of
   * the instance (`@name_1`, `@name_2`, ...) so the batch never collides.
   * The primary key is left out: the database generates it.
   */
  compileInsert(entity: Function, instances: readonly object[]): CompiledStatement[] {
    const table = quoteIdent(getTableName(entity));
    const { fields } = fieldsFor(entity, Operation.Create, true);
    const columnList = fields.map((f) => quoteIdent(f.column)).join(", ");

    return instances.map((instance, i) => {
      if (fields.length === 0) {
        return { sql: `INSERT INTO ${table} DEFAULT VALUES`, params: [] };
      }
      const params = fields.map((f) => bind(f, instance, `_${i + 1}`));
      const placeholders = params.map((p) => `@${p.name}`).join(", ");
      return {
        sql: `INSERT INTO ${table} (${columnList}) VALUES (${placeholders})`,
        params,
      };
    });
  }

  compileSelect(entity: Function): CompiledStatement {
    return { sql: `SELECT * FROM ${quoteIdent(getTableName(entity))}`, params: [] };
  }

  compileSelectById(entity: Function, id: unknown): CompiledStatement {
    const { primaryKey } = requirePrimaryKey(entity, Operation.Retrieve);
    return {
      sql: `SELECT * FROM ${quoteIdent(getTableName(entity))} WHERE ${equate(primaryKey)}`,
      params: [{ name: primaryKey.column, value: toBindable(id, primaryKey.type) }],
    };
  }

  /**
   * `UPDATE T SET a = @a, b = @b WHERE key = @key`.
   */
  compileUpdate(entity: Function, instance: object): CompiledStatement {
    const { fields, primaryKey } = requirePrimaryKey(entity, Operation.Update);
    if (fields.length === 0) {
      throw new InvalidOperationError(
        `Entity ${entity.name} has no columns to update besides its primary key.`
      );
    }

    const setClause = fields.map(equate).join(", ");
    return {
      sql: `UPDATE ${quoteIdent(getTableName(entity))} SET ${setClause} WHERE ${equate(primaryKey)}`,
      params: [...fields.map((f) => bind(f, instance)), bind(primaryKey, instance)],
    };
  }

  compileDelete(entity: Function, instance: object): CompiledStatement {
    const { primaryKey } = requirePrimaryKey(entity, Operation.Delete);
    return {
      sql: `DELETE FROM ${quoteIdent(getTableName(entity))} WHERE ${equate(primaryKey)}`,
      params: [bind(primaryKey, instance)],
    };
  }

  compileCount(entity: Function): CompiledStatement {
    return {
      sql: `SELECT COUNT(*) AS "count" FROM ${quoteIdent(getTableName(entity))}`,
      params: [],
    };
  }

  /**
   * Select a lookup table as `value` / `name` pairs.
   */
  compileEnum(table: string, nameColumn: string, valueColumn: string): CompiledStatement {
    assertIdentifier(table, "table name");
    assertIdentifier(nameColumn, "column name");
    assertIdentifier(valueColumn, "column name");
    return {
      sql: `SELECT ${quoteIdent(valueColumn)} AS "value", ${quoteIdent(nameColumn)} AS "name" FROM ${quoteIdent(table)}`,
      params: [],
    };
  }
}
