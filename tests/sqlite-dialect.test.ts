import { describe, expect, it } from 'vitest';
import {
  InvalidOperationError,
  MappingError,
  MissingPrimaryKeyError,
  SqliteCompiler,
  quoteIdent,
} from '../src';
import { Counter, Driver, Note, Vehicle, driver } from './fixtures/entities';

const compiler = new SqliteCompiler();

describe('SqliteCompiler', () => {
  describe('compileInsert', () => {
    it('emits one statement per instance with 1-based parameter suffixes', () => {
      const statements = compiler.compileInsert(Driver, [driver('Ada'), driver('Bo', false)]);

      expect(statements).toEqual([
        {
          sql: 'INSERT INTO "Driver" ("name", "active") VALUES (@name_1, @active_1)',
          params: [
            { name: 'name_1', value: 'Ada' },
            { name: 'active_1', value: 1 },
          ],
        },
        {
          sql: 'INSERT INTO "Driver" ("name", "active") VALUES (@name_2, @active_2)',
          params: [
            { name: 'name_2', value: 'Bo' },
            { name: 'active_2', value: 0 },
          ],
        },
      ]);
    });

    it('never includes the primary key', () => {
      const d = driver('Ada');
      d.id = 42;
      const [statement] = compiler.compileInsert(Driver, [d]);
      expect(statement.sql).not.toContain('"id"');
      expect(statement.params.map((p) => p.name)).toEqual(['name_1', 'active_1']);
    });

    it('uses column names and converts dates', () => {
      const v = new Vehicle();
      v.plate = 'AB-123';
      v.registeredAt = new Date('2024-03-01T00:00:00.000Z');

      expect(compiler.compileInsert(Vehicle, [v])).toEqual([
        {
          sql: 'INSERT INTO "Vehicle" ("plate_number", "registeredAt") VALUES (@plate_number_1, @registeredAt_1)',
          params: [
            { name: 'plate_number_1', value: 'AB-123' },
            { name: 'registeredAt_1', value: '2024-03-01T00:00:00.000Z' },
          ],
        },
      ]);
    });

    it('binds unset values as NULL', () => {
      const [statement] = compiler.compileInsert(Driver, [new Driver()]);
      expect(statement.params).toEqual([
        { name: 'name_1', value: null },
        { name: 'active_1', value: null },
      ]);
    });

    it('falls back to DEFAULT VALUES when only the key is mapped', () => {
      expect(compiler.compileInsert(Counter, [new Counter()])).toEqual([
        { sql: 'INSERT INTO "Counter" DEFAULT VALUES', params: [] },
      ]);
    });
  });

  describe('compileUpdate', () => {
    it('sets every non-key field and filters on the key', () => {
      const d = driver('Ada', false);
      d.id = 3;
      d.createdAt = '2024-01-01 00:00:00';

      expect(compiler.compileUpdate(Driver, d)).toEqual({
        sql: 'UPDATE "Driver" SET "name" = @name, "active" = @active WHERE "id" = @id',
        params: [
          { name: 'name', value: 'Ada' },
          { name: 'active', value: 0 },
          { name: 'id', value: 3 },
        ],
      });
    });

    it('fails fast without a primary key', () => {
      expect(() => compiler.compileUpdate(Note, new Note())).toThrow(MissingPrimaryKeyError);
    });

    it('refuses an update with nothing to set', () => {
      expect(() => compiler.compileUpdate(Counter, new Counter())).toThrow(InvalidOperationError);
    });
  });

  describe('compileDelete', () => {
    it('binds the key instead of inlining it', () => {
      const d = driver('Ada');
      d.id = 7;
      expect(compiler.compileDelete(Driver, d)).toEqual({
        sql: 'DELETE FROM "Driver" WHERE "id" = @id',
        params: [{ name: 'id', value: 7 }],
      });
    });

    it('uses the key column name', () => {
      const v = new Vehicle();
      v.id = 9;
      expect(compiler.compileDelete(Vehicle, v)).toEqual({
        sql: 'DELETE FROM "Vehicle" WHERE "vehicle_id" = @vehicle_id',
        params: [{ name: 'vehicle_id', value: 9 }],
      });
    });

    it('fails fast without a primary key', () => {
      expect(() => compiler.compileDelete(Note, new Note())).toThrow(MissingPrimaryKeyError);
    });
  });

  describe('selects', () => {
    it('selects the whole table', () => {
      expect(compiler.compileSelect(Driver)).toEqual({ sql: 'SELECT * FROM "Driver"', params: [] });
    });

    it('selects by key', () => {
      expect(compiler.compileSelectById(Vehicle, 4)).toEqual({
        sql: 'SELECT * FROM "Vehicle" WHERE "vehicle_id" = @vehicle_id',
        params: [{ name: 'vehicle_id', value: 4 }],
      });
    });

    it('counts rows', () => {
      expect(compiler.compileCount(Driver).sql).toBe('SELECT COUNT(*) AS "count" FROM "Driver"');
    });

    it('selects a lookup table as value and name', () => {
      expect(compiler.compileEnum('Status', 'Name', 'Id')).toEqual({
        sql: 'SELECT "Id" AS "value", "Name" AS "name" FROM "Status"',
        params: [],
      });
    });

    it('rejects lookup names that are not identifiers', () => {
      expect(() => compiler.compileEnum('Status; DROP TABLE Driver', 'Name', 'Id')).toThrow(
        MappingError
      );
      expect(() => compiler.compileEnum('Status', 'Name', 'Id--')).toThrow(MappingError);
    });
  });

  it('quotes identifiers', () => {
    expect(quoteIdent('Driver')).toBe('"Driver"');
    expect(quoteIdent('a"b')).toBe('"a""b"');
  });
});
