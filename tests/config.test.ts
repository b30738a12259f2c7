import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError, Executor, defineConfig, env } from '../src';
import { createTempDir, removeTempDir } from './fixtures/database';
import { DRIVER_TABLE, Driver, driver } from './fixtures/entities';

describe('defineConfig', () => {
  it('returns the options unchanged', () => {
    const options = { connection: 'Data Source=app.db', useTransactions: true };
    expect(defineConfig(options)).toBe(options);
  });

  it('requires a connection', () => {
    expect(() => defineConfig({ connection: ' ' })).toThrow(ConfigurationError);
  });

  it('rejects an empty procedures directory', () => {
    expect(() => defineConfig({ connection: 'app.db', proceduresDir: '' })).toThrow(
      ConfigurationError
    );
  });
});

describe('env', () => {
  const NAME = 'CRUD_EXECUTOR_TEST_CONNECTION';

  afterEach(() => {
    delete process.env[NAME];
  });

  it('reads a set variable', () => {
    process.env[NAME] = 'Data Source=env.db';
    expect(env(NAME)).toBe('Data Source=env.db');
  });

  it('falls back to the default', () => {
    expect(env(NAME, 'Data Source=default.db')).toBe('Data Source=default.db');
  });

  it('throws when unset without a default', () => {
    expect(() => env(NAME)).toThrow(ConfigurationError);
    expect(() => env(NAME)).toThrow(`Missing required environment variable: ${NAME}`);
  });
});

describe('Executor configuration', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('connects through a settings document', () => {
    const settings = path.join(dir, 'settings.json');
    fs.mkdirSync(path.join(dir, 'data', 'main'), { recursive: true });
    fs.writeFileSync(
      settings,
      JSON.stringify({
        connectionString: { server: 'data', instance: 'main', database: 'fleet.db', timeout: 1 },
      })
    );

    const executor = new Executor(settings);
    executor.execute(DRIVER_TABLE);
    executor.create(driver('Ada'));

    expect(fs.existsSync(path.join(dir, 'data', 'main', 'fleet.db'))).toBe(true);
    expect(executor.count(Driver)).toBe(1);
  });

  it('loads procedures from a directory', () => {
    const procedures = path.join(dir, 'procedures');
    fs.mkdirSync(procedures);
    fs.writeFileSync(path.join(procedures, 'activeDrivers.sql'), 'SELECT * FROM Driver WHERE active = 1;');

    const executor = new Executor({
      connection: `Data Source=${path.join(dir, 'fleet.db')}`,
      proceduresDir: procedures,
    });
    executor.execute(DRIVER_TABLE);
    executor.create([driver('Ada'), driver('Bo', false)]);

    expect(executor.retrieve(Driver, 'activeDrivers').map((d) => d.name)).toEqual(['Ada']);
  });

  it('lets code procedures override directory ones', () => {
    const procedures = path.join(dir, 'procedures');
    fs.mkdirSync(procedures);
    fs.writeFileSync(path.join(procedures, 'pick.sql'), 'SELECT * FROM Driver WHERE active = 1');

    const executor = new Executor({
      connection: `Data Source=${path.join(dir, 'fleet.db')}`,
      proceduresDir: procedures,
      procedures: { pick: 'SELECT * FROM Driver WHERE active = 0' },
    });
    executor.execute(DRIVER_TABLE);
    executor.create([driver('Ada'), driver('Bo', false)]);

    expect(executor.retrieve(Driver, 'pick').map((d) => d.name)).toEqual(['Bo']);
  });

  it('rejects a malformed connection string up front', () => {
    expect(() => new Executor('Server=db1;Database=fleet')).toThrow(ConfigurationError);
  });
});
