/**
 * Connection strings and the JSON connection settings document.
 *
 * A connection string is a list of `key=value` pairs separated by `;`:
 *
 *   Data Source=data/app.db;Mode=ReadWrite;Default Timeout=5;Foreign Keys=True
 *
 * Keys are case-insensitive and ignore spaces. Values may be double-quoted,
 * with `""` standing for a literal quote. A string without any `=` is taken
 * as a bare database path.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';

export type ConnectionMode = 'ReadWriteCreate' | 'ReadWrite' | 'ReadOnly' | 'Memory';

const MODES: readonly ConnectionMode[] = ['ReadWriteCreate', 'ReadWrite', 'ReadOnly', 'Memory'];

/**
 * What a connection string resolves to: the options each per-call
 * better-sqlite3 connection is opened with.
 */
export interface ConnectionSettings {
  filename: string;
  mode: ConnectionMode;
  /** Busy timeout in milliseconds */
  timeout?: number;
  foreignKeys?: boolean;
}

/**
 * Shape of the connection settings document. `server` is the directory
 * holding database files (relative paths resolve against the document),
 * `instance` an optional sub-directory and `database` the file name.
 */
export const ConnectionSettingsDocument = z.object({
  connectionString: z.object({
    server: z.string().min(1),
    instance: z.string().optional(),
    database: z.string().min(1),
    mode: z.enum(['ReadWriteCreate', 'ReadWrite', 'ReadOnly']).optional(),
    timeout: z.number().nonnegative().optional(),
    foreignKeys: z.boolean().optional(),
  }),
});

export type ConnectionSettingsDocument = z.infer<typeof ConnectionSettingsDocument>;

function splitPairs(input: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  let i = 0;

  while (i < input.length) {
    while (i < input.length && (input[i] === ';' || input[i] === ' ')) i++;
    if (i >= input.length) break;

    const eq = input.indexOf('=', i);
    const semi = input.indexOf(';', i);
    if (eq < 0 || (semi >= 0 && semi < eq)) {
      throw new ConfigurationError(
        `Expected key=value in connection string near "${input.slice(i)}".`,
      );
    }
    const key = input.slice(i, eq).trim();
    i = eq + 1;
    while (i < input.length && input[i] === ' ') i++;

    let value = '';
    if (input[i] === '"') {
      let j = i + 1;
      for (;;) {
        if (j >= input.length) {
          throw new ConfigurationError(`Unterminated quoted value for "${key}".`);
        }
        if (input[j] === '"') {
          if (input[j + 1] === '"') {
            value += '"';
            j += 2;
            continue;
          }
          break;
        }
        value += input[j];
        j++;
      }
      i = j + 1;
      while (i < input.length && input[i] === ' ') i++;
      if (i < input.length && input[i] !== ';') {
        throw new ConfigurationError(`Unexpected text after quoted value for "${key}".`);
      }
    } else {
      const end = semi < 0 ? input.length : semi;
      value = input.slice(i, end).trim();
      i = end;
    }
    pairs.push([key, value]);
  }

  return pairs;
}

function parseBoolean(key: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case 'true':
    case 'yes':
      return true;
    case 'false':
    case 'no':
      return false;
    default:
      throw new ConfigurationError(`Invalid boolean "${value}" for "${key}".`);
  }
}

function stripFilePrefix(filename: string): string {
  return filename.startsWith('file:') ? filename.slice(5) : filename;
}

/**
 * Parse a connection string into connection settings.
 *
 * @throws ConfigurationError on unknown keys, bad values or a missing data source
 */
export function parseConnectionString(input: string): ConnectionSettings {
  if (input.trim().length === 0) {
    throw new ConfigurationError('Connection string is empty.');
  }
  if (!input.includes('=')) {
    return { filename: stripFilePrefix(input.trim()), mode: 'ReadWriteCreate' };
  }

  let filename: string | undefined;
  let mode: ConnectionMode = 'ReadWriteCreate';
  let timeout: number | undefined;
  let foreignKeys: boolean | undefined;

  for (const [key, value] of splitPairs(input)) {
    switch (key.toLowerCase().replace(/\s+/g, '')) {
      case 'datasource':
      case 'filename':
        filename = stripFilePrefix(value);
        break;
      case 'mode': {
        const match = MODES.find((m) => m.toLowerCase() === value.toLowerCase());
        if (!match) {
          throw new ConfigurationError(
            `Invalid mode "${value}". Expected one of: ${MODES.join(', ')}.`,
          );
        }
        mode = match;
        break;
      }
      case 'defaulttimeout':
      case 'timeout': {
        const seconds = Number(value);
        if (value === '' || !Number.isFinite(seconds) || seconds < 0) {
          throw new ConfigurationError(`Invalid timeout "${value}".`);
        }
        timeout = Math.round(seconds * 1000);
        break;
      }
      case 'foreignkeys':
        foreignKeys = parseBoolean(key, value);
        break;
      default:
        throw new ConfigurationError(`Unknown connection string key "${key}".`);
    }
  }

  if (mode === 'Memory') {
    filename = ':memory:';
  }
  if (!filename) {
    throw new ConfigurationError('Connection string has no Data Source.');
  }

  return { filename, mode, timeout, foreignKeys };
}

function quoteValue(value: string): string {
  return /[;"]|^\s|\s$/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Build a connection string from a settings document.
 *
 * @param baseDir - Directory relative server paths resolve against
 */
export function buildConnectionString(
  document: ConnectionSettingsDocument,
  baseDir: string,
): string {
  const { server, instance, database, mode, timeout, foreignKeys } = document.connectionString;

  let directory = path.resolve(baseDir, server);
  if (instance && instance.trim().length > 0) {
    directory = path.join(directory, instance);
  }

  const parts = [`Data Source=${quoteValue(path.join(directory, database))}`];
  if (mode) parts.push(`Mode=${mode}`);
  if (timeout !== undefined) parts.push(`Default Timeout=${timeout}`);
  if (foreignKeys !== undefined) parts.push(`Foreign Keys=${foreignKeys ? 'True' : 'False'}`);
  return parts.join(';');
}

/**
 * Read and validate a connection settings document.
 *
 * @throws ConfigurationError if the file is not valid JSON or has the wrong shape
 */
export function readSettingsDocument(file: string): ConnectionSettingsDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read connection settings from ${file}.`, {
      cause: error,
    });
  }

  const result = ConnectionSettingsDocument.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid connection settings in ${file}: ${issues}`, {
      cause: result.error,
    });
  }
  return result.data;
}

function isSettingsFile(input: string): boolean {
  return (
    path.extname(input).toLowerCase() === '.json' &&
    fs.existsSync(input) &&
    fs.statSync(input).isFile()
  );
}

/**
 * Resolve the connection input given to the executor: a path to an
 * existing `.json` settings document, or a connection string.
 */
export function resolveConnection(input: string): ConnectionSettings {
  if (isSettingsFile(input)) {
    const document = readSettingsDocument(input);
    return parseConnectionString(
      buildConnectionString(document, path.dirname(path.resolve(input))),
    );
  }
  return parseConnectionString(input);
}
