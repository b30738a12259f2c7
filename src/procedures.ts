/**
 * Named SQL bodies that play the part of stored procedures.
 *
 * SQLite has no server-side procedures, so they are registered with the
 * executor instead: in code, or as `<name>.sql` files in a directory.
 * Statement text without whitespace is always looked up here.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError, ProcedureNotFoundError } from './errors';
import type { ProcedureBody } from './types';

const PROCEDURE_NAME = /^[a-zA-Z_][a-zA-Z0-9_.]*$/;

/**
 * True when `text` is a procedure name rather than statement text.
 */
export function isProcedureName(text: string): boolean {
  return !/\s/.test(text);
}

export class ProcedureRegistry {
  private bodies = new Map<string, readonly string[]>();

  /**
   * Register (or replace) a procedure.
   *
   * @throws ConfigurationError for an invalid name or an empty body
   */
  register(name: string, body: ProcedureBody): this {
    if (!PROCEDURE_NAME.test(name)) {
      throw new ConfigurationError(`Invalid procedure name "${name}".`);
    }
    const statements = (typeof body === 'string' ? [body] : [...body])
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
    if (statements.length === 0) {
      throw new ConfigurationError(`Procedure "${name}" has an empty body.`);
    }
    this.bodies.set(name, statements);
    return this;
  }

  /**
   * Register every `<name>.sql` file in `dir`. Each file holds one statement.
   */
  loadDirectory(dir: string): this {
    let entries: string[];
    try {
      entries = fs.readdirSync(dir);
    } catch (error) {
      throw new ConfigurationError(`Cannot read procedures directory ${dir}.`, {
        cause: error,
      });
    }

    for (const entry of entries.sort()) {
      if (path.extname(entry).toLowerCase() !== '.sql') continue;
      const name = path.basename(entry, path.extname(entry));
      this.register(name, fs.readFileSync(path.join(dir, entry), 'utf8'));
    }
    return this;
  }

  has(name: string): boolean {
    return this.bodies.has(name);
  }

  /**
   * Statements of a registered procedure, in execution order.
   *
   * @throws ProcedureNotFoundError if the name is not registered
   */
  resolve(name: string): readonly string[] {
    const statements = this.bodies.get(name);
    if (!statements) {
      throw new ProcedureNotFoundError(name);
    }
    return statements;
  }

  names(): string[] {
    return [...this.bodies.keys()];
  }
}
