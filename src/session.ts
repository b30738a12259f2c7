/**
 * Session: the lifetime of one call.
 *
 * Every executor call opens exactly one connection, runs its work, and
 * closes the connection on every exit path. With transactions on, the work
 * runs inside one transaction that commits on success. On failure it is
 * rolled back and the failure surfaces as a TransactionError, so a caller
 * can always tell "no rows affected" apart from "rolled back".
 */

import { SqliteAdapter } from "./adapter";
import type { ConnectionSettings } from "./connection-string";
import { InvalidOperationError, TransactionError } from "./errors";
import type { DiagnosticEvent, DiagnosticHandler, Logger } from "./types";

export interface SessionOptions {
  settings: ConnectionSettings;
  onDiagnostic?: DiagnosticHandler;
  /** Set only when logging is on */
  logger?: Logger;
}

export type SessionAction<T> = (adapter: SqliteAdapter) => T;

export class Session {
  constructor(private options: SessionOptions) {}

  /**
   * Run `action` over a fresh connection.
   *
   * @param text - Statement text or procedure name the call executes
   * @param useTransactions - Wrap the action in a transaction
   * @throws InvalidOperationError if `text` is blank; nothing is opened
   * @throws TransactionError if a transactional action fails (after rollback)
   *
   * @example
   * ```typescript
   * const changes = session.run("DELETE FROM Log", false, (adapter) =>
   *   adapter.run("DELETE FROM Log")
   * );
   * ```
   */
  run<T>(text: string, useTransactions: boolean, action: SessionAction<T>): T {
    if (text.trim().length === 0) {
      throw new InvalidOperationError("Statement text or procedure name is empty.");
    }

    const { settings, logger } = this.options;
    let opened: SqliteAdapter | undefined;
    const adapter = new SqliteAdapter({
      settings,
      onStatement: (sql) => {
        logger?.log(`[Executor] SQL: ${sql}`);
        if (opened) {
          this.emit(opened, { severity: "info", message: sql, sql });
        }
      },
    });
    opened = adapter;
    logger?.log(`[Executor] Connected to ${settings.filename}`);

    try {
      if (!useTransactions) {
        return action(adapter);
      }

      try {
        const result = adapter.transaction(() => action(adapter));
        logger?.log(`[Executor] Transaction committed`);
        return result;
      } catch (error) {
        const failure = new TransactionError(text, error);
        logger?.error(`[Executor] ${failure.message}`);
        this.emit(adapter, { severity: "warning", message: failure.message, sql: text });
        throw failure;
      }
    } finally {
      adapter.close();
      logger?.log(`[Executor] Connection closed`);
    }
  }

  private emit(adapter: SqliteAdapter, event: DiagnosticEvent): void {
    this.options.onDiagnostic?.(adapter.getDb(), event);
  }
}
