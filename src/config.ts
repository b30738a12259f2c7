/**
 * Configuration helpers for the executor.
 *
 * - defineConfig(): Helper to define Executor options with type safety
 * - env(): Type-safe environment variable access with validation
 *
 * The executor doesn't load .env automatically. Use `import 'dotenv/config'`
 * in your config file or `node --env-file=.env`.
 */

import { ConfigurationError } from './errors';
import type { ExecutorOptions } from './types';

/**
 * Helper to define executor configuration with type safety.
 * Returns the options object unchanged after validating it.
 *
 * @example
 * ```typescript
 * import { defineConfig, env } from 'crud-executor'
 *
 * export default defineConfig({
 *   connection: env('DATABASE_URL', 'Data Source=app.db'),
 *   useTransactions: true,
 *   proceduresDir: './procedures',
 *   logging: process.env.NODE_ENV === 'development',
 * })
 * ```
 */
export function defineConfig(options: ExecutorOptions): ExecutorOptions {
  validateConfig(options);
  return options;
}

/**
 * Type-safe environment variable accessor.
 *
 * Throws if the variable is not set, ensuring you catch
 * configuration errors early at startup.
 *
 * @example
 * ```typescript
 * const connection = env('DATABASE_URL') // throws if not set
 * const mode = env('DB_MODE', 'ReadWrite') // defaults to 'ReadWrite'
 * ```
 */
export function env(name: string, defaultValue?: string): string {
  const value = process.env[name];

  if (!value) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(
      `Missing required environment variable: ${name}\n` +
        `Please set ${name} or provide a default in your config.`,
    );
  }

  return value;
}

/**
 * Validate ExecutorOptions to catch common configuration errors early.
 *
 * @internal
 */
export function validateConfig(options: ExecutorOptions): void {
  if (!options.connection || options.connection.trim().length === 0) {
    throw new ConfigurationError(
      'ExecutorOptions.connection is required. \n' +
        'Example: { connection: "Data Source=app.db" }',
    );
  }

  if (options.proceduresDir !== undefined && options.proceduresDir.trim().length === 0) {
    throw new ConfigurationError(
      'ExecutorOptions.proceduresDir must not be empty when given. \n' +
        'Example: { connection: "Data Source=app.db", proceduresDir: "./procedures" }',
    );
  }
}
