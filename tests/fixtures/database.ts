import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * A fresh directory for one test's database files. Every executor call
 * opens its own connection, so tests use a file rather than `:memory:`.
 */
export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'crud-executor-'));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * The error `fn` throws. Fails the test if it returns normally.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
