import { ColumnMismatchError } from "./errors";
import type { ColumnMetadata } from "./types";

export type Row = Record<string, unknown>;

/**
 * Narrows a driver result to a row object.
 */
export function isRow(data: unknown): data is Row {
  return typeof data === "object" && data !== null && !Array.isArray(data);
}

/**
 * Assert a result row has a column for every mapped field or throw.
 * Columns without a field are allowed and ignored by hydration.
 */
export function assertRowCovers(
  row: Row,
  fields: readonly ColumnMetadata[],
  entityName: string
): void {
  for (const field of fields) {
    if (!Object.prototype.hasOwnProperty.call(row, field.column)) {
      throw new ColumnMismatchError(entityName, field.column);
    }
  }
}
