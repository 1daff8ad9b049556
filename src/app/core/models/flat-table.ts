/**
 * Flat Table Models
 *
 * Delimited tables (registry, SDRF, supplementary sources) as read from
 * disk. Rows are kept positional so duplicate column names survive.
 */

/**
 * A parsed delimited table.
 */
export interface FlatTable {
  /** Header cells as written (trimmed) */
  headers: string[];

  /** Data rows, padded to the header width */
  rows: string[][];
}

/**
 * Finds a column index by name (case-insensitive); -1 when absent.
 */
export function findColumnIndex(table: FlatTable, name: string): number {
  const nameLower = name.trim().toLowerCase();
  return table.headers.findIndex((header) => header.toLowerCase() === nameLower);
}

/**
 * Returns the names from `required` that the table lacks.
 */
export function missingColumns(table: FlatTable, required: readonly string[]): string[] {
  return required.filter((name) => findColumnIndex(table, name) === -1);
}

/**
 * Reads a cell by column name; undefined when the column is absent.
 */
export function cellValue(table: FlatTable, row: string[], name: string): string | undefined {
  const index = findColumnIndex(table, name);
  return index === -1 ? undefined : row[index];
}
