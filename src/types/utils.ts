/**
 * Core type utilities.
 * These types replace 'any' usage for values read back from the store.
 */

/**
 * Primitive JSON values.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * A single cell as returned to callers. Drivers may hand back bigint,
 * Date or Buffer values; those are normalised by {@link toCellValue}.
 */
export type CellValue = JsonPrimitive;

/**
 * One result row keyed by column name, in the driver's column order.
 */
export type Row = Record<string, CellValue>;

/**
 * One query result row as positional cells, aligned with the result's
 * column list. Duplicate column names each keep their own cell.
 */
export type ResultRow = readonly CellValue[];

/**
 * Type guard for plain objects.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalise a driver value into a JSON-safe cell.
 */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString('base64');
  return String(value);
}

/**
 * Normalise a driver row into a {@link Row}, keeping key order.
 */
export function toRow(value: Record<string, unknown>): Row {
  const row: Row = {};
  for (const [key, cell] of Object.entries(value)) {
    row[key] = toCellValue(cell);
  }
  return row;
}

/**
 * Normalise a positional driver row into a {@link ResultRow}.
 */
export function toResultRow(cells: readonly unknown[]): ResultRow {
  return cells.map(toCellValue);
}

/**
 * Infer a coarse type name for a cell value.
 */
export function inferFieldType(value: CellValue): string {
  if (value === null) return 'null';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'number';
  }
  return 'string';
}
