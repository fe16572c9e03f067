/**
 * Schema introspection for LLM grounding.
 * Reads the live store on every call so re-ingested data is always reflected.
 */

import { KNOWN_TABLES } from '../catalog.js';
import type { ColumnSummary, SchemaSummary, TableSummary } from '../types/models.js';
import { inferFieldType, type Row } from '../types/utils.js';
import { renderTable } from '../utils/table.js';
import type { Store } from './database.js';

export const SAMPLE_ROW_COUNT = 3;

export class SchemaIntrospector {
  constructor(
    private store: Store,
    private tables: readonly string[] = KNOWN_TABLES,
    private sampleSize: number = SAMPLE_ROW_COUNT
  ) {}

  /**
   * Build a fresh summary of every known table.
   */
  async describe(): Promise<SchemaSummary> {
    const summaries: TableSummary[] = [];

    for (const name of this.tables) {
      const [storeColumns, sample] = await Promise.all([
        this.store.columns(name),
        this.store.sample(name, this.sampleSize),
      ]);

      const columns: ColumnSummary[] = storeColumns.map((column) => ({
        name: column.name,
        type: column.type || inferColumnType(column.name, sample),
      }));

      summaries.push({ name, columns, sample_rows: sample });
    }

    return summaries;
  }
}

/**
 * Infer a column's type from the first non-null sample value.
 */
function inferColumnType(column: string, sample: readonly Row[]): string {
  for (const row of sample) {
    const value = row[column] ?? null;
    if (value !== null) return inferFieldType(value);
  }
  return 'null';
}

/**
 * Render a summary as the text block embedded in the SQL generation prompt.
 */
export function renderSchemaSummary(summary: SchemaSummary): string {
  return summary
    .map((table) => {
      const columnInfo = table.columns
        .map((column) => `${column.name} (${column.type})`)
        .join(', ');
      const names = table.columns.map((column) => column.name);
      const sample =
        table.sample_rows.length > 0
          ? renderTable(
              names,
              table.sample_rows.map((row) => names.map((name) => row[name] ?? null))
            )
          : '(no rows)';

      return `Table: ${table.name}\nColumns: ${columnInfo}\nSample rows:\n${sample}`;
    })
    .join('\n\n');
}
