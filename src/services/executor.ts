/**
 * Query execution against the store.
 */

import { SQLExecutionError, StorageUnavailableError, errorMessage } from '../types/errors.js';
import type { QueryResult } from '../types/models.js';
import type { Store, TabularResult } from './database.js';

/**
 * Build a QueryResult from the store's columns and positional rows.
 */
export function toQueryResult({ columns, rows }: TabularResult): QueryResult {
  return {
    columns,
    rows,
    row_count: rows.length,
    col_count: columns.length,
  };
}

export class QueryExecutor {
  constructor(private store: Store) {}

  /**
   * Execute SQL exactly as given. Rows and columns keep the store's order.
   *
   * @throws SQLExecutionError when the store rejects the query
   * @throws StorageUnavailableError when the store cannot be reached
   */
  async execute(sql: string): Promise<QueryResult> {
    try {
      return toQueryResult(await this.store.query(sql));
    } catch (error) {
      if (error instanceof StorageUnavailableError) {
        throw error;
      }
      throw new SQLExecutionError(errorMessage(error), sql);
    }
  }
}
