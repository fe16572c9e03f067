/**
 * Store access using Knex.js.
 * Supports SQLite (better-sqlite3) and PostgreSQL.
 */

import Database from 'better-sqlite3';
import { knex, type Knex } from 'knex';
import pg from 'pg';
import { StorageUnavailableError, errorMessage } from '../types/errors.js';
import { isRecord, toResultRow, toRow, type ResultRow, type Row } from '../types/utils.js';
import { logger } from '../utils/logger.js';

/**
 * Column metadata as reported by the store.
 */
export interface StoreColumn {
  name: string;
  type: string;
}

/**
 * Rows of a query in positional form, with the column names the driver
 * reported for the statement.
 */
export interface TabularResult {
  columns: string[];
  rows: ResultRow[];
}

/**
 * Error codes and names that mean the store itself is unreachable,
 * as opposed to a query being rejected.
 */
const UNAVAILABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'SQLITE_CANTOPEN',
  'SQLITE_NOTADB',
  'SQLITE_IOERR',
  'SQLITE_CORRUPT',
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
  '3D000', // invalid_catalog_name
  '28P01', // invalid_password
]);

/**
 * Decide whether a driver error means the store is unreachable.
 */
export function isStorageUnavailable(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === 'KnexTimeoutError') return true;

  const code = isRecord(error) ? error['code'] : undefined;
  if (typeof code === 'string') {
    if (UNAVAILABLE_CODES.has(code)) return true;
    if (code.startsWith('SQLITE_IOERR')) return true;
  }

  return /cannot open database|unable to open database/i.test(error.message);
}

/**
 * Normalise the dialect-specific value returned by `knex.raw`.
 * Order matters: check more specific structures first.
 */
export function normalizeRawResult(result: unknown): Row[] {
  // PostgreSQL: returns { rows: [...] }
  if (isRecord(result) && Array.isArray(result['rows'])) {
    return result['rows'].filter(isRecord).map(toRow);
  }

  // SQLite: returns array of rows directly
  if (Array.isArray(result)) {
    return result.filter(isRecord).map(toRow);
  }

  // Statements without a row set (e.g. { changes, lastInsertRowid })
  return [];
}

/**
 * Run a statement on a raw driver connection, reading column names from
 * the statement metadata rather than from row keys.
 */
export async function queryConnection(connection: unknown, sql: string): Promise<TabularResult> {
  if (connection instanceof Database) {
    const statement = connection.prepare(sql);
    if (!statement.reader) {
      statement.run();
      return { columns: [], rows: [] };
    }
    const columns = statement.columns().map((column) => column.name);
    const rows: unknown[] = statement.raw(true).all();
    return { columns, rows: rows.filter(Array.isArray).map(toResultRow) };
  }

  if (connection instanceof pg.Client) {
    const result = await connection.query({ text: sql, rowMode: 'array' });
    const rows: unknown[] = result.rows;
    return {
      columns: result.fields.map((field) => field.name),
      rows: rows.filter(Array.isArray).map(toResultRow),
    };
  }

  throw new Error('Unsupported connection type for tabular queries');
}

/**
 * Thin wrapper over a Knex instance.
 */
export class Store {
  constructor(readonly db: Knex) {}

  /**
   * Open a store from a Knex configuration object.
   */
  static fromConfig(config: Knex.Config): Store {
    return new Store(knex(config));
  }

  /**
   * Driver name, e.g. "better-sqlite3" or "pg".
   */
  get client(): string {
    const client: unknown = this.db.client.config.client;
    return typeof client === 'string' ? client : 'unknown';
  }

  /**
   * Human-readable dialect name for prompts.
   */
  get dialect(): 'SQLite' | 'PostgreSQL' {
    return this.client === 'pg' ? 'PostgreSQL' : 'SQLite';
  }

  /**
   * Run a raw SQL string and return its rows.
   * Connectivity failures are raised as StorageUnavailableError; anything
   * else is re-thrown untouched for the caller to classify.
   */
  async raw(sql: string): Promise<Row[]> {
    try {
      const result: unknown = await this.db.raw(sql);
      return normalizeRawResult(result);
    } catch (error) {
      if (isStorageUnavailable(error)) {
        throw new StorageUnavailableError(`Store unavailable: ${errorMessage(error)}`);
      }
      throw error;
    }
  }

  /**
   * Run a raw SQL string and return its columns and positional rows,
   * in the order the driver reports them.
   * Error handling matches {@link Store.raw}.
   */
  async query(sql: string): Promise<TabularResult> {
    let connection: unknown;
    try {
      connection = await this.db.client.acquireConnection();
      return await queryConnection(connection, sql);
    } catch (error) {
      if (isStorageUnavailable(error)) {
        throw new StorageUnavailableError(`Store unavailable: ${errorMessage(error)}`);
      }
      throw error;
    } finally {
      if (connection !== undefined) {
        await this.db.client.releaseConnection(connection);
      }
    }
  }

  /**
   * Check a table exists.
   */
  async hasTable(table: string): Promise<boolean> {
    try {
      return await this.db.schema.hasTable(table);
    } catch (error) {
      throw this.wrapConnectivity(error);
    }
  }

  /**
   * Column names and declared types, in table order.
   */
  async columns(table: string): Promise<StoreColumn[]> {
    try {
      const info = await this.db(table).columnInfo();
      return Object.entries(info).map(([name, column]) => ({
        name,
        type: column.type ?? '',
      }));
    } catch (error) {
      throw this.wrapConnectivity(error);
    }
  }

  /**
   * First `limit` rows of a table.
   */
  async sample(table: string, limit: number): Promise<Row[]> {
    try {
      const rows: unknown[] = await this.db.select('*').from(table).limit(limit);
      return rows.filter(isRecord).map(toRow);
    } catch (error) {
      throw this.wrapConnectivity(error);
    }
  }

  /**
   * Confirm the store answers at all.
   */
  async ping(): Promise<void> {
    await this.raw('SELECT 1');
  }

  /**
   * Close database connection.
   */
  async close(): Promise<void> {
    await this.db.destroy();
    logger.debug('Database connection closed');
  }

  private wrapConnectivity(error: unknown): unknown {
    if (isStorageUnavailable(error)) {
      return new StorageUnavailableError(`Store unavailable: ${errorMessage(error)}`);
    }
    return error;
  }
}
