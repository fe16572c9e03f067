import { afterEach, describe, it, expect } from 'vitest';
import {
  Store,
  isStorageUnavailable,
  normalizeRawResult,
  queryConnection,
} from '../src/services/database.js';
import { derivePreAggregationQuery } from '../src/services/drilldown.js';
import { QueryExecutor, toQueryResult } from '../src/services/executor.js';
import { SQLExecutionError, StorageUnavailableError } from '../src/types/errors.js';
import { createFixtureStore } from './helpers.js';

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('isStorageUnavailable', () => {
  it('recognises connectivity error codes', () => {
    expect(isStorageUnavailable(withCode('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED'))).toBe(true);
    expect(isStorageUnavailable(withCode('disk I/O error', 'SQLITE_IOERR_READ'))).toBe(true);
    expect(isStorageUnavailable(withCode('database "x" does not exist', '3D000'))).toBe(true);
  });

  it('recognises pool timeouts and open failures', () => {
    const timeout = new Error('Knex: Timeout acquiring a connection');
    timeout.name = 'KnexTimeoutError';

    expect(isStorageUnavailable(timeout)).toBe(true);
    expect(isStorageUnavailable(new TypeError('Cannot open database because the directory does not exist'))).toBe(true);
  });

  it('leaves rejected queries alone', () => {
    expect(isStorageUnavailable(withCode('no such table: nope', 'SQLITE_ERROR'))).toBe(false);
    expect(isStorageUnavailable(withCode('syntax error at or near "SELEC"', '42601'))).toBe(false);
    expect(isStorageUnavailable('ECONNREFUSED')).toBe(false);
  });
});

describe('normalizeRawResult', () => {
  it('reads the PostgreSQL result shape', () => {
    expect(normalizeRawResult({ rows: [{ id: 1 }], rowCount: 1 })).toEqual([{ id: 1 }]);
  });

  it('reads the SQLite array shape and normalises cells', () => {
    expect(normalizeRawResult([{ id: 7n, when: new Date('2024-01-15T00:00:00.000Z') }])).toEqual([
      { id: 7, when: '2024-01-15T00:00:00.000Z' },
    ]);
  });

  it('returns no rows for statement results', () => {
    expect(normalizeRawResult({ changes: 1, lastInsertRowid: 3 })).toEqual([]);
  });
});

describe('toQueryResult', () => {
  it('counts the reported columns', () => {
    expect(toQueryResult({ columns: ['a', 'b'], rows: [[1, 'x']] })).toEqual({
      columns: ['a', 'b'],
      rows: [[1, 'x']],
      row_count: 1,
      col_count: 2,
    });
  });

  it('keeps columns when there are no rows', () => {
    expect(toQueryResult({ columns: ['a'], rows: [] })).toEqual({
      columns: ['a'],
      rows: [],
      row_count: 0,
      col_count: 1,
    });
  });
});

describe('queryConnection', () => {
  it('rejects connections it cannot read metadata from', async () => {
    await expect(queryConnection({}, 'SELECT 1')).rejects.toThrow(
      'Unsupported connection type for tabular queries'
    );
  });
});

describe('QueryExecutor', () => {
  let store: Store | undefined;

  afterEach(async () => {
    await store?.close();
    store = undefined;
  });

  it('returns rows in store order with their columns', async () => {
    store = await createFixtureStore();
    const result = await new QueryExecutor(store).execute(
      'SELECT client_id, client_name FROM clients ORDER BY client_id'
    );

    expect(result).toEqual({
      columns: ['client_id', 'client_name'],
      rows: [
        ['C001', 'Acme Corp'],
        ['C002', 'Globex'],
      ],
      row_count: 2,
      col_count: 2,
    });
  });

  it('keeps the select-list order for numeric aliases', async () => {
    store = await createFixtureStore();
    const result = await new QueryExecutor(store).execute(
      'SELECT client_id, COUNT(*) AS "2024" FROM invoices GROUP BY client_id ORDER BY client_id'
    );

    expect(result.columns).toEqual(['client_id', '2024']);
    expect(result.rows).toEqual([
      ['C001', 2],
      ['C002', 1],
    ]);
  });

  it('keeps every column of a join drill-down', async () => {
    store = await createFixtureStore();
    const derivation = derivePreAggregationQuery(
      'SELECT c.client_name, COUNT(*) FROM clients c JOIN invoices i ON c.client_id = i.client_id GROUP BY c.client_name'
    );
    expect(derivation).toEqual({
      status: 'derived',
      sql: 'SELECT * FROM clients c JOIN invoices i ON c.client_id = i.client_id LIMIT 100',
    });
    if (derivation.status !== 'derived') return;

    const result = await new QueryExecutor(store).execute(derivation.sql);

    expect(result.col_count).toBe(11);
    expect(result.columns).toEqual([
      'client_id',
      'client_name',
      'industry',
      'country',
      'invoice_id',
      'client_id',
      'invoice_date',
      'due_date',
      'status',
      'currency',
      'fx_rate_to_usd',
    ]);
    expect(result.row_count).toBe(3);
  });

  it('keeps both sides of a LEFT JOIN on a shared column name', async () => {
    store = await createFixtureStore();
    const result = await new QueryExecutor(store).execute(
      "SELECT c.client_id, i.client_id FROM clients c LEFT JOIN invoices i ON i.client_id = c.client_id AND i.status = 'Void' ORDER BY c.client_id"
    );

    expect(result.columns).toEqual(['client_id', 'client_id']);
    expect(result.rows).toEqual([
      ['C001', null],
      ['C002', null],
    ]);
  });

  it('computes line totals with tax', async () => {
    store = await createFixtureStore();
    const result = await new QueryExecutor(store).execute(
      "SELECT ROUND(SUM(quantity * unit_price * (1 + tax_rate)), 2) AS total FROM invoice_line_items WHERE invoice_id = 'INV001'"
    );

    expect(result.rows).toEqual([{ total: 1200 }]);
  });

  it('returns an empty result when nothing matches', async () => {
    store = await createFixtureStore();
    const result = await new QueryExecutor(store).execute(
      "SELECT * FROM clients WHERE client_id = 'none'"
    );

    expect(result).toEqual({
      columns: ['client_id', 'client_name', 'industry', 'country'],
      rows: [],
      row_count: 0,
      col_count: 4,
    });
  });

  it('wraps rejected queries in SQLExecutionError', async () => {
    store = await createFixtureStore();
    const sql = 'SELECT * FROM missing_table';
    const error = await new QueryExecutor(store).execute(sql).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SQLExecutionError);
    if (error instanceof SQLExecutionError) {
      expect(error.sql).toBe(sql);
      expect(error.message).toContain('no such table: missing_table');
    }
  });

  it('raises StorageUnavailableError when the store cannot be opened', async () => {
    store = Store.fromConfig({
      client: 'better-sqlite3',
      connection: { filename: '/nonexistent-tabletalk-dir/db.sqlite' },
      useNullAsDefault: true,
    });

    await expect(new QueryExecutor(store).execute('SELECT 1')).rejects.toBeInstanceOf(
      StorageUnavailableError
    );
  });
});

describe('Store', () => {
  it('reports its client and dialect', async () => {
    const store = await createFixtureStore();

    expect(store.client).toBe('better-sqlite3');
    expect(store.dialect).toBe('SQLite');
    expect(await store.hasTable('invoices')).toBe(true);
    expect(await store.hasTable('payments')).toBe(false);

    await store.close();
  });
});
