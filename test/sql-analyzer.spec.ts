import { describe, it, expect } from 'vitest';
import { KeywordSqlAnalyzer, analyzeSql } from '../src/services/sql-analyzer.js';

const REVENUE_BY_CLIENT = `SELECT c.client_name, SUM(li.quantity * li.unit_price) AS total
FROM clients c
JOIN invoices i ON c.client_id = i.client_id
JOIN invoice_line_items li ON i.invoice_id = li.invoice_id
GROUP BY c.client_name
ORDER BY total DESC;`;

describe('analyzeSql', () => {
  it('classifies a plain select', () => {
    expect(analyzeSql('SELECT * FROM clients')).toEqual({
      tables_used: ['clients'],
      table_count: 1,
      join_count: 0,
      has_aggregation: false,
      has_group_by: false,
      has_filter: false,
      has_order: false,
      has_limit: false,
      query_type: 'SELECT',
    });
  });

  it('prefers AGGREGATION over JOIN', () => {
    const analysis = analyzeSql(REVENUE_BY_CLIENT);

    expect(analysis.tables_used).toEqual(['clients', 'invoices', 'invoice_line_items']);
    expect(analysis.table_count).toBe(3);
    expect(analysis.join_count).toBe(2);
    expect(analysis.has_aggregation).toBe(true);
    expect(analysis.has_group_by).toBe(true);
    expect(analysis.has_order).toBe(true);
    expect(analysis.query_type).toBe('AGGREGATION');
  });

  it('classifies a join with filter and limit', () => {
    const analysis = analyzeSql(
      "select c.client_name, i.invoice_id from clients c join invoices i on c.client_id = i.client_id where i.status = 'Overdue' limit 5"
    );

    expect(analysis.query_type).toBe('JOIN');
    expect(analysis.join_count).toBe(1);
    expect(analysis.has_filter).toBe(true);
    expect(analysis.has_limit).toBe(true);
    expect(analysis.has_aggregation).toBe(false);
  });

  it('treats GROUP BY without an aggregate function as aggregation', () => {
    const analysis = analyzeSql('SELECT status FROM invoices GROUP BY status');

    expect(analysis.has_aggregation).toBe(false);
    expect(analysis.has_group_by).toBe(true);
    expect(analysis.query_type).toBe('AGGREGATION');
  });

  it('only recognises aggregate functions written directly before a parenthesis', () => {
    expect(analyzeSql('SELECT COUNT (*) FROM invoices').has_aggregation).toBe(false);
    expect(analyzeSql('SELECT max(unit_price) FROM invoice_line_items').has_aggregation).toBe(true);
  });

  it('matches table names as substrings of the whole text', () => {
    expect(analyzeSql('SELECT * FROM invoice_line_items').tables_used).toEqual([
      'invoice_line_items',
    ]);

    const literal = analyzeSql("SELECT client_name FROM clients WHERE industry = 'join invoices'");
    expect(literal.tables_used).toEqual(['clients', 'invoices']);
    expect(literal.join_count).toBe(1);
    expect(literal.query_type).toBe('JOIN');
  });

  it('honours a custom table list', () => {
    expect(analyzeSql('SELECT * FROM payments', ['payments']).tables_used).toEqual(['payments']);
  });
});

describe('KeywordSqlAnalyzer', () => {
  const analyzer = new KeywordSqlAnalyzer();

  it('delegates analysis', () => {
    expect(analyzer.analyze(REVENUE_BY_CLIENT)).toEqual(analyzeSql(REVENUE_BY_CLIENT));
  });

  it('derives the drill-down query', () => {
    expect(analyzer.derivePreAggregation('SELECT status, COUNT(*) FROM invoices GROUP BY status')).toEqual({
      status: 'derived',
      sql: 'SELECT * FROM invoices LIMIT 100',
    });
  });
});
