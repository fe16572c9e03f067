import { describe, it, expect } from 'vitest';
import { DRILLDOWN_ROW_CAP, derivePreAggregationQuery } from '../src/services/drilldown.js';

describe('derivePreAggregationQuery', () => {
  it('is not applicable without GROUP BY', () => {
    expect(derivePreAggregationQuery('SELECT COUNT(*) FROM invoices')).toEqual({
      status: 'not-applicable',
      reason: 'query has no GROUP BY',
    });
  });

  it('keeps joins and collapses whitespace', () => {
    const sql = `SELECT c.client_name, SUM(li.quantity * li.unit_price) AS total
FROM clients c
JOIN invoices i ON c.client_id = i.client_id
JOIN invoice_line_items li ON i.invoice_id = li.invoice_id
GROUP BY c.client_name
ORDER BY total DESC;`;

    expect(derivePreAggregationQuery(sql)).toEqual({
      status: 'derived',
      sql:
        'SELECT * FROM clients c JOIN invoices i ON c.client_id = i.client_id ' +
        'JOIN invoice_line_items li ON i.invoice_id = li.invoice_id LIMIT 100',
    });
  });

  it('keeps the WHERE clause', () => {
    const derivation = derivePreAggregationQuery(
      "SELECT client_id, COUNT(*) FROM invoices WHERE status = 'Paid' GROUP BY client_id"
    );

    expect(derivation).toEqual({
      status: 'derived',
      sql: "SELECT * FROM invoices WHERE status = 'Paid' LIMIT 100",
    });
  });

  it('matches keywords case-insensitively', () => {
    expect(derivePreAggregationQuery('select status, count(*) from invoices group by status')).toEqual({
      status: 'derived',
      sql: 'SELECT * FROM invoices LIMIT 100',
    });
  });

  it('reports a missing FROM clause', () => {
    expect(derivePreAggregationQuery('SELECT 1 GROUP BY 1')).toEqual({
      status: 'not-applicable',
      reason: 'no FROM clause found',
    });
  });

  it('uses the row cap', () => {
    expect(DRILLDOWN_ROW_CAP).toBe(100);
    expect(derivePreAggregationQuery('SELECT status FROM invoices GROUP BY status', 10)).toEqual({
      status: 'derived',
      sql: 'SELECT * FROM invoices LIMIT 10',
    });
  });
});
