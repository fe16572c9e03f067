import { describe, it, expect } from 'vitest';
import { generateDemoDataset } from '../src/cli/seed-database.js';
import { loadDataset } from '../src/services/ingest.js';
import { createMemoryStore } from './helpers.js';

describe('generateDemoDataset', () => {
  const dataset = generateDemoDataset({ clients: 5, invoices: 20 }, 7);

  it('generates the requested counts', () => {
    expect(dataset.clients).toHaveLength(5);
    expect(dataset.invoices).toHaveLength(20);
    expect(dataset.invoice_line_items.length).toBeGreaterThanOrEqual(20);
    expect(dataset.invoice_line_items.length).toBeLessThanOrEqual(80);
  });

  it('keeps foreign keys consistent', () => {
    const clientIds = new Set(dataset.clients.map((client) => client.client_id));
    const invoiceIds = new Set(dataset.invoices.map((invoice) => invoice.invoice_id));

    expect(dataset.invoices.every((invoice) => clientIds.has(invoice.client_id))).toBe(true);
    expect(dataset.invoice_line_items.every((item) => invoiceIds.has(item.invoice_id))).toBe(true);
    expect(new Set(dataset.invoice_line_items.map((item) => item.line_id)).size).toBe(
      dataset.invoice_line_items.length
    );
  });

  it('writes dates as YYYY-MM-DD with due dates 30 days out', () => {
    const invoice = dataset.invoices[0];
    expect(invoice?.invoice_date).toMatch(/^2024-\d{2}-\d{2}$/);
    expect(invoice?.due_date).toMatch(/^\d{4}-\d{2}-\d{2}$/);

    const issued = Date.parse(`${invoice?.invoice_date}T00:00:00Z`);
    const due = Date.parse(`${invoice?.due_date}T00:00:00Z`);
    expect((due - issued) / 86_400_000).toBe(30);
  });

  it('is repeatable for a seed', () => {
    expect(generateDemoDataset({ clients: 5, invoices: 20 }, 7)).toEqual(dataset);
  });

  it('generates no invoices without clients', () => {
    expect(generateDemoDataset({ clients: 0, invoices: 10 }, 1)).toEqual({
      clients: [],
      invoices: [],
      invoice_line_items: [],
    });
  });

  it('loads into the store', async () => {
    const store = createMemoryStore();
    await loadDataset(store, dataset);

    expect(await store.raw('SELECT COUNT(*) AS n FROM invoices')).toEqual([{ n: 20 }]);
    await store.close();
  });
});
