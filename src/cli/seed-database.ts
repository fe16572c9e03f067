/**
 * Demo dataset seeder.
 * Generates realistic clients, invoices and line items with Faker.js
 */

import { faker } from '@faker-js/faker';
import type { Store } from '../services/database.js';
import {
  loadDataset,
  type ClientRow,
  type Dataset,
  type InvoiceRow,
  type LineItemRow,
} from '../services/ingest.js';
import * as logger from './logger.js';

const INDUSTRIES = [
  'Technology',
  'Healthcare',
  'Finance',
  'Retail',
  'Manufacturing',
  'Education',
  'Logistics',
  'Media',
];

const COUNTRIES = ['United States', 'United Kingdom', 'Germany', 'France', 'Canada', 'Japan'];

const SERVICES = [
  'Consulting',
  'Implementation',
  'Support',
  'Training',
  'Licensing',
  'Hosting',
  'Audit',
];

const INVOICE_STATUSES = ['Paid', 'Overdue', 'Draft'];

const FX_RATES_TO_USD: Record<string, number> = {
  USD: 1,
  EUR: 1.08,
  GBP: 1.27,
  CAD: 0.74,
};

export interface SeedCounts {
  clients: number;
  invoices: number;
}

export const DEFAULT_COUNTS: SeedCounts = {
  clients: 25,
  invoices: 200,
};

const DAY_MS = 24 * 60 * 60 * 1000;

function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function pick<T>(values: readonly T[]): T {
  return faker.helpers.arrayElement(values);
}

/**
 * Build a demo dataset. The same seed always yields the same rows.
 */
export function generateDemoDataset(counts: SeedCounts = DEFAULT_COUNTS, seed = 42): Dataset {
  faker.seed(seed);

  const clients: ClientRow[] = [];
  for (let i = 1; i <= counts.clients; i++) {
    clients.push({
      client_id: `C${String(i).padStart(3, '0')}`,
      client_name: faker.company.name(),
      industry: pick(INDUSTRIES),
      country: pick(COUNTRIES),
    });
  }

  const invoices: InvoiceRow[] = [];
  const lineItems: LineItemRow[] = [];
  const currencies = Object.keys(FX_RATES_TO_USD);

  if (clients.length > 0) {
    for (let i = 1; i <= counts.invoices; i++) {
      const invoiceId = `INV${String(i).padStart(4, '0')}`;
      const issued = faker.date.between({ from: '2024-01-01', to: '2024-12-31' });
      const currency = pick(currencies);

      invoices.push({
        invoice_id: invoiceId,
        client_id: pick(clients).client_id,
        invoice_date: isoDay(issued),
        due_date: isoDay(new Date(issued.getTime() + 30 * DAY_MS)),
        status: pick(INVOICE_STATUSES),
        currency,
        fx_rate_to_usd: FX_RATES_TO_USD[currency] ?? 1,
      });

      const itemCount = faker.number.int({ min: 1, max: 4 });
      for (let j = 1; j <= itemCount; j++) {
        lineItems.push({
          line_id: `${invoiceId}-L${j}`,
          invoice_id: invoiceId,
          service_name: pick(SERVICES),
          quantity: faker.number.int({ min: 1, max: 40 }),
          unit_price: faker.number.float({ min: 50, max: 2500, fractionDigits: 2 }),
          tax_rate: pick([0, 0.05, 0.1, 0.2]),
        });
      }
    }
  }

  return { clients, invoices, invoice_line_items: lineItems };
}

/**
 * Replace the store's tables with a generated demo dataset.
 */
export async function seedDemoDatabase(
  store: Store,
  counts: SeedCounts = DEFAULT_COUNTS,
  seed?: number
): Promise<Dataset> {
  logger.section('Creating Demo Invoice Database');
  logger.newline();

  const generating = logger.spinner('Generating demo data...');
  const dataset = generateDemoDataset(counts, seed);
  generating.succeed(
    `Generated ${dataset.clients.length} clients, ${dataset.invoices.length} invoices, ` +
      `${dataset.invoice_line_items.length} line items`
  );

  const writing = logger.spinner('Writing tables...');
  try {
    await loadDataset(store, dataset);
  } catch (error) {
    writing.fail('Could not write demo data');
    throw error;
  }
  writing.succeed('Tables written');

  logger.successBox(
    `Database created successfully!\n\n` +
      `🏢 ${dataset.clients.length.toLocaleString()} clients\n` +
      `🧾 ${dataset.invoices.length.toLocaleString()} invoices\n` +
      `📄 ${dataset.invoice_line_items.length.toLocaleString()} line items`,
    '✨ Database Ready'
  );

  return dataset;
}
