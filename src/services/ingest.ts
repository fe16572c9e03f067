/**
 * Store provisioning: table schema plus the Excel workbook load.
 *
 * Loading replaces table contents: tables are dropped, recreated and
 * filled inside one transaction.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import type { Knex } from 'knex';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import { KNOWN_TABLES, type KnownTable } from '../catalog.js';
import { ProvisioningError, errorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import type { Store } from './database.js';

/**
 * Provisions the backing store when it is empty.
 */
export interface StoreProvisioner {
  isProvisioned(): Promise<boolean>;
  provision(): Promise<void>;
}

export const WORKBOOK_FILES: Record<KnownTable, string> = {
  clients: 'Clients.xlsx',
  invoices: 'Invoices.xlsx',
  invoice_line_items: 'InvoiceLineItems.xlsx',
};

// ============================================================================
// ROW SCHEMAS
// ============================================================================

const text = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1));

const optionalText = z
  .union([z.string(), z.number(), z.null()])
  .transform((value) => (value === null || String(value).trim() === '' ? null : String(value).trim()));

const numeric = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number());

const optionalNumeric = z
  .union([z.number(), z.string(), z.null()])
  .transform((value) => (value === null || value === '' ? null : Number(value)))
  .pipe(z.number().nullable());

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Normalise an Excel date cell (Date, serial number or string) to YYYY-MM-DD.
 */
export function toIsoDate(value: unknown): unknown {
  if (value instanceof Date) {
    return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
  }
  if (typeof value === 'number') {
    const parsed = XLSX.SSF.parse_date_code(value);
    return `${parsed.y}-${pad(parsed.m)}-${pad(parsed.d)}`;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    return /^\d{4}-\d{2}-\d{2}/.test(trimmed) ? trimmed.slice(0, 10) : trimmed;
  }
  return value;
}

const isoDate = z.preprocess(toIsoDate, z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a date'));
const optionalIsoDate = z.preprocess(
  toIsoDate,
  z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a date').nullable()
);

export const ClientRowSchema = z.object({
  client_id: text,
  client_name: text,
  industry: optionalText,
  country: optionalText,
});

export const InvoiceRowSchema = z.object({
  invoice_id: text,
  client_id: text,
  invoice_date: isoDate,
  due_date: optionalIsoDate,
  status: optionalText,
  currency: optionalText,
  fx_rate_to_usd: optionalNumeric,
});

export const LineItemRowSchema = z.object({
  line_id: text,
  invoice_id: text,
  service_name: text,
  quantity: numeric,
  unit_price: numeric,
  tax_rate: numeric,
});

export type ClientRow = z.infer<typeof ClientRowSchema>;
export type InvoiceRow = z.infer<typeof InvoiceRowSchema>;
export type LineItemRow = z.infer<typeof LineItemRowSchema>;

export interface Dataset {
  clients: ClientRow[];
  invoices: InvoiceRow[];
  invoice_line_items: LineItemRow[];
}

// ============================================================================
// SCHEMA
// ============================================================================

/**
 * Drop and recreate the business tables.
 */
export async function createSchema(db: Knex | Knex.Transaction): Promise<void> {
  await db.schema.dropTableIfExists('invoice_line_items');
  await db.schema.dropTableIfExists('invoices');
  await db.schema.dropTableIfExists('clients');

  await db.schema.createTable('clients', (table) => {
    table.string('client_id').primary();
    table.string('client_name').notNullable();
    table.string('industry');
    table.string('country');
  });

  await db.schema.createTable('invoices', (table) => {
    table.string('invoice_id').primary();
    table.string('client_id').notNullable().references('client_id').inTable('clients');
    table.date('invoice_date').notNullable();
    table.date('due_date');
    table.string('status');
    table.string('currency');
    table.double('fx_rate_to_usd');
  });

  await db.schema.createTable('invoice_line_items', (table) => {
    table.string('line_id').primary();
    table.string('invoice_id').notNullable().references('invoice_id').inTable('invoices');
    table.string('service_name').notNullable();
    table.double('quantity').notNullable();
    table.double('unit_price').notNullable();
    table.double('tax_rate').notNullable();
  });
}

const INSERT_CHUNK_SIZE = 100;

async function insertRows(
  trx: Knex.Transaction,
  table: KnownTable,
  rows: readonly object[]
): Promise<void> {
  for (let start = 0; start < rows.length; start += INSERT_CHUNK_SIZE) {
    await trx(table).insert(rows.slice(start, start + INSERT_CHUNK_SIZE));
  }
}

/**
 * Replace all three tables with the given dataset.
 */
export async function loadDataset(store: Store, dataset: Dataset): Promise<void> {
  await store.db.transaction(async (trx) => {
    await createSchema(trx);
    await insertRows(trx, 'clients', dataset.clients);
    await insertRows(trx, 'invoices', dataset.invoices);
    await insertRows(trx, 'invoice_line_items', dataset.invoice_line_items);
  });

  logger.info(
    `Loaded ${dataset.clients.length} clients, ${dataset.invoices.length} invoices, ` +
      `${dataset.invoice_line_items.length} line items`
  );
}

// ============================================================================
// WORKBOOKS
// ============================================================================

function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/\s+/g, '_');
}

/**
 * Rows of a workbook's first sheet, keyed by normalised header.
 * Empty cells come back as null.
 */
export function readSheetRows(workbook: XLSX.WorkBook): Record<string, unknown>[] {
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new ProvisioningError('Workbook has no sheets');
  }

  return XLSX.utils
    .sheet_to_json<Record<string, unknown>>(sheet, { defval: null })
    .map((row) =>
      Object.fromEntries(Object.entries(row).map(([key, value]) => [normalizeHeader(key), value]))
    );
}

/**
 * Validate sheet rows against a row schema.
 */
export function parseRows<T>(
  table: KnownTable,
  rows: readonly Record<string, unknown>[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T[] {
  return rows.map((row, index) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      // +2: one for the header row, one for 1-based numbering
      throw new ProvisioningError(`${table} row ${index + 2} is invalid (${issues})`);
    }
    return parsed.data;
  });
}

export function datasetFromWorkbooks(workbooks: Record<KnownTable, XLSX.WorkBook>): Dataset {
  return {
    clients: parseRows('clients', readSheetRows(workbooks.clients), ClientRowSchema),
    invoices: parseRows('invoices', readSheetRows(workbooks.invoices), InvoiceRowSchema),
    invoice_line_items: parseRows(
      'invoice_line_items',
      readSheetRows(workbooks.invoice_line_items),
      LineItemRowSchema
    ),
  };
}

async function readWorkbook(path: string): Promise<XLSX.WorkBook> {
  let buffer: Buffer;
  try {
    buffer = await readFile(path);
  } catch (error) {
    throw new ProvisioningError(`Cannot read workbook ${path}: ${errorMessage(error)}`);
  }
  return XLSX.read(buffer, { type: 'buffer', cellDates: true });
}

/**
 * Read the three source workbooks from a directory.
 */
export async function readWorkbooks(dataDir: string): Promise<Record<KnownTable, XLSX.WorkBook>> {
  return {
    clients: await readWorkbook(join(dataDir, WORKBOOK_FILES.clients)),
    invoices: await readWorkbook(join(dataDir, WORKBOOK_FILES.invoices)),
    invoice_line_items: await readWorkbook(join(dataDir, WORKBOOK_FILES.invoice_line_items)),
  };
}

/**
 * Provisions the store from Excel workbooks in a data directory.
 */
export class ExcelProvisioner implements StoreProvisioner {
  constructor(
    private store: Store,
    private dataDir: string
  ) {}

  async isProvisioned(): Promise<boolean> {
    for (const table of KNOWN_TABLES) {
      if (!(await this.store.hasTable(table))) {
        return false;
      }
    }
    return true;
  }

  async provision(): Promise<void> {
    logger.info(`Loading workbooks from ${this.dataDir}...`);
    const workbooks = await readWorkbooks(this.dataDir);
    await loadDataset(this.store, datasetFromWorkbooks(workbooks));
  }
}
