/**
 * Business tables the pipeline knows about, with the descriptions and join
 * rules handed to the LLM.
 */

export const KNOWN_TABLES = ['clients', 'invoices', 'invoice_line_items'] as const;

export type KnownTable = (typeof KNOWN_TABLES)[number];

export const TABLE_DESCRIPTIONS: Record<KnownTable, string> = {
  clients:
    'Contains client information including client_id (primary key), ' +
    'client_name, industry, and country.',
  invoices:
    'Contains invoice records with invoice_id (primary key), client_id (foreign key), ' +
    'invoice_date, due_date, status (Paid/Overdue/Draft), currency, and fx_rate_to_usd.',
  invoice_line_items:
    'Contains line items for invoices with line_id (primary key), invoice_id (foreign key), ' +
    'service_name, quantity, unit_price, and tax_rate. ' +
    'Line total with tax = quantity * unit_price * (1 + tax_rate).',
};

export const LINE_TOTAL_FORMULA = 'quantity * unit_price * (1 + tax_rate)';

export interface JoinRule {
  left: KnownTable;
  right: KnownTable;
  key: string;
}

export const JOIN_RULES: readonly JoinRule[] = [
  { left: 'clients', right: 'invoices', key: 'client_id' },
  { left: 'invoices', right: 'invoice_line_items', key: 'invoice_id' },
];

/**
 * Render table descriptions as a bullet list.
 */
export function describeTables(): string {
  return KNOWN_TABLES.map((name) => `- ${name}: ${TABLE_DESCRIPTIONS[name]}`).join('\n');
}
