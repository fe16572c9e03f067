import { Store } from '../src/services/database.js';
import { loadDataset, type Dataset } from '../src/services/ingest.js';
import type { LanguageModelClient } from '../src/services/llm.js';
import type { PromptMessage } from '../src/types/models.js';

export const FIXTURE: Dataset = {
  clients: [
    { client_id: 'C001', client_name: 'Acme Corp', industry: 'Technology', country: 'United States' },
    { client_id: 'C002', client_name: 'Globex', industry: 'Finance', country: 'United Kingdom' },
  ],
  invoices: [
    {
      invoice_id: 'INV001',
      client_id: 'C001',
      invoice_date: '2024-01-15',
      due_date: '2024-02-14',
      status: 'Paid',
      currency: 'USD',
      fx_rate_to_usd: 1,
    },
    {
      invoice_id: 'INV002',
      client_id: 'C001',
      invoice_date: '2024-02-10',
      due_date: '2024-03-11',
      status: 'Overdue',
      currency: 'USD',
      fx_rate_to_usd: 1,
    },
    {
      invoice_id: 'INV003',
      client_id: 'C002',
      invoice_date: '2024-03-05',
      due_date: null,
      status: 'Paid',
      currency: 'GBP',
      fx_rate_to_usd: 1.27,
    },
  ],
  invoice_line_items: [
    { line_id: 'L1', invoice_id: 'INV001', service_name: 'Consulting', quantity: 10, unit_price: 100, tax_rate: 0.1 },
    { line_id: 'L2', invoice_id: 'INV001', service_name: 'Support', quantity: 2, unit_price: 50, tax_rate: 0 },
    { line_id: 'L3', invoice_id: 'INV002', service_name: 'Training', quantity: 1, unit_price: 500, tax_rate: 0.2 },
    { line_id: 'L4', invoice_id: 'INV003', service_name: 'Consulting', quantity: 5, unit_price: 200, tax_rate: 0 },
  ],
};

/**
 * Fresh in-memory SQLite store. Knex keeps a single connection for
 * SQLite, so the database lives as long as the store.
 */
export function createMemoryStore(): Store {
  return Store.fromConfig({
    client: 'better-sqlite3',
    connection: { filename: ':memory:' },
    useNullAsDefault: true,
  });
}

export async function createFixtureStore(): Promise<Store> {
  const store = createMemoryStore();
  await loadDataset(store, FIXTURE);
  return store;
}

type Responder = (messages: readonly PromptMessage[]) => string | Promise<string>;

/**
 * Language model stand-in that records every prompt it receives.
 */
export class FakeLLM implements LanguageModelClient {
  readonly calls: PromptMessage[][] = [];

  constructor(private respond: Responder) {}

  async complete(messages: readonly PromptMessage[]): Promise<string> {
    this.calls.push([...messages]);
    return this.respond(messages);
  }
}

export function isSqlPrompt(messages: readonly PromptMessage[]): boolean {
  return messages[0]?.content.startsWith('You are a SQL expert') ?? false;
}

/**
 * Answers SQL prompts from a question → SQL table and every other prompt
 * with a fixed answer.
 */
export function scriptedLLM(sqlByQuestion: Record<string, string>, answer = 'fake answer'): FakeLLM {
  return new FakeLLM((messages) => {
    if (isSqlPrompt(messages)) {
      const question = messages[1]?.content ?? '';
      const sql = sqlByQuestion[question];
      if (sql === undefined) {
        throw new Error(`no scripted SQL for "${question}"`);
      }
      return sql;
    }
    return answer;
  });
}
