import { afterEach, describe, it, expect } from 'vitest';
import type { Store } from '../src/services/database.js';
import { SchemaIntrospector } from '../src/services/schema-introspector.js';
import { SqlGenerator, buildSqlPrompt, stripSqlFences } from '../src/services/sql-generator.js';
import { createFixtureStore, FakeLLM } from './helpers.js';

describe('stripSqlFences', () => {
  it('removes Markdown fences and whitespace', () => {
    expect(stripSqlFences('```sql\nSELECT * FROM clients;\n```')).toBe('SELECT * FROM clients;');
    expect(stripSqlFences('  ```\nSELECT 1\n```  ')).toBe('SELECT 1');
    expect(stripSqlFences('SELECT 1')).toBe('SELECT 1');
  });
});

describe('buildSqlPrompt', () => {
  it('fills in dialect, schema, descriptions and rules', () => {
    const [system, human] = buildSqlPrompt('How many clients?', 'Table: clients', 'SQLite');

    expect(system?.role).toBe('system');
    expect(system?.content).toContain("Generate a SQLite query to answer the user's question.");
    expect(system?.content).toContain('Database Schema:\nTable: clients\n');
    expect(system?.content).toContain('- invoices: Contains invoice records');
    expect(system?.content).toContain(
      '2. For line totals with tax: quantity * unit_price * (1 + tax_rate)'
    );
    expect(system?.content).toContain('3. Join clients and invoices on client_id');
    expect(system?.content).toContain('4. Join invoices and invoice_line_items on invoice_id');
    expect(system?.content).toContain('6. Use strftime for date operations in SQLite');
    expect(human).toEqual({ role: 'human', content: 'How many clients?' });
  });

  it('switches the date rule for PostgreSQL', () => {
    const [system] = buildSqlPrompt('q', '', 'PostgreSQL');

    expect(system?.content).toContain('Generate a PostgreSQL query');
    expect(system?.content).toContain('6. Use date_trunc, EXTRACT or to_char');
  });

  it('keeps dollar signs in the schema text literal', () => {
    const [system] = buildSqlPrompt('q', "price $& $1 $'", 'SQLite');

    expect(system?.content).toContain("Database Schema:\nprice $& $1 $'\n");
  });
});

describe('SqlGenerator', () => {
  let store: Store;

  afterEach(async () => {
    await store.close();
  });

  it('returns the model output without fences', async () => {
    store = await createFixtureStore();
    const llm = new FakeLLM(() => '```sql\nSELECT COUNT(*) FROM clients\n```');
    const generator = new SqlGenerator(llm, new SchemaIntrospector(store));

    expect(await generator.generate('How many clients?')).toBe('SELECT COUNT(*) FROM clients');
    expect(llm.calls).toHaveLength(1);
    expect(llm.calls[0]?.[0]?.content).toContain('Table: invoice_line_items');
  });

  it('introspects the store on every call', async () => {
    store = await createFixtureStore();
    const llm = new FakeLLM(() => 'SELECT 1');
    const generator = new SqlGenerator(llm, new SchemaIntrospector(store));

    await generator.generate('first');
    await store.db('clients').insert({
      client_id: 'C000',
      client_name: 'Initech',
      industry: null,
      country: null,
    });
    await generator.generate('second');

    expect(llm.calls[0]?.[0]?.content).not.toContain('Initech');
    expect(llm.calls[1]?.[0]?.content).toContain('Initech');
  });
});
