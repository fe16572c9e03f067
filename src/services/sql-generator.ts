/**
 * SQL generation from natural-language questions.
 */

import { describeTables, JOIN_RULES, LINE_TOTAL_FORMULA } from '../catalog.js';
import type { PromptMessage } from '../types/models.js';
import { logger } from '../utils/logger.js';
import type { LanguageModelClient } from './llm.js';
import { renderSchemaSummary, type SchemaIntrospector } from './schema-introspector.js';

export type SqlDialect = 'SQLite' | 'PostgreSQL';

const DATE_FUNCTION_RULES: Record<SqlDialect, string> = {
  SQLite: 'Use strftime for date operations in SQLite',
  PostgreSQL: 'Use date_trunc, EXTRACT or to_char for date operations in PostgreSQL',
};

const PROMPT_RULES: readonly string[] = [
  'Use only the tables and columns shown in the schema',
  `For line totals with tax: ${LINE_TOTAL_FORMULA}`,
  ...JOIN_RULES.map((rule) => `Join ${rule.left} and ${rule.right} on ${rule.key}`),
  'Return ONLY the SQL query, no explanations',
  '{date_rule}',
];

/**
 * System prompt for SQL generation.
 */
const SQL_GENERATION_SYSTEM_PROMPT = `You are a SQL expert. Generate a {dialect} query to answer the user's question.

Database Schema:
{schema}

Table Descriptions:
{table_descriptions}

Rules:
${PROMPT_RULES.map((rule, index) => `${index + 1}. ${rule}`).join('\n')}`;

/**
 * Remove Markdown code fences and surrounding whitespace from a response.
 */
export function stripSqlFences(raw: string): string {
  return raw.trim().replace(/```(?:sql)?/gi, '').trim();
}

/**
 * Build the prompt messages for one question.
 */
export function buildSqlPrompt(
  question: string,
  schema: string,
  dialect: SqlDialect
): PromptMessage[] {
  // Replacer functions keep `$` sequences in sample data literal.
  const system = SQL_GENERATION_SYSTEM_PROMPT.replace('{dialect}', dialect)
    .replace('{date_rule}', DATE_FUNCTION_RULES[dialect])
    .replace('{table_descriptions}', () => describeTables())
    .replace('{schema}', () => schema);

  return [
    { role: 'system', content: system },
    { role: 'human', content: question },
  ];
}

export class SqlGenerator {
  constructor(
    private llm: LanguageModelClient,
    private introspector: SchemaIntrospector,
    private dialect: SqlDialect = 'SQLite'
  ) {}

  /**
   * Generate a SQL string for a question. The SQL is not validated;
   * the store rejects bad queries at execution time.
   */
  async generate(question: string): Promise<string> {
    logger.info('Generating SQL query...');

    const summary = await this.introspector.describe();
    const messages = buildSqlPrompt(question, renderSchemaSummary(summary), this.dialect);
    const sql = stripSqlFences(await this.llm.complete(messages));

    logger.info(`Generated SQL: ${sql.slice(0, 100)}...`);
    return sql;
  }
}
