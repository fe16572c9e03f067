/**
 * Natural-language answers grounded in query results.
 */

import type { PromptMessage, QueryResult } from '../types/models.js';
import { logger } from '../utils/logger.js';
import { renderTable } from '../utils/table.js';
import type { LanguageModelClient } from './llm.js';

export const NO_RESULTS_MARKER = 'No results';

const ANSWER_SYSTEM_PROMPT = `You are a helpful assistant answering questions about business data.
Based on the query results, provide a clear and accurate answer.

Rules:
1. Use ONLY the data provided in the results
2. Format numbers appropriately (currency with 2 decimals)
3. If results are empty, say no matching data was found
4. Be concise but complete`;

/**
 * Render a result for the prompt, or the no-results marker.
 */
export function renderResultForPrompt(result: QueryResult): string {
  return result.row_count > 0 ? renderTable(result.columns, result.rows) : NO_RESULTS_MARKER;
}

export function buildAnswerPrompt(
  question: string,
  sql: string,
  result: QueryResult
): PromptMessage[] {
  return [
    { role: 'system', content: ANSWER_SYSTEM_PROMPT },
    {
      role: 'human',
      content: `Question: ${question}

SQL Query executed:
${sql}

Results:
${renderResultForPrompt(result)}

Provide a natural language answer:`,
    },
  ];
}

export class AnswerSynthesizer {
  constructor(private llm: LanguageModelClient) {}

  /**
   * Ask the LLM to phrase an answer. The text is returned as is.
   */
  async synthesize(question: string, sql: string, result: QueryResult): Promise<string> {
    logger.info('Generating natural language answer...');
    return this.llm.complete(buildAnswerPrompt(question, sql, result));
  }
}
