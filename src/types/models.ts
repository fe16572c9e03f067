/**
 * Type definitions and Zod schemas for the question-answering pipeline.
 * Records that leave the pipeline use snake_case keys so the HTTP API can
 * return them unchanged.
 */

import { z } from 'zod';
import type { ResultRow, Row } from './utils.js';

// ============================================================================
// SCHEMA SUMMARY
// ============================================================================

export interface ColumnSummary {
	readonly name: string;
	readonly type: string;
}

/**
 * Grounding context for one table: its columns and a few sample rows.
 */
export interface TableSummary {
	readonly name: string;
	readonly columns: readonly ColumnSummary[];
	readonly sample_rows: readonly Row[];
}

export type SchemaSummary = readonly TableSummary[];

// ============================================================================
// SQL ANALYSIS
// ============================================================================

export const QUERY_TYPES = ['AGGREGATION', 'JOIN', 'SELECT'] as const;

export type QueryType = (typeof QUERY_TYPES)[number];

/**
 * Static classification of a SQL string.
 */
export interface SqlAnalysis {
	readonly tables_used: readonly string[];
	readonly table_count: number;
	readonly join_count: number;
	readonly has_aggregation: boolean;
	readonly has_group_by: boolean;
	readonly has_filter: boolean;
	readonly has_order: boolean;
	readonly has_limit: boolean;
	readonly query_type: QueryType;
}

/**
 * Outcome of deriving a drill-down query from an aggregation.
 */
export type DrilldownDerivation =
	| { readonly status: 'derived'; readonly sql: string }
	| { readonly status: 'not-applicable'; readonly reason: string }
	| { readonly status: 'failed'; readonly reason: string };

// ============================================================================
// QUERY RESULTS
// ============================================================================

/**
 * Rows are positional and line up with `columns`, which may repeat a name.
 */
export interface QueryResult {
	readonly columns: readonly string[];
	readonly rows: readonly ResultRow[];
	readonly row_count: number;
	readonly col_count: number;
}

/**
 * Pre-aggregation rows fetched for an aggregation query, with their SQL.
 */
export interface IntermediateResult extends QueryResult {
	readonly sql_query: string;
}

interface AskResultBase {
	readonly question: string;
	readonly sql_query: string;
	readonly answer: string;
	readonly analysis: SqlAnalysis;
	/** Wall-clock seconds spent on the whole question. */
	readonly response_time: number;
}

export interface AskSuccess extends AskResultBase {
	readonly columns: readonly string[];
	readonly results: readonly ResultRow[];
	readonly row_count: number;
	readonly col_count: number;
	readonly intermediate?: IntermediateResult;
}

/**
 * Returned when the store rejects the generated SQL.
 */
export interface AskFailure extends AskResultBase {
	readonly error: string;
}

export type AskResult = AskSuccess | AskFailure;

export function isAskFailure(result: AskResult): result is AskFailure {
	return 'error' in result;
}

// ============================================================================
// STATISTICS
// ============================================================================

/**
 * History entry for one completed or failed question.
 */
export interface QueryRecord {
	readonly question: string;
	readonly response_time: number;
	readonly success: boolean;
	readonly row_count: number;
	readonly col_count: number;
	/** Null when the question failed before its SQL was analysed. */
	readonly analysis: SqlAnalysis | null;
	readonly intermediate: IntermediateResult | null;
	readonly sql_query: string;
	readonly error?: string;
	readonly timestamp: string;
}

export interface PipelineStatsSnapshot {
	readonly total_queries: number;
	readonly successful_queries: number;
	readonly failed_queries: number;
	readonly total_response_time: number;
	readonly avg_response_time: number;
	readonly query_history: readonly QueryRecord[];
	readonly last_query: QueryRecord | null;
}

// ============================================================================
// LLM PROMPTS
// ============================================================================

export type PromptRole = 'system' | 'human';

export interface PromptMessage {
	readonly role: PromptRole;
	readonly content: string;
}

// ============================================================================
// API REQUESTS
// ============================================================================

export const MAX_QUESTION_LENGTH = 500;

/**
 * Body of POST /ask.
 */
export const AskRequestSchema = z.object({
	question: z
		.string()
		.trim()
		.min(1, 'question must not be empty')
		.max(MAX_QUESTION_LENGTH),
});

export type AskRequest = z.infer<typeof AskRequestSchema>;
