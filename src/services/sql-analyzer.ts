/**
 * Static SQL classification by keyword scanning.
 *
 * Callers depend on the SqlAnalyzer interface only, so the keyword
 * heuristics here can be replaced by a real parser later.
 */

import { KNOWN_TABLES } from '../catalog.js';
import type { DrilldownDerivation, QueryType, SqlAnalysis } from '../types/models.js';
import { derivePreAggregationQuery } from './drilldown.js';

export interface SqlAnalyzer {
  analyze(sql: string): SqlAnalysis;
  derivePreAggregation(sql: string): DrilldownDerivation;
}

const AGGREGATE_MARKERS = ['COUNT(', 'SUM(', 'AVG(', 'MAX(', 'MIN('];

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

/**
 * Classify a SQL string. Table names match as case-insensitive substrings,
 * so a name inside a comment or string literal still counts.
 */
export function analyzeSql(
  sql: string,
  knownTables: readonly string[] = KNOWN_TABLES
): SqlAnalysis {
  const upper = sql.toUpperCase();

  const tablesUsed = knownTables.filter((table) => upper.includes(table.toUpperCase()));
  const joinCount = countOccurrences(upper, 'JOIN');
  const hasAggregation = AGGREGATE_MARKERS.some((marker) => upper.includes(marker));
  const hasGroupBy = upper.includes('GROUP BY');

  // Aggregation wins over join.
  let queryType: QueryType = 'SELECT';
  if (hasAggregation || hasGroupBy) {
    queryType = 'AGGREGATION';
  } else if (joinCount > 0) {
    queryType = 'JOIN';
  }

  return {
    tables_used: tablesUsed,
    table_count: tablesUsed.length,
    join_count: joinCount,
    has_aggregation: hasAggregation,
    has_group_by: hasGroupBy,
    has_filter: upper.includes('WHERE'),
    has_order: upper.includes('ORDER BY'),
    has_limit: upper.includes('LIMIT'),
    query_type: queryType,
  };
}

export class KeywordSqlAnalyzer implements SqlAnalyzer {
  constructor(private knownTables: readonly string[] = KNOWN_TABLES) {}

  analyze(sql: string): SqlAnalysis {
    return analyzeSql(sql, this.knownTables);
  }

  derivePreAggregation(sql: string): DrilldownDerivation {
    return derivePreAggregationQuery(sql);
  }
}
