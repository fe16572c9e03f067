/**
 * Drill-down query derivation.
 *
 * Given an aggregation query, rebuild a plain SELECT over the same FROM
 * clause so the rows behind a summary number can be inspected. This is a
 * pattern match on the raw text, not a parse.
 */

import type { DrilldownDerivation } from '../types/models.js';

export const DRILLDOWN_ROW_CAP = 100;

/**
 * FROM clause up to the first GROUP BY, ORDER BY, LIMIT, semicolon or end of text.
 */
const FROM_CLAUSE = /FROM\s+(.+?)(?:\sGROUP BY|\sORDER BY|\sLIMIT|;|$)/is;

export function derivePreAggregationQuery(
  sql: string,
  rowCap: number = DRILLDOWN_ROW_CAP
): DrilldownDerivation {
  if (!sql.toUpperCase().includes('GROUP BY')) {
    return { status: 'not-applicable', reason: 'query has no GROUP BY' };
  }

  try {
    const match = FROM_CLAUSE.exec(sql);
    const fromClause = match?.[1]?.trim();

    if (!fromClause) {
      return { status: 'not-applicable', reason: 'no FROM clause found' };
    }

    const derived = `SELECT * FROM ${fromClause} LIMIT ${rowCap}`
      .replace(/\s+/g, ' ')
      .trim();

    return { status: 'derived', sql: derived };
  } catch (error) {
    return {
      status: 'failed',
      reason: error instanceof Error ? error.message : String(error),
    };
  }
}
