/**
 * Running statistics and query history for a pipeline.
 */

import type { PipelineStatsSnapshot, QueryRecord } from '../types/models.js';

/**
 * All mutation happens inside the synchronous {@link record} call, so
 * concurrent asks on the event loop never observe a half-applied update.
 */
export class PipelineStatistics {
  private totalQueries = 0;
  private successfulQueries = 0;
  private failedQueries = 0;
  private totalResponseTime = 0;
  private history: QueryRecord[] = [];
  private lastQuery: QueryRecord | null = null;

  record(entry: QueryRecord): QueryRecord {
    const frozen = Object.freeze({ ...entry });

    this.totalQueries++;
    if (frozen.success) {
      this.successfulQueries++;
    } else {
      this.failedQueries++;
    }
    this.totalResponseTime += frozen.response_time;
    this.history.push(frozen);
    this.lastQuery = frozen;

    return frozen;
  }

  /**
   * Read-only view of the current counters and history.
   */
  snapshot(): PipelineStatsSnapshot {
    return Object.freeze({
      total_queries: this.totalQueries,
      successful_queries: this.successfulQueries,
      failed_queries: this.failedQueries,
      total_response_time: this.totalResponseTime,
      avg_response_time:
        this.totalQueries > 0 ? this.totalResponseTime / this.totalQueries : 0,
      query_history: Object.freeze([...this.history]),
      last_query: this.lastQuery,
    });
  }
}
