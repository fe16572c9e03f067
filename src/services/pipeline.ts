/**
 * Question-answering pipeline.
 *
 * Sequences SQL generation, analysis, drill-down, execution and answer
 * synthesis, and keeps running statistics for every question asked.
 */

import { SQLExecutionError, errorMessage } from '../types/errors.js';
import {
  isAskFailure,
  type AskFailure,
  type AskResult,
  type AskSuccess,
  type IntermediateResult,
  type PipelineStatsSnapshot,
  type QueryRecord,
  type QueryResult,
  type SqlAnalysis,
} from '../types/models.js';
import { logger } from '../utils/logger.js';
import type { AnswerSynthesizer } from './answer-synthesizer.js';
import type { QueryExecutor } from './executor.js';
import type { StoreProvisioner } from './ingest.js';
import type { SqlAnalyzer } from './sql-analyzer.js';
import type { SqlGenerator } from './sql-generator.js';
import { PipelineStatistics } from './stats.js';

export type PipelineState = 'uninitialized' | 'ready';

export interface PipelineComponents {
  generator: Pick<SqlGenerator, 'generate'>;
  analyzer: SqlAnalyzer;
  executor: Pick<QueryExecutor, 'execute'>;
  synthesizer: Pick<AnswerSynthesizer, 'synthesize'>;
  provisioner: StoreProvisioner;
  statistics?: PipelineStatistics;
}

type AskOutcome = Omit<AskSuccess, 'response_time'> | Omit<AskFailure, 'response_time'>;

/**
 * What was known about a question when it failed.
 */
interface AskTrace {
  sql?: string;
  analysis?: SqlAnalysis;
}

function secondsSince(start: number): number {
  return (performance.now() - start) / 1000;
}

/**
 * History entry for a question that produced a result.
 */
function toQueryRecord(result: AskResult): QueryRecord {
  const base = {
    question: result.question,
    response_time: result.response_time,
    analysis: result.analysis,
    sql_query: result.sql_query,
    timestamp: new Date().toISOString(),
  };

  if (isAskFailure(result)) {
    return {
      ...base,
      success: false,
      row_count: 0,
      col_count: 0,
      intermediate: null,
      error: result.error,
    };
  }

  return {
    ...base,
    success: true,
    row_count: result.row_count,
    col_count: result.col_count,
    intermediate: result.intermediate ?? null,
  };
}

export class Pipeline {
  private state: PipelineState = 'uninitialized';
  private initializing: Promise<void> | null = null;
  private readonly statistics: PipelineStatistics;

  constructor(private components: PipelineComponents) {
    this.statistics = components.statistics ?? new PipelineStatistics();
  }

  get isReady(): boolean {
    return this.state === 'ready';
  }

  /**
   * Provision the store if needed. Idempotent; concurrent callers share
   * one in-flight initialization.
   */
  initialize(): Promise<void> {
    if (this.state === 'ready') {
      return Promise.resolve();
    }

    if (!this.initializing) {
      this.initializing = this.runInitialization()
        .then(() => {
          this.state = 'ready';
        })
        .finally(() => {
          this.initializing = null;
        });
    }

    return this.initializing;
  }

  private async runInitialization(): Promise<void> {
    logger.info('Initializing pipeline...');

    if (await this.components.provisioner.isProvisioned()) {
      logger.info('Using existing store');
    } else {
      logger.info('Provisioning store...');
      await this.components.provisioner.provision();
      logger.info('Store provisioned successfully');
    }

    logger.info('Pipeline ready');
  }

  /**
   * Answer a natural-language question.
   *
   * Store rejections of the generated SQL come back as a result carrying
   * `error`; every other failure is recorded and re-thrown.
   */
  async ask(question: string): Promise<AskResult> {
    await this.initialize();

    const start = performance.now();
    const trace: AskTrace = {};
    logger.info(`Processing query: ${question.slice(0, 100)}...`);

    let result: AskResult;
    try {
      const outcome = await this.run(question, trace);
      result = { ...outcome, response_time: secondsSince(start) };
    } catch (error) {
      this.statistics.record({
        question,
        response_time: secondsSince(start),
        success: false,
        row_count: 0,
        col_count: 0,
        analysis: trace.analysis ?? null,
        intermediate: null,
        sql_query: trace.sql ?? '',
        error: errorMessage(error),
        timestamp: new Date().toISOString(),
      });
      logger.error({ err: error }, `Query failed: ${errorMessage(error)}`);
      throw error;
    }

    this.statistics.record(toQueryRecord(result));
    if (isAskFailure(result)) {
      logger.warn(`Query finished with an execution error in ${result.response_time.toFixed(2)}s`);
    } else {
      logger.info(`Response generated in ${result.response_time.toFixed(2)}s`);
    }

    return result;
  }

  /**
   * Counters, average response time, history and the latest record.
   */
  getStats(): PipelineStatsSnapshot {
    return this.statistics.snapshot();
  }

  private async run(question: string, trace: AskTrace): Promise<AskOutcome> {
    const { generator, analyzer, executor, synthesizer } = this.components;

    const sql = await generator.generate(question);
    trace.sql = sql;

    const analysis = analyzer.analyze(sql);
    trace.analysis = analysis;
    logger.info(
      `Query analysis: ${analysis.table_count} table(s), ` +
        `${analysis.join_count} join(s), type: ${analysis.query_type}`
    );

    const intermediate =
      analysis.query_type === 'AGGREGATION' ? await this.fetchIntermediate(sql) : undefined;

    let result: QueryResult;
    try {
      logger.info('Executing SQL query...');
      result = await executor.execute(sql);
    } catch (error) {
      if (error instanceof SQLExecutionError) {
        logger.error(`SQL execution error: ${error.message}`);
        return {
          question,
          sql_query: sql,
          error: error.message,
          answer: `Error executing query: ${error.message}`,
          analysis,
        };
      }
      throw error;
    }
    logger.info(`Query returned ${result.row_count} row(s), ${result.col_count} column(s)`);

    const answer = await synthesizer.synthesize(question, sql, result);

    return {
      question,
      sql_query: sql,
      columns: result.columns,
      results: result.rows,
      row_count: result.row_count,
      col_count: result.col_count,
      answer,
      analysis,
      ...(intermediate ? { intermediate } : {}),
    };
  }

  /**
   * Best-effort drill-down rows for an aggregation query.
   */
  private async fetchIntermediate(sql: string): Promise<IntermediateResult | undefined> {
    const derivation = this.components.analyzer.derivePreAggregation(sql);

    switch (derivation.status) {
      case 'not-applicable':
        logger.debug(`No pre-aggregation query: ${derivation.reason}`);
        return undefined;

      case 'failed':
        logger.warn(`Could not generate pre-aggregation query: ${derivation.reason}`);
        return undefined;

      case 'derived':
        break;
    }

    try {
      logger.info(`Fetching intermediate results: ${derivation.sql.slice(0, 80)}...`);
      const result = await this.components.executor.execute(derivation.sql);
      logger.info(`Intermediate results: ${result.row_count} rows`);
      return { ...result, sql_query: derivation.sql };
    } catch (error) {
      if (error instanceof SQLExecutionError) {
        logger.warn(`Could not fetch intermediate results: ${error.message}`);
        return undefined;
      }
      throw error;
    }
  }
}
