#!/usr/bin/env node
/**
 * tabletalk CLI
 * Ask questions about invoice data from the command line
 */

import { cac } from 'cac';
import { z } from 'zod';
import { createApp } from './app.js';
import { config } from './config.js';
import { runDiagnostics } from './cli/diagnostics.js';
import * as logger from './cli/logger.js';
import { DEFAULT_COUNTS, seedDemoDatabase } from './cli/seed-database.js';
import { Store } from './services/database.js';
import { ExcelProvisioner } from './services/ingest.js';
import { errorMessage } from './types/errors.js';
import { isAskFailure } from './types/models.js';

const cli = cac('tabletalk');

cli.version('1.0.0');
cli.help();

function toCount(value: string | number | undefined, fallback: number): number {
  const parsed = Number(value ?? fallback);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Expected a non-negative integer, got "${String(value)}"`);
  }
  return parsed;
}

function fail(message: string, error: unknown, suggestion?: string): never {
  logger.error(`${message}: ${errorMessage(error)}`, suggestion);
  process.exit(1);
}

/**
 * tabletalk serve
 * Start the HTTP server
 */
cli
  .command('serve', 'Start the HTTP API server')
  .option('-p, --port <port>', 'Server port', { default: config.PORT })
  .option('--host <host>', 'Bind address', { default: config.HOST })
  .action(async (options: { port: string | number; host: string }) => {
    logger.printBanner();
    logger.newline();

    try {
      const { startServer } = await import('./index.js');
      await startServer({ host: options.host, port: toCount(options.port, config.PORT) });
    } catch (error) {
      fail('Failed to start server', error);
    }
  });

/**
 * tabletalk ask <question>
 * Run the pipeline in-process and print the answer
 */
cli
  .command('ask <question>', 'Answer a natural-language question')
  .action(async (question: string) => {
    logger.printBanner();
    logger.info(`Question: "${question}"`);

    const { store, pipeline } = createApp(config);
    try {
      const spinner = logger.spinner('Thinking...');
      const result = await pipeline.ask(question).finally(() => spinner.stop());

      logger.box(result.answer, 'Answer');

      logger.section('Generated SQL');
      logger.code(result.sql_query, 'sql');

      logger.section('Analysis');
      logger.row('Query type', result.analysis.query_type);
      logger.row('Tables', result.analysis.tables_used.join(', ') || '(none)');
      logger.row('Joins', String(result.analysis.join_count));

      if (isAskFailure(result)) {
        logger.newline();
        logger.errorBox(result.error, 'SQL Error');
      } else {
        logger.section(`Results (${result.row_count} rows, ${result.col_count} columns)`);
        logger.table(result.columns, result.results);

        if (result.intermediate) {
          logger.section(`Drill-down (${result.intermediate.row_count} rows)`);
          logger.code(result.intermediate.sql_query, 'sql');
          logger.table(result.intermediate.columns, result.intermediate.rows);
        }
      }

      logger.newline();
      logger.info(`Response time: ${result.response_time.toFixed(2)}s`);
    } catch (error) {
      fail('Question failed', error, 'Run: tabletalk doctor');
    } finally {
      await store.close();
    }
  });

/**
 * tabletalk ingest
 * Load the Excel workbooks into the store
 */
cli
  .command('ingest', 'Load Clients, Invoices and InvoiceLineItems workbooks')
  .option('--dir <dir>', 'Directory holding the workbooks', { default: config.DATA_DIR })
  .action(async (options: { dir: string }) => {
    const store = Store.fromConfig(config.KNEX_CONFIG);
    const spinner = logger.spinner(`Loading workbooks from ${options.dir}...`);

    try {
      await new ExcelProvisioner(store, options.dir).provision();
      spinner.succeed('Workbooks loaded');
    } catch (error) {
      spinner.fail('Ingest failed');
      fail('Could not load workbooks', error);
    } finally {
      await store.close();
    }
  });

/**
 * tabletalk seed
 * Write a generated demo dataset
 */
cli
  .command('seed', 'Replace the tables with generated demo data')
  .option('--clients <n>', 'Number of clients', { default: DEFAULT_COUNTS.clients })
  .option('--invoices <n>', 'Number of invoices', { default: DEFAULT_COUNTS.invoices })
  .option('--seed <n>', 'Random seed')
  .action(
    async (options: { clients: string | number; invoices: string | number; seed?: string | number }) => {
      logger.printBanner();
      const store = Store.fromConfig(config.KNEX_CONFIG);

      try {
        await seedDemoDatabase(
          store,
          {
            clients: toCount(options.clients, DEFAULT_COUNTS.clients),
            invoices: toCount(options.invoices, DEFAULT_COUNTS.invoices),
          },
          options.seed === undefined ? undefined : toCount(options.seed, 0)
        );
      } catch (error) {
        fail('Seeding failed', error);
      } finally {
        await store.close();
      }
    }
  );

const StatsResponseSchema = z.object({
  total_queries: z.number(),
  successful_queries: z.number(),
  failed_queries: z.number(),
  avg_response_time: z.number(),
  last_query: z
    .object({
      question: z.string(),
      success: z.boolean(),
      response_time: z.number(),
    })
    .nullable(),
});

/**
 * tabletalk stats
 * Show pipeline statistics from a running server
 */
cli
  .command('stats', 'Show pipeline statistics from a running server')
  .option('--url <url>', 'Server base URL', { default: `http://localhost:${config.PORT}` })
  .action(async (options: { url: string }) => {
    logger.printBanner();
    logger.info('Fetching pipeline statistics...');

    try {
      const response = await fetch(new URL('/stats', options.url));
      if (!response.ok) {
        throw new Error(`Server responded with ${response.status}`);
      }

      const stats = StatsResponseSchema.parse(await response.json());
      const successRate =
        stats.total_queries > 0 ? (stats.successful_queries / stats.total_queries) * 100 : 0;

      logger.section('Pipeline Statistics');
      logger.row('Total queries', String(stats.total_queries));
      logger.row('Successful', String(stats.successful_queries));
      logger.row('Failed', String(stats.failed_queries), stats.failed_queries === 0);
      logger.row('Success rate', `${successRate.toFixed(1)}%`);
      logger.row('Avg response time', `${stats.avg_response_time.toFixed(2)}s`);

      if (stats.last_query) {
        logger.section('Last Query');
        logger.row('Question', stats.last_query.question, stats.last_query.success);
        logger.row('Response time', `${stats.last_query.response_time.toFixed(2)}s`);
      }
      logger.newline();
    } catch (error) {
      fail('Failed to fetch stats', error, 'Make sure the server is running: tabletalk serve');
    }
  });

/**
 * tabletalk doctor
 * Run diagnostics
 */
cli
  .command('doctor', 'Run diagnostics')
  .action(async () => {
    try {
      const healthy = await runDiagnostics(config);
      process.exitCode = healthy ? 0 : 1;
    } catch (error) {
      fail('Diagnostics failed', error);
    }
  });

// Parse CLI arguments
cli.parse();
