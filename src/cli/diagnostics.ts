/**
 * Health diagnostics and troubleshooting.
 * Helps users identify and fix configuration issues.
 */

import { existsSync } from 'fs';
import { join } from 'path';
import Table from 'cli-table3';
import chalk from 'chalk';
import { KNOWN_TABLES } from '../catalog.js';
import type { Config } from '../config.js';
import { Store } from '../services/database.js';
import { WORKBOOK_FILES } from '../services/ingest.js';
import { errorMessage } from '../types/errors.js';
import * as logger from './logger.js';

export interface DiagnosticCheck {
  name: string;
  passed: boolean;
  message: string;
  fix?: string;
}

/**
 * SQLite file name from a knex config, if it has one.
 */
export function sqliteFilename(knexConfig: Config['KNEX_CONFIG']): string | undefined {
  const connection = knexConfig.connection;
  if (
    typeof connection === 'object' &&
    connection !== null &&
    'filename' in connection &&
    typeof connection.filename === 'string'
  ) {
    return connection.filename;
  }
  return undefined;
}

/**
 * Checks that need only the configuration and the filesystem.
 */
export function configChecks(config: Config, cwd: string = process.cwd()): DiagnosticCheck[] {
  const checks: DiagnosticCheck[] = [];

  const envExists = existsSync(join(cwd, '.env'));
  checks.push({
    name: 'Environment File',
    passed: envExists,
    message: envExists ? '.env file found' : '.env file not found',
    fix: envExists ? undefined : 'Copy .env.example to .env',
  });

  const { provider, model, apiKey } = config.LLM_CONFIG;
  const keyName = provider === 'openai' ? 'OPENAI_API_KEY' : 'ANTHROPIC_API_KEY';
  checks.push({
    name: 'LLM API Key',
    passed: Boolean(apiKey),
    message: apiKey ? `${provider}/${model} configured` : `${keyName} missing`,
    fix: apiKey ? undefined : `Add ${keyName}=... to .env`,
  });

  const filename = sqliteFilename(config.KNEX_CONFIG);
  if (config.DATABASE_TYPE === 'sqlite3' && filename) {
    const dbExists = filename === ':memory:' || existsSync(filename);
    checks.push({
      name: 'SQLite File',
      passed: dbExists,
      message: dbExists ? `Database file: ${filename}` : `Database file not found: ${filename}`,
      fix: dbExists ? undefined : 'Run: tabletalk ingest (or tabletalk seed for demo data)',
    });
  } else {
    checks.push({
      name: 'Database',
      passed: true,
      message: `Database type: ${config.DATABASE_TYPE}`,
    });
  }

  const missingWorkbooks = Object.values(WORKBOOK_FILES).filter(
    (file) => !existsSync(join(config.DATA_DIR, file))
  );
  checks.push({
    name: 'Source Workbooks',
    passed: missingWorkbooks.length === 0,
    message:
      missingWorkbooks.length === 0
        ? `All workbooks found in ${config.DATA_DIR}`
        : `Missing: ${missingWorkbooks.join(', ')}`,
    fix:
      missingWorkbooks.length === 0
        ? undefined
        : `Place the workbooks in ${config.DATA_DIR} or set DATA_DIR`,
  });

  const nodeVersion = process.version;
  const majorVersion = parseInt(nodeVersion.slice(1).split('.')[0] ?? '0', 10);
  const validNodeVersion = majorVersion >= 20;
  checks.push({
    name: 'Node.js Version',
    passed: validNodeVersion,
    message: `Node ${nodeVersion}`,
    fix: validNodeVersion ? undefined : 'Upgrade to Node.js 20 or higher',
  });

  return checks;
}

/**
 * Connect to the store and look for the known tables.
 */
export async function storeChecks(store: Store): Promise<DiagnosticCheck[]> {
  try {
    await store.ping();
  } catch (error) {
    return [
      {
        name: 'Database Connection',
        passed: false,
        message: errorMessage(error),
        fix: 'Check DATABASE_TYPE, DATABASE_PATH and DATABASE_URL in .env',
      },
    ];
  }

  const missing: string[] = [];
  for (const table of KNOWN_TABLES) {
    if (!(await store.hasTable(table))) {
      missing.push(table);
    }
  }

  return [
    { name: 'Database Connection', passed: true, message: `Connected (${store.client})` },
    {
      name: 'Tables',
      passed: missing.length === 0,
      message: missing.length === 0 ? KNOWN_TABLES.join(', ') : `Missing: ${missing.join(', ')}`,
      fix: missing.length === 0 ? undefined : 'Run: tabletalk ingest',
    },
  ];
}

/**
 * Run comprehensive diagnostics. Resolves to true when every check passed.
 */
export async function runDiagnostics(config: Config): Promise<boolean> {
  logger.printBanner();
  logger.newline();
  logger.section('Running Diagnostics');
  logger.newline();

  const checks = configChecks(config);

  const spinner = logger.spinner('Connecting to database...');
  const store = Store.fromConfig(config.KNEX_CONFIG);
  try {
    checks.push(...(await storeChecks(store)));
    spinner.stop();
  } finally {
    await store.close();
  }

  displayDiagnostics(checks);

  logger.newline();
  const passed = checks.filter((c) => c.passed).length;
  const total = checks.length;

  if (passed === total) {
    logger.successBox(
      `All checks passed! (${passed}/${total})\n\nYour tabletalk installation is healthy.`,
      '✅ Diagnostics Complete'
    );
    logger.newline();
    logger.info('Ready to start:');
    logger.code('tabletalk serve', 'bash');
  } else {
    logger.errorBox(
      `${total - passed} issue(s) found\n\nPlease fix the issues above to continue.`,
      '⚠️  Diagnostics Complete'
    );
  }

  logger.newline();
  return passed === total;
}

/**
 * Display diagnostics in a table.
 */
function displayDiagnostics(checks: DiagnosticCheck[]): void {
  const table = new Table({
    head: [chalk.bold('Check'), chalk.bold('Status'), chalk.bold('Details')],
    colWidths: [25, 10, 50],
    style: {
      head: ['cyan'],
      border: ['gray'],
    },
  });

  for (const check of checks) {
    const status = check.passed ? chalk.green('✔ PASS') : chalk.red('✖ FAIL');

    const details = check.passed
      ? chalk.dim(check.message)
      : `${check.message}\n${chalk.yellow('Fix:')} ${check.fix ?? ''}`;

    table.push([check.name, status, details]);
  }

  console.log(table.toString());
}
