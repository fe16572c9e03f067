/**
 * Plain-text table rendering for prompts and terminal output.
 */

import Table from 'cli-table3';
import type { CellValue, ResultRow } from '../types/utils.js';

/**
 * Border characters that reduce cli-table3 to whitespace-separated columns.
 */
const PLAIN_CHARS = {
  top: '',
  'top-mid': '',
  'top-left': '',
  'top-right': '',
  bottom: '',
  'bottom-mid': '',
  'bottom-left': '',
  'bottom-right': '',
  left: '',
  'left-mid': '',
  mid: '',
  'mid-mid': '',
  right: '',
  'right-mid': '',
  middle: '  ',
};

export function formatCell(value: CellValue): string {
  return value === null ? 'NULL' : String(value);
}

/**
 * Render rows as an aligned text table without borders or colors.
 */
export function renderTable(columns: readonly string[], rows: readonly ResultRow[]): string {
  const table = new Table({
    head: [...columns],
    chars: PLAIN_CHARS,
    style: { head: [], border: [], 'padding-left': 0, 'padding-right': 0 },
  });

  for (const row of rows) {
    table.push(columns.map((_, index) => formatCell(row[index] ?? null)));
  }

  return table
    .toString()
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0)
    .join('\n');
}
