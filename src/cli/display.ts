/**
 * Rendering of pipeline results, history and statistics in the terminal.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { HistoryStats, IndexSummary, PipelineResult } from '../types/models.js';
import type { JsonObject, JsonValue } from '../types/utils.js';
import * as logger from './logger.js';

export const PREVIEW_ROWS = 5;
const MAX_CELL_WIDTH = 40;

/**
 * One table cell: strings as they are, everything else as JSON, truncated.
 */
export function formatCell(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return 'NULL';
  const text = typeof value === 'string' ? value : JSON.stringify(value);
  return text.length > MAX_CELL_WIDTH ? `${text.slice(0, MAX_CELL_WIDTH - 1)}…` : text;
}

/**
 * cli-table3 rendering of the first `limit` rows.
 */
export function renderRows(
  columns: readonly string[],
  rows: readonly JsonObject[],
  limit: number = PREVIEW_ROWS
): string {
  const table = new Table({
    head: columns.map((column) => chalk.bold(column)),
    style: {
      head: ['cyan'],
      border: ['gray'],
    },
  });

  for (const row of rows.slice(0, limit)) {
    table.push(columns.map((column) => formatCell(row[column])));
  }

  return table.toString();
}

export function displayResult(result: PipelineResult): void {
  if (!result.success) {
    logger.error(result.errorMessage);
    if (result.sqlQuery) {
      logger.code(result.sqlQuery, 'sql');
    }
    return;
  }

  logger.success(`Query processed successfully in ${result.processingTimeSeconds}s`);
  logger.code(result.sqlQuery, 'sql');
  logger.info(`Returned ${result.rows.length} rows`);

  if (result.rows.length > 0) {
    console.log(renderRows(result.columns, result.rows));
    if (result.rows.length > PREVIEW_ROWS) {
      console.log(chalk.dim(`  ... and ${result.rows.length - PREVIEW_ROWS} more rows`));
    }
  }

  if (result.analysis) {
    logger.panel(result.analysis, 'Analysis');
  }
}

export function displayStats(stats: HistoryStats): void {
  logger.section('Query Statistics');
  logger.row('Total queries', String(stats.total));
  logger.row('Successful', String(stats.successful));
  logger.row('Failed', String(stats.failed), stats.failed === 0);
  logger.row('Success rate', `${stats.successRate}%`);
  logger.row('Average time', `${stats.avgProcessingTimeSeconds}s`);
}

export function displaySummary(summary: IndexSummary): void {
  logger.section('Schema Index');
  logger.row('Documents', String(summary.totalDocuments));
  logger.row('Tables', String(summary.tables));
  logger.row('Views', String(summary.views));
  logger.row('Relationship documents', String(summary.relationships));
}

export function displayHistory(history: readonly PipelineResult[]): void {
  logger.section(`Recent Queries (${history.length})`);
  if (history.length === 0) {
    logger.info('No queries yet');
    return;
  }

  const table = new Table({
    head: ['#', 'Question', 'Status', 'Time'].map((h) => chalk.bold(h)),
    colWidths: [5, 50, 10, 10],
    wordWrap: true,
    style: {
      head: ['cyan'],
      border: ['gray'],
    },
  });

  history.forEach((entry, i) => {
    table.push([
      String(i + 1),
      entry.question,
      entry.success ? chalk.green('✔') : chalk.red(entry.errorKind),
      `${entry.processingTimeSeconds}s`,
    ]);
  });

  console.log(table.toString());
}
