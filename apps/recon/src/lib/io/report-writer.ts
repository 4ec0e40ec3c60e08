/**
 * Report writer
 *
 * Writes `<kind>_report_<asOf>.csv` and, when enabled, the matching `.json`
 * into the output directory.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { METRIC_DEFINITIONS } from '@channel-recon/catalog';
import { silentLogger, type Logger } from '../logger';
import type { AssembledReport, ReportColumn } from '../reports';

export interface WriteReportOptions {
  outputDir: string;
  saveJson: boolean;
  logger?: Logger;
}

export interface WrittenReport {
  csvPath: string;
  jsonPath: string | null;
}

/**
 * Quote a CSV field when it contains a comma, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatCell(column: ReportColumn, value: string | number | undefined): string {
  if (value === undefined) return '';
  if (typeof value === 'string') return value;
  if (column.kind === 'identifier') return String(value);
  return value.toFixed(METRIC_DEFINITIONS[column.metric].scale);
}

/**
 * Render a report as CSV: header row of column keys, one line per row
 */
export function toCsv(report: Pick<AssembledReport, 'columns' | 'rows'>): string {
  const lines = [report.columns.map((column) => escapeCsvField(column.key)).join(',')];

  for (const row of report.rows) {
    lines.push(report.columns.map((column) => escapeCsvField(formatCell(column, row[column.key]))).join(','));
  }

  return lines.join('\n') + '\n';
}

export function reportFileName(report: Pick<AssembledReport, 'kind' | 'asOf'>, extension: 'csv' | 'json'): string {
  return `${report.kind}_report_${report.asOf}.${extension}`;
}

export async function writeReport(report: AssembledReport, options: WriteReportOptions): Promise<WrittenReport> {
  const logger = options.logger ?? silentLogger;
  await mkdir(options.outputDir, { recursive: true });

  const csvPath = join(options.outputDir, reportFileName(report, 'csv'));
  await writeFile(csvPath, toCsv(report), 'utf8');
  logger.info(`Saved ${csvPath}`);

  let jsonPath: string | null = null;
  if (options.saveJson) {
    jsonPath = join(options.outputDir, reportFileName(report, 'json'));
    await writeFile(jsonPath, JSON.stringify(report.rows, null, 2) + '\n', 'utf8');
    logger.info(`Saved ${jsonPath}`);
  }

  return { csvPath, jsonPath };
}
