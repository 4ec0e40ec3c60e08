/**
 * Tabular Report Parser
 *
 * Abstract base class for channel CSV exports. Subclasses declare their
 * columns and turn one row into quantity drafts; this class handles header
 * lookup, skipped rows and per-row errors.
 */

import {
  METRIC_DEFINITIONS,
  getChannelLabel,
  type Channel,
  type QuantityRecord,
  type SourceReportType,
} from '@channel-recon/catalog';
import type { Diagnostic, DiagnosticKind } from '../diagnostics';
import { MalformedRowError } from '../errors';
import { silentLogger, type Logger } from '../logger';
import { normalizeHeader, parseCsv, type CsvRow } from './csv';
import { parseNumber } from './numbers';
import type { ChannelParser, ParseResult, ParserInput, QuantityDraft, RowReader } from './types';

export abstract class TabularReportParser implements ChannelParser {
  abstract readonly channel: Channel;
  abstract readonly reportType: SourceReportType;

  /** Column holding the channel's SKU identifier */
  protected abstract readonly identifierColumn: string;

  /** Columns that must be present in the header */
  protected abstract readonly requiredColumns: readonly string[];

  /** Lines to skip before the header row */
  protected readonly preambleLines: number = 0;

  protected readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  /**
   * Read the quantities of one row
   *
   * @throws MalformedRowError when a cell cannot be read
   */
  protected abstract readRow(row: RowReader): QuantityDraft[];

  /**
   * Reason to leave a row out (cancelled order, etc.), or null to keep it
   */
  protected exclusionReason(_row: RowReader): string | null {
    return null;
  }

  get label(): string {
    return `${getChannelLabel(this.channel)} ${this.reportType}`;
  }

  parse(input: ParserInput): ParseResult {
    const { source, content } = input;
    const table = parseCsv(content, { skipLines: this.preambleLines });
    const records: QuantityRecord[] = [];
    const diagnostics: Diagnostic[] = [];

    const report = (kind: DiagnosticKind, line: number, message: string, identifier?: string) => {
      diagnostics.push({
        kind,
        channel: this.channel,
        file: source.fileName,
        line,
        message,
        ...(identifier ? { identifier } : {}),
      });
    };

    const headerIndex = new Map<string, number>();
    table.headers.forEach((header, index) => {
      const key = normalizeHeader(header);
      if (!headerIndex.has(key)) headerIndex.set(key, index);
    });

    const missing = [this.identifierColumn, ...this.requiredColumns].filter(
      (column) => !headerIndex.has(normalizeHeader(column))
    );
    if (missing.length > 0) {
      const message = `Missing required column(s): ${missing.join(', ')}`;
      report('malformed_row', this.preambleLines + 1, message);
      this.logger.warn(`${source.fileName}: ${message}`);
      return { records, diagnostics, totalRows: table.rows.length };
    }

    for (const row of table.rows) {
      const reader = this.createReader(row, headerIndex);
      const identifier = reader.text(this.identifierColumn);

      if (!identifier) {
        report('missing_identifier', row.line, `Row has no ${this.identifierColumn}`);
        continue;
      }

      const exclusion = this.exclusionReason(reader);
      if (exclusion) {
        report('excluded_row', row.line, exclusion, identifier);
        continue;
      }

      let drafts: QuantityDraft[];
      try {
        drafts = this.readRow(reader);
        this.assertWholeUnits(drafts, row.line);
      } catch (error) {
        if (!(error instanceof MalformedRowError)) throw error;
        report('malformed_row', row.line, error.message, identifier);
        this.logger.warn(`${source.fileName} line ${row.line}: ${error.message}`);
        continue;
      }

      for (const draft of drafts) {
        records.push({
          channel: this.channel,
          identifier,
          metric: draft.metric,
          value: draft.value,
          source: { file: source.fileName, line: row.line },
        });
      }
    }

    this.logger.info(
      `Parsed ${source.fileName}: ${table.rows.length} rows, ${records.length} records, ${diagnostics.length} skipped`
    );

    return { records, diagnostics, totalRows: table.rows.length };
  }

  private createReader(row: CsvRow, headerIndex: ReadonlyMap<string, number>): RowReader {
    const text = (column: string): string => {
      const index = headerIndex.get(normalizeHeader(column));
      return index !== undefined ? (row.values[index] ?? '').trim() : '';
    };

    const number = (column: string): number => {
      const raw = text(column);
      const value = parseNumber(raw);
      if (value === null) {
        throw new MalformedRowError(`Invalid number "${raw}" in column "${column}"`, row.line, column, raw);
      }
      return value;
    };

    return {
      line: row.line,
      text,
      number,
      has: (column) => headerIndex.has(normalizeHeader(column)),
    };
  }

  /**
   * Unit counts must be whole numbers; revenue may carry cents
   */
  private assertWholeUnits(drafts: QuantityDraft[], line: number): void {
    for (const draft of drafts) {
      if (METRIC_DEFINITIONS[draft.metric].scale === 0 && !Number.isInteger(draft.value)) {
        throw new MalformedRowError(
          `Expected a whole number for ${draft.metric}, got ${draft.value}`,
          line,
          undefined,
          String(draft.value)
        );
      }
    }
  }
}
