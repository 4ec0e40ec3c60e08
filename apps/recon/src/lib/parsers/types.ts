import type {
  Channel,
  MetricKey,
  QuantityRecord,
  SourceFile,
  SourceReportType,
} from '@channel-recon/catalog';
import type { Diagnostic } from '../diagnostics';

export interface ParserInput {
  source: SourceFile;
  content: string;
}

/**
 * Parsing result
 */
export interface ParseResult {
  records: QuantityRecord[];
  diagnostics: Diagnostic[];
  /** Data rows seen, including skipped ones */
  totalRows: number;
}

/**
 * One parser per channel/report-type pair. Parsers never aggregate across
 * rows and never touch the registry.
 */
export interface ChannelParser {
  readonly channel: Channel;
  readonly reportType: SourceReportType;
  parse(input: ParserInput): ParseResult;
}

/**
 * Cell access for one data row
 */
export interface RowReader {
  readonly line: number;
  /** Trimmed cell text; empty when the column is absent */
  text(column: string): string;
  /** @throws MalformedRowError when the cell is not a number */
  number(column: string): number;
  has(column: string): boolean;
}

/**
 * A quantity read from a row, before the channel and identifier are attached
 */
export interface QuantityDraft {
  metric: MetricKey;
  value: number;
}
