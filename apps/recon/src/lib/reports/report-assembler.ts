/**
 * Report Assembler
 *
 * Abstract base class for the sales and inventory reports. Picks the source
 * files a report can use, parses them concurrently, reconciles once and lays
 * out the final columns.
 */

import {
  sourceKey,
  type Channel,
  type ReportKind,
  type SourceFile,
  type SourceKey,
  type SourceReportType,
} from '@channel-recon/catalog';
import { summarizeDiagnostics, type Diagnostic, type DiagnosticsSummary } from '../diagnostics';
import { silentLogger, type Logger } from '../logger';
import type { ParseResult, ParserRegistry } from '../parsers';
import { Reconciler, type AggregatedRow, type UnmappedPolicy } from '../reconciler';
import type { SkuRegistry } from '../registry';
import type { ReportColumn, ReportDefinition } from './report-definitions';

/** Reads a source file's content (with whatever timeout the caller imposes) */
export type SourceReader = (file: SourceFile) => Promise<string>;

export interface ReportAssemblerDeps {
  registry: SkuRegistry;
  parsers: ParserRegistry;
  readSource: SourceReader;
  /** ISO date stamped as asOf when no source file contributed */
  runDate: string;
  unmappedPolicy?: UnmappedPolicy;
  logger?: Logger;
}

/** One output row, keys in column order */
export type ReportRecord = Record<string, string | number>;

export interface SourceFileStats {
  fileName: string;
  channel: Channel;
  reportType: SourceReportType;
  fileDate: string;
  rowsAnalysed: number;
  recordsEmitted: number;
}

export interface AssembledReport {
  kind: ReportKind;
  title: string;
  asOf: string;
  columns: readonly ReportColumn[];
  rows: ReportRecord[];
  /** Latest contributing file date per channel, null when the channel had no file */
  sources: Partial<Record<Channel, string | null>>;
  files: SourceFileStats[];
  diagnostics: DiagnosticsSummary;
}

interface ParsedFile {
  file: SourceFile;
  result: ParseResult;
}

export abstract class ReportAssembler {
  abstract readonly definition: ReportDefinition;

  protected readonly registry: SkuRegistry;
  protected readonly logger: Logger;

  constructor(protected readonly deps: ReportAssemblerDeps) {
    this.registry = deps.registry;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * One-line summary of the report's headline figures, for run logs
   */
  abstract headline(report: AssembledReport): string;

  /** Sum of a column across every row */
  protected columnTotal(report: AssembledReport, key: string): number {
    return report.rows.reduce((sum, row) => {
      const value = row[key];
      return typeof value === 'number' ? sum + value : sum;
    }, 0);
  }

  /**
   * Files this report can use: one per source pair (the latest file date),
   * in the report's declared source order
   */
  selectSources(files: readonly SourceFile[]): SourceFile[] {
    const latest = new Map<SourceKey, SourceFile>();

    for (const file of files) {
      const key = sourceKey(file.channel, file.reportType);
      if (!this.definition.sources.includes(key) || !this.deps.parsers.has(key)) continue;

      const current = latest.get(key);
      if (
        !current ||
        file.fileDate > current.fileDate ||
        (file.fileDate === current.fileDate && file.fileName > current.fileName)
      ) {
        latest.set(key, file);
      }
    }

    return this.definition.sources.flatMap((key) => {
      const file = latest.get(key);
      return file ? [file] : [];
    });
  }

  async assemble(files: readonly SourceFile[]): Promise<AssembledReport> {
    const selected = this.selectSources(files);
    const selectedKeys = new Set(selected.map((file) => sourceKey(file.channel, file.reportType)));

    for (const key of this.definition.sources) {
      if (!selectedKeys.has(key)) {
        this.logger.warn(`No ${key} file found; its columns are zero-filled`);
      }
    }

    // Independent files parse concurrently; results keep selection order.
    // A file that cannot be read counts as absent.
    const outcomes = await Promise.all(selected.map((file) => this.parseFile(file)));
    const parsed = outcomes.flatMap((outcome) => ('result' in outcome ? [outcome] : []));
    const unreadable = outcomes.flatMap((outcome) => ('result' in outcome ? [] : [outcome.diagnostic]));
    const used = parsed.map(({ file }) => file);

    const reconciler = new Reconciler({
      registry: this.registry,
      definition: this.definition,
      unmappedPolicy: this.deps.unmappedPolicy,
      logger: this.logger,
    });
    const reconciled = reconciler.reconcile(parsed.map(({ result }) => result.records));

    const diagnostics: Diagnostic[] = [
      ...unreadable,
      ...parsed.flatMap(({ result }) => result.diagnostics),
      ...reconciled.diagnostics,
    ];

    const report: AssembledReport = {
      kind: this.definition.kind,
      title: this.definition.title,
      asOf: used.reduce((max, file) => (file.fileDate > max ? file.fileDate : max), '') || this.deps.runDate,
      columns: reconciler.columns,
      rows: reconciled.rows.map((row) => this.toRecord(row, reconciler.columns)),
      sources: this.summarizeSources(used),
      files: parsed.map(({ file, result }) => ({
        fileName: file.fileName,
        channel: file.channel,
        reportType: file.reportType,
        fileDate: file.fileDate,
        rowsAnalysed: result.totalRows,
        recordsEmitted: result.records.length,
      })),
      diagnostics: summarizeDiagnostics(diagnostics),
    };

    this.logger.info(
      `Reconciled ${reconciled.folded} records into ${report.rows.length} rows (as of ${report.asOf})`
    );
    if (report.diagnostics.total > 0) {
      this.logger.warn(`${report.diagnostics.total} rows or records skipped`, { byKind: report.diagnostics.byKind });
    }

    return report;
  }

  private async parseFile(file: SourceFile): Promise<ParsedFile | { diagnostic: Diagnostic }> {
    const parser = this.deps.parsers.get(sourceKey(file.channel, file.reportType));
    if (!parser) {
      throw new Error(`No parser registered for ${file.channel}:${file.reportType}`);
    }

    let content: string;
    try {
      content = await this.deps.readSource(file);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const message = `Could not read ${file.fileName}: ${reason}; its columns are zero-filled`;
      this.logger.warn(message);
      return {
        diagnostic: { kind: 'unreadable_file', channel: file.channel, file: file.fileName, line: 0, message },
      };
    }

    this.logger.info(`Found ${file.fileName} (file date ${file.fileDate})`);
    return { file, result: parser.parse({ source: file, content }) };
  }

  private toRecord(row: AggregatedRow, columns: readonly ReportColumn[]): ReportRecord {
    const record: ReportRecord = {};
    for (const column of columns) {
      record[column.key] = column.kind === 'identifier' ? row.sku : (row.values[column.key] ?? 0);
    }
    return record;
  }

  private summarizeSources(selected: readonly SourceFile[]): Partial<Record<Channel, string | null>> {
    const sources: Partial<Record<Channel, string | null>> = {};

    for (const channel of this.registry.channelOrder()) {
      if (!this.definition.tracked[channel]) continue;
      const dates = selected.filter((file) => file.channel === channel).map((file) => file.fileDate);
      sources[channel] = dates.length > 0 ? dates.reduce((a, b) => (b > a ? b : a)) : null;
    }

    return sources;
  }
}
