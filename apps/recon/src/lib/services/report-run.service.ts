/**
 * Report Run Service
 *
 * One reconciliation run: discover source files once, then for each report
 * kind assemble, validate, write and deliver. Reports are independent: a
 * fatal error in one is recorded as a failed outcome and the next report
 * still runs. Nothing is written for a report that fails validation.
 */

import { getChannelLabel, type Channel, type ReportKind, type SourceFile } from '@channel-recon/catalog';
import type { AppConfig } from '../config';
import { discoverSourceFiles, readSourceFile, writeReport, type WebhookSendResult, type WebhookService, type WrittenReport } from '../io';
import { silentLogger, type Logger } from '../logger';
import { createParserRegistry, type ParserRegistry } from '../parsers';
import type { SkuRegistry } from '../registry';
import { createReportAssembler, type AssembledReport, type SourceReader } from '../reports';
import { validateReport } from '../validation';

export type ReportRunConfig = Pick<
  AppConfig,
  'inputDir' | 'outputDir' | 'saveJsonOutput' | 'fileReadTimeoutMs' | 'unmappedPolicy'
>;

export interface ReportRunServiceDeps {
  registry: SkuRegistry;
  config: ReportRunConfig;
  webhook: WebhookService;
  logger?: Logger;
  /** Defaults to reading from disk with the configured timeout */
  readSource?: SourceReader;
}

export interface RunOptions {
  /** Skip webhook delivery */
  testMode: boolean;
  /** yyyy-MM-dd, used as asOf when a report has no source files */
  runDate: string;
}

export interface ReportRunSuccess {
  status: 'completed';
  kind: ReportKind;
  report: AssembledReport;
  headline: string;
  written: WrittenReport;
  /** null when delivery was skipped (test mode or no webhook) */
  delivery: WebhookSendResult | null;
}

export interface ReportRunFailure {
  status: 'failed';
  kind: ReportKind;
  error: Error;
}

export type ReportRunOutcome = ReportRunSuccess | ReportRunFailure;

export interface ChannelStatus {
  channel: Channel;
  label: string;
  /** Latest source file date used for this channel, null for no data */
  latestDate: string | null;
}

export class ReportRunService {
  private readonly logger: Logger;
  private readonly parsers: ParserRegistry;
  private readonly readSource: SourceReader;

  constructor(private readonly deps: ReportRunServiceDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.parsers = createParserRegistry(this.logger.child('parse'));
    this.readSource =
      deps.readSource ?? ((file: SourceFile) => readSourceFile(file, deps.config.fileReadTimeoutMs));
  }

  /**
   * Run each report kind in turn against one discovery of the input directory
   */
  async run(kinds: readonly ReportKind[], options: RunOptions): Promise<ReportRunOutcome[]> {
    const files = await discoverSourceFiles(this.deps.config.inputDir, this.logger.child('discover'));
    const outcomes: ReportRunOutcome[] = [];

    for (const kind of kinds) {
      try {
        outcomes.push(await this.runReport(kind, files, options));
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        this.logger.error(`${kind} report failed: ${error.message}`, { error: error.name });
        outcomes.push({ status: 'failed', kind, error });
      }
    }

    return outcomes;
  }

  /**
   * Assemble, validate, write and deliver one report
   *
   * @throws SchemaViolationError, or UnmappedIdentifierError under the fail policy
   */
  async runReport(kind: ReportKind, files: readonly SourceFile[], options: RunOptions): Promise<ReportRunSuccess> {
    const logger = this.logger.child(kind);
    const assembler = createReportAssembler(kind, {
      registry: this.deps.registry,
      parsers: this.parsers,
      readSource: this.readSource,
      runDate: options.runDate,
      unmappedPolicy: this.deps.config.unmappedPolicy,
      logger,
    });

    const report = await assembler.assemble(files);
    validateReport(report.rows, report.columns, this.deps.registry.allMasterSkus());

    const written = await writeReport(report, {
      outputDir: this.deps.config.outputDir,
      saveJson: this.deps.config.saveJsonOutput,
      logger,
    });

    let delivery: WebhookSendResult | null = null;
    if (options.testMode) {
      logger.info('Test mode - skipping webhook delivery');
    } else if (!this.deps.webhook.isEnabled()) {
      logger.info('No webhook configured - skipping delivery');
    } else {
      delivery = await this.deps.webhook.deliver(report);
      if (!delivery.success) {
        logger.warn(`Report saved but not delivered: ${delivery.error ?? 'unknown error'}`);
      }
    }

    const headline = assembler.headline(report);
    logger.info(headline);

    return { status: 'completed', kind, report, headline, written, delivery };
  }
}

/**
 * Latest source date per channel across the completed reports, in registry
 * channel order. Channels no report tracks are left out.
 */
export function summarizeChannelStatus(
  outcomes: readonly ReportRunOutcome[],
  channelOrder: readonly Channel[]
): ChannelStatus[] {
  const latest = new Map<Channel, string | null>();

  for (const outcome of outcomes) {
    if (outcome.status !== 'completed') continue;
    for (const channel of channelOrder) {
      if (!(channel in outcome.report.sources)) continue;
      const date = outcome.report.sources[channel] ?? null;
      const current = latest.get(channel) ?? null;
      latest.set(channel, date !== null && (current === null || date > current) ? date : current);
    }
  }

  return channelOrder.flatMap((channel) =>
    latest.has(channel)
      ? [{ channel, label: getChannelLabel(channel), latestDate: latest.get(channel) ?? null }]
      : []
  );
}
