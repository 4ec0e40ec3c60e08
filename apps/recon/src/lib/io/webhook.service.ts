/**
 * Webhook delivery
 *
 * Posts a finished report as JSON to a single configured URL:
 * `{ reportType, reportSummary, reportData }`. No retries; a failed or
 * timed-out delivery is returned as a result, never thrown.
 */

import type { Channel } from '@channel-recon/catalog';
import type { DiagnosticsSummary } from '../diagnostics';
import { silentLogger, type Logger } from '../logger';
import type { AssembledReport, ReportRecord } from '../reports';

export interface WebhookPayload {
  reportType: string;
  reportSummary: {
    asOf: string;
    sources: Partial<Record<Channel, string | null>>;
    diagnostics: DiagnosticsSummary;
  };
  reportData: ReportRecord[];
}

/** Result of a delivery attempt */
export interface WebhookSendResult {
  success: boolean;
  error?: string;
}

export interface WebhookServiceOptions {
  url?: string;
  timeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 60_000;

export function buildWebhookPayload(report: AssembledReport): WebhookPayload {
  return {
    reportType: report.kind,
    reportSummary: {
      asOf: report.asOf,
      sources: report.sources,
      diagnostics: report.diagnostics,
    },
    reportData: report.rows,
  };
}

export class WebhookService {
  private readonly url: string | undefined;
  private readonly timeout: number;
  private readonly logger: Logger;

  constructor(options: WebhookServiceOptions = {}) {
    this.url = options.url;
    this.timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Check if a webhook URL is configured
   */
  isEnabled(): boolean {
    return !!this.url;
  }

  async deliver(report: AssembledReport): Promise<WebhookSendResult> {
    if (!this.url) {
      this.logger.info(`Webhook not configured - skipping ${report.kind} delivery`);
      return { success: true };
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(buildWebhookPayload(report)),
        signal: controller.signal,
      });

      clearTimeout(timeoutId);

      if (!response.ok) {
        const errorText = await response.text().catch(() => 'Unknown error');
        this.logger.error(`Delivery of ${report.kind} report failed with status ${response.status}: ${errorText}`);
        return { success: false, error: `HTTP ${response.status}: ${errorText}` };
      }

      this.logger.info(`Delivered ${report.kind} report (${report.rows.length} rows)`);
      return { success: true };
    } catch (err) {
      clearTimeout(timeoutId);

      if (err instanceof Error && err.name === 'AbortError') {
        this.logger.error(`Delivery of ${report.kind} report timed out after ${this.timeout}ms`);
        return { success: false, error: 'Request timed out' };
      }

      this.logger.error(`Delivery of ${report.kind} report failed`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return { success: false, error: err instanceof Error ? err.message : 'Unknown error' };
    }
  }
}
