import type { Channel } from './channels';
import type { MetricKey } from './metrics';

/** Canonical, channel-independent product identifier */
export type MasterSku = string;

/** The two reports produced by a run */
export const REPORT_KINDS = ['sales', 'inventory'] as const;
export type ReportKind = (typeof REPORT_KINDS)[number];

/** Report type segment of a source filename (`Amazon_fba_2025-01-31.csv`) */
export const SOURCE_REPORT_TYPES = ['sales', 'fba', 'awd', 'wfs', 'inventory', 'inbound'] as const;
export type SourceReportType = (typeof SOURCE_REPORT_TYPES)[number];

/** `channel:reportType` pair, e.g. `amazon:fba` */
export type SourceKey = `${Channel}:${SourceReportType}`;

export function isReportKind(value: string): value is ReportKind {
  return (REPORT_KINDS as readonly string[]).includes(value);
}

export function isSourceReportType(value: string): value is SourceReportType {
  return (SOURCE_REPORT_TYPES as readonly string[]).includes(value);
}

export function sourceKey(channel: Channel, reportType: SourceReportType): SourceKey {
  return `${channel}:${reportType}`;
}

/**
 * A discovered input file. Scoped to a single run.
 */
export interface SourceFile {
  channel: Channel;
  reportType: SourceReportType;
  /** ISO date (yyyy-MM-dd) taken from the filename */
  fileDate: string;
  fileName: string;
  path: string;
}

/**
 * One quantity read from one source row. Identifiers are still in the
 * channel's own space; the reconciler resolves them to master SKUs.
 */
export interface QuantityRecord {
  readonly channel: Channel;
  readonly identifier: string;
  readonly metric: MetricKey;
  readonly value: number;
  readonly source: {
    readonly file: string;
    readonly line: number;
  };
}
