/**
 * Report definitions
 *
 * Which metrics each report carries, which channels track which metric, and
 * which source files feed it. A channel/metric pair missing from `tracked`
 * is structurally absent from the report (no column), as opposed to a
 * tracked column whose value is zero.
 */

import {
  METRIC_DEFINITIONS,
  type Channel,
  type MetricKey,
  type ReportKind,
  type SourceKey,
} from '@channel-recon/catalog';

/**
 * How values from several records combine in one cell. Both are
 * commutative, so the fold does not depend on record order.
 */
export type FoldMode = 'sum' | 'max';

export type TrackedMetrics = Partial<Record<Channel, Partial<Record<MetricKey, FoldMode>>>>;

export interface ReportDefinition {
  kind: ReportKind;
  title: string;
  metrics: readonly MetricKey[];
  tracked: TrackedMetrics;
  sources: readonly SourceKey[];
}

export type ReportColumn =
  | { key: 'sku'; kind: 'identifier' }
  | { key: string; kind: 'channel'; channel: Channel; metric: MetricKey }
  | { key: string; kind: 'total'; metric: MetricKey };

export const SALES_REPORT: ReportDefinition = {
  kind: 'sales',
  title: 'Sales',
  metrics: ['units', 'revenue'],
  tracked: {
    amazon: { units: 'sum', revenue: 'sum' },
    walmart: { units: 'sum', revenue: 'sum' },
    tiktok: { units: 'sum', revenue: 'sum' },
    shopify: { units: 'sum', revenue: 'sum' },
  },
  sources: ['amazon:sales', 'walmart:sales', 'tiktok:sales', 'shopify:sales'],
};

export const INVENTORY_REPORT: ReportDefinition = {
  kind: 'inventory',
  title: 'Inventory',
  metrics: ['onHand', 'inbound', 'sold30d'],
  tracked: {
    amazon: { onHand: 'sum', inbound: 'sum', sold30d: 'sum' },
    walmart: { onHand: 'sum', inbound: 'sum' },
    // Trailing-30-day sales repeat on every lot row of the levels export
    flexport: { onHand: 'sum', inbound: 'sum', sold30d: 'max' },
  },
  sources: ['amazon:fba', 'amazon:awd', 'walmart:wfs', 'flexport:inventory', 'flexport:inbound'],
};

export const REPORT_DEFINITIONS: Record<ReportKind, ReportDefinition> = {
  sales: SALES_REPORT,
  inventory: INVENTORY_REPORT,
};

export function channelColumnKey(channel: Channel, metric: MetricKey): string {
  return `${channel}_${METRIC_DEFINITIONS[metric].column}`;
}

export function totalColumnKey(metric: MetricKey): string {
  return `total_${METRIC_DEFINITIONS[metric].column}`;
}

/**
 * Fold mode for a channel/metric pair, or undefined when not tracked
 */
export function foldModeFor(
  definition: ReportDefinition,
  channel: Channel,
  metric: MetricKey
): FoldMode | undefined {
  return definition.tracked[channel]?.[metric];
}

/**
 * Output columns: identifier first, then channel metrics in channel order,
 * then one total per metric.
 */
export function buildColumns(
  definition: ReportDefinition,
  channelOrder: readonly Channel[]
): ReportColumn[] {
  const columns: ReportColumn[] = [{ key: 'sku', kind: 'identifier' }];

  for (const channel of channelOrder) {
    for (const metric of definition.metrics) {
      if (foldModeFor(definition, channel, metric)) {
        columns.push({ key: channelColumnKey(channel, metric), kind: 'channel', channel, metric });
      }
    }
  }

  for (const metric of definition.metrics) {
    columns.push({ key: totalColumnKey(metric), kind: 'total', metric });
  }

  return columns;
}
