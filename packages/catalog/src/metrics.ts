/**
 * Quantity metrics carried by channel reports.
 *
 * `scale` is the number of decimal places a metric keeps. Values are folded
 * as integers in that minor unit (units as-is, revenue in cents).
 */

export const METRICS = ['units', 'revenue', 'onHand', 'inbound', 'sold30d'] as const;
export type MetricKey = (typeof METRICS)[number];

export interface MetricDefinition {
  key: MetricKey;
  /** Snake-case fragment used in output column keys */
  column: string;
  label: string;
  scale: 0 | 2;
}

export const METRIC_DEFINITIONS: Record<MetricKey, MetricDefinition> = {
  units: { key: 'units', column: 'units', label: 'Units', scale: 0 },
  revenue: { key: 'revenue', column: 'revenue', label: 'Revenue', scale: 2 },
  onHand: { key: 'onHand', column: 'on_hand', label: 'On Hand', scale: 0 },
  inbound: { key: 'inbound', column: 'inbound', label: 'Inbound', scale: 0 },
  sold30d: { key: 'sold30d', column: 'sold_30d', label: 'Sold (30d)', scale: 0 },
};

export function isMetricKey(value: string): value is MetricKey {
  return (METRICS as readonly string[]).includes(value);
}

/**
 * Convert a value to integer minor units for its metric
 */
export function toMinorUnits(metric: MetricKey, value: number): number {
  const factor = 10 ** METRIC_DEFINITIONS[metric].scale;
  return Math.round(value * factor);
}

/**
 * Convert integer minor units back to the metric's natural value
 */
export function fromMinorUnits(metric: MetricKey, minor: number): number {
  const factor = 10 ** METRIC_DEFINITIONS[metric].scale;
  return minor / factor;
}
