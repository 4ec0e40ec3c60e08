/**
 * Report schema validation
 *
 * Builds a zod schema from a report's column list and checks every output row
 * against it, then runs the cross-row checks (unique SKUs, one row per master
 * SKU, registry order). All violations are collected before failing.
 */

import { METRIC_DEFINITIONS, type MasterSku, type MetricKey } from '@channel-recon/catalog';
import { z } from 'zod';
import { SchemaViolationError, type SchemaViolation } from '../errors';
import type { ReportColumn, ReportRecord } from '../reports';

const quantitySchema = z
  .number({ invalid_type_error: 'Expected a number' })
  .int('Expected a whole number')
  .nonnegative('Quantity cannot be negative');

const amountSchema = z
  .number({ invalid_type_error: 'Expected a number' })
  .finite('Expected a finite number')
  .nonnegative('Amount cannot be negative')
  .refine((value) => Math.abs(value * 100 - Math.round(value * 100)) < 1e-6, 'At most 2 decimal places');

function metricSchema(metric: MetricKey): z.ZodTypeAny {
  return METRIC_DEFINITIONS[metric].scale === 0 ? quantitySchema : amountSchema;
}

/**
 * Row schema for a column list. Undeclared keys are rejected.
 */
export function buildRowSchema(columns: readonly ReportColumn[]) {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const column of columns) {
    shape[column.key] =
      column.kind === 'identifier'
        ? z.string({ invalid_type_error: 'Expected a string' }).min(1, 'SKU cannot be blank')
        : metricSchema(column.metric);
  }
  return z.object(shape).strict();
}

/**
 * Every violation in a report, in row order then report-level checks
 */
export function collectViolations(
  rows: readonly ReportRecord[],
  columns: readonly ReportColumn[],
  masterSkus: readonly MasterSku[]
): SchemaViolation[] {
  const schema = buildRowSchema(columns);
  const violations: SchemaViolation[] = [];
  const seen = new Set<string>();

  rows.forEach((row, index) => {
    const rowNumber = index + 1;
    const result = schema.safeParse(row);

    if (!result.success) {
      for (const issue of result.error.issues) {
        if (issue.code === 'unrecognized_keys') {
          for (const key of issue.keys) {
            violations.push({ row: rowNumber, column: key, message: 'Undeclared column' });
          }
          continue;
        }
        const path = issue.path[0];
        violations.push({
          row: rowNumber,
          column: typeof path === 'string' ? path : null,
          message: issue.message === 'Required' ? 'Missing column' : issue.message,
        });
      }
    }

    const sku = row.sku;
    if (typeof sku === 'string') {
      if (seen.has(sku)) {
        violations.push({ row: rowNumber, column: 'sku', message: `Duplicate SKU "${sku}"` });
      }
      seen.add(sku);
    }
  });

  if (rows.length !== masterSkus.length) {
    violations.push({
      row: null,
      column: null,
      message: `Expected ${masterSkus.length} rows (one per master SKU), got ${rows.length}`,
    });
  } else {
    const outOfOrder = rows.findIndex((row, index) => row.sku !== masterSkus[index]);
    if (outOfOrder >= 0) {
      violations.push({
        row: outOfOrder + 1,
        column: 'sku',
        message: `Expected SKU "${masterSkus[outOfOrder]}" at this position`,
      });
    }
  }

  return violations;
}

/**
 * @throws SchemaViolationError when any check fails
 */
export function validateReport(
  rows: readonly ReportRecord[],
  columns: readonly ReportColumn[],
  masterSkus: readonly MasterSku[]
): void {
  const violations = collectViolations(rows, columns, masterSkus);
  if (violations.length > 0) {
    throw new SchemaViolationError(violations);
  }
}
