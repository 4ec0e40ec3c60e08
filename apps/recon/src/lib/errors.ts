/**
 * Reconciliation error taxonomy
 *
 * Per-row errors (unmapped identifier, malformed row, invalid quantity) are
 * recoverable: the row or record is dropped and reported as a diagnostic.
 * Schema violations and configuration errors are fatal and abort a run before
 * anything is written or delivered.
 */

import type { Channel, MetricKey } from '@channel-recon/catalog';

export type ReconciliationErrorCode =
  | 'UNMAPPED_IDENTIFIER'
  | 'MALFORMED_ROW'
  | 'INVALID_QUANTITY'
  | 'SCHEMA_VIOLATION'
  | 'REGISTRY_CONFIG'
  | 'CONFIG';

export class ReconciliationError extends Error {
  constructor(
    message: string,
    public readonly code: ReconciliationErrorCode
  ) {
    super(message);
    this.name = 'ReconciliationError';
  }
}

/**
 * A channel identifier with no master SKU in the registry
 */
export class UnmappedIdentifierError extends ReconciliationError {
  constructor(
    public readonly channel: Channel,
    public readonly identifier: string
  ) {
    super(`No master SKU mapped for ${channel} identifier "${identifier}"`, 'UNMAPPED_IDENTIFIER');
    this.name = 'UnmappedIdentifierError';
  }
}

/**
 * A source row that cannot be read (bad number, missing column)
 */
export class MalformedRowError extends ReconciliationError {
  constructor(
    message: string,
    public readonly line: number,
    public readonly column?: string,
    public readonly rawValue?: string
  ) {
    super(message, 'MALFORMED_ROW');
    this.name = 'MalformedRowError';
  }
}

/**
 * A negative quantity. Sales and inventory counts are never negative here.
 */
export class InvalidQuantityError extends ReconciliationError {
  constructor(
    public readonly channel: Channel,
    public readonly identifier: string,
    public readonly metric: MetricKey,
    public readonly value: number
  ) {
    super(
      `Rejected ${metric} value ${value} for ${channel} identifier "${identifier}"`,
      'INVALID_QUANTITY'
    );
    this.name = 'InvalidQuantityError';
  }
}

export interface SchemaViolation {
  /** 1-based row index, or null for report-level checks */
  row: number | null;
  column: string | null;
  message: string;
}

export class SchemaViolationError extends ReconciliationError {
  constructor(public readonly violations: SchemaViolation[]) {
    const first = violations[0];
    const suffix = violations.length > 1 ? ` (+${violations.length - 1} more)` : '';
    super(
      `Report failed schema validation: ${first ? formatViolation(first) : 'unknown violation'}${suffix}`,
      'SCHEMA_VIOLATION'
    );
    this.name = 'SchemaViolationError';
  }
}

export class RegistryConfigError extends ReconciliationError {
  constructor(public readonly problems: string[]) {
    super(`Invalid SKU mapping: ${problems.join('; ')}`, 'REGISTRY_CONFIG');
    this.name = 'RegistryConfigError';
  }
}

export class ConfigError extends ReconciliationError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG');
    this.name = 'ConfigError';
  }
}

export function formatViolation(violation: SchemaViolation): string {
  const location = [
    violation.row !== null ? `row ${violation.row}` : null,
    violation.column !== null ? `column "${violation.column}"` : null,
  ]
    .filter(Boolean)
    .join(', ');
  return location ? `${location}: ${violation.message}` : violation.message;
}
