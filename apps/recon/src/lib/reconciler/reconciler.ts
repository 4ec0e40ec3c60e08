/**
 * Reconciler
 *
 * Folds quantity records from every source into one row per master SKU.
 *
 * 1. Start from one zero row per master SKU, in registry order
 * 2. Resolve each record's identifier and fold its value into the
 *    (SKU, channel, metric) cell
 * 3. Total each metric across the row's channel cells
 *
 * Values are folded as integers in the metric's minor unit so the result
 * is identical whatever order files or rows arrive in. Each batch (one
 * source file) folds into its own partial map; partials merge at the end.
 *
 * A "max" cell takes the largest value per channel identifier within a
 * batch, and those maxima are then added into the master SKU's cell, so
 * several identifiers mapped to one master SKU each contribute.
 */

import {
  fromMinorUnits,
  toMinorUnits,
  type MasterSku,
  type QuantityRecord,
} from '@channel-recon/catalog';
import type { Diagnostic } from '../diagnostics';
import { InvalidQuantityError, UnmappedIdentifierError } from '../errors';
import { silentLogger, type Logger } from '../logger';
import { normalizeIdentifier, type SkuRegistry } from '../registry';
import {
  buildColumns,
  channelColumnKey,
  foldModeFor,
  type FoldMode,
  type ReportColumn,
  type ReportDefinition,
} from '../reports/report-definitions';

/**
 * What to do with identifiers that have no master SKU:
 * - report: drop the record and add a diagnostic
 * - fail: abort the run
 */
export type UnmappedPolicy = 'report' | 'fail';

export interface ReconcilerOptions {
  registry: SkuRegistry;
  definition: ReportDefinition;
  unmappedPolicy?: UnmappedPolicy;
  logger?: Logger;
}

export interface AggregatedRow {
  sku: MasterSku;
  /** Keyed by column key; untracked channel/metric pairs have no entry */
  values: Record<string, number>;
}

export interface ReconcileResult {
  rows: AggregatedRow[];
  diagnostics: Diagnostic[];
  /** Records that reached a cell */
  folded: number;
}

/** Cell values in minor units, keyed by master SKU then column key */
type PartialAggregate = Map<MasterSku, Map<string, number>>;

/** Largest value seen for one identifier in a "max" cell */
interface RepeatedFigure {
  sku: MasterSku;
  key: string;
  value: number;
}

function addToCell(partial: PartialAggregate, sku: MasterSku, key: string, value: number): void {
  const cells = partial.get(sku) ?? new Map<string, number>();
  cells.set(key, (cells.get(key) ?? 0) + value);
  partial.set(sku, cells);
}

export class Reconciler {
  private readonly registry: SkuRegistry;
  private readonly definition: ReportDefinition;
  private readonly unmappedPolicy: UnmappedPolicy;
  private readonly logger: Logger;
  readonly columns: readonly ReportColumn[];
  private readonly foldModes: ReadonlyMap<string, FoldMode>;

  constructor(options: ReconcilerOptions) {
    this.registry = options.registry;
    this.definition = options.definition;
    this.unmappedPolicy = options.unmappedPolicy ?? 'report';
    this.logger = options.logger ?? silentLogger;
    this.columns = buildColumns(this.definition, this.registry.channelOrder());

    const modes = new Map<string, FoldMode>();
    for (const column of this.columns) {
      if (column.kind !== 'channel') continue;
      const mode = foldModeFor(this.definition, column.channel, column.metric);
      if (mode) modes.set(column.key, mode);
    }
    this.foldModes = modes;
  }

  /**
   * Reconcile record batches (typically one per source file)
   *
   * @throws UnmappedIdentifierError when the unmapped policy is "fail"
   */
  reconcile(batches: readonly (readonly QuantityRecord[])[]): ReconcileResult {
    const diagnostics: Diagnostic[] = [];
    let folded = 0;

    const partials = batches.map((batch) => {
      const partial: PartialAggregate = new Map();
      folded += this.foldBatch(batch, partial, diagnostics);
      return partial;
    });

    const merged = this.merge(partials);
    const rows = this.registry.allMasterSkus().map((sku) => this.buildRow(sku, merged.get(sku)));

    return { rows, diagnostics, folded };
  }

  /**
   * Fold one batch into a partial map. Returns the number of records folded.
   */
  private foldBatch(
    records: readonly QuantityRecord[],
    partial: PartialAggregate,
    diagnostics: Diagnostic[]
  ): number {
    let folded = 0;
    const repeated = new Map<string, RepeatedFigure>();

    for (const record of records) {
      const key = channelColumnKey(record.channel, record.metric);
      const mode = this.foldModes.get(key);
      const where = { channel: record.channel, file: record.source.file, line: record.source.line };

      if (!mode) {
        diagnostics.push({
          ...where,
          kind: 'untracked_metric',
          message: `${this.definition.title} report does not track ${record.metric} for ${record.channel}`,
          identifier: record.identifier,
        });
        continue;
      }

      let sku: MasterSku;
      try {
        sku = this.registry.resolve(record.channel, record.identifier);
      } catch (error) {
        if (!(error instanceof UnmappedIdentifierError) || this.unmappedPolicy === 'fail') {
          throw error;
        }
        this.logger.warn(error.message, { file: record.source.file, line: record.source.line });
        diagnostics.push({
          ...where,
          kind: 'unmapped_identifier',
          message: error.message,
          identifier: record.identifier,
        });
        continue;
      }

      if (record.value < 0) {
        const error = new InvalidQuantityError(record.channel, record.identifier, record.metric, record.value);
        this.logger.warn(error.message, { file: record.source.file, line: record.source.line });
        diagnostics.push({
          ...where,
          kind: 'invalid_quantity',
          message: error.message,
          identifier: record.identifier,
        });
        continue;
      }

      const value = toMinorUnits(record.metric, record.value);
      if (mode === 'max') {
        const figureKey = `${key}\u0000${normalizeIdentifier(record.identifier)}`;
        const current = repeated.get(figureKey);
        if (!current || value > current.value) repeated.set(figureKey, { sku, key, value });
      } else {
        addToCell(partial, sku, key, value);
      }
      folded++;
    }

    for (const { sku, key, value } of repeated.values()) {
      addToCell(partial, sku, key, value);
    }

    return folded;
  }

  private merge(partials: readonly PartialAggregate[]): PartialAggregate {
    const merged: PartialAggregate = new Map();

    for (const partial of partials) {
      for (const [sku, cells] of partial) {
        for (const [key, value] of cells) {
          addToCell(merged, sku, key, value);
        }
      }
    }

    return merged;
  }

  /**
   * Zero-filled row for a master SKU, with totals
   */
  private buildRow(sku: MasterSku, cells: ReadonlyMap<string, number> | undefined): AggregatedRow {
    const values: Record<string, number> = {};
    const totals = new Map<string, number>();

    for (const column of this.columns) {
      if (column.kind !== 'channel') continue;
      const minor = cells?.get(column.key) ?? 0;
      values[column.key] = fromMinorUnits(column.metric, minor);
      totals.set(column.metric, (totals.get(column.metric) ?? 0) + minor);
    }

    for (const column of this.columns) {
      if (column.kind !== 'total') continue;
      values[column.key] = fromMinorUnits(column.metric, totals.get(column.metric) ?? 0);
    }

    return { sku, values };
  }
}
