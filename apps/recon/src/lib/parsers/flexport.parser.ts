/**
 * Flexport report parsers
 *
 * - inventory: inventory levels, one row per SKU and lot. Each row splits
 *   into the DTC (ecommerce) and Reserve warehouses. "Ecom Last 30 Days" is a
 *   per-SKU figure repeated on every lot row.
 * - inbound: inbound reconciliation, one row per shipment line.
 */

import type { Channel, SourceReportType } from '@channel-recon/catalog';
import { TabularReportParser } from './tabular-report.parser';
import type { QuantityDraft, RowReader } from './types';

export class FlexportInventoryParser extends TabularReportParser {
  readonly channel: Channel = 'flexport';
  readonly reportType: SourceReportType = 'inventory';
  protected readonly identifierColumn = 'SKU';
  protected readonly requiredColumns = ['Available in Ecom', 'Available in Reserve', 'Ecom Last 30 Days'];

  protected readRow(row: RowReader): QuantityDraft[] {
    return [
      { metric: 'onHand', value: row.number('Available in Ecom') },
      { metric: 'onHand', value: row.number('Available in Reserve') },
      { metric: 'sold30d', value: row.number('Ecom Last 30 Days') },
    ];
  }
}

const IN_TRANSIT_COLUMNS = ['IN_TRANSIT_WITHIN_DELIVERR_UNDER_60_DAYS', 'IN_TRANSIT_TO_DELIVERR'];

export class FlexportInboundParser extends TabularReportParser {
  readonly channel: Channel = 'flexport';
  readonly reportType: SourceReportType = 'inbound';
  protected readonly identifierColumn = 'MSKU';
  protected readonly requiredColumns = IN_TRANSIT_COLUMNS;

  protected readRow(row: RowReader): QuantityDraft[] {
    // One record per column so a negative cell is rejected on its own
    return IN_TRANSIT_COLUMNS.map((column): QuantityDraft => ({ metric: 'inbound', value: row.number(column) }));
  }
}
