/**
 * Amazon report parsers
 *
 * - sales: Business Report "Detail Page Sales and Traffic by Child Item"
 * - fba:   FBA Inventory report (one row per merchant SKU and condition)
 * - awd:   AWD inventory export; two title lines precede the header
 */

import type { Channel, SourceReportType } from '@channel-recon/catalog';
import { TabularReportParser } from './tabular-report.parser';
import type { QuantityDraft, RowReader } from './types';

const SALES_COLUMNS = {
  sku: 'SKU',
  units: 'Units Ordered',
  revenue: 'Ordered Product Sales',
} as const;

const FBA_COLUMNS = {
  sku: 'Merchant SKU',
  available: 'Available',
  fcTransfer: 'FC transfer',
  inbound: 'Inbound',
  sold30d: 'Units Sold Last 30 Days',
} as const;

const AWD_COLUMNS = {
  sku: 'SKU',
  available: 'Available in AWD (units)',
  reserved: 'Reserved in AWD (units)',
  inbound: 'Inbound to AWD (units)',
} as const;

export class AmazonSalesParser extends TabularReportParser {
  readonly channel: Channel = 'amazon';
  readonly reportType: SourceReportType = 'sales';
  protected readonly identifierColumn = SALES_COLUMNS.sku;
  protected readonly requiredColumns = [SALES_COLUMNS.units, SALES_COLUMNS.revenue];

  protected readRow(row: RowReader): QuantityDraft[] {
    return [
      { metric: 'units', value: row.number(SALES_COLUMNS.units) },
      { metric: 'revenue', value: row.number(SALES_COLUMNS.revenue) },
    ];
  }
}

export class AmazonFbaParser extends TabularReportParser {
  readonly channel: Channel = 'amazon';
  readonly reportType: SourceReportType = 'fba';
  protected readonly identifierColumn = FBA_COLUMNS.sku;
  protected readonly requiredColumns = [
    FBA_COLUMNS.available,
    FBA_COLUMNS.fcTransfer,
    FBA_COLUMNS.inbound,
    FBA_COLUMNS.sold30d,
  ];

  protected readRow(row: RowReader): QuantityDraft[] {
    return [
      { metric: 'onHand', value: row.number(FBA_COLUMNS.available) },
      // Units moving between fulfilment centres still count as on hand
      { metric: 'onHand', value: row.number(FBA_COLUMNS.fcTransfer) },
      { metric: 'inbound', value: row.number(FBA_COLUMNS.inbound) },
      { metric: 'sold30d', value: row.number(FBA_COLUMNS.sold30d) },
    ];
  }
}

export class AmazonAwdParser extends TabularReportParser {
  readonly channel: Channel = 'amazon';
  readonly reportType: SourceReportType = 'awd';
  protected readonly identifierColumn = AWD_COLUMNS.sku;
  protected readonly requiredColumns = [AWD_COLUMNS.available, AWD_COLUMNS.reserved, AWD_COLUMNS.inbound];
  protected readonly preambleLines = 2;

  protected readRow(row: RowReader): QuantityDraft[] {
    return [
      { metric: 'onHand', value: row.number(AWD_COLUMNS.available) },
      { metric: 'onHand', value: row.number(AWD_COLUMNS.reserved) },
      { metric: 'inbound', value: row.number(AWD_COLUMNS.inbound) },
    ];
  }
}
