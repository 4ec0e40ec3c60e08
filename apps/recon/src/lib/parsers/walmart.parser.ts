/**
 * Walmart report parsers
 *
 * - sales: Seller Center item sales export
 * - wfs:   Walmart Fulfillment Services inventory health export
 */

import type { Channel, SourceReportType } from '@channel-recon/catalog';
import { TabularReportParser } from './tabular-report.parser';
import type { QuantityDraft, RowReader } from './types';

export class WalmartSalesParser extends TabularReportParser {
  readonly channel: Channel = 'walmart';
  readonly reportType: SourceReportType = 'sales';
  protected readonly identifierColumn = 'SKU';
  protected readonly requiredColumns = ['Units_Sold', 'GMV'];

  protected readRow(row: RowReader): QuantityDraft[] {
    return [
      { metric: 'units', value: row.number('Units_Sold') },
      { metric: 'revenue', value: row.number('GMV') },
    ];
  }
}

export class WfsInventoryParser extends TabularReportParser {
  readonly channel: Channel = 'walmart';
  readonly reportType: SourceReportType = 'wfs';
  protected readonly identifierColumn = 'SKU';
  protected readonly requiredColumns = ['Available units', 'Inbound units'];

  protected readRow(row: RowReader): QuantityDraft[] {
    return [
      { metric: 'onHand', value: row.number('Available units') },
      { metric: 'inbound', value: row.number('Inbound units') },
    ];
  }
}
