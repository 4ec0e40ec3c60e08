import type { Channel, SourceReportType } from '@channel-recon/catalog';
import { TabularReportParser } from './tabular-report.parser';
import type { QuantityDraft, RowReader } from './types';

/**
 * Shopify "Net sales by product variant SKU" export.
 * Net figures go negative when returns outweigh sales; the reconciler
 * rejects those.
 */
export class ShopifySalesParser extends TabularReportParser {
  readonly channel: Channel = 'shopify';
  readonly reportType: SourceReportType = 'sales';
  protected readonly identifierColumn = 'Product variant SKU';
  protected readonly requiredColumns = ['Net items sold', 'Net sales'];

  protected readRow(row: RowReader): QuantityDraft[] {
    return [
      { metric: 'units', value: row.number('Net items sold') },
      { metric: 'revenue', value: row.number('Net sales') },
    ];
  }
}
