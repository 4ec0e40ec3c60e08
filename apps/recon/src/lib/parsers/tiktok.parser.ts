/**
 * TikTok Shop order export parser
 *
 * One row per order line. Cancelled lines are left out; everything else is
 * emitted per row and folded later.
 */

import type { Channel, SourceReportType } from '@channel-recon/catalog';
import { TabularReportParser } from './tabular-report.parser';
import type { QuantityDraft, RowReader } from './types';

const CANCELLED_STATUSES = new Set(['canceled', 'cancelled']);

export class TikTokSalesParser extends TabularReportParser {
  readonly channel: Channel = 'tiktok';
  readonly reportType: SourceReportType = 'sales';
  protected readonly identifierColumn = 'Seller SKU';
  protected readonly requiredColumns = ['Quantity', 'SKU Subtotal After Discount'];

  protected exclusionReason(row: RowReader): string | null {
    const status = row.text('Order Status');
    return CANCELLED_STATUSES.has(status.toLowerCase()) ? `Order status is ${status}` : null;
  }

  protected readRow(row: RowReader): QuantityDraft[] {
    return [
      { metric: 'units', value: row.number('Quantity') },
      { metric: 'revenue', value: row.number('SKU Subtotal After Discount') },
    ];
  }
}
