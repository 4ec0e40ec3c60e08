import { formatCount } from '@channel-recon/shared';
import { ReportAssembler, type AssembledReport } from './report-assembler';
import { INVENTORY_REPORT, totalColumnKey } from './report-definitions';

/**
 * On-hand, inbound and trailing-30-day sales per master SKU across the
 * fulfilment networks
 */
export class InventoryReportAssembler extends ReportAssembler {
  readonly definition = INVENTORY_REPORT;

  headline(report: AssembledReport): string {
    const onHand = this.columnTotal(report, totalColumnKey('onHand'));
    const inbound = this.columnTotal(report, totalColumnKey('inbound'));
    return `Inventory as of ${report.asOf}: ${formatCount(onHand)} on hand, ${formatCount(inbound)} inbound across ${report.rows.length} SKUs`;
  }
}
