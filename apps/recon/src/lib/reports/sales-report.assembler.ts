import { formatCount, formatCurrency } from '@channel-recon/shared';
import { ReportAssembler, type AssembledReport } from './report-assembler';
import { SALES_REPORT, totalColumnKey } from './report-definitions';

/**
 * Units and revenue per master SKU across the marketplaces
 */
export class SalesReportAssembler extends ReportAssembler {
  readonly definition = SALES_REPORT;

  headline(report: AssembledReport): string {
    const cents = Math.round(this.columnTotal(report, totalColumnKey('revenue')) * 100);
    const units = this.columnTotal(report, totalColumnKey('units'));
    return `Sales as of ${report.asOf}: ${formatCount(units)} units, ${formatCurrency(cents / 100)} across ${report.rows.length} SKUs`;
  }
}
