import type { ReportKind } from '@channel-recon/catalog';
import { InventoryReportAssembler } from './inventory-report.assembler';
import type { ReportAssembler, ReportAssemblerDeps } from './report-assembler';
import { SalesReportAssembler } from './sales-report.assembler';

/**
 * Assembler for a report kind
 */
export function createReportAssembler(kind: ReportKind, deps: ReportAssemblerDeps): ReportAssembler {
  switch (kind) {
    case 'sales':
      return new SalesReportAssembler(deps);
    case 'inventory':
      return new InventoryReportAssembler(deps);
  }
}

export { ReportAssembler } from './report-assembler';
export { SalesReportAssembler, InventoryReportAssembler };
export {
  INVENTORY_REPORT,
  REPORT_DEFINITIONS,
  SALES_REPORT,
  buildColumns,
  channelColumnKey,
  foldModeFor,
  totalColumnKey,
} from './report-definitions';
export type {
  AssembledReport,
  ReportAssemblerDeps,
  ReportRecord,
  SourceFileStats,
  SourceReader,
} from './report-assembler';
export type { FoldMode, ReportColumn, ReportDefinition, TrackedMetrics } from './report-definitions';
