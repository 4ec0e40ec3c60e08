import { format, isValid, parse } from 'date-fns';
import { REPORT_KINDS, isReportKind, type ReportKind } from '@channel-recon/catalog';

export interface CliArgs {
  testMode: boolean;
  reports: ReportKind[];
  runDate: string;
}

export class CliArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliArgsError';
  }
}

/**
 * Parse `--test`, `--report=sales|inventory|all` and `--date=YYYY-MM-DD`
 */
export function parseCliArgs(argv: readonly string[], today: Date = new Date()): CliArgs {
  let testMode = false;
  let reports: ReportKind[] = [...REPORT_KINDS];
  let runDate = format(today, 'yyyy-MM-dd');

  for (const arg of argv) {
    if (arg === '--test') {
      testMode = true;
    } else if (arg.startsWith('--report=')) {
      const value = arg.slice('--report='.length).toLowerCase();
      if (value === 'all') {
        reports = [...REPORT_KINDS];
      } else if (isReportKind(value)) {
        reports = [value];
      } else {
        throw new CliArgsError(`Unknown report "${value}" (expected sales, inventory or all)`);
      }
    } else if (arg.startsWith('--date=')) {
      const value = arg.slice('--date='.length);
      if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || !isValid(parse(value, 'yyyy-MM-dd', today))) {
        throw new CliArgsError(`Invalid --date "${value}" (expected YYYY-MM-DD)`);
      }
      runDate = value;
    } else {
      throw new CliArgsError(`Unknown argument "${arg}"`);
    }
  }

  return { testMode, reports, runDate };
}
