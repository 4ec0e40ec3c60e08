import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { AssembledReport } from '../../reports';
import { buildColumns, SALES_REPORT } from '../../reports';
import { summarizeDiagnostics } from '../../diagnostics';
import { escapeCsvField, reportFileName, toCsv, writeReport } from '../report-writer';

function salesReport(): AssembledReport {
  return {
    kind: 'sales',
    title: 'Sales',
    asOf: '2025-01-31',
    columns: buildColumns(SALES_REPORT, ['amazon']),
    rows: [
      { sku: 'A', amazon_units: 2, amazon_revenue: 10.5, total_units: 2, total_revenue: 10.5 },
      { sku: 'B,"x"', amazon_units: 0, amazon_revenue: 0, total_units: 0, total_revenue: 0 },
    ],
    sources: { amazon: '2025-01-31' },
    files: [],
    diagnostics: summarizeDiagnostics([]),
  };
}

describe('report writer', () => {
  it('should quote fields with commas, quotes or line breaks', () => {
    expect(escapeCsvField('plain')).toBe('plain');
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
  });

  it('should render revenue with two decimals and counts as integers', () => {
    expect(toCsv(salesReport())).toBe(
      [
        'sku,amazon_units,amazon_revenue,total_units,total_revenue',
        'A,2,10.50,2,10.50',
        '"B,""x""",0,0.00,0,0.00',
        '',
      ].join('\n')
    );
  });

  it('should name files by report kind and date', () => {
    expect(reportFileName(salesReport(), 'csv')).toBe('sales_report_2025-01-31.csv');
    expect(reportFileName({ kind: 'inventory', asOf: '2025-02-01' }, 'json')).toBe('inventory_report_2025-02-01.json');
  });

  describe('writeReport', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'recon-output-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should write CSV and JSON into a new output directory', async () => {
      const outputDir = join(dir, 'out');

      const written = await writeReport(salesReport(), { outputDir, saveJson: true });

      expect(written).toEqual({
        csvPath: join(outputDir, 'sales_report_2025-01-31.csv'),
        jsonPath: join(outputDir, 'sales_report_2025-01-31.json'),
      });
      expect(await readFile(written.csvPath, 'utf8')).toBe(toCsv(salesReport()));
      expect(JSON.parse(await readFile(join(outputDir, 'sales_report_2025-01-31.json'), 'utf8'))).toEqual(
        salesReport().rows
      );
    });

    it('should skip JSON when disabled', async () => {
      const written = await writeReport(salesReport(), { outputDir: dir, saveJson: false });

      expect(written.jsonPath).toBeNull();
    });
  });
});
