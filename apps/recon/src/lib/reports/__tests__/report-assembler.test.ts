import { describe, it, expect, vi } from 'vitest';
import type { SourceFile } from '@channel-recon/catalog';
import { abcRegistry, sourceFile } from '@/test/fixtures';
import { createRecordingLogger } from '@/test/recording-logger';
import { createParserRegistry } from '../../parsers';
import { InventoryReportAssembler, SalesReportAssembler, createReportAssembler, type ReportAssemblerDeps } from '../index';

const SALES_HEADER = 'SKU,Units Ordered,Ordered Product Sales';

function depsFor(contents: Record<string, string>, overrides: Partial<ReportAssemblerDeps> = {}): ReportAssemblerDeps {
  return {
    registry: abcRegistry(),
    parsers: createParserRegistry(),
    readSource: async (file: SourceFile) => contents[file.fileName] ?? '',
    runDate: '2025-02-01',
    ...overrides,
  };
}

describe('ReportAssembler', () => {
  // ===========================================================================
  // Sales
  // ===========================================================================

  describe('SalesReportAssembler', () => {
    const oldAmazon = sourceFile('amazon', 'sales', '2025-01-30');
    const amazon = sourceFile('amazon', 'sales', '2025-01-31');
    const walmart = sourceFile('walmart', 'sales', '2025-01-29');
    const flexport = sourceFile('flexport', 'inventory', '2025-01-31');

    const contents = {
      [oldAmazon.fileName]: `${SALES_HEADER}\nA,99,990`,
      [amazon.fileName]: `${SALES_HEADER}\nA,10,100\nB,5,50`,
      [walmart.fileName]: 'SKU,Units_Sold,GMV\nB,3,30',
    };

    it('should select the latest file per source in declared order', () => {
      const assembler = new SalesReportAssembler(depsFor(contents));

      expect(assembler.selectSources([walmart, amazon, flexport, oldAmazon])).toEqual([amazon, walmart]);
    });

    it('should reconcile the worked example into zero-filled rows', async () => {
      const assembler = new SalesReportAssembler(depsFor(contents));

      const report = await assembler.assemble([oldAmazon, amazon, walmart, flexport]);

      expect(report.kind).toBe('sales');
      expect(report.asOf).toBe('2025-01-31');
      expect(report.rows.map((row) => [row.sku, row.amazon_units, row.walmart_units, row.total_units])).toEqual([
        ['A', 10, 0, 10],
        ['B', 5, 3, 8],
        ['C', 0, 0, 0],
      ]);
      expect(Object.keys(report.rows[0])).toEqual(report.columns.map((column) => column.key));
      expect(report.columns.map((column) => column.key)).toEqual([
        'sku',
        'amazon_units',
        'amazon_revenue',
        'walmart_units',
        'walmart_revenue',
        'tiktok_units',
        'tiktok_revenue',
        'shopify_units',
        'shopify_revenue',
        'total_units',
        'total_revenue',
      ]);
    });

    it('should summarize sources and per-file statistics', async () => {
      const report = await new SalesReportAssembler(depsFor(contents)).assemble([amazon, walmart]);

      expect(report.sources).toEqual({
        amazon: '2025-01-31',
        walmart: '2025-01-29',
        tiktok: null,
        shopify: null,
      });
      expect(report.files).toEqual([
        {
          fileName: amazon.fileName,
          channel: 'amazon',
          reportType: 'sales',
          fileDate: '2025-01-31',
          rowsAnalysed: 2,
          recordsEmitted: 4,
        },
        {
          fileName: walmart.fileName,
          channel: 'walmart',
          reportType: 'sales',
          fileDate: '2025-01-29',
          rowsAnalysed: 1,
          recordsEmitted: 2,
        },
      ]);
      expect(report.diagnostics.total).toBe(0);
    });

    it('should warn about sources with no file', async () => {
      const logger = createRecordingLogger();
      await new SalesReportAssembler(depsFor(contents, { logger })).assemble([amazon, walmart]);

      expect(logger.entries.filter((entry) => entry.level === 'warn').map((entry) => entry.message)).toEqual([
        'No tiktok:sales file found; its columns are zero-filled',
        'No shopify:sales file found; its columns are zero-filled',
      ]);
    });

    it('should fall back to the run date with no input files', async () => {
      const report = await new SalesReportAssembler(depsFor({})).assemble([]);

      expect(report.asOf).toBe('2025-02-01');
      expect(report.rows).toHaveLength(3);
      expect(report.rows.every((row) => row.total_units === 0 && row.total_revenue === 0)).toBe(true);
    });

    it('should give identical rows whatever order files are listed in', async () => {
      const tiktok = sourceFile('tiktok', 'sales');
      const all = { ...contents, [tiktok.fileName]: 'Seller SKU,Quantity,SKU Subtotal After Discount\nA,1,0.10\nA,2,0.20' };

      const forward = await new SalesReportAssembler(depsFor(all)).assemble([amazon, walmart, tiktok]);
      const backward = await new SalesReportAssembler(depsFor(all)).assemble([tiktok, walmart, amazon]);

      expect(backward.rows).toEqual(forward.rows);
      expect(forward.rows[0].tiktok_revenue).toBe(0.3);
    });

    it('should collect parser and reconciler diagnostics together', async () => {
      const report = await new SalesReportAssembler(
        depsFor({ [amazon.fileName]: `${SALES_HEADER}\nA,x,1\nZZZ,1,1\nB,-2,5` })
      ).assemble([amazon]);

      expect(report.diagnostics.byKind).toMatchObject({
        malformed_row: 1,
        unmapped_identifier: 2,
        invalid_quantity: 1,
      });
      expect(report.diagnostics.byChannel).toEqual({
        amazon: { malformed_row: 1, unmapped_identifier: 2, invalid_quantity: 1 },
      });
      expect(report.rows[1]).toMatchObject({ sku: 'B', amazon_units: 0, amazon_revenue: 5 });
    });

    it('should describe the headline figures', async () => {
      const assembler = new SalesReportAssembler(depsFor(contents));
      const report = await assembler.assemble([amazon, walmart]);

      expect(assembler.headline(report)).toBe('Sales as of 2025-01-31: 18 units, $180.00 across 3 SKUs');
    });

    it('should treat a file that cannot be read as absent', async () => {
      const logger = createRecordingLogger();
      const readSource = vi.fn(async (file: SourceFile) => {
        if (file.channel === 'amazon') throw new Error('Timed out reading file');
        return contents[file.fileName] ?? '';
      });
      const assembler = new SalesReportAssembler(depsFor({}, { readSource, logger }));

      const report = await assembler.assemble([amazon, walmart]);

      const message = `Could not read ${amazon.fileName}: Timed out reading file; its columns are zero-filled`;
      expect(report.rows.map((row) => [row.sku, row.amazon_units, row.walmart_units])).toEqual([
        ['A', 0, 0],
        ['B', 0, 3],
        ['C', 0, 0],
      ]);
      expect(report.asOf).toBe('2025-01-29');
      expect(report.sources).toMatchObject({ amazon: null, walmart: '2025-01-29' });
      expect(report.files.map((file) => file.fileName)).toEqual([walmart.fileName]);
      expect(report.diagnostics.byKind.unreadable_file).toBe(1);
      expect(report.diagnostics.samples).toEqual([
        { kind: 'unreadable_file', channel: 'amazon', file: amazon.fileName, line: 0, message },
      ]);
      expect(logger.entries.filter((entry) => entry.level === 'warn').map((entry) => entry.message)).toContain(message);
    });
  });

  // ===========================================================================
  // Inventory
  // ===========================================================================

  describe('InventoryReportAssembler', () => {
    it('should combine FBA, AWD and Flexport stock', async () => {
      const fba = sourceFile('amazon', 'fba', '2025-01-30');
      const awd = sourceFile('amazon', 'awd', '2025-01-31');
      const flexport = sourceFile('flexport', 'inventory', '2025-01-28');
      const assembler = new InventoryReportAssembler(
        depsFor({
          [fba.fileName]: 'Merchant SKU,Available,FC transfer,Inbound,Units Sold Last 30 Days\nA,10,2,5,7',
          [awd.fileName]: 'Title\nSubtitle\nSKU,Available in AWD (units),Reserved in AWD (units),Inbound to AWD (units)\nA,100,20,30',
          [flexport.fileName]: 'SKU,Available in Ecom,Available in Reserve,Ecom Last 30 Days\nB,5,10,8\nB,3,0,8',
        })
      );

      const report = await assembler.assemble([fba, awd, flexport]);

      expect(report.asOf).toBe('2025-01-31');
      expect(report.rows[0]).toMatchObject({
        sku: 'A',
        amazon_on_hand: 132,
        amazon_inbound: 35,
        amazon_sold_30d: 7,
        total_on_hand: 132,
      });
      expect(report.rows[1]).toMatchObject({
        sku: 'B',
        flexport_on_hand: 18,
        flexport_sold_30d: 8,
        total_sold_30d: 8,
      });
      expect(report.sources).toEqual({ amazon: '2025-01-31', walmart: null, flexport: '2025-01-28' });
      expect(assembler.headline(report)).toBe('Inventory as of 2025-01-31: 150 on hand, 35 inbound across 3 SKUs');
    });
  });

  describe('InventoryReportAssembler with bad or repeated figures', () => {
    it('should reject a negative FBA column and keep the other on-hand column', async () => {
      const fba = sourceFile('amazon', 'fba');
      const report = await new InventoryReportAssembler(
        depsFor({ [fba.fileName]: 'Merchant SKU,Available,FC transfer,Inbound,Units Sold Last 30 Days\nA,-3,10,0,0' })
      ).assemble([fba]);

      expect(report.rows[0]).toMatchObject({ sku: 'A', amazon_on_hand: 10, total_on_hand: 10 });
      expect(report.diagnostics.byKind.invalid_quantity).toBe(1);
      expect(report.diagnostics.samples[0]).toMatchObject({ kind: 'invalid_quantity', identifier: 'A', line: 2 });
    });

    it('should reject a negative in-transit column for Flexport inbound', async () => {
      const inbound = sourceFile('flexport', 'inbound');
      const report = await new InventoryReportAssembler(
        depsFor({ [inbound.fileName]: 'MSKU,IN_TRANSIT_WITHIN_DELIVERR_UNDER_60_DAYS,IN_TRANSIT_TO_DELIVERR\nB,-4,9' })
      ).assemble([inbound]);

      expect(report.rows[1]).toMatchObject({ sku: 'B', flexport_inbound: 9, total_inbound: 9 });
      expect(report.diagnostics.byKind.invalid_quantity).toBe(1);
    });

    it('should add 30-day sales across Flexport codes mapped to one SKU', async () => {
      const flexport = sourceFile('flexport', 'inventory');
      const report = await new InventoryReportAssembler(
        depsFor(
          {
            [flexport.fileName]:
              'SKU,Available in Ecom,Available in Reserve,Ecom Last 30 Days\nA,1,0,10\nA-OLD,2,0,4\nA,3,0,10',
          },
          { registry: abcRegistry({ flexport: { 'A-OLD': 'A' } }) }
        )
      ).assemble([flexport]);

      expect(report.rows[0]).toMatchObject({ sku: 'A', flexport_on_hand: 6, flexport_sold_30d: 14, total_sold_30d: 14 });
    });
  });

  describe('createReportAssembler', () => {
    it('should build the assembler for each report kind', () => {
      expect(createReportAssembler('sales', depsFor({}))).toBeInstanceOf(SalesReportAssembler);
      expect(createReportAssembler('inventory', depsFor({}))).toBeInstanceOf(InventoryReportAssembler);
    });
  });
});
