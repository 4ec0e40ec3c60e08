import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { sourceFile } from '@/test/fixtures';
import { createRecordingLogger } from '@/test/recording-logger';
import { discoverSourceFiles, parseSourceFilename, readSourceFile } from '../source-files';

describe('parseSourceFilename', () => {
  it('should read the channel, report type and date', () => {
    expect(parseSourceFilename('Amazon_fba_2025-01-31.csv', '/in')).toEqual({
      channel: 'amazon',
      reportType: 'fba',
      fileDate: '2025-01-31',
      fileName: 'Amazon_fba_2025-01-31.csv',
      path: join('/in', 'Amazon_fba_2025-01-31.csv'),
    });
  });

  it('should accept any prefix case', () => {
    expect(parseSourceFilename('TIKTOK_Sales_2025-02-01.CSV')).toMatchObject({ channel: 'tiktok', reportType: 'sales' });
  });

  it('should reject unknown channels, report types, dates and extensions', () => {
    expect(parseSourceFilename('Ebay_sales_2025-01-31.csv')).toBeNull();
    expect(parseSourceFilename('Amazon_returns_2025-01-31.csv')).toBeNull();
    expect(parseSourceFilename('Amazon_sales_2025-02-30.csv')).toBeNull();
    expect(parseSourceFilename('Amazon_sales_2025-01-31.xlsx')).toBeNull();
    expect(parseSourceFilename('notes.txt')).toBeNull();
  });
});

describe('source file IO', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'recon-input-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should discover matching files sorted by name and log the rest', async () => {
    await writeFile(join(dir, 'Walmart_wfs_2025-01-31.csv'), '');
    await writeFile(join(dir, 'Amazon_sales_2025-01-31.csv'), '');
    await writeFile(join(dir, 'readme.md'), '');
    const logger = createRecordingLogger();

    const files = await discoverSourceFiles(dir, logger);

    expect(files.map((file) => file.fileName)).toEqual(['Amazon_sales_2025-01-31.csv', 'Walmart_wfs_2025-01-31.csv']);
    expect(logger.entries).toEqual([
      { level: 'debug', scope: 'test', message: 'Ignoring readme.md: not a recognised source file name' },
      { level: 'info', scope: 'test', message: `Discovered 2 source files in ${dir}` },
    ]);
  });

  it('should treat a missing input directory as empty', async () => {
    await expect(discoverSourceFiles(join(dir, 'missing'))).resolves.toEqual([]);
  });

  it('should read file content', async () => {
    await mkdir(join(dir, 'nested'));
    const path = join(dir, 'nested', 'Amazon_sales_2025-01-31.csv');
    await writeFile(path, 'SKU,Units Ordered\nA,1\n');

    const content = await readSourceFile({ ...sourceFile('amazon', 'sales'), path }, 1000);

    expect(content).toBe('SKU,Units Ordered\nA,1\n');
  });
});
