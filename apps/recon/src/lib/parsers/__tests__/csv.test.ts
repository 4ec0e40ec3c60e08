import { describe, it, expect } from 'vitest';
import { normalizeHeader, parseCsv } from '../csv';

describe('parseCsv', () => {
  it('should split the header from data rows and keep line numbers', () => {
    const table = parseCsv('SKU,Qty\nA,1\nB,2\n');

    expect(table.headers).toEqual(['SKU', 'Qty']);
    expect(table.rows).toEqual([
      { line: 2, values: ['A', '1'] },
      { line: 3, values: ['B', '2'] },
    ]);
  });

  it('should handle quoted delimiters, escaped quotes, CRLF and blank lines', () => {
    const table = parseCsv('SKU,Units\r\n"A, x",1\r\n\r\n"B ""q""",2');

    expect(table.rows).toEqual([
      { line: 2, values: ['A, x', '1'] },
      { line: 4, values: ['B "q"', '2'] },
    ]);
  });

  it('should keep line breaks inside quoted values and count them', () => {
    const table = parseCsv('SKU,Note\nA,"two\nlines"\nB,x');

    expect(table.rows[0]).toEqual({ line: 2, values: ['A', 'two\nlines'] });
    expect(table.rows[1]).toEqual({ line: 4, values: ['B', 'x'] });
  });

  it('should skip preamble lines before the header', () => {
    const table = parseCsv('Title\nSubtitle\nSKU,Qty\nA,1', { skipLines: 2 });

    expect(table.headers).toEqual(['SKU', 'Qty']);
    expect(table.rows).toEqual([{ line: 4, values: ['A', '1'] }]);
  });

  it('should strip a byte-order mark and trim values', () => {
    const table = parseCsv('\uFEFFSKU , Qty\n A , 1 ');

    expect(table.headers).toEqual(['SKU', 'Qty']);
    expect(table.rows).toEqual([{ line: 2, values: ['A', '1'] }]);
  });

  it('should return an empty table for empty content', () => {
    expect(parseCsv('')).toEqual({ headers: [], rows: [] });
  });

  it('should support another delimiter', () => {
    const table = parseCsv('SKU\tQty\nA\t3', { delimiter: '\t' });

    expect(table.rows).toEqual([{ line: 2, values: ['A', '3'] }]);
  });
});

describe('normalizeHeader', () => {
  it('should lowercase and collapse whitespace', () => {
    expect(normalizeHeader('  Units   Ordered ')).toBe('units ordered');
  });
});
