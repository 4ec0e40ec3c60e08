import { describe, it, expect } from 'vitest';
import { sourceFile } from '@/test/fixtures';
import { FlexportInboundParser, FlexportInventoryParser } from '../flexport.parser';

describe('Flexport parsers', () => {
  it('should split inventory into DTC and Reserve and carry the 30-day figure per row', () => {
    const source = sourceFile('flexport', 'inventory');
    const result = new FlexportInventoryParser().parse({
      source,
      content: 'SKU,Lot,Available in Ecom,Available in Reserve,Ecom Last 30 Days\nA,L1,5,10,8\nA,L2,3,0,8',
    });

    expect(result.records.map(({ metric, value, source: { line } }) => [line, metric, value])).toEqual([
      [2, 'onHand', 5],
      [2, 'onHand', 10],
      [2, 'sold30d', 8],
      [3, 'onHand', 3],
      [3, 'onHand', 0],
      [3, 'sold30d', 8],
    ]);
  });

  it('should emit one inbound record per in-transit column', () => {
    const source = sourceFile('flexport', 'inbound');
    const result = new FlexportInboundParser().parse({
      source,
      content: 'MSKU,IN_TRANSIT_WITHIN_DELIVERR_UNDER_60_DAYS,IN_TRANSIT_TO_DELIVERR\nA,4,-6',
    });

    expect(result.records).toEqual([
      { channel: 'flexport', identifier: 'A', metric: 'inbound', value: 4, source: { file: source.fileName, line: 2 } },
      { channel: 'flexport', identifier: 'A', metric: 'inbound', value: -6, source: { file: source.fileName, line: 2 } },
    ]);
    expect(result.diagnostics).toEqual([]);
  });
});
