import { sourceKey, type SourceKey } from '@channel-recon/catalog';
import { silentLogger, type Logger } from '../logger';
import { AmazonAwdParser, AmazonFbaParser, AmazonSalesParser } from './amazon.parser';
import { FlexportInboundParser, FlexportInventoryParser } from './flexport.parser';
import { ShopifySalesParser } from './shopify.parser';
import { TikTokSalesParser } from './tiktok.parser';
import type { ChannelParser } from './types';
import { WalmartSalesParser, WfsInventoryParser } from './walmart.parser';

export type ParserRegistry = ReadonlyMap<SourceKey, ChannelParser>;

/**
 * Build one parser per supported channel/report-type pair.
 * New sources are added here by implementing ChannelParser.
 */
export function createParserRegistry(logger: Logger = silentLogger): ParserRegistry {
  const parsers: ChannelParser[] = [
    new AmazonSalesParser(logger.child('amazon:sales')),
    new AmazonFbaParser(logger.child('amazon:fba')),
    new AmazonAwdParser(logger.child('amazon:awd')),
    new WalmartSalesParser(logger.child('walmart:sales')),
    new WfsInventoryParser(logger.child('walmart:wfs')),
    new TikTokSalesParser(logger.child('tiktok:sales')),
    new ShopifySalesParser(logger.child('shopify:sales')),
    new FlexportInventoryParser(logger.child('flexport:inventory')),
    new FlexportInboundParser(logger.child('flexport:inbound')),
  ];

  return new Map(parsers.map((parser) => [sourceKey(parser.channel, parser.reportType), parser]));
}

export { TabularReportParser } from './tabular-report.parser';
export { parseCsv, normalizeHeader } from './csv';
export { parseNumber } from './numbers';
export {
  AmazonAwdParser,
  AmazonFbaParser,
  AmazonSalesParser,
  FlexportInboundParser,
  FlexportInventoryParser,
  ShopifySalesParser,
  TikTokSalesParser,
  WalmartSalesParser,
  WfsInventoryParser,
};
export type { ChannelParser, ParseResult, ParserInput, QuantityDraft, RowReader } from './types';
export type { CsvRow, CsvTable, CsvOptions } from './csv';
