import type { Channel, SourceFile, SourceReportType } from '@channel-recon/catalog';
import { SkuRegistry } from '@/lib/registry';

export function sourceFile(
  channel: Channel,
  reportType: SourceReportType,
  fileDate = '2025-01-31',
  fileName = `${channel}_${reportType}_${fileDate}.csv`
): SourceFile {
  return { channel, reportType, fileDate, fileName, path: `/input/${fileName}` };
}

/** Universe {A, B, C} with every channel in default order */
export function abcRegistry(mappings: Record<string, Record<string, string>> = {}): SkuRegistry {
  return SkuRegistry.fromDefinition({
    masterSkus: ['A', 'B', 'C'],
    channelOrder: ['amazon', 'walmart', 'tiktok', 'shopify', 'flexport'],
    mappings,
  });
}
