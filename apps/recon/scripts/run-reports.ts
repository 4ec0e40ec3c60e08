/**
 * Channel Reconciliation Run
 *
 * Reads the latest channel exports from the input directory, builds the
 * sales and inventory reports, writes them to the output directory and posts
 * them to the configured webhook.
 *
 * Usage:
 *   cd apps/recon
 *   npm run reports -- [--test] [--report=sales|inventory|all] [--date=YYYY-MM-DD]
 *
 * Configuration comes from .env / .env.local (see .env.example).
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import { formatCount, formatDate, formatDuration } from '@channel-recon/shared';
import { parseCliArgs } from '../src/lib/cli-args';
import { loadConfig } from '../src/lib/config';
import { WebhookService } from '../src/lib/io';
import { createLogger } from '../src/lib/logger';
import { loadSkuRegistry } from '../src/lib/registry';
import { ReportRunService, summarizeChannelStatus } from '../src/lib/services';

const APP_DIR = resolve(__dirname, '..');

config({ path: resolve(APP_DIR, '.env.local') });
config({ path: resolve(APP_DIR, '.env') });

async function main() {
  const startTime = Date.now();
  const args = parseCliArgs(process.argv.slice(2));
  const appConfig = loadConfig(process.env, APP_DIR);
  const logger = createLogger('Recon', { level: appConfig.logLevel, filePath: appConfig.logFile });

  logger.info(`Run date ${args.runDate}${args.testMode ? ' (test mode)' : ''}`);

  const registry = await loadSkuRegistry(appConfig.skuMappingPath);
  logger.info(`Loaded ${registry.allMasterSkus().length} master SKUs from ${appConfig.skuMappingPath}`);

  const service = new ReportRunService({
    registry,
    config: appConfig,
    webhook: new WebhookService({
      url: appConfig.webhookUrl,
      timeoutMs: appConfig.webhookTimeoutMs,
      logger: logger.child('webhook'),
    }),
    logger,
  });

  const outcomes = await service.run(args.reports, { testMode: args.testMode, runDate: args.runDate });

  console.log('\n=== Source status ===');
  for (const status of summarizeChannelStatus(outcomes, registry.channelOrder())) {
    console.log(`  ${status.label}: ${status.latestDate ? formatDate(status.latestDate) : 'No data'}`);
  }

  console.log('\n=== Reports ===');
  for (const outcome of outcomes) {
    if (outcome.status === 'failed') {
      console.log(`  ${outcome.kind}: FAILED - ${outcome.error.message}`);
      continue;
    }
    console.log(`  ${outcome.headline}`);
    console.log(`    Saved: ${outcome.written.csvPath}`);
    const { diagnostics } = outcome.report;
    if (diagnostics.total > 0) {
      const counts = Object.entries(diagnostics.byKind)
        .filter(([, count]) => count > 0)
        .map(([kind, count]) => `${kind}=${formatCount(count)}`)
        .join(', ');
      console.log(`    Skipped: ${formatCount(diagnostics.total)} (${counts})`);
    }
    if (outcome.delivery && !outcome.delivery.success) {
      console.log(`    Delivery failed: ${outcome.delivery.error ?? 'unknown error'}`);
    }
  }

  console.log(`\nCompleted in ${formatDuration(Date.now() - startTime)}`);

  if (outcomes.some((outcome) => outcome.status === 'failed')) {
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('Fatal:', err);
  process.exit(1);
});
