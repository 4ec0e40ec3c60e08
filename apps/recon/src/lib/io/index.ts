export { discoverSourceFiles, parseSourceFilename, readSourceFile } from './source-files';
export { escapeCsvField, reportFileName, toCsv, writeReport } from './report-writer';
export { WebhookService, buildWebhookPayload } from './webhook.service';
export type { WriteReportOptions, WrittenReport } from './report-writer';
export type { WebhookPayload, WebhookSendResult, WebhookServiceOptions } from './webhook.service';
