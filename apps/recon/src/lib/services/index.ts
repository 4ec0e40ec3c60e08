export { ReportRunService, summarizeChannelStatus } from './report-run.service';
export type {
  ChannelStatus,
  ReportRunConfig,
  ReportRunFailure,
  ReportRunOutcome,
  ReportRunServiceDeps,
  ReportRunSuccess,
  RunOptions,
} from './report-run.service';
