export { buildRowSchema, collectViolations, validateReport } from './report-validator';
