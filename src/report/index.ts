/**
 * Report module.
 * Turns a RunSummary into the JSON contract and a markdown report.
 */

export {
  generateJSON,
  serializeJSON,
  generateMarkdown,
  writeReports,
  failureBreakdown,
} from './reporter.js';
export type { JsonOutput, JsonOutputTask, ReportPaths } from './reporter.js';
