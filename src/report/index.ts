/**
 * Report generation module.
 * Turns run reports and recording listings into text and JSON output.
 */

export {
  generateRunJSON,
  generateRecordingsJSON,
  serializeJSON,
  formatRecordingsTable,
  formatRunSummary,
  formatReplaySummary,
  formatSize,
  JSON_OUTPUT_VERSION,
} from './reporter.js';
export type { RunJson, RecordingsJson } from './reporter.js';
