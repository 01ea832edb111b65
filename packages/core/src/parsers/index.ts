export {
  parseTimestamp,
  fromDate,
  toDate,
  formatTimestamp,
  formatDay,
  formatMinute,
  formatCompact,
  displayDay,
  displayMinute,
} from './timestamp-parser.js';
export type { Timestamp } from './timestamp-parser.js';
export { parseCsv, escapeCsvField, formatCsvRow } from './csv-parser.js';
