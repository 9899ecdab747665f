export { parseTimingSummary, TIMING_SUMMARY_FIELDS } from './timing.js';
export { parseTimingPaths } from './timing-paths.js';
export { parseUtilization, parseModuleTable, UTILIZATION_FIELDS } from './utilization.js';
export { parseClocks } from './clocks.js';
export { parseObjectList, DEFAULT_ATTRIBUTES } from './objects.js';
export { parseMessages, parseMessageLine, filterBySeverity } from './messages.js';
export { parseReport, isReportKind, REPORT_PARSERS, REPORT_KINDS } from './registry.js';
export {
  runExtractors,
  parseNumber,
  labeledValue,
  columnValue,
  splitColumns,
  pipeTables,
  tokenizeTclList,
  type FieldExtractor,
} from './extract.js';
export type * from './types.js';
