import { parseTimingSummary } from './timing.js';
import { parseTimingPaths } from './timing-paths.js';
import { parseUtilization } from './utilization.js';
import { parseClocks } from './clocks.js';
import { parseObjectList } from './objects.js';
import { parseMessages } from './messages.js';
import type { ParsedReportMap, ReportKind } from './types.js';

type ParserTable = { [K in ReportKind]: (raw: string) => ParsedReportMap[K] };

/**
 * Report kind → parser
 */
export const REPORT_PARSERS: ParserTable = {
  'timing-summary': parseTimingSummary,
  'timing-paths': (raw) => parseTimingPaths(raw),
  utilization: parseUtilization,
  hierarchy: (raw) => parseObjectList('hierarchy', raw),
  clocks: parseClocks,
  ports: (raw) => parseObjectList('ports', raw),
  nets: (raw) => parseObjectList('nets', raw),
  cells: (raw) => parseObjectList('cells', raw),
  messages: parseMessages,
};

export const REPORT_KINDS = Object.keys(REPORT_PARSERS).filter(isReportKind);

export function isReportKind(value: string): value is ReportKind {
  return Object.prototype.hasOwnProperty.call(REPORT_PARSERS, value);
}

/**
 * Parse raw text as the given report kind; never throws
 */
export function parseReport<K extends ReportKind>(kind: K, raw: string): ParsedReportMap[K] {
  const parser: (raw: string) => ParsedReportMap[K] = REPORT_PARSERS[kind];
  return parser(raw);
}
