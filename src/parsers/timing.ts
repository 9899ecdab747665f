import {
  columnNumber,
  labeledNumber,
  runExtractors,
  type FieldExtractor,
} from './extract.js';
import type { TimingField, TimingSummary } from './types.js';

/**
 * Slack-style number: `WNS(ns): -0.250` lines first, then the column of the
 * Design Timing Summary table
 */
function summaryNumber(field: TimingField, label: string, required = false): FieldExtractor<TimingField, number> {
  return {
    field,
    required,
    extract: (raw) => labeledNumber(raw, label) ?? columnNumber(raw, label),
  };
}

export const TIMING_SUMMARY_FIELDS: ReadonlyArray<FieldExtractor<TimingField, number>> = [
  summaryNumber('wns', 'WNS(ns)', true),
  summaryNumber('tns', 'TNS(ns)', true),
  summaryNumber('whs', 'WHS(ns)', true),
  summaryNumber('ths', 'THS(ns)', true),
  summaryNumber('wpws', 'WPWS(ns)'),
  summaryNumber('tpws', 'TPWS(ns)'),
  {
    field: 'failingEndpoints',
    extract: (raw) => {
      const column = columnNumber(raw, 'TNS Failing Endpoints');
      if (column !== undefined) {
        return column;
      }
      const match = /(\d+)\s+failing\s+endpoints?/i.exec(raw);
      return match?.[1] === undefined ? undefined : Number(match[1]);
    },
  },
  {
    field: 'totalEndpoints',
    extract: (raw) => columnNumber(raw, 'TNS Total Endpoints'),
  },
];

/**
 * Parse report_timing_summary output
 */
export function parseTimingSummary(raw: string): TimingSummary {
  const { values, missing } = runExtractors(raw, TIMING_SUMMARY_FIELDS);

  const summary: TimingSummary = {
    kind: 'timing-summary',
    raw,
    ...values,
    parseIncomplete: missing.length > 0,
    missingFields: missing,
  };

  if (values.wns !== undefined && values.whs !== undefined) {
    summary.met = values.wns >= 0 && values.whs >= 0;
  }

  return summary;
}
