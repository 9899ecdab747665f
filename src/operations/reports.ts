import { InvalidArgumentError } from '../errors.js';
import type { LineWindow, ReportArtifact, ReportRef, ReportSection } from '../reports/store.js';
import { assertTclWord } from '../tcl.js';
import type { OperationContext, OperationResult } from './types.js';

const REPORT_COMMANDS: Record<string, string> = {
  timing: 'report_timing -max_paths 100',
  timing_summary: 'report_timing_summary',
  utilization: 'report_utilization',
  hierarchy: 'report_hierarchy',
  clocks: 'report_clocks',
  power: 'report_power',
  drc: 'report_drc',
};

export interface FullReportOptions {
  /** Write here instead of the reports directory */
  destinationPath?: string;
  /** utilization only */
  hierarchical?: boolean;
  /** timing only */
  numPaths?: number;
}

export interface GeneratedReport extends OperationResult {
  reportType: string;
  artifact?: ReportArtifact;
  error?: string;
}

/**
 * Command for a report type; unknown types map to report_<type>
 */
export function reportCommand(reportType: string, options: FullReportOptions = {}): string {
  assertTclWord(reportType, 'report type');
  let command = REPORT_COMMANDS[reportType] ?? `report_${reportType}`;

  if (reportType === 'utilization' && options.hierarchical) {
    command += ' -hierarchical';
  }
  if (reportType === 'timing' && options.numPaths !== undefined) {
    if (!Number.isInteger(options.numPaths) || options.numPaths < 1) {
      throw new InvalidArgumentError(`numPaths must be a positive integer, got ${options.numPaths}`);
    }
    command = command.replace('-max_paths 100', `-max_paths ${options.numPaths}`);
  }
  return command;
}

/**
 * Write a complete report to disk; only its location and size come back
 */
export async function generateFullReport(
  ctx: OperationContext,
  reportType: string = 'timing',
  options: FullReportOptions = {}
): Promise<GeneratedReport> {
  const command = reportCommand(reportType, options);
  const generated = await ctx.store.generateFullReport(ctx.runner, command, {
    reportType,
    ...(options.destinationPath ? { destinationPath: options.destinationPath } : {}),
  });

  const result: GeneratedReport = {
    success: generated.success,
    elapsedMs: generated.elapsedMs,
    reportType,
  };
  if (generated.artifact) {
    result.artifact = generated.artifact;
  }
  if (generated.error) {
    result.error = generated.error;
  }
  return result;
}

export interface ReadReportOptions {
  startLine?: number;
  numLines?: number;
  searchPattern?: string;
}

/**
 * Window of lines from a report, by id or path
 */
export async function readReportLines(
  ctx: OperationContext,
  ref: ReportRef,
  options: ReadReportOptions = {}
): Promise<LineWindow> {
  return ctx.store.readReportLines(ref, options);
}

/**
 * Character range of a report, by id or path
 */
export async function readReportSection(
  ctx: OperationContext,
  ref: ReportRef,
  offset: number,
  length: number
): Promise<ReportSection> {
  const filePath = await ctx.store.resolve(ref);
  return ctx.store.readReportSection(filePath, offset, length);
}
