import { InvalidArgumentError } from '../errors.js';
import { parseClocks } from '../parsers/clocks.js';
import { filterBySeverity, parseMessages } from '../parsers/messages.js';
import { parseTimingSummary } from '../parsers/timing.js';
import { parseTimingPaths } from '../parsers/timing-paths.js';
import { parseModuleTable, parseUtilization } from '../parsers/utilization.js';
import type {
  ClockList,
  EngineMessage,
  ModuleUtilization,
  ResourceKind,
  Severity,
  TimingPath,
  TimingSummary,
  Utilization,
} from '../parsers/types.js';
import { assertTclWord, tclQuote } from '../tcl.js';
import { attachRaw, outcome, withoutRaw } from './detail.js';
import type { DetailLevel, OperationContext, OperationResult, RawDetail } from './types.js';

const RESOURCE_KINDS: readonly ResourceKind[] = ['lut', 'ff', 'bram', 'dsp', 'io'];
const SEVERITIES: readonly Severity[] = ['error', 'critical-warning', 'warning', 'info'];

// ============================================================================
// Timing
// ============================================================================

export interface TimingSummaryResult extends OperationResult, RawDetail {
  timing: Omit<TimingSummary, 'raw'>;
}

export async function getTimingSummary(
  ctx: OperationContext,
  options: { detailLevel?: DetailLevel } = {}
): Promise<TimingSummaryResult> {
  const tx = await ctx.runner.execute('report_timing_summary -no_header -return_string');
  const parsed = parseTimingSummary(tx.output);
  return {
    ...outcome(tx),
    timing: withoutRaw(parsed),
    ...(await attachRaw(ctx, tx.output, options.detailLevel ?? 'summary', 'timing_summary')),
  };
}

export interface TimingPathOptions {
  /** setup checks max delay, hold checks min delay */
  pathType?: 'setup' | 'hold';
  numPaths?: number;
  /** Only paths with slack below this; 0 means failing paths */
  slackThreshold?: number;
  from?: string;
  to?: string;
  through?: string;
  clock?: string;
  detailLevel?: DetailLevel;
}

export interface TimingPathsResult extends OperationResult, RawDetail {
  filters: Omit<TimingPathOptions, 'detailLevel'>;
  paths: TimingPath[];
  pathCount: number;
  error?: string;
}

export function timingPathsCommand(options: TimingPathOptions): string {
  const numPaths = options.numPaths ?? 10;
  const slack = options.slackThreshold ?? 0;
  if (!Number.isInteger(numPaths) || numPaths < 1) {
    throw new InvalidArgumentError(`numPaths must be a positive integer, got ${numPaths}`);
  }
  if (!Number.isFinite(slack)) {
    throw new InvalidArgumentError(`slackThreshold must be a number, got ${slack}`);
  }

  const delayType = (options.pathType ?? 'setup') === 'setup' ? 'max' : 'min';
  const parts = [`report_timing -delay_type ${delayType} -max_paths ${numPaths} -slack_lesser_than ${slack}`];
  if (options.from) {
    parts.push(`-from ${tclQuote(options.from)}`);
  }
  if (options.to) {
    parts.push(`-to ${tclQuote(options.to)}`);
  }
  if (options.through) {
    parts.push(`-through ${tclQuote(options.through)}`);
  }
  if (options.clock) {
    parts.push(`-filter {CLOCK == ${assertTclWord(options.clock, 'clock name')}}`);
  }
  parts.push('-return_string');
  return parts.join(' ');
}

export async function getTimingPaths(
  ctx: OperationContext,
  options: TimingPathOptions = {}
): Promise<TimingPathsResult> {
  const { detailLevel = 'summary', ...filters } = options;
  const command = timingPathsCommand(options);
  const tx = await ctx.runner.execute(command);
  const base = outcome(tx);

  if (!base.success) {
    return { ...base, filters, paths: [], pathCount: 0, error: tx.output };
  }

  const parsed = parseTimingPaths(tx.output, options.numPaths ?? 10);
  return {
    ...base,
    filters,
    paths: parsed.paths,
    pathCount: parsed.paths.length,
    ...(await attachRaw(ctx, tx.output, detailLevel, 'timing_paths')),
  };
}

// ============================================================================
// Utilization
// ============================================================================

export interface UtilizationOptions {
  hierarchical?: boolean;
  /** Instance pattern for the hierarchical table */
  moduleFilter?: string;
  /** Flag resources whose utilization is below this percentage */
  thresholdPercent?: number;
  detailLevel?: DetailLevel;
}

export interface UtilizationResult extends OperationResult, RawDetail {
  utilization: Omit<Utilization, 'raw'>;
  belowThreshold?: ResourceKind[];
}

export async function getUtilization(
  ctx: OperationContext,
  options: UtilizationOptions = {}
): Promise<UtilizationResult> {
  const startTime = Date.now();
  const tx = await ctx.runner.execute('report_utilization -return_string');
  const parsed = parseUtilization(tx.output);
  const base = outcome(tx);
  let raw = tx.output;

  // The flat report has the totals, the hierarchical one the per-instance rows
  if (options.hierarchical) {
    const pattern = options.moduleFilter ? ` -hierarchical_pattern ${tclQuote(options.moduleFilter)}` : '';
    const hierTx = await ctx.runner.execute(`report_utilization -hierarchical${pattern} -return_string`);
    const modules: ModuleUtilization[] = parseModuleTable(hierTx.output);
    if (modules.length > 0) {
      parsed.modules = modules;
    }
    if (hierTx.completion !== 'prompt-matched') {
      base.success = false;
      base.errors = [...(base.errors ?? []), ...hierTx.errors];
    }
    raw = `${raw}\n\n${hierTx.output}`;
  }

  const result: UtilizationResult = {
    ...base,
    elapsedMs: Date.now() - startTime,
    utilization: withoutRaw(parsed),
    ...(await attachRaw(ctx, raw, options.detailLevel ?? 'summary', 'utilization')),
  };

  const threshold = options.thresholdPercent;
  if (threshold !== undefined) {
    result.belowThreshold = RESOURCE_KINDS.filter((kind) => {
      const usage = parsed[kind];
      return usage !== undefined && usage.percent < threshold;
    });
  }
  return result;
}

// ============================================================================
// Clocks and messages
// ============================================================================

export interface ClocksResult extends OperationResult, RawDetail {
  clocks: Omit<ClockList, 'raw'>;
}

export async function getClocks(
  ctx: OperationContext,
  options: { detailLevel?: DetailLevel } = {}
): Promise<ClocksResult> {
  const tx = await ctx.runner.execute('report_clocks -return_string');
  return {
    ...outcome(tx),
    clocks: withoutRaw(parseClocks(tx.output)),
    ...(await attachRaw(ctx, tx.output, options.detailLevel ?? 'summary', 'clocks')),
  };
}

export type SeverityFilter = Severity | 'all';

export interface MessagesResult extends OperationResult, RawDetail {
  severity: SeverityFilter;
  messages: EngineMessage[];
  counts: Record<Severity, number>;
}

export function isSeverityFilter(value: string): value is SeverityFilter {
  return value === 'all' || SEVERITIES.some((severity) => severity === value);
}

export async function getMessages(
  ctx: OperationContext,
  options: { severity?: SeverityFilter; detailLevel?: DetailLevel } = {}
): Promise<MessagesResult> {
  const severity = options.severity ?? 'all';
  if (!isSeverityFilter(severity)) {
    throw new InvalidArgumentError(`Unknown severity '${severity}'; expected all or ${SEVERITIES.join(', ')}`);
  }

  const tx = await ctx.runner.execute('get_msg_config -rules');
  const parsed = parseMessages(tx.output);
  return {
    ...outcome(tx),
    // Listed ERROR lines are the payload here, not a failure of the query
    success: tx.completion === 'prompt-matched' || tx.completion === 'error-detected',
    severity,
    messages: severity === 'all' ? parsed.messages : filterBySeverity(parsed, [severity]),
    counts: parsed.counts,
    ...(await attachRaw(ctx, tx.output, options.detailLevel ?? 'summary', 'messages')),
  };
}
