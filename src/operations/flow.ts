import { assertTclWord } from '../tcl.js';
import { outcome } from './detail.js';
import type { OperationContext, OperationResult } from './types.js';

export interface RunStatus {
  runName: string;
  /** STATUS property, e.g. "synth_design Complete!" */
  status: string;
  /** PROGRESS property, e.g. "100%" */
  progress: string;
  succeeded: boolean;
  failed: boolean;
}

export interface FlowResult extends OperationResult {
  output: string;
  run?: RunStatus;
  note?: string;
}

export interface FlowOptions {
  jobs?: number;
  timeoutMs?: number;
}

/**
 * Ask the engine how a run actually ended
 *
 * Run output is full of error-like text from sub-tools, so the run's own
 * STATUS property decides success.
 */
export async function verifyRunStatus(ctx: OperationContext, runName: string): Promise<RunStatus> {
  assertTclWord(runName, 'run name');
  const statusTx = await ctx.runner.execute(`get_property STATUS [get_runs ${runName}]`);
  const progressTx = await ctx.runner.execute(`get_property PROGRESS [get_runs ${runName}]`);

  const status = statusTx.completion === 'prompt-matched' ? statusTx.output.trim() : 'unknown';
  const progress = progressTx.completion === 'prompt-matched' ? progressTx.output.trim() : 'unknown';
  const lower = status.toLowerCase();

  return {
    runName,
    status,
    progress,
    succeeded: lower.includes('complete'),
    failed: lower.includes('error'),
  };
}

function jobCount(ctx: OperationContext, options: FlowOptions): number {
  const jobs = options.jobs ?? ctx.config.flow.jobs;
  return Number.isInteger(jobs) && jobs > 0 ? jobs : ctx.config.flow.jobs;
}

async function runAndVerify(
  ctx: OperationContext,
  command: string,
  runName: string,
  timeoutMs: number
): Promise<FlowResult> {
  ctx.logger.info(`Starting ${runName}: ${command}`);
  const tx = await ctx.runner.execute(command, { timeoutMs });
  const run = await verifyRunStatus(ctx, runName);

  const result: FlowResult = {
    ...outcome(tx),
    success: run.succeeded,
    output: tx.output,
    run,
  };
  if (tx.completion === 'error-detected' && run.succeeded) {
    result.note = 'Output contained error-like lines but the run completed successfully';
  }
  if (tx.completion === 'timeout') {
    result.note = `No output for ${timeoutMs}ms; the run may still be going`;
  }
  ctx.logger.info(`${runName} finished: ${run.status} (${run.progress})`);
  return result;
}

export async function runSynthesis(ctx: OperationContext, options: FlowOptions = {}): Promise<FlowResult> {
  const jobs = jobCount(ctx, options);
  return runAndVerify(
    ctx,
    `reset_run synth_1; launch_runs synth_1 -jobs ${jobs}; wait_on_run synth_1`,
    'synth_1',
    options.timeoutMs ?? ctx.config.flow.synthesisTimeoutMs
  );
}

export async function runImplementation(ctx: OperationContext, options: FlowOptions = {}): Promise<FlowResult> {
  const jobs = jobCount(ctx, options);
  return runAndVerify(
    ctx,
    `launch_runs impl_1 -jobs ${jobs}; wait_on_run impl_1`,
    'impl_1',
    options.timeoutMs ?? ctx.config.flow.implementationTimeoutMs
  );
}

export async function generateBitstream(ctx: OperationContext, options: FlowOptions = {}): Promise<FlowResult> {
  return runAndVerify(
    ctx,
    'launch_runs impl_1 -to_step write_bitstream; wait_on_run impl_1',
    'impl_1',
    options.timeoutMs ?? ctx.config.flow.implementationTimeoutMs
  );
}
