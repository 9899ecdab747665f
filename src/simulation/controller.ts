import { InvalidArgumentError, InvalidPhaseError, InvalidScopeError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { tokenizeTclList } from '../parsers/extract.js';
import { assertTclWord, tclQuote } from '../tcl.js';
import type { CommandRunner, Transaction } from '../session/types.js';
import { ZERO_TIME, formatTime, normalizeDuration, parseSimulationTime, type SimulationTime } from './time.js';
import type {
  Breakpoint,
  BreakpointCondition,
  ListResult,
  ObjectFilter,
  Radix,
  RestartResult,
  RunResult,
  SignalValue,
  SignalValues,
  SimulationMode,
  SimulationPhase,
  SimulationResult,
  SimulationSnapshot,
  WaveResult,
} from './types.js';

const MODE_ARGS: Record<SimulationMode, string> = {
  behavioral: '-mode behavioral',
  'post-synth-func': '-mode post-synthesis -type functional',
  'post-synth-timing': '-mode post-synthesis -type timing',
  'post-impl-func': '-mode post-implementation -type functional',
  'post-impl-timing': '-mode post-implementation -type timing',
};

const CONDITION_FLAGS: Record<BreakpointCondition, string> = {
  posedge: '-posedge ',
  negedge: '-negedge ',
  change: '',
};

const OBJECT_FILTERS: Record<ObjectFilter, string> = {
  all: '',
  signals: '-filter {TYPE == signal} ',
  ports: '-filter {TYPE == port} ',
  internal: '-filter {TYPE == signal && IS_PORT == false} ',
};

const RADIXES: readonly Radix[] = ['bin', 'oct', 'hex', 'dec', 'unsigned', 'ascii'];

const MAX_SIGNAL_READS = 50;

// xsim reports a breakpoint or $stop before handing back the prompt:
//   Stopped at time : 150 ns : File "/work/tb.v" Line 42
const STOPPED_PATTERN = /Stopped at time|\$stop called/i;
const NOT_FOUND_PATTERN = /no objects? found|not found|unable to find|does not exist|invalid (?:scope|object)/i;

const ACTIVE_PHASES: readonly SimulationPhase[] = ['running', 'paused'];

function breakpointKey(breakpoint: Breakpoint): string {
  return `${breakpoint.signal}\n${breakpoint.condition}`;
}

export function isSimulationMode(value: string): value is SimulationMode {
  return Object.prototype.hasOwnProperty.call(MODE_ARGS, value);
}

export function isBreakpointCondition(value: string): value is BreakpointCondition {
  return Object.prototype.hasOwnProperty.call(CONDITION_FLAGS, value);
}

export function isObjectFilter(value: string): value is ObjectFilter {
  return Object.prototype.hasOwnProperty.call(OBJECT_FILTERS, value);
}

export function isRadix(value: string): value is Radix {
  return RADIXES.some((radix) => radix === value);
}

export interface SimulationControllerOptions {
  /** Timeout for launch, run and restart, which can take minutes */
  runTimeoutMs: number;
  logger?: Logger;
}

/**
 * Simulation controller
 *
 * Tracks what the simulator cannot be asked for reliably (phase, time after
 * each command, top module, breakpoints set through this controller) and
 * rejects commands that make no sense in the current phase before anything
 * is sent.
 */
export class SimulationController {
  private phase: SimulationPhase = 'not-started';
  private currentTime: SimulationTime = ZERO_TIME;
  private mode: SimulationMode | undefined;
  private topModule: string | undefined;
  private fileset = 'sim_1';
  private scope: string | undefined;
  // One entry per signal and condition, as the engine keeps them
  private breakpoints = new Map<string, Breakpoint>();
  private readonly logger: Logger;

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: SimulationControllerOptions
  ) {
    this.logger = options.logger ?? createLogger('simulation');
  }

  state(): SimulationSnapshot {
    const snapshot: SimulationSnapshot = {
      phase: this.phase,
      currentTime: { ...this.currentTime },
      time: formatTime(this.currentTime),
      fileset: this.fileset,
      breakpoints: this.listBreakpoints(),
    };
    if (this.mode) {
      snapshot.mode = this.mode;
    }
    if (this.topModule) {
      snapshot.topModule = this.topModule;
    }
    if (this.scope) {
      snapshot.scope = this.scope;
    }
    return snapshot;
  }

  /**
   * Forget everything; used when the engine session restarts or fails
   */
  reset(): void {
    if (this.phase !== 'not-started') {
      this.logger.info('Engine session ended, simulation state reset');
    }
    this.phase = 'not-started';
    this.currentTime = ZERO_TIME;
    this.mode = undefined;
    this.topModule = undefined;
    this.fileset = 'sim_1';
    this.scope = undefined;
    this.breakpoints.clear();
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Launch the simulator; optionally set the simulation top first
   */
  async launch(mode: SimulationMode = 'behavioral', topModule?: string, fileset?: string): Promise<SimulationResult> {
    if (this.phase !== 'not-started' && this.phase !== 'closed') {
      throw new InvalidPhaseError('launch', this.phase);
    }
    if (!Object.prototype.hasOwnProperty.call(MODE_ARGS, mode)) {
      throw new InvalidArgumentError(`Unknown simulation mode '${mode}'`);
    }

    const startTime = Date.now();
    if (topModule) {
      const top = await this.setTop(topModule, fileset);
      if (!top.success) {
        return top;
      }
    }

    this.logger.info(`Launching ${mode} simulation${this.topModule ? ` of ${this.topModule}` : ''}`);
    const tx = await this.runner.execute(`launch_simulation ${MODE_ARGS[mode]}`, {
      timeoutMs: this.options.runTimeoutMs,
    });

    if (tx.completion === 'prompt-matched') {
      this.phase = 'running';
      this.currentTime = ZERO_TIME;
      this.mode = mode;
      this.scope = undefined;
    }
    return this.result(tx, startTime);
  }

  /**
   * Advance simulation time
   * @param duration - e.g. "100ns", or "forever"/"all" to run until the testbench stops
   */
  async run(duration: string = '100ns'): Promise<RunResult> {
    this.requireActive('run');
    const forever = /^(?:forever|all)$/i.test(duration.trim());
    const command = forever ? 'run -all' : `run ${normalizeDuration(duration)}`;
    return this.advance(command);
  }

  /**
   * Step the simulation; the simulator stops after the step
   */
  async step(count: number = 1): Promise<RunResult> {
    this.requireActive('step');
    if (!Number.isInteger(count) || count < 1) {
      throw new InvalidArgumentError(`Step count must be a positive integer, got ${count}`);
    }
    const result = await this.advance(`step ${count}`);
    if (result.success) {
      this.phase = 'paused';
      result.state = this.state();
    }
    return result;
  }

  /**
   * Back to time 0 with the same top module and breakpoints
   * A closed simulation is launched again in its previous mode.
   */
  async restart(): Promise<RestartResult> {
    if (this.phase === 'not-started') {
      throw new InvalidPhaseError('restart', this.phase);
    }
    const startTime = Date.now();
    const tracked = this.listBreakpoints();

    let base: SimulationResult;
    if (this.phase === 'closed') {
      base = await this.launch(this.mode ?? 'behavioral');
    } else {
      const tx = await this.runner.execute('restart', { timeoutMs: this.options.runTimeoutMs });
      if (tx.completion === 'prompt-matched') {
        this.phase = 'running';
        this.currentTime = ZERO_TIME;
      }
      base = this.result(tx, startTime);
    }

    if (!base.success) {
      return { ...base, reappliedBreakpoints: [], failedBreakpoints: tracked };
    }

    const reapplied: Breakpoint[] = [];
    const failed: Breakpoint[] = [];
    if (tracked.length > 0) {
      // Clear whatever survived so re-adding does not double up
      await this.runner.execute('remove_bps -all');
      for (const breakpoint of tracked) {
        const tx = await this.runner.execute(this.breakpointCommand(breakpoint.signal, breakpoint.condition));
        if (tx.completion === 'prompt-matched') {
          reapplied.push(breakpoint);
        } else {
          failed.push(breakpoint);
          this.breakpoints.delete(breakpointKey(breakpoint));
        }
      }
      if (failed.length > 0) {
        this.logger.warn(`${failed.length} breakpoint(s) could not be re-applied after restart`);
      }
    }

    return {
      ...base,
      elapsedMs: Date.now() - startTime,
      state: this.state(),
      reappliedBreakpoints: reapplied,
      failedBreakpoints: failed,
    };
  }

  /**
   * Close the simulator; time, scope and breakpoints go with it
   */
  async close(): Promise<SimulationResult> {
    const startTime = Date.now();

    if (this.phase === 'not-started' || this.phase === 'closed') {
      this.markClosed();
      return { success: true, output: '', elapsedMs: 0, state: this.state() };
    }

    const tx = await this.runner.execute('close_sim', { timeoutMs: this.options.runTimeoutMs });
    // An engine error here means there was no simulation left to close
    if (tx.completion === 'prompt-matched' || tx.completion === 'error-detected') {
      this.markClosed();
    }
    return this.result(tx, startTime);
  }

  // ============================================================================
  // Signals
  // ============================================================================

  async getSignalValue(signal: string, radix: Radix = 'hex'): Promise<SignalValue> {
    this.requireActive('read signals');
    this.checkRadix(radix);

    const tx = await this.runner.execute(`get_value -radix ${radix} ${tclQuote(signal)}`);
    const value = tx.output.trim();
    if (tx.completion !== 'prompt-matched' || !value) {
      throw new InvalidScopeError(signal, tx.errors[0] ?? this.notFoundDetail(tx));
    }
    return { signal, value, radix, elapsedMs: tx.elapsedMs };
  }

  /**
   * Read every signal and port matching a pattern (first 50 only)
   */
  async getSignalValues(pattern: string = '/*', radix: Radix = 'hex'): Promise<SignalValues> {
    this.requireActive('read signals');
    this.checkRadix(radix);
    const startTime = Date.now();

    const tx = await this.runner.execute(
      `get_objects -filter {TYPE == signal || TYPE == port} ${tclQuote(pattern)}`
    );
    const signals = tx.completion === 'prompt-matched' ? tokenizeTclList(tx.output) : [];
    if (signals.length === 0) {
      throw new InvalidScopeError(pattern, tx.errors[0] ?? 'no signals matched');
    }

    const values: Record<string, string> = {};
    for (const signal of signals.slice(0, MAX_SIGNAL_READS)) {
      const read = await this.runner.execute(`get_value -radix ${radix} ${tclQuote(signal)}`);
      if (read.completion === 'prompt-matched') {
        values[signal] = read.output.trim();
      }
    }

    return {
      values,
      radix,
      matched: signals.length,
      truncated: signals.length > MAX_SIGNAL_READS,
      elapsedMs: Date.now() - startTime,
    };
  }

  async addToWave(signals: string[]): Promise<WaveResult> {
    this.requireActive('add waves');
    const results: WaveResult['results'] = [];

    for (const signal of signals) {
      const tx = await this.runner.execute(`add_wave ${tclQuote(signal)}`);
      if (tx.completion === 'prompt-matched') {
        results.push({ signal, success: true });
      } else {
        results.push({ signal, success: false, error: tx.errors[0] ?? tx.output });
      }
    }

    return { success: results.every((entry) => entry.success), results };
  }

  // ============================================================================
  // Breakpoints
  // ============================================================================

  async addBreakpoint(signal: string, condition: BreakpointCondition = 'change'): Promise<SimulationResult> {
    this.requireActive('add breakpoints');
    if (!Object.prototype.hasOwnProperty.call(CONDITION_FLAGS, condition)) {
      throw new InvalidArgumentError(`Unknown breakpoint condition '${condition}'`);
    }
    const startTime = Date.now();

    const tx = await this.runner.execute(this.breakpointCommand(signal, condition));
    if (tx.completion === 'prompt-matched') {
      this.breakpoints.set(breakpointKey({ signal, condition }), { signal, condition });
    }
    return this.result(tx, startTime);
  }

  async removeBreakpoints(): Promise<SimulationResult> {
    this.requireActive('remove breakpoints');
    const startTime = Date.now();

    const tx = await this.runner.execute('remove_bps -all');
    if (tx.completion === 'prompt-matched') {
      this.breakpoints.clear();
    }
    return this.result(tx, startTime);
  }

  // ============================================================================
  // Queries
  // ============================================================================

  async getTime(): Promise<SimulationTime> {
    this.requireActive('read the time');
    await this.refreshTime();
    return { ...this.currentTime };
  }

  async setScope(scope: string): Promise<SimulationResult> {
    this.requireActive('change scope');
    const startTime = Date.now();

    const tx = await this.runner.execute(`current_scope ${tclQuote(scope)}`);
    if (tx.completion === 'error-detected') {
      throw new InvalidScopeError(scope, tx.errors[0]);
    }
    if (tx.completion === 'prompt-matched') {
      this.scope = scope;
    }
    return this.result(tx, startTime);
  }

  async getScopes(parent: string = '/'): Promise<ListResult> {
    this.requireActive('list scopes');
    return this.list(`get_scopes ${tclQuote(childPattern(parent))}`);
  }

  async getObjects(scope: string = '/', filter: ObjectFilter = 'all'): Promise<ListResult> {
    this.requireActive('list objects');
    if (!Object.prototype.hasOwnProperty.call(OBJECT_FILTERS, filter)) {
      throw new InvalidArgumentError(`Unknown object filter '${filter}'`);
    }
    return this.list(`get_objects ${OBJECT_FILTERS[filter]}${tclQuote(childPattern(scope))}`);
  }

  /**
   * Set the top module of a simulation fileset; allowed in any phase
   */
  async setTop(topModule: string, fileset: string = this.fileset): Promise<SimulationResult> {
    assertTclWord(fileset, 'fileset');
    const startTime = Date.now();

    const tx = await this.runner.execute(`set_property top ${tclQuote(topModule)} [get_filesets ${fileset}]`);
    if (tx.completion === 'prompt-matched') {
      this.topModule = topModule;
      this.fileset = fileset;
    }
    return this.result(tx, startTime);
  }

  /**
   * Message counts, optionally for one severity
   */
  async getMessages(severity?: string): Promise<SimulationResult> {
    const startTime = Date.now();
    const command =
      severity && severity !== 'all'
        ? `get_msg_config -count -severity ${tclQuote(severity)}`
        : 'get_msg_config -count';
    const tx = await this.runner.execute(command);
    return this.result(tx, startTime);
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private async advance(command: string): Promise<RunResult> {
    const startTime = Date.now();
    const tx = await this.runner.execute(command, { timeoutMs: this.options.runTimeoutMs });

    if (tx.completion === 'timeout' || tx.completion === 'process-exited') {
      return { ...this.result(tx, startTime), stoppedAtBreakpoint: false };
    }

    const stoppedAtBreakpoint = STOPPED_PATTERN.test(tx.output);
    if (tx.completion === 'prompt-matched') {
      this.phase = stoppedAtBreakpoint ? 'paused' : 'running';
    }
    await this.refreshTime();

    return {
      ...this.result(tx, startTime),
      elapsedMs: Date.now() - startTime,
      stoppedAtBreakpoint,
    };
  }

  private async refreshTime(): Promise<void> {
    const tx = await this.runner.execute('current_time');
    const time = tx.completion === 'prompt-matched' ? parseSimulationTime(tx.output) : undefined;
    if (time) {
      this.currentTime = time;
    } else {
      this.logger.warn(`Could not read simulation time from '${tx.output}'`);
    }
  }

  private async list(command: string): Promise<ListResult> {
    const tx = await this.runner.execute(command);
    const items = tx.completion === 'prompt-matched' ? tokenizeTclList(tx.output) : [];
    return {
      success: tx.completion === 'prompt-matched',
      items,
      count: items.length,
      elapsedMs: tx.elapsedMs,
    };
  }

  private breakpointCommand(signal: string, condition: BreakpointCondition): string {
    return `add_bp ${CONDITION_FLAGS[condition]}${tclQuote(signal)}`;
  }

  private markClosed(): void {
    this.phase = 'closed';
    this.currentTime = ZERO_TIME;
    this.scope = undefined;
    this.breakpoints.clear();
  }

  private listBreakpoints(): Breakpoint[] {
    return [...this.breakpoints.values()].map((breakpoint) => ({ ...breakpoint }));
  }

  private requireActive(operation: string): void {
    if (!ACTIVE_PHASES.includes(this.phase)) {
      throw new InvalidPhaseError(operation, this.phase);
    }
  }

  private checkRadix(radix: Radix): void {
    if (!RADIXES.includes(radix)) {
      throw new InvalidArgumentError(`Unknown radix '${radix}'; expected one of ${RADIXES.join(', ')}`);
    }
  }

  private notFoundDetail(tx: Transaction): string | undefined {
    return NOT_FOUND_PATTERN.test(tx.output) ? tx.output.split('\n')[0] : undefined;
  }

  private result(tx: Transaction, startTime: number): SimulationResult {
    const result: SimulationResult = {
      success: tx.completion === 'prompt-matched',
      output: tx.output,
      elapsedMs: Date.now() - startTime,
      state: this.state(),
    };
    if (tx.errors.length > 0) {
      result.errors = tx.errors;
    }
    return result;
  }
}

function childPattern(parent: string): string {
  return parent.endsWith('/') ? `${parent}*` : `${parent}/*`;
}
