import type { CommandHandler, FakeReply } from './fake-engine.js';

/**
 * Small model of the simulator behind the Tcl console
 *
 * Knows a fixed set of signals, keeps time in ns, stops a run at `stopAtNs`
 * when any breakpoint is set, and forgets breakpoints on close_sim (restart
 * keeps them, like the real simulator).
 */
export interface FakeSimulatorOptions {
  signals?: Record<string, string>;
  scopes?: string[];
  /** Time at which a set breakpoint fires */
  stopAtNs?: number;
  /** Time at which the testbench calls $finish under run -all */
  finishAtNs?: number;
}

export class FakeSimulator {
  launched = false;
  timeNs = 0;
  top: string | undefined;
  readonly breakpoints: string[] = [];
  readonly signals: Record<string, string>;
  private readonly scopes: string[];
  private readonly stopAtNs: number;
  private readonly finishAtNs: number;
  private nextBreakpoint = 1;

  constructor(options: FakeSimulatorOptions = {}) {
    this.signals = options.signals ?? { '/tb/clk': '1', '/tb/rst': '0', '/tb/count': '2a' };
    this.scopes = options.scopes ?? ['/tb', '/tb/dut'];
    this.stopAtNs = options.stopAtNs ?? 150;
    this.finishAtNs = options.finishAtNs ?? 1000;
  }

  readonly handler: CommandHandler = (command) => this.handle(command);

  private handle(command: string): FakeReply | string | undefined {
    let match = /^set_property top \{(\S+)\} \[get_filesets (\S+)\]$/.exec(command);
    if (match) {
      this.top = match[1];
      return '';
    }

    if (command.startsWith('launch_simulation')) {
      this.launched = true;
      this.timeNs = 0;
      return `INFO: [Vivado 12-5682] Launching behavioral simulation in '/work/sim'\nINFO: [USF-XSim-96] XSim completed. Design snapshot '${this.top ?? 'tb'}_behav' loaded.`;
    }

    if (command === 'close_sim') {
      if (!this.launched) {
        return 'ERROR: [Vivado 12-2391] No open simulation to close.';
      }
      this.launched = false;
      this.timeNs = 0;
      this.breakpoints.length = 0;
      return '';
    }

    if (!this.launched) {
      return undefined;
    }

    if (command === 'current_time') {
      return `${this.timeNs} ns`;
    }

    if (command === 'restart') {
      this.timeNs = 0;
      return 'INFO: [Simtcl 6-17] Simulation restarted';
    }

    match = /^run (\d+)ns$/.exec(command);
    if (match) {
      return this.advance(this.timeNs + Number(match[1]));
    }
    if (command === 'run -all') {
      return this.advance(this.finishAtNs, true);
    }

    match = /^step (\d+)$/.exec(command);
    if (match) {
      this.timeNs += Number(match[1]);
      return `Stopped at time : ${this.timeNs} ns : File "/work/tb.v" Line 12`;
    }

    match = /^add_bp (?:-posedge |-negedge )?\{(\S+)\}$/.exec(command);
    if (match) {
      const signal = match[1] ?? '';
      if (!(signal in this.signals)) {
        return `ERROR: [Simtcl 6-26] Object not found: ${signal}`;
      }
      this.breakpoints.push(signal);
      return `bp_${this.nextBreakpoint++}`;
    }

    if (command === 'remove_bps -all') {
      this.breakpoints.length = 0;
      return '';
    }

    match = /^get_value -radix (\w+) \{(\S+)\}$/.exec(command);
    if (match) {
      const value = this.signals[match[2] ?? ''];
      return value ?? `ERROR: [Simtcl 6-26] Object not found: ${match[2]}`;
    }

    match = /^get_objects -filter \{TYPE == signal \|\| TYPE == port\} \{(\S+)\}$/.exec(command);
    if (match) {
      return this.matching(match[1] ?? '').join(' ');
    }

    match = /^get_objects (?:-filter \{[^}]*\} )?\{(\S+)\}$/.exec(command);
    if (match) {
      return this.matching(match[1] ?? '').join(' ');
    }

    match = /^get_scopes \{(\S+)\}$/.exec(command);
    if (match) {
      const prefix = (match[1] ?? '').replace(/\*$/, '');
      return this.scopes.filter((scope) => scope.startsWith(prefix)).join(' ');
    }

    match = /^current_scope \{(\S+)\}$/.exec(command);
    if (match) {
      const scope = match[1] ?? '';
      return this.scopes.includes(scope) || scope === '/' ? scope : `ERROR: [Simtcl 6-27] Scope not found: ${scope}`;
    }

    match = /^add_wave \{(\S+)\}$/.exec(command);
    if (match) {
      const signal = match[1] ?? '';
      return signal in this.signals ? signal : `ERROR: [Wavedata 42-471] No objects found for ${signal}`;
    }

    return undefined;
  }

  private advance(targetNs: number, untilFinish: boolean = false): string {
    if (this.breakpoints.length > 0 && this.timeNs < this.stopAtNs && targetNs >= this.stopAtNs) {
      this.timeNs = this.stopAtNs;
      return `Stopped at time : ${this.stopAtNs} ns : File "/work/tb.v" Line 42`;
    }
    this.timeNs = targetNs;
    return untilFinish ? `$finish called at time : ${targetNs} ns : File "/work/tb.v" Line 60` : '';
  }

  private matching(pattern: string): string[] {
    const prefix = pattern.replace(/\*$/, '');
    return Object.keys(this.signals).filter((signal) => signal.startsWith(prefix));
  }
}
