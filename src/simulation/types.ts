import type { SimulationTime } from './time.js';

export type SimulationPhase = 'not-started' | 'running' | 'paused' | 'closed';

export type SimulationMode =
  | 'behavioral'
  | 'post-synth-func'
  | 'post-synth-timing'
  | 'post-impl-func'
  | 'post-impl-timing';

export type BreakpointCondition = 'posedge' | 'negedge' | 'change';

export type Radix = 'bin' | 'oct' | 'hex' | 'dec' | 'unsigned' | 'ascii';

export type ObjectFilter = 'all' | 'signals' | 'ports' | 'internal';

export interface Breakpoint {
  signal: string;
  condition: BreakpointCondition;
}


export interface SimulationSnapshot {
  phase: SimulationPhase;
  currentTime: SimulationTime;
  /** currentTime rendered as "<value> <unit>" */
  time: string;
  mode?: SimulationMode;
  topModule?: string;
  fileset: string;
  scope?: string;
  breakpoints: Breakpoint[];
}

export interface SimulationResult {
  success: boolean;
  output: string;
  elapsedMs: number;
  state: SimulationSnapshot;
  /** Engine error lines, when the command was rejected */
  errors?: string[];
}

export interface RunResult extends SimulationResult {
  /** Stopped at a breakpoint or $stop before the requested time */
  stoppedAtBreakpoint: boolean;
}

export interface RestartResult extends SimulationResult {
  reappliedBreakpoints: Breakpoint[];
  failedBreakpoints: Breakpoint[];
}

export interface SignalValue {
  signal: string;
  value: string;
  radix: Radix;
  elapsedMs: number;
}

export interface SignalValues {
  values: Record<string, string>;
  radix: Radix;
  /** Number of matching signals, including any beyond the read limit */
  matched: number;
  truncated: boolean;
  elapsedMs: number;
}

export interface ListResult {
  success: boolean;
  items: string[];
  count: number;
  elapsedMs: number;
}

export interface WaveResult {
  success: boolean;
  results: Array<{ signal: string; success: boolean; error?: string }>;
}
