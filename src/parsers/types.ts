/**
 * Parsed report types
 *
 * Every parsed report keeps the raw text. Fields the parser could not find are
 * left out, and a missing required field sets `parseIncomplete`.
 */

export type ReportKind =
  | 'timing-summary'
  | 'timing-paths'
  | 'utilization'
  | 'hierarchy'
  | 'clocks'
  | 'ports'
  | 'nets'
  | 'cells'
  | 'messages';

export interface ParsedBase<K extends ReportKind> {
  kind: K;
  raw: string;
  parseIncomplete: boolean;
  missingFields: string[];
}

// ============================================================================
// Timing
// ============================================================================

export type TimingField =
  | 'wns'
  | 'tns'
  | 'whs'
  | 'ths'
  | 'wpws'
  | 'tpws'
  | 'failingEndpoints'
  | 'totalEndpoints';

export type TimingSummary = ParsedBase<'timing-summary'> &
  Partial<Record<TimingField, number>> & {
    /** Setup and hold both non-negative; only present when both are known */
    met?: boolean;
  };

export interface TimingPath {
  slack?: number;
  /** MET or VIOLATED, as printed next to the slack */
  status?: string;
  source?: string;
  destination?: string;
  sourceClock?: string;
  destinationClock?: string;
  pathGroup?: string;
  pathType?: string;
  requirement?: number;
  dataPathDelay?: number;
  logicLevels?: number;
}

export type TimingPaths = ParsedBase<'timing-paths'> & {
  paths: TimingPath[];
};

// ============================================================================
// Utilization
// ============================================================================

export type ResourceKind = 'lut' | 'ff' | 'bram' | 'dsp' | 'io';

export interface ResourceUsage {
  used: number;
  available: number;
  percent: number;
}

export interface ModuleUtilization {
  instance: string;
  module: string;
  /** 0 for the top instance */
  depth: number;
  /** Column header → count, e.g. "Total LUTs" → 1234 */
  resources: Record<string, number>;
}

export type Utilization = ParsedBase<'utilization'> &
  Partial<Record<ResourceKind, ResourceUsage>> & {
    /** Rows of a hierarchical utilization table, when present */
    modules?: ModuleUtilization[];
  };

// ============================================================================
// Clocks
// ============================================================================

export interface Clock {
  name: string;
  periodNs?: number;
  waveform?: [number, number];
  frequencyMhz?: number;
  attributes?: string[];
  sources?: string[];
}

export type ClockList = ParsedBase<'clocks'> & {
  clocks: Clock[];
};

// ============================================================================
// Design objects
// ============================================================================

export type ObjectType = 'instance' | 'port' | 'net' | 'cell';

export interface DesignObject {
  name: string;
  type: ObjectType;
  /** Extra columns of `name|attr|...` rows, keyed by property name */
  attributes: Record<string, string>;
  /** Bus width when several `name[i]` bits were grouped */
  width?: number;
  range?: { msb: number; lsb: number };
  direction?: string;
  refName?: string;
  /** Hierarchy depth (number of `/` separators) */
  depth?: number;
}

export type ObjectListKind = 'hierarchy' | 'ports' | 'nets' | 'cells';

export type ObjectList<K extends ObjectListKind> = ParsedBase<K> & {
  objects: DesignObject[];
};

// ============================================================================
// Messages
// ============================================================================

export type Severity = 'error' | 'critical-warning' | 'warning' | 'info';

export interface EngineMessage {
  severity: Severity;
  /** Bracketed message id such as "Synth 8-327" */
  id?: string;
  text: string;
  line: string;
}

export type MessageList = ParsedBase<'messages'> & {
  messages: EngineMessage[];
  counts: Record<Severity, number>;
};

// ============================================================================
// Registry
// ============================================================================

export interface ParsedReportMap {
  'timing-summary': TimingSummary;
  'timing-paths': TimingPaths;
  utilization: Utilization;
  hierarchy: ObjectList<'hierarchy'>;
  clocks: ClockList;
  ports: ObjectList<'ports'>;
  nets: ObjectList<'nets'>;
  cells: ObjectList<'cells'>;
  messages: MessageList;
}

export type ParsedReport = ParsedReportMap[ReportKind];
