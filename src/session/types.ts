/**
 * Process session types
 */

// ============================================================================
// Lifecycle
// ============================================================================

export type SessionState =
  | 'uninitialized'
  | 'starting'
  | 'ready'
  | 'busy'
  | 'stopping'
  | 'failed';

export type StateChangeListener = (next: SessionState, previous: SessionState) => void;

// ============================================================================
// Transactions
// ============================================================================

export type CompletionKind = 'prompt-matched' | 'timeout' | 'error-detected' | 'process-exited';

/**
 * One command/response cycle
 */
export interface Transaction {
  command: string;
  /** Response text with echo, carriage returns and the trailing prompt removed */
  output: string;
  completion: CompletionKind;
  elapsedMs: number;
  /** Lines recognized as in-band engine errors */
  errors: string[];
  /** False when the command was held back because an earlier command never resolved */
  sent: boolean;
  /** Late or unsolicited text drained before this command was written */
  staleOutput?: string;
  startedAt: string;
  completedAt: string;
}

export interface ExecuteOptions {
  /** Milliseconds without new output before the call gives up waiting */
  timeoutMs?: number;
}

/**
 * The part of a session that layers above it use to send commands
 */
export interface CommandRunner {
  execute(command: string, options?: ExecuteOptions): Promise<Transaction>;
}

// ============================================================================
// Start / status
// ============================================================================

export interface StartOptions {
  executable?: string;
  /** Default per-command timeout for this session */
  commandTimeoutMs?: number;
  startupTimeoutMs?: number;
  extraArgs?: string[];
}

export interface StartResult {
  pid: number;
  executable: string;
  args: string[];
  elapsedMs: number;
  banner: string;
}

export interface CommandHistoryEntry {
  command: string;
  completion: CompletionKind;
  elapsedMs: number;
  timestamp: string;
}

export interface SessionStatus {
  state: SessionState;
  pid?: number;
  executable: string;
  prompt: string;
  uptimeMs: number;
  commandCount: number;
  errorCount: number;
  totalCommandMs: number;
  averageCommandMs?: number;
  startedAt?: string;
  lastCommandAt?: string;
  resyncPending: boolean;
  queueDepth: number;
  history: CommandHistoryEntry[];
}

// ============================================================================
// Session settings
// ============================================================================

export interface SessionSettings {
  executable: string;
  baseArgs: string[];
  extraArgs: string[];
  prompt: string;
  lineTerminator: string;
  startupTimeoutMs: number;
  commandTimeoutMs: number;
  stopGraceMs: number;
  promptSettleMs: number;
  exitCommand: string;
  interruptOnTimeout: boolean;
  healthCheckTimeoutMs: number;
  cwd?: string;
  env?: Record<string, string>;
}
