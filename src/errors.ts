/**
 * Error taxonomy
 *
 * Command timeouts and in-band engine errors are not thrown: they are completion
 * kinds on the returned transaction. Everything below is a precondition or
 * transport failure that the caller has to act on.
 */

export type BridgeErrorCode =
  | 'NotReady'
  | 'AlreadyStarted'
  | 'StartupTimeout'
  | 'ProcessExited'
  | 'EngineSpawn'
  | 'EngineNotFound'
  | 'InvalidPhase'
  | 'InvalidScope'
  | 'InvalidArgument'
  | 'FileNotFound'
  | 'RangeOutOfBounds'
  | 'ReportNotFound'
  | 'Config';

export class BridgeError extends Error {
  constructor(
    readonly code: BridgeErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'BridgeError';
  }
}

export class NotReadyError extends BridgeError {
  constructor(readonly state: string) {
    super('NotReady', `Engine session is not ready (state: ${state}). Call start() first.`);
    this.name = 'NotReadyError';
  }
}

export class AlreadyStartedError extends BridgeError {
  constructor(readonly state: string) {
    super('AlreadyStarted', `Engine session already started (state: ${state})`);
    this.name = 'AlreadyStartedError';
  }
}

export class StartupTimeoutError extends BridgeError {
  constructor(
    readonly timeoutMs: number,
    readonly lastOutput: string
  ) {
    super('StartupTimeout', `Timeout waiting for engine prompt after ${timeoutMs}ms`);
    this.name = 'StartupTimeoutError';
  }
}

export class ProcessExitedError extends BridgeError {
  constructor(
    readonly exitCode: number | undefined,
    readonly lastOutput: string
  ) {
    super(
      'ProcessExited',
      `Engine process exited${exitCode === undefined ? '' : ` with code ${exitCode}`}`
    );
    this.name = 'ProcessExitedError';
  }
}

export class EngineSpawnError extends BridgeError {
  constructor(executable: string, reason: string) {
    super('EngineSpawn', `Failed to spawn ${executable}: ${reason}`);
    this.name = 'EngineSpawnError';
  }
}

export class EngineNotFoundError extends BridgeError {
  constructor(readonly executable: string) {
    super(
      'EngineNotFound',
      `Engine executable '${executable}' was not found.\n` +
        `Either add it to PATH or set EDA_BRIDGE_EXECUTABLE to its absolute path.`
    );
    this.name = 'EngineNotFoundError';
  }
}

export class InvalidPhaseError extends BridgeError {
  constructor(
    readonly operation: string,
    readonly phase: string
  ) {
    super('InvalidPhase', `Cannot ${operation} while simulation is ${phase}`);
    this.name = 'InvalidPhaseError';
  }
}

export class InvalidScopeError extends BridgeError {
  constructor(
    readonly target: string,
    readonly detail?: string
  ) {
    super('InvalidScope', `Nothing in the simulation matches '${target}'${detail ? `: ${detail}` : ''}`);
    this.name = 'InvalidScopeError';
  }
}

export class InvalidArgumentError extends BridgeError {
  constructor(message: string) {
    super('InvalidArgument', message);
    this.name = 'InvalidArgumentError';
  }
}

export class FileNotFoundError extends BridgeError {
  constructor(readonly filePath: string) {
    super('FileNotFound', `File not found: ${filePath}`);
    this.name = 'FileNotFoundError';
  }
}

export class RangeOutOfBoundsError extends BridgeError {
  constructor(
    readonly offset: number,
    readonly length: number,
    readonly totalLength: number
  ) {
    super(
      'RangeOutOfBounds',
      `Range [${offset}, +${length}) is outside the artifact (${totalLength} chars)`
    );
    this.name = 'RangeOutOfBoundsError';
  }
}

export class ReportNotFoundError extends BridgeError {
  constructor(readonly reportId: string) {
    super('ReportNotFound', `Report ID '${reportId}' not found in cache or reports directory`);
    this.name = 'ReportNotFoundError';
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string) {
    super('Config', message);
    this.name = 'ConfigError';
  }
}

/**
 * Render any thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True for a filesystem error whose code is ENOENT
 */
export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
