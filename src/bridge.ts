import { loadConfig, errorPatternsFrom, sessionSettingsFrom, type BridgeConfig, type LoadConfigOptions } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { getHostStatus, type HostStatus } from './operations/host.js';
import type { OperationContext } from './operations/types.js';
import { ReportStore } from './reports/store.js';
import type { ChannelFactory } from './session/channel.js';
import { spawnPtyChannel } from './session/pty-channel.js';
import { ProcessSession } from './session/session.js';
import type { SessionState, SessionStatus, StartOptions, StartResult } from './session/types.js';
import { SimulationController } from './simulation/controller.js';

export interface BridgeDependencies {
  /** Replaces the PTY spawner (tests use an in-process fake) */
  channelFactory?: ChannelFactory;
  logger?: Logger;
  cwd?: string;
}

export interface SessionStartResult extends StartResult {
  success: boolean;
}

export type HealthAction = 'none' | 'started' | 'restarted';

export interface HealthResult {
  healthy: boolean;
  action: HealthAction;
  message: string;
  state: SessionState;
  elapsedMs: number;
}

// After these transitions the simulator (if any) is gone with the old process
const RESETTING_STATES: readonly SessionState[] = ['uninitialized', 'starting', 'failed'];

/**
 * Owns the single engine session and everything layered on it
 *
 * The simulation controller and the report store are created here and share
 * the session by reference; the controller is reset whenever the session
 * restarts or fails.
 */
export class EdaBridge {
  readonly session: ProcessSession;
  readonly simulation: SimulationController;
  readonly store: ReportStore;
  readonly context: OperationContext;
  private readonly logger: Logger;

  constructor(
    readonly config: BridgeConfig,
    deps: BridgeDependencies = {}
  ) {
    this.logger = deps.logger ?? createLogger('bridge', config.logLevel);

    this.session = new ProcessSession(sessionSettingsFrom(config, deps.cwd), {
      channelFactory: deps.channelFactory ?? spawnPtyChannel,
      logger: this.logger.child('session'),
      errorPatterns: errorPatternsFrom(config),
    });
    this.simulation = new SimulationController(this.session, {
      runTimeoutMs: config.simulation.runTimeoutMs,
      logger: this.logger.child('simulation'),
    });
    this.store = new ReportStore({
      directory: config.reports.directory,
      cacheHours: config.reports.cacheHours,
      logger: this.logger.child('reports'),
    });
    this.context = {
      runner: this.session,
      store: this.store,
      config,
      logger: this.logger.child('operations'),
    };

    this.session.onStateChange((next) => {
      if (RESETTING_STATES.includes(next)) {
        this.simulation.reset();
      }
    });
  }

  /**
   * Load configuration (defaults, eda-bridge.yaml, environment) and build a bridge
   */
  static async create(options: LoadConfigOptions & BridgeDependencies = {}): Promise<EdaBridge> {
    const config = await loadConfig(options);
    return new EdaBridge(config, options);
  }

  // ============================================================================
  // Session operations
  // ============================================================================

  async startSession(options: StartOptions = {}): Promise<SessionStartResult> {
    const result = await this.session.start(options);
    return { success: true, ...result };
  }

  async stopSession(): Promise<{ success: boolean; state: SessionState }> {
    await this.session.stop();
    return { success: true, state: this.session.getState() };
  }

  sessionStatus(): SessionStatus {
    return this.session.status();
  }

  isSessionActive(): boolean {
    const state = this.session.getState();
    return state === 'ready' || state === 'busy';
  }

  /**
   * Probe the engine; with autoRecover, start it when absent and restart it
   * when it no longer answers
   */
  async checkHealth(autoRecover: boolean = true): Promise<HealthResult> {
    const startTime = Date.now();
    const done = (healthy: boolean, action: HealthAction, message: string): HealthResult => ({
      healthy,
      action,
      message,
      state: this.session.getState(),
      elapsedMs: Date.now() - startTime,
    });

    if (!this.isSessionActive()) {
      if (!autoRecover) {
        return done(false, 'none', `Session not running (state: ${this.session.getState()})`);
      }
      await this.restartSession();
      return done(this.isSessionActive(), 'started', 'Session was not running; started a new one');
    }

    // A long command holds the console; that is not a hang
    if (this.session.getState() === 'busy') {
      return done(true, 'none', 'Session is busy with a command');
    }
    // A timed-out command may still be running; its prompt has not come back yet
    if (this.session.status().resyncPending) {
      return done(true, 'none', 'Session is still finishing a timed-out command');
    }

    if (await this.session.checkHealth()) {
      return done(true, 'none', 'Session is healthy and responsive');
    }
    if (!autoRecover) {
      return done(false, 'none', 'Session is unresponsive');
    }

    this.logger.warn('Engine did not answer the health probe; restarting');
    await this.restartSession();
    return done(this.isSessionActive(), 'restarted', 'Session was unresponsive; restarted');
  }

  hostStatus(): HostStatus {
    return getHostStatus(this.isSessionActive());
  }

  async dispose(): Promise<void> {
    await this.session.stop();
  }

  private async restartSession(): Promise<void> {
    await this.session.stop();
    await this.session.start();
  }
}
