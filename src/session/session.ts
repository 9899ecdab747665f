import type { ChannelExit, ChannelFactory, Disposable, EngineChannel } from './channel.js';
import { TransactionFramer } from './framer.js';
import { classifyErrors, extractResponse, isFailure } from './response.js';
import { escapeForDisplay, stripControlSequences } from './escape.js';
import type {
  CommandHistoryEntry,
  CompletionKind,
  ExecuteOptions,
  SessionSettings,
  SessionState,
  SessionStatus,
  StartOptions,
  StartResult,
  StateChangeListener,
  Transaction,
} from './types.js';
import {
  AlreadyStartedError,
  BridgeError,
  EngineSpawnError,
  InvalidArgumentError,
  NotReadyError,
  ProcessExitedError,
  StartupTimeoutError,
  errorMessage,
} from '../errors.js';
import { createLogger, type Logger } from '../logger.js';

const HISTORY_LIMIT = 100;
const MAX_UNSOLICITED_CHARS = 100 * 1024; // 100KB
const INTERRUPT = '\x03';
const HEALTH_MARKER = 'HEALTH_OK';

type Boundary = 'prompt' | 'timeout' | 'exited';

/**
 * Response being collected for one command (or for startup)
 * A timed-out command keeps its pending response until its prompt shows up.
 */
interface PendingResponse {
  command: string;
  framer: TransactionFramer;
  notify: ((event: 'data' | 'exit') => void) | null;
}

export interface SessionDependencies {
  channelFactory: ChannelFactory;
  logger?: Logger;
  /** Extra line patterns treated as in-band engine errors */
  errorPatterns?: RegExp[];
}

/**
 * Process session
 *
 * Owns one interactive engine process and turns its console into a serialized
 * command/response contract. Commands queue FIFO; a command is written only
 * once the previous one has reached its prompt.
 */
export class ProcessSession {
  private state: SessionState = 'uninitialized';
  private settings: SessionSettings;
  private channel: EngineChannel | null = null;
  private subscriptions: Disposable[] = [];
  private pending: PendingResponse | null = null;
  private unsolicited = '';
  private resyncPending = false;
  private queue: Promise<void> = Promise.resolve();
  private queueDepth = 0;
  private stopping: Promise<void> | null = null;
  private exitWaiters: Array<() => void> = [];
  private lastExit: ChannelExit | undefined;
  private readonly listeners = new Set<StateChangeListener>();
  private readonly logger: Logger;

  private startedAt: number | undefined;
  private lastCommandAt: number | undefined;
  private commandCount = 0;
  private errorCount = 0;
  private totalCommandMs = 0;
  private history: CommandHistoryEntry[] = [];

  constructor(
    private readonly baseSettings: SessionSettings,
    private readonly deps: SessionDependencies
  ) {
    this.settings = { ...baseSettings };
    this.logger = deps.logger ?? createLogger('session');
  }

  getState(): SessionState {
    return this.state;
  }

  get pid(): number | undefined {
    return this.channel?.pid;
  }

  /**
   * Subscribe to lifecycle transitions
   * @returns Function that removes the listener
   */
  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Spawn the engine and wait for its first prompt
   */
  async start(options: StartOptions = {}): Promise<StartResult> {
    if (this.state !== 'uninitialized') {
      throw new AlreadyStartedError(this.state);
    }

    const settings: SessionSettings = {
      ...this.baseSettings,
      executable: options.executable ?? this.baseSettings.executable,
      commandTimeoutMs: options.commandTimeoutMs ?? this.baseSettings.commandTimeoutMs,
      startupTimeoutMs: options.startupTimeoutMs ?? this.baseSettings.startupTimeoutMs,
      extraArgs: options.extraArgs ?? this.baseSettings.extraArgs,
    };
    this.settings = settings;
    const args = [...settings.baseArgs, ...settings.extraArgs];
    const startTime = Date.now();

    this.setState('starting');
    this.logger.info(`Starting ${settings.executable} ${args.join(' ')}`);

    let channel: EngineChannel;
    try {
      channel = await this.deps.channelFactory({
        executable: settings.executable,
        args,
        cwd: settings.cwd,
        env: settings.env,
      });
    } catch (error) {
      this.setState('uninitialized');
      if (error instanceof BridgeError) {
        throw error;
      }
      throw new EngineSpawnError(settings.executable, errorMessage(error));
    }

    this.attach(channel);
    const startup = this.openPending('');
    const boundary = await this.waitForBoundary(startup, settings.startupTimeoutMs);
    this.pending = null;

    if (boundary === 'timeout') {
      const lastOutput = startup.framer.tailText();
      this.logger.error(`No prompt '${settings.prompt}' within ${settings.startupTimeoutMs}ms, tearing down`);
      this.forceKill(channel);
      this.detach();
      this.setState('uninitialized');
      throw new StartupTimeoutError(settings.startupTimeoutMs, lastOutput);
    }

    if (boundary === 'exited') {
      this.detach();
      this.setState('uninitialized');
      throw new ProcessExitedError(this.lastExit?.exitCode, startup.framer.tailText());
    }

    this.startedAt = Date.now();
    this.lastCommandAt = undefined;
    this.commandCount = 0;
    this.errorCount = 0;
    this.totalCommandMs = 0;
    this.history = [];
    this.resyncPending = false;
    this.setState('ready');

    const elapsedMs = Date.now() - startTime;
    this.logger.info(`Engine ready (pid ${channel.pid}) in ${elapsedMs}ms`);

    return {
      pid: channel.pid,
      executable: settings.executable,
      args,
      elapsedMs,
      banner: extractResponse(startup.framer.text(), '', settings.prompt),
    };
  }

  /**
   * Shut the engine down
   * Safe to call in any state; always ends uninitialized. A command still in
   * flight completes as process-exited.
   */
  async stop(): Promise<void> {
    if (this.state === 'uninitialized') {
      return;
    }
    if (this.stopping) {
      return this.stopping;
    }

    this.stopping = this.shutdown().finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    const channel = this.channel;
    this.setState('stopping');

    if (channel) {
      const exited = this.waitForExit(this.settings.stopGraceMs);
      try {
        channel.write(this.settings.exitCommand + this.settings.lineTerminator);
      } catch (error) {
        this.logger.warn(`Failed to send exit command: ${errorMessage(error)}`);
      }

      if (!(await exited)) {
        this.logger.warn(`Engine still alive after ${this.settings.stopGraceMs}ms, killing`);
        this.forceKill(channel);
      }
    }

    this.detach();
    this.pending?.notify?.('exit');
    this.pending = null;
    this.unsolicited = '';
    this.resyncPending = false;
    this.startedAt = undefined;
    this.setState('uninitialized');
    this.logger.info('Engine session stopped');
  }

  /**
   * Send an interrupt (Ctrl-C) to abort the command in flight
   * The engine answers with its prompt; the aborted command's response is
   * drained before the next command.
   */
  interrupt(): void {
    if (!this.channel) {
      throw new NotReadyError(this.state);
    }
    this.logger.warn('Sending interrupt to engine');
    this.channel.write(INTERRUPT);
  }

  // ============================================================================
  // Commands
  // ============================================================================

  /**
   * Run one command and wait for its response boundary
   *
   * Callers arriving while another command is in flight are queued in order.
   * Timeouts, engine errors and process exit are reported through the
   * transaction's completion kind rather than thrown.
   */
  async execute(command: string, options: ExecuteOptions = {}): Promise<Transaction> {
    if (this.state !== 'ready' && this.state !== 'busy') {
      throw new NotReadyError(this.state);
    }
    if (/[\r\n]/.test(command)) {
      throw new InvalidArgumentError('Commands must be a single line; join statements with ";"');
    }

    this.queueDepth++;
    const run = this.queue.then(() => {
      this.queueDepth--;
      return this.runTransaction(command, options);
    });
    // The chain only orders callers; each caller sees its own outcome via `run`
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Check that the engine still answers
   */
  async checkHealth(): Promise<boolean> {
    if (this.state !== 'ready') {
      return false;
    }
    const tx = await this.execute(`puts ${HEALTH_MARKER}`, {
      timeoutMs: this.settings.healthCheckTimeoutMs,
    });
    return tx.completion === 'prompt-matched' && tx.output.includes(HEALTH_MARKER);
  }

  private async runTransaction(command: string, options: ExecuteOptions): Promise<Transaction> {
    // The session may have stopped or failed while this caller was queued
    if (this.state !== 'ready') {
      throw new NotReadyError(this.state);
    }

    const timeoutMs = options.timeoutMs ?? this.settings.commandTimeoutMs;
    const startTime = Date.now();
    this.setState('busy');

    let staleOutput = '';
    const previous = this.pending;
    if (previous) {
      this.logger.warn(`Waiting for '${previous.command}' to reach its prompt before sending '${command}'`);
      const boundary = await this.waitForBoundary(previous, timeoutMs);
      if (boundary !== 'prompt') {
        return this.finish(startTime, {
          command,
          output: '',
          completion: boundary === 'timeout' ? 'timeout' : 'process-exited',
          errors: [],
          sent: false,
        });
      }
      staleOutput = extractResponse(previous.framer.text(), previous.command, this.settings.prompt);
      this.pending = null;
      this.resyncPending = false;
    }

    if (this.unsolicited) {
      const extra = stripControlSequences(this.unsolicited).trim();
      this.unsolicited = '';
      staleOutput = [staleOutput, extra].filter((text) => text.length > 0).join('\n');
    }
    if (staleOutput) {
      this.logger.warn(`Drained ${staleOutput.length} chars of stale output before '${command}'`);
    }

    const channel = this.channel;
    if (!channel) {
      return this.finish(startTime, {
        command,
        output: '',
        completion: 'process-exited',
        errors: [],
        sent: false,
        staleOutput,
      });
    }

    const pending = this.openPending(command);
    this.logger.debug(`> ${command}`);
    try {
      channel.write(command + this.settings.lineTerminator);
    } catch (error) {
      // The PTY can refuse writes just before its exit event arrives
      this.pending = null;
      this.logger.error(`Failed to send '${command}': ${errorMessage(error)}`);
      return this.finish(startTime, {
        command,
        output: '',
        completion: 'process-exited',
        errors: [],
        sent: false,
        staleOutput,
      });
    }
    const boundary = await this.waitForBoundary(pending, timeoutMs);
    const output = extractResponse(pending.framer.text(), command, this.settings.prompt);

    if (boundary === 'timeout') {
      this.resyncPending = true;
      this.logger.warn(`'${command}' produced no output for ${timeoutMs}ms; engine left running`);
      if (this.settings.interruptOnTimeout) {
        try {
          channel.write(INTERRUPT);
        } catch (error) {
          this.logger.warn(`Failed to send interrupt: ${errorMessage(error)}`);
        }
      }
      return this.finish(startTime, { command, output, completion: 'timeout', errors: [], sent: true, staleOutput });
    }

    this.pending = null;

    if (boundary === 'exited') {
      return this.finish(startTime, {
        command,
        output,
        completion: 'process-exited',
        errors: [],
        sent: true,
        staleOutput,
      });
    }

    const classification = classifyErrors(output, this.deps.errorPatterns);
    const completion: CompletionKind = isFailure(classification) ? 'error-detected' : 'prompt-matched';
    return this.finish(startTime, {
      command,
      output,
      completion,
      errors: classification.messages,
      sent: true,
      staleOutput,
    });
  }

  private finish(
    startTime: number,
    result: Omit<Transaction, 'elapsedMs' | 'startedAt' | 'completedAt' | 'staleOutput'> & { staleOutput?: string }
  ): Transaction {
    const completedAt = Date.now();
    const elapsedMs = completedAt - startTime;
    const { staleOutput, ...rest } = result;
    const transaction: Transaction = {
      ...rest,
      elapsedMs,
      startedAt: new Date(startTime).toISOString(),
      completedAt: new Date(completedAt).toISOString(),
    };
    if (staleOutput) {
      transaction.staleOutput = staleOutput;
    }

    if (transaction.sent) {
      this.commandCount++;
      this.totalCommandMs += elapsedMs;
      this.lastCommandAt = completedAt;
    }
    if (transaction.completion !== 'prompt-matched') {
      this.errorCount++;
    }

    this.history.push({
      command: transaction.command,
      completion: transaction.completion,
      elapsedMs,
      timestamp: transaction.completedAt,
    });
    if (this.history.length > HISTORY_LIMIT) {
      this.history = this.history.slice(-HISTORY_LIMIT);
    }

    if (this.state === 'busy') {
      this.setState('ready');
    }
    return transaction;
  }

  // ============================================================================
  // Status
  // ============================================================================

  /**
   * Snapshot of the session; never waits on the command queue
   */
  status(): SessionStatus {
    const status: SessionStatus = {
      state: this.state,
      executable: this.settings.executable,
      prompt: this.settings.prompt,
      uptimeMs: this.startedAt === undefined ? 0 : Date.now() - this.startedAt,
      commandCount: this.commandCount,
      errorCount: this.errorCount,
      totalCommandMs: this.totalCommandMs,
      resyncPending: this.resyncPending,
      queueDepth: this.queueDepth,
      history: [...this.history],
    };

    if (this.channel) {
      status.pid = this.channel.pid;
    }
    if (this.commandCount > 0) {
      status.averageCommandMs = this.totalCommandMs / this.commandCount;
    }
    if (this.startedAt !== undefined) {
      status.startedAt = new Date(this.startedAt).toISOString();
    }
    if (this.lastCommandAt !== undefined) {
      status.lastCommandAt = new Date(this.lastCommandAt).toISOString();
    }
    return status;
  }

  // ============================================================================
  // Channel plumbing
  // ============================================================================

  private attach(channel: EngineChannel): void {
    this.channel = channel;
    this.lastExit = undefined;
    this.unsolicited = '';
    this.subscriptions = [
      channel.onData((chunk) => this.handleData(chunk)),
      channel.onExit((event) => this.handleExit(event)),
    ];
  }

  private detach(): void {
    for (const subscription of this.subscriptions) {
      subscription.dispose();
    }
    this.subscriptions = [];
    this.channel = null;
  }

  private openPending(command: string): PendingResponse {
    const pending: PendingResponse = {
      command,
      framer: new TransactionFramer(this.settings.prompt),
      notify: null,
    };
    this.pending = pending;
    return pending;
  }

  private handleData(chunk: string): void {
    this.logger.debug(`< ${escapeForDisplay(chunk.length > 200 ? `${chunk.slice(0, 200)}...` : chunk)}`);

    const pending = this.pending;
    if (!pending) {
      this.unsolicited = (this.unsolicited + chunk).slice(-MAX_UNSOLICITED_CHARS);
      return;
    }
    pending.framer.feed(chunk);
    pending.notify?.('data');
  }

  private handleExit(event: ChannelExit): void {
    this.lastExit = event;
    this.detach();

    if (this.state === 'ready' || this.state === 'busy') {
      this.logger.error(`Engine exited unexpectedly (code ${event.exitCode})`);
      this.setState('failed');
    }

    this.pending?.notify?.('exit');
    const waiters = this.exitWaiters;
    this.exitWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }

  /**
   * Wait until the pending response ends in a confirmed prompt
   *
   * The prompt must still be at the end of the stream after the settle window;
   * more output in that window means the prompt-like text was part of the
   * response. The timeout counts from the last chunk received.
   */
  private waitForBoundary(pending: PendingResponse, timeoutMs: number): Promise<Boundary> {
    if (!this.channel) {
      return Promise.resolve('exited');
    }
    const settleMs = this.settings.promptSettleMs;

    return new Promise<Boundary>((resolve) => {
      let idleTimer: NodeJS.Timeout | undefined;
      let settleTimer: NodeJS.Timeout | undefined;

      const finish = (boundary: Boundary): void => {
        clearTimeout(idleTimer);
        clearTimeout(settleTimer);
        pending.notify = null;
        resolve(boundary);
      };

      const armIdle = (): void => {
        clearTimeout(idleTimer);
        idleTimer = setTimeout(() => finish('timeout'), timeoutMs);
      };

      const checkPrompt = (): void => {
        clearTimeout(settleTimer);
        settleTimer = undefined;
        if (!pending.framer.promptAtEnd()) {
          return;
        }
        if (settleMs <= 0) {
          finish('prompt');
          return;
        }
        settleTimer = setTimeout(() => finish('prompt'), settleMs);
      };

      pending.notify = (event) => {
        if (event === 'exit') {
          finish('exited');
          return;
        }
        armIdle();
        checkPrompt();
      };

      armIdle();
      checkPrompt();
    });
  }

  private waitForExit(timeoutMs: number): Promise<boolean> {
    if (!this.channel) {
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        this.exitWaiters = this.exitWaiters.filter((waiter) => waiter !== onExit);
        resolve(false);
      }, timeoutMs);
      const onExit = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      this.exitWaiters.push(onExit);
    });
  }

  private forceKill(channel: EngineChannel): void {
    try {
      channel.kill('SIGKILL');
    } catch (error) {
      // Process already gone
      this.logger.debug(`Kill failed: ${errorMessage(error)}`);
    }
  }

  private setState(next: SessionState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    this.logger.debug(`State ${previous} -> ${next}`);
    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (error) {
        this.logger.error(`State listener failed: ${errorMessage(error)}`);
      }
    }
  }
}
