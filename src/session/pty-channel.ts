import * as path from 'node:path';
import { promises as fs } from 'node:fs';
import execa from 'execa';
import * as pty from 'node-pty';
import type { ChannelExit, ChannelFactory, ChannelSpawnSpec, Disposable, EngineChannel } from './channel.js';
import { EngineNotFoundError } from '../errors.js';

/**
 * Engine channel backed by a pseudo-terminal
 *
 * The engine switches to block buffering when its stdout is a pipe, so it has
 * to believe it is talking to a terminal.
 */
export class PtyChannel implements EngineChannel {
  constructor(private readonly ptyProcess: pty.IPty) {}

  get pid(): number {
    return this.ptyProcess.pid;
  }

  write(data: string): void {
    this.ptyProcess.write(data);
  }

  onData(listener: (chunk: string) => void): Disposable {
    return this.ptyProcess.onData(listener);
  }

  onExit(listener: (event: ChannelExit) => void): Disposable {
    return this.ptyProcess.onExit(({ exitCode, signal }) => listener({ exitCode, signal }));
  }

  kill(signal?: string): void {
    this.ptyProcess.kill(signal);
  }
}

/**
 * Resolve an executable the way the shell would
 * Absolute and relative paths are checked directly; bare names go through `which`.
 */
export async function resolveExecutable(executable: string): Promise<string> {
  if (executable.includes(path.sep)) {
    try {
      await fs.access(executable, fs.constants.X_OK);
      return path.resolve(executable);
    } catch {
      throw new EngineNotFoundError(executable);
    }
  }

  const result = await execa('which', [executable], { reject: false });
  const resolved = result.stdout.trim();
  if (result.exitCode !== 0 || !resolved) {
    throw new EngineNotFoundError(executable);
  }
  return resolved;
}

/**
 * Default channel factory: resolve the executable, then spawn it on a PTY
 */
export const spawnPtyChannel: ChannelFactory = async (spec: ChannelSpawnSpec) => {
  const file = await resolveExecutable(spec.executable);

  const ptyProcess = pty.spawn(file, spec.args, {
    name: 'xterm-256color',
    cols: 250,
    rows: 50,
    cwd: spec.cwd ?? process.cwd(),
    env: spec.env ?? inheritEnv(),
  });

  return new PtyChannel(ptyProcess);
};

function inheritEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}
