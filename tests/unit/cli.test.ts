import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PassThrough, Readable } from 'node:stream';
import { v4 as uuidv4 } from 'uuid';
import { createProgram, run } from '../../src/cli.js';
import { setDefaultLogLevel } from '../../src/logger.js';
import { FakeEngine } from '../helpers/fake-engine.js';

describe('cli', () => {
  let directory: string;

  beforeEach(async () => {
    directory = path.join(os.tmpdir(), `eda-bridge-cli-test-${uuidv4()}`);
    await fs.mkdir(directory, { recursive: true });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    setDefaultLogLevel('info');
    process.exitCode = undefined;
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('should register the commands', () => {
    expect(createProgram().commands.map((command) => command.name())).toEqual(['exec', 'console', 'read-report']);
  });

  it('should print a character range of a report as JSON', async () => {
    const filePath = path.join(directory, 'timing.txt');
    await fs.writeFile(filePath, 'Timing Report\nWNS(ns): -0.250\n', 'utf-8');
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await run(['node', 'eda-bridge', 'read-report', filePath, '--offset', '14', '--length', '15', '--log-level', 'silent']);

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual({
      filePath,
      offset: 14,
      content: 'WNS(ns): -0.250',
      returnedLength: 15,
      totalLength: 30,
      hasMore: true,
    });
  });

  it('should print a searched line window', async () => {
    const filePath = path.join(directory, 'drc.txt');
    await fs.writeFile(filePath, 'Report DRC\nChecks found: 1\nNSTD-1 Unspecified I/O Standard\n', 'utf-8');
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await run(['node', 'eda-bridge', 'read-report', filePath, '--search', 'nstd', '--num-lines', '1', '--log-level', 'silent']);

    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toMatchObject({
      startLine: 3,
      matchLine: 3,
      content: 'NSTD-1 Unspecified I/O Standard\n',
    });
  });

  it('should set a failing exit code for a missing report', async () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    await run(['node', 'eda-bridge', 'read-report', path.join(directory, 'missing.txt'), '--log-level', 'error']);

    expect(process.exitCode).toBe(1);
    expect(String(error.mock.calls[0]?.[0])).toMatch(/^\[ERROR\] \[cli\] /);
  });

  describe('engine commands', () => {
    let configPath: string;

    beforeEach(async () => {
      configPath = path.join(directory, 'eda-bridge.yaml');
      await fs.writeFile(
        configPath,
        ['reports:', `  directory: ${JSON.stringify(path.join(directory, 'reports'))}`, 'session:', '  stopGraceMs: 200'].join('\n'),
        'utf-8'
      );
    });

    it('should run each command and print the transactions as JSON', async () => {
      const engine = new FakeEngine().respond('puts hi', 'hi').respond('get_parts -quiet', 'xc7a35t');
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

      await run(
        ['node', 'eda-bridge', 'exec', 'puts hi', 'get_parts -quiet', '--config', configPath, '--log-level', 'silent'],
        { channelFactory: engine.factory }
      );

      expect(log).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual([
        expect.objectContaining({ command: 'puts hi', success: true, completion: 'prompt-matched', output: 'hi', sent: true }),
        expect.objectContaining({ command: 'get_parts -quiet', success: true, output: 'xc7a35t', truncated: false }),
      ]);
      expect(process.exitCode).toBeUndefined();
      expect(engine.channel.commands()).toEqual(['puts hi', 'get_parts -quiet', 'exit']);
      expect(engine.channel.exited).toBe(true);
    });

    it('should send console lines as Tcl and answer bridge commands', async () => {
      const engine = new FakeEngine().respond('puts hi', 'hi');
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      const input = Readable.from([Buffer.from('puts hi\n\n:status\n:quit\nputs never\n')]);

      await run(['node', 'eda-bridge', 'console', '--config', configPath, '--log-level', 'silent'], {
        channelFactory: engine.factory,
        input,
        promptOutput: new PassThrough(),
      });

      expect(log).toHaveBeenCalledTimes(2);
      expect(log.mock.calls[0]?.[0]).toBe('hi');
      expect(JSON.parse(String(log.mock.calls[1]?.[0]))).toMatchObject({
        state: 'ready',
        commandCount: 1,
        resyncPending: false,
      });
      expect(engine.channel.commands()).toEqual(['puts hi', 'exit']);
      expect(engine.channel.exited).toBe(true);
    });

    it('should answer an unknown bridge command without touching the engine', async () => {
      const engine = new FakeEngine();
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      const input = Readable.from([Buffer.from(':bogus\n:quit\n')]);

      await run(['node', 'eda-bridge', 'console', '--config', configPath, '--log-level', 'silent'], {
        channelFactory: engine.factory,
        input,
        promptOutput: new PassThrough(),
      });

      expect(log.mock.calls.map((call) => call[0])).toEqual(["Unknown command ':bogus'. Type :help for the list."]);
      expect(engine.channel.commands()).toEqual(['exit']);
    });
  });
});
