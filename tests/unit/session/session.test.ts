import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { ProcessSession } from '../../../src/session/session.js';
import type { SessionState } from '../../../src/session/types.js';
import {
  AlreadyStartedError,
  EngineSpawnError,
  InvalidArgumentError,
  NotReadyError,
  ProcessExitedError,
  StartupTimeoutError,
} from '../../../src/errors.js';
import { FakeEngine } from '../../helpers/fake-engine.js';
import { createTestSession } from '../../helpers/session.js';

describe('ProcessSession', () => {
  let session: ProcessSession | null = null;

  afterEach(async () => {
    if (session) {
      await session.stop();
      session = null;
    }
  });

  describe('start', () => {
    it('should reach ready once the prompt shows and keep the banner', async () => {
      const engine = new FakeEngine({ banner: '****** Engine v1.0\r\n  **** build 42\r\n\r\n' });
      session = createTestSession(engine);

      const result = await session.start({ extraArgs: ['-source', 'init.tcl'] });

      expect(session.getState()).toBe('ready');
      expect(result.pid).toBe(4242);
      expect(result.banner).toBe('****** Engine v1.0\n  **** build 42');
      expect(result.args).toEqual(['-mode', 'tcl', '-nojournal', '-nolog', '-source', 'init.tcl']);
      expect(engine.channel.spec.args).toEqual(result.args);
    });

    it('should reject a second start', async () => {
      const engine = new FakeEngine();
      session = createTestSession(engine);
      await session.start();

      await expect(session.start()).rejects.toBeInstanceOf(AlreadyStartedError);
    });

    it('should tear the process down when no prompt arrives', async () => {
      const engine = new FakeEngine({ startup: 'silent', banner: 'loading...\r\n' });
      session = createTestSession(engine, { startupTimeoutMs: 50 });

      const error = await session.start().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StartupTimeoutError);
      expect(error instanceof StartupTimeoutError && error.lastOutput).toBe('loading...\n');
      expect(engine.channel.kills).toEqual(['SIGKILL']);
      expect(session.getState()).toBe('uninitialized');
    });

    it('should report an engine that dies during startup', async () => {
      const engine = new FakeEngine({ startup: 'exit', banner: 'license checkout failed\r\n' });
      session = createTestSession(engine);

      await expect(session.start()).rejects.toBeInstanceOf(ProcessExitedError);
      expect(session.getState()).toBe('uninitialized');
    });

    it('should wrap spawn failures', async () => {
      const engine = new FakeEngine({ spawnError: 'ENOENT' });
      session = createTestSession(engine);

      await expect(session.start()).rejects.toBeInstanceOf(EngineSpawnError);
      expect(session.getState()).toBe('uninitialized');
    });
  });

  describe('execute', () => {
    it('should fail with NotReady before start', async () => {
      session = createTestSession(new FakeEngine());

      await expect(session.execute('puts hi')).rejects.toBeInstanceOf(NotReadyError);
    });

    it('should fail with NotReady after stop', async () => {
      const engine = new FakeEngine();
      session = createTestSession(engine);
      await session.start();
      await session.stop();

      await expect(session.execute('puts hi')).rejects.toBeInstanceOf(NotReadyError);
      expect(engine.channel.commands()).toEqual(['exit']);
    });

    it('should reject multi-line commands', async () => {
      const engine = new FakeEngine();
      session = createTestSession(engine);
      await session.start();

      await expect(session.execute('puts a\nputs b')).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(engine.channel.commands()).toEqual([]);
    });

    it('should return the response without echo or prompt', async () => {
      const engine = new FakeEngine().respond('get_parts *k7*', 'xc7k70tfbg676-1\r\nxc7k160tfbg676-1');
      session = createTestSession(engine);
      await session.start();

      const tx = await session.execute('get_parts *k7*');

      expect(tx.completion).toBe('prompt-matched');
      expect(tx.output).toBe('xc7k70tfbg676-1\nxc7k160tfbg676-1');
      expect(tx.sent).toBe(true);
      expect(tx.errors).toEqual([]);
      expect(tx.staleOutput).toBeUndefined();
      expect(session.getState()).toBe('ready');
    });

    it('should flag engine errors but keep the text', async () => {
      const engine = new FakeEngine().respond(
        'open_project /missing.xpr',
        "ERROR: [Coretcl 2-27] Can't open project /missing.xpr"
      );
      session = createTestSession(engine);
      await session.start();

      const tx = await session.execute('open_project /missing.xpr');

      expect(tx.completion).toBe('error-detected');
      expect(tx.output).toBe("ERROR: [Coretcl 2-27] Can't open project /missing.xpr");
      expect(tx.errors).toEqual(["ERROR: [Coretcl 2-27] Can't open project /missing.xpr"]);
    });

    it('should flag Tcl interpreter errors', async () => {
      const engine = new FakeEngine().respond('frobnicate', 'invalid command name "frobnicate"');
      session = createTestSession(engine);
      await session.start();

      const tx = await session.execute('frobnicate');

      expect(tx.completion).toBe('error-detected');
      expect(tx.errors).toEqual(['invalid command name "frobnicate"']);
    });

    it('should not mistake prompt text inside the output for the boundary', async () => {
      const engine = new FakeEngine().respond('report_notes', {
        chunks: ['line1\r\nVivado% ', ' is quoted here\r\nmore'],
        chunkDelayMs: 5,
      });
      session = createTestSession(engine, { promptSettleMs: 40 });
      await session.start();

      const tx = await session.execute('report_notes');

      expect(tx.completion).toBe('prompt-matched');
      expect(tx.output).toBe('line1\nVivado%  is quoted here\nmore');
    });

    it('should time out within a bounded margin and stay usable', async () => {
      const engine = new FakeEngine().respond('wait_on_run impl_1', { hang: true });
      session = createTestSession(engine);
      await session.start();

      const tx = await session.execute('wait_on_run impl_1', { timeoutMs: 100 });

      expect(tx.completion).toBe('timeout');
      expect(tx.sent).toBe(true);
      expect(tx.elapsedMs).toBeGreaterThanOrEqual(95);
      expect(tx.elapsedMs).toBeLessThan(400);
      expect(session.getState()).toBe('ready');
      expect(session.status().resyncPending).toBe(true);
    });

    it('should drain a late response before sending the next command', async () => {
      const engine = new FakeEngine()
        .respond('slow_report', { output: 'late result', delayMs: 150 })
        .respond('puts next', 'next');
      session = createTestSession(engine);
      await session.start();

      const first = await session.execute('slow_report', { timeoutMs: 40 });
      expect(first.completion).toBe('timeout');

      const second = await session.execute('puts next');

      expect(second.completion).toBe('prompt-matched');
      expect(second.output).toBe('next');
      expect(second.staleOutput).toBe('late result');
      expect(session.status().resyncPending).toBe(false);
      const channel = engine.channel;
      const nextWrite = channel.writes.find((write) => write.data === 'puts next\n');
      expect(nextWrite && nextWrite.at).toBeGreaterThanOrEqual(channel.promptsAt[1] ?? Infinity);
    });

    it('should hold the next command back when the engine never recovers', async () => {
      const engine = new FakeEngine().respond('stuck', { hang: true });
      session = createTestSession(engine);
      await session.start();

      await session.execute('stuck', { timeoutMs: 30 });
      const held = await session.execute('puts after', { timeoutMs: 30 });

      expect(held.completion).toBe('timeout');
      expect(held.sent).toBe(false);
      expect(engine.channel.commands()).toEqual(['stuck']);
    });

    it('should interrupt a timed-out command when configured', async () => {
      const engine = new FakeEngine().respond('stuck', { hang: true }).respond('puts ok', 'ok');
      session = createTestSession(engine, { interruptOnTimeout: true });
      await session.start();

      await session.execute('stuck', { timeoutMs: 30 });
      const next = await session.execute('puts ok');

      expect(engine.channel.writes.map((write) => write.data)).toEqual(['stuck\n', '\x03', 'puts ok\n']);
      expect(next.staleOutput).toBe('^C');
      expect(next.output).toBe('ok');
    });

    it('should hand unsolicited output to the next transaction', async () => {
      const engine = new FakeEngine().respond('puts x', 'x');
      session = createTestSession(engine);
      await session.start();

      engine.channel.emit('INFO: [Common 17-206] Exiting background job\r\n');
      const tx = await session.execute('puts x');

      expect(tx.staleOutput).toBe('INFO: [Common 17-206] Exiting background job');
      expect(tx.output).toBe('x');
    });

    it('should fail the session when the engine exits mid-command', async () => {
      const engine = new FakeEngine().respond('crash_me', { output: 'Abnormal program termination', exitCode: 11 });
      session = createTestSession(engine);
      await session.start();

      const tx = await session.execute('crash_me');

      expect(tx.completion).toBe('process-exited');
      expect(tx.output).toBe('Abnormal program termination');
      expect(session.getState()).toBe('failed');
      await expect(session.execute('puts hi')).rejects.toBeInstanceOf(NotReadyError);

      await session.stop();
      expect(session.getState()).toBe('uninitialized');
    });

    it('should stay usable when writing a command to the channel fails', async () => {
      const engine = new FakeEngine().respond('puts b', 'b');
      session = createTestSession(engine);
      await session.start();
      jest.spyOn(engine.channel, 'write').mockImplementationOnce(() => {
        throw new Error('write EIO');
      });

      const failed = await session.execute('puts a');

      expect(failed.completion).toBe('process-exited');
      expect(failed.sent).toBe(false);
      expect(session.getState()).toBe('ready');

      const next = await session.execute('puts b');
      expect(next.completion).toBe('prompt-matched');
      expect(next.output).toBe('b');
      expect(next.staleOutput).toBeUndefined();
    });
  });

  describe('concurrency', () => {
    it('should serialize concurrent callers in arrival order', async () => {
      const engine = new FakeEngine().on((command) =>
        command.startsWith('puts ') ? { output: command.slice(5), delayMs: 20 } : undefined
      );
      session = createTestSession(engine);
      await session.start();

      const results = await Promise.all([
        session.execute('puts one'),
        session.execute('puts two'),
        session.execute('puts three'),
      ]);

      expect(results.map((tx) => tx.output)).toEqual(['one', 'two', 'three']);
      const channel = engine.channel;
      expect(channel.commands()).toEqual(['puts one', 'puts two', 'puts three']);
      // Each write happens only after the prompt that closed the previous transaction
      channel.writes.forEach((write, index) => {
        expect(write.at).toBeGreaterThanOrEqual(channel.promptsAt[index] ?? Infinity);
      });
    });

    it('should reject queued callers when the session stops under them', async () => {
      const engine = new FakeEngine().respond('long', { output: 'done', delayMs: 50 });
      session = createTestSession(engine);
      await session.start();

      const first = session.execute('long');
      const queued = session.execute('puts never').catch((error: unknown) => error);
      await new Promise((resolve) => setTimeout(resolve, 10));
      const stopped = session.stop();

      const tx = await first;
      expect(tx.completion).toBe('process-exited');
      expect(await queued).toBeInstanceOf(NotReadyError);
      await stopped;
      expect(engine.channel.commands()).toEqual(['long', 'exit']);
    });
  });

  describe('stop', () => {
    it('should be idempotent', async () => {
      const engine = new FakeEngine();
      session = createTestSession(engine);
      await session.stop();
      await session.start();

      await Promise.all([session.stop(), session.stop()]);
      await session.stop();

      expect(session.getState()).toBe('uninitialized');
      expect(engine.channel.commands()).toEqual(['exit']);
      expect(engine.channel.kills).toEqual([]);
    });

    it('should kill an engine that ignores the exit command', async () => {
      const engine = new FakeEngine({ ignoreExit: true });
      session = createTestSession(engine, { stopGraceMs: 30 });
      await session.start();

      await session.stop();

      expect(engine.channel.kills).toEqual(['SIGKILL']);
      expect(session.getState()).toBe('uninitialized');
    });

    it('should allow a fresh start afterwards', async () => {
      const engine = new FakeEngine();
      session = createTestSession(engine);
      await session.start();
      await session.stop();

      const result = await session.start();

      expect(result.pid).toBe(4243);
      expect(session.status().commandCount).toBe(0);
    });
  });

  describe('status and health', () => {
    it('should track counters and history', async () => {
      const engine = new FakeEngine().respond('puts a', 'a').respond('bad', 'invalid command name "bad"');
      session = createTestSession(engine);
      await session.start();

      await session.execute('puts a');
      await session.execute('bad');
      const status = session.status();

      expect(status.state).toBe('ready');
      expect(status.pid).toBe(4242);
      expect(status.commandCount).toBe(2);
      expect(status.errorCount).toBe(1);
      expect(status.queueDepth).toBe(0);
      expect(status.history.map((entry) => [entry.command, entry.completion])).toEqual([
        ['puts a', 'prompt-matched'],
        ['bad', 'error-detected'],
      ]);
      expect(status.averageCommandMs).toBeDefined();
      expect(status.lastCommandAt).toBeDefined();
    });

    it('should report health through the marker command', async () => {
      const engine = new FakeEngine().respond('puts HEALTH_OK', 'HEALTH_OK');
      session = createTestSession(engine);

      expect(await session.checkHealth()).toBe(false);
      await session.start();
      expect(await session.checkHealth()).toBe(true);
    });

    it('should notify state listeners until unsubscribed', async () => {
      const engine = new FakeEngine().respond('puts a', 'a');
      session = createTestSession(engine);
      const seen: Array<[SessionState, SessionState]> = [];
      const unsubscribe = session.onStateChange((next, previous) => seen.push([next, previous]));

      await session.start();
      await session.execute('puts a');
      unsubscribe();
      await session.stop();

      expect(seen).toEqual([
        ['starting', 'uninitialized'],
        ['ready', 'starting'],
        ['busy', 'ready'],
        ['ready', 'busy'],
      ]);
    });
  });
});
