import { ProcessSession } from '../../src/session/session.js';
import type { SessionSettings } from '../../src/session/types.js';
import { createLogger } from '../../src/logger.js';
import { FakeEngine, FAKE_PROMPT } from './fake-engine.js';

export const silentLogger = createLogger('test', 'silent');

export function testSettings(overrides: Partial<SessionSettings> = {}): SessionSettings {
  return {
    executable: 'vivado',
    baseArgs: ['-mode', 'tcl', '-nojournal', '-nolog'],
    extraArgs: [],
    prompt: FAKE_PROMPT.trim(),
    lineTerminator: '\n',
    startupTimeoutMs: 1000,
    commandTimeoutMs: 1000,
    stopGraceMs: 200,
    promptSettleMs: 5,
    exitCommand: 'exit',
    interruptOnTimeout: false,
    healthCheckTimeoutMs: 500,
    ...overrides,
  };
}

export function createTestSession(
  engine: FakeEngine,
  overrides: Partial<SessionSettings> = {}
): ProcessSession {
  return new ProcessSession(testSettings(overrides), {
    channelFactory: engine.factory,
    logger: silentLogger,
  });
}
