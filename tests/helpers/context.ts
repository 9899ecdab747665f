import { parseConfig, type BridgeConfigInput } from '../../src/config.js';
import type { OperationContext } from '../../src/operations/types.js';
import { ReportStore } from '../../src/reports/store.js';
import type { CommandRunner } from '../../src/session/types.js';
import { silentLogger } from './session.js';

/**
 * Operation context over any runner, with reports kept in `directory`
 */
export function createTestContext(
  runner: CommandRunner,
  directory: string,
  reports: NonNullable<BridgeConfigInput['reports']> = {}
): OperationContext {
  const config = parseConfig({ reports: { directory, ...reports }, logLevel: 'silent' });
  return {
    runner,
    store: new ReportStore({ directory, cacheHours: config.reports.cacheHours, logger: silentLogger }),
    config,
    logger: silentLogger,
  };
}
