import type { BridgeConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { ReportStore } from '../reports/store.js';
import type { CommandRunner } from '../session/types.js';

/**
 * What every operation needs: a way to send commands, somewhere to put large
 * output, and the configured limits
 */
export interface OperationContext {
  runner: CommandRunner;
  store: ReportStore;
  config: BridgeConfig;
  logger: Logger;
}

/**
 * How much raw engine text goes back next to the parsed fields
 * - summary: none
 * - standard: up to half the inline limit
 * - full: up to the inline limit
 */
export type DetailLevel = 'summary' | 'standard' | 'full';

export interface OperationResult {
  success: boolean;
  elapsedMs: number;
  /** Engine error lines, when there were any */
  errors?: string[];
}

/**
 * Raw text as attached to a result
 */
export interface RawDetail {
  raw?: string;
  rawTruncated?: boolean;
  rawTotalLength?: number;
  /** Complete text, when the raw text did not fit inline */
  artifactPath?: string;
  reportId?: string;
  note?: string;
}
