/**
 * eda-console-bridge library entry point
 *
 * The command line program lives in cli.ts; everything here can be used
 * in-process by another tool that wants a managed engine session.
 */

export { EdaBridge, type BridgeDependencies, type HealthAction, type HealthResult, type SessionStartResult } from './bridge.js';
export {
  loadConfig,
  parseConfig,
  applyEnvOverrides,
  sessionSettingsFrom,
  errorPatternsFrom,
  CONFIG_FILE_NAME,
  type BridgeConfig,
  type BridgeConfigInput,
  type LoadConfigOptions,
} from './config.js';
export { loadEnvFiles, findProjectRoot } from './env-loader.js';
export * from './errors.js';
export { createLogger, setDefaultLogLevel, resolveLevel, type Logger, type LogLevel } from './logger.js';
export { tclQuote, assertTclWord } from './tcl.js';
export * from './session/index.js';
export * from './parsers/index.js';
export * from './simulation/index.js';
export * from './reports/index.js';
export * from './operations/index.js';
