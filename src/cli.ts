#!/usr/bin/env node

import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import * as readline from 'node:readline';
import { Command, InvalidArgumentError as CommanderArgumentError } from 'commander';
import { z } from 'zod';
import { EdaBridge, type BridgeDependencies } from './bridge.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { createLogger, resolveLevel, setDefaultLogLevel } from './logger.js';
import {
  generateFullReport,
  getClocks,
  getDesignHierarchy,
  getMessages,
  getTimingPaths,
  getTimingSummary,
  getUtilization,
  isDetailLevel,
  isSeverityFilter,
  readReportLines,
  readReportSection,
  runTcl,
  type RawCommandResult,
} from './operations/index.js';
import type { ReportRef } from './reports/store.js';
import { isBreakpointCondition, isRadix, isSimulationMode } from './simulation/controller.js';

const PackageJsonSchema = z.object({ version: z.string() });
const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8'))
);

/**
 * Logs go to stderr; stdout only carries results
 */
const logger = createLogger('cli');

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function positiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new CommanderArgumentError('must be a positive integer');
  }
  return parsed;
}

function nonNegativeInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new CommanderArgumentError('must be a non-negative integer');
  }
  return parsed;
}

/**
 * What the commands run against; tests swap in a fake engine and scripted input
 */
export interface CliDependencies extends BridgeDependencies {
  /** Console input (defaults to stdin) */
  input?: NodeJS.ReadableStream;
  /** Where the console prompt is drawn (defaults to stderr) */
  promptOutput?: NodeJS.WritableStream;
}

interface BridgeOptions {
  config?: string;
  executable?: string;
  timeout?: number;
  logLevel?: string;
}

async function loadBridge(options: { config?: string; logLevel?: string }, deps: CliDependencies): Promise<EdaBridge> {
  const loaded = await loadConfig(options.config ? { configPath: options.config } : {});
  const config = { ...loaded, logLevel: resolveLevel(options.logLevel) ?? loaded.logLevel };
  setDefaultLogLevel(config.logLevel);
  return new EdaBridge(config, deps);
}

async function openBridge(options: BridgeOptions, deps: CliDependencies): Promise<EdaBridge> {
  const bridge = await loadBridge(options, deps);
  await bridge.startSession({
    ...(options.executable ? { executable: options.executable } : {}),
    ...(options.timeout ? { commandTimeoutMs: options.timeout } : {}),
  });
  return bridge;
}

/**
 * A bare 8-character id names a stored report; anything else is a path
 */
function toReportRef(value: string): ReportRef {
  return /^[0-9a-f]{8}$/i.test(value) && !existsSync(value) ? { reportId: value } : { filePath: value };
}

// ============================================
// exec
// ============================================

async function handleExecCommand(commands: string[], options: BridgeOptions, deps: CliDependencies): Promise<void> {
  const bridge = await openBridge(options, deps);
  try {
    const results: Array<RawCommandResult & { command: string }> = [];
    for (const command of commands) {
      results.push({ command, ...(await runTcl(bridge.context, command)) });
    }
    printJson(results);
    if (results.some((result) => !result.success)) {
      process.exitCode = 1;
    }
  } finally {
    await bridge.dispose();
  }
}

// ============================================
// console
// ============================================

const CONSOLE_HELP = `Lines are sent to the engine as Tcl. Bridge commands start with ':'
  :status                      session statistics
  :health                      probe the engine, restarting it if needed
  :host                        host memory and session state
  :timing [detail]             parsed timing summary
  :paths [count]               worst setup paths
  :util [hier]                 parsed utilization
  :clocks                      parsed clocks
  :messages [severity]         engine messages
  :hierarchy [depth]           design hierarchy
  :report <type>               write a full report to a file
  :read <id|path> [start] [n]  read lines of a report
  :sim launch [mode] [top]     launch the simulator
  :sim run <time|forever>      run the simulation
  :sim step [n] | restart | close | state | time
  :sim value <signal> [radix]  read a signal
  :sim bp <signal> [edge]      add a breakpoint
  :quit`;

async function runBridgeCommand(bridge: EdaBridge, line: string): Promise<unknown> {
  const [name = '', ...args] = line.slice(1).trim().split(/\s+/);
  const ctx = bridge.context;

  switch (name) {
    case 'help':
      return CONSOLE_HELP;
    case 'status':
      return bridge.sessionStatus();
    case 'health':
      return bridge.checkHealth(true);
    case 'host':
      return bridge.hostStatus();
    case 'timing': {
      const detail = args[0] ?? 'summary';
      return getTimingSummary(ctx, { detailLevel: isDetailLevel(detail) ? detail : 'summary' });
    }
    case 'paths':
      return getTimingPaths(ctx, { numPaths: args[0] ? positiveInt(args[0]) : 10 });
    case 'util':
      return getUtilization(ctx, { hierarchical: args[0] === 'hier' });
    case 'clocks':
      return getClocks(ctx);
    case 'messages': {
      const severity = args[0] ?? 'all';
      return getMessages(ctx, { severity: isSeverityFilter(severity) ? severity : 'all' });
    }
    case 'hierarchy':
      return getDesignHierarchy(ctx, { maxDepth: args[0] ? nonNegativeInt(args[0]) : 3 });
    case 'report':
      return generateFullReport(ctx, args[0] ?? 'timing');
    case 'read': {
      if (!args[0]) {
        return 'usage: :read <id|path> [start] [n]';
      }
      return readReportLines(ctx, toReportRef(args[0]), {
        startLine: args[1] ? positiveInt(args[1]) : 1,
        numLines: args[2] ? positiveInt(args[2]) : 100,
      });
    }
    case 'sim':
      return runSimulationCommand(bridge, args);
    default:
      return `Unknown command ':${name}'. Type :help for the list.`;
  }
}

async function runSimulationCommand(bridge: EdaBridge, args: string[]): Promise<unknown> {
  const [sub = 'state', first, second] = args;
  const sim = bridge.simulation;

  switch (sub) {
    case 'launch': {
      const mode = first ?? 'behavioral';
      if (!isSimulationMode(mode)) {
        return `Unknown simulation mode '${mode}'`;
      }
      return sim.launch(mode, second);
    }
    case 'run':
      return sim.run(first ?? '100ns');
    case 'step':
      return sim.step(first ? positiveInt(first) : 1);
    case 'restart':
      return sim.restart();
    case 'close':
      return sim.close();
    case 'time':
      return sim.getTime();
    case 'value':
      if (!first) {
        return 'usage: :sim value <signal> [radix]';
      }
      if (second !== undefined && !isRadix(second)) {
        return `Unknown radix '${second}'`;
      }
      return sim.getSignalValue(first, second ?? 'hex');
    case 'bp':
      if (!first) {
        return 'usage: :sim bp <signal> [posedge|negedge|change]';
      }
      if (second !== undefined && !isBreakpointCondition(second)) {
        return `Unknown breakpoint condition '${second}'`;
      }
      return sim.addBreakpoint(first, second ?? 'change');
    default:
      return sim.state();
  }
}

async function handleConsoleCommand(options: BridgeOptions, deps: CliDependencies): Promise<void> {
  const bridge = await openBridge(options, deps);
  const rl = readline.createInterface({
    input: deps.input ?? process.stdin,
    output: deps.promptOutput ?? process.stderr,
    terminal: deps.input === undefined && process.stdin.isTTY === true,
  });
  rl.setPrompt('tcl> ');

  logger.info(`Engine ready (pid ${bridge.session.pid ?? '?'}). Type :help for bridge commands.`);
  rl.prompt();

  try {
    for await (const input of rl) {
      const line = input.trim();
      if (line === ':quit' || line === ':exit') {
        break;
      }
      if (line) {
        try {
          if (line.startsWith(':')) {
            const result = await runBridgeCommand(bridge, line);
            if (typeof result === 'string') {
              console.log(result);
            } else {
              printJson(result);
            }
          } else {
            const result = await runTcl(bridge.context, line);
            if (result.staleOutput) {
              logger.warn(`Late output from an earlier command:\n${result.staleOutput}`);
            }
            console.log(result.output);
            if (result.truncated) {
              logger.info(`Output truncated at ${result.output.length} of ${result.totalLength} chars; full text in report ${result.reportId ?? '?'}`);
            }
            if (result.completion !== 'prompt-matched') {
              logger.warn(`Command ended with ${result.completion}`);
            }
          }
        } catch (error) {
          logger.error(errorMessage(error));
        }
      }
      rl.prompt();
    }
  } finally {
    rl.close();
    await bridge.dispose();
  }
}

// ============================================
// read-report
// ============================================

interface ReadReportOptions {
  config?: string;
  logLevel?: string;
  offset?: number;
  length?: number;
  startLine?: number;
  numLines?: number;
  search?: string;
}

async function handleReadReportCommand(ref: string, options: ReadReportOptions, deps: CliDependencies): Promise<void> {
  const bridge = await loadBridge(options, deps);
  const reportRef = toReportRef(ref);

  if (options.offset !== undefined || options.length !== undefined) {
    printJson(await readReportSection(bridge.context, reportRef, options.offset ?? 0, options.length ?? 4000));
    return;
  }

  printJson(
    await readReportLines(bridge.context, reportRef, {
      ...(options.startLine !== undefined ? { startLine: options.startLine } : {}),
      ...(options.numLines !== undefined ? { numLines: options.numLines } : {}),
      ...(options.search ? { searchPattern: options.search } : {}),
    })
  );
}

/**
 * Report a failed command and set the exit code
 */
function withErrors<A extends unknown[]>(handler: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await handler(...args);
    } catch (error) {
      logger.error(errorMessage(error));
      process.exitCode = 1;
    }
  };
}

/**
 * Create and configure the CLI program
 */
export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('eda-bridge')
    .description('Drive a persistent EDA Tcl console from the command line')
    .version(packageJson.version);

  program
    .command('exec <commands...>')
    .description('Start the engine, run each Tcl command, print the transactions as JSON, stop')
    .option('-c, --config <path>', 'Configuration file (defaults to ./eda-bridge.yaml when present)')
    .option('-e, --executable <path>', 'Engine executable (overrides configuration)')
    .option('-t, --timeout <ms>', 'Per-command timeout in milliseconds', positiveInt)
    .option('--log-level <level>', 'debug, info, warn, error or silent')
    .action(withErrors((commands: string[], options: BridgeOptions) => handleExecCommand(commands, options, deps)));

  program
    .command('console')
    .description('Interactive console over a persistent engine session')
    .option('-c, --config <path>', 'Configuration file (defaults to ./eda-bridge.yaml when present)')
    .option('-e, --executable <path>', 'Engine executable (overrides configuration)')
    .option('-t, --timeout <ms>', 'Per-command timeout in milliseconds', positiveInt)
    .option('--log-level <level>', 'debug, info, warn, error or silent')
    .action(withErrors((options: BridgeOptions) => handleConsoleCommand(options, deps)));

  program
    .command('read-report <report>')
    .description('Read part of a stored report by id or path')
    .option('-c, --config <path>', 'Configuration file (for the reports directory)')
    .option('--offset <chars>', 'Character offset', nonNegativeInt)
    .option('--length <chars>', 'Number of characters', positiveInt)
    .option('--start-line <line>', 'First line (1-based)', positiveInt)
    .option('--num-lines <count>', 'Number of lines', positiveInt)
    .option('--search <pattern>', 'Open the window around the first case-insensitive match')
    .option('--log-level <level>', 'debug, info, warn, error or silent')
    .action(withErrors((ref: string, options: ReadReportOptions) => handleReadReportCommand(ref, options, deps)));

  return program;
}

/**
 * Parse command line arguments and execute
 */
export async function run(argv: string[] = process.argv, deps: CliDependencies = {}): Promise<void> {
  await createProgram(deps).parseAsync(argv);
}

if (require.main === module) {
  process.on('unhandledRejection', (reason) => {
    console.error('[FATAL] Unhandled rejection:', reason);
    process.exit(1);
  });

  run().catch((error: unknown) => {
    console.error(`[FATAL] ${errorMessage(error)}`);
    process.exit(1);
  });
}
