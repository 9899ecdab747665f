import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parse as parseShell } from 'shell-quote';
import yaml from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage, isNotFound } from './errors.js';
import { loadEnvFiles } from './env-loader.js';
import type { SessionSettings } from './session/types.js';

// ============================================
// Schema
// ============================================

const positiveInt = z.number().int().positive();

export const SessionConfigSchema = z.object({
  executable: z.string().min(1).default('vivado'),
  baseArgs: z.array(z.string()).default(['-mode', 'tcl', '-nojournal', '-nolog']),
  extraArgs: z.array(z.string()).default([]),
  prompt: z.string().min(1).default('Vivado%'),
  lineTerminator: z.string().min(1).default('\n'),
  startupTimeoutMs: positiveInt.default(10_000),
  commandTimeoutMs: positiveInt.default(300_000),
  stopGraceMs: positiveInt.default(5_000),
  promptSettleMs: z.number().int().nonnegative().default(20),
  exitCommand: z.string().min(1).default('exit'),
  interruptOnTimeout: z.boolean().default(false),
  healthCheckTimeoutMs: positiveInt.default(5_000),
  /** Extra line patterns (regular expressions) treated as engine errors */
  errorPatterns: z
    .array(
      z.string().refine((source) => {
        try {
          new RegExp(source);
          return true;
        } catch {
          return false;
        }
      }, 'Invalid regular expression')
    )
    .default([]),
});

export const ReportsConfigSchema = z.object({
  directory: z.string().min(1).default(path.join(os.tmpdir(), 'eda-bridge')),
  maxResponseChars: positiveInt.default(8_000),
  cacheHours: z.number().positive().default(1),
});

export const FlowConfigSchema = z.object({
  synthesisTimeoutMs: positiveInt.default(30 * 60_000),
  implementationTimeoutMs: positiveInt.default(60 * 60_000),
  jobs: positiveInt.default(4),
});

export const SimulationConfigSchema = z.object({
  runTimeoutMs: positiveInt.default(10 * 60_000),
});

export const BridgeConfigSchema = z.object({
  session: SessionConfigSchema.default({}),
  reports: ReportsConfigSchema.default({}),
  flow: FlowConfigSchema.default({}),
  simulation: SimulationConfigSchema.default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
export type BridgeConfigInput = z.input<typeof BridgeConfigSchema>;

export const CONFIG_FILE_NAME = 'eda-bridge.yaml';

// ============================================
// Environment overrides
// ============================================

type RawConfig = Record<string, unknown>;

interface EnvOverride {
  variable: string;
  section?: string;
  key: string;
  parse: (value: string) => unknown;
}

const asNumber = (value: string): unknown => {
  const trimmed = value.trim();
  // Leave garbage as a string so validation names the variable's field
  return trimmed !== '' && Number.isFinite(Number(trimmed)) ? Number(trimmed) : value;
};

const asString = (value: string): unknown => value;

function asArgs(value: string): unknown {
  const words: string[] = [];
  for (const entry of parseShell(value)) {
    if (typeof entry !== 'string') {
      throw new ConfigError(`EDA_BRIDGE_EXTRA_ARGS may only hold plain arguments: ${JSON.stringify(value)}`);
    }
    words.push(entry);
  }
  return words;
}

const ENV_OVERRIDES: EnvOverride[] = [
  { variable: 'EDA_BRIDGE_EXECUTABLE', section: 'session', key: 'executable', parse: asString },
  { variable: 'EDA_BRIDGE_EXTRA_ARGS', section: 'session', key: 'extraArgs', parse: asArgs },
  { variable: 'EDA_BRIDGE_PROMPT', section: 'session', key: 'prompt', parse: asString },
  { variable: 'EDA_BRIDGE_COMMAND_TIMEOUT_MS', section: 'session', key: 'commandTimeoutMs', parse: asNumber },
  { variable: 'EDA_BRIDGE_STARTUP_TIMEOUT_MS', section: 'session', key: 'startupTimeoutMs', parse: asNumber },
  { variable: 'EDA_BRIDGE_REPORTS_DIR', section: 'reports', key: 'directory', parse: asString },
  { variable: 'EDA_BRIDGE_MAX_RESPONSE_CHARS', section: 'reports', key: 'maxResponseChars', parse: asNumber },
  { variable: 'EDA_BRIDGE_LOG_LEVEL', key: 'logLevel', parse: (value) => value.trim().toLowerCase() },
];

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sectionOf(raw: RawConfig, name: string): RawConfig {
  const existing = raw[name];
  if (isRecord(existing)) {
    return existing;
  }
  const created: RawConfig = {};
  raw[name] = created;
  return created;
}

/**
 * Overlay EDA_BRIDGE_* variables onto a raw configuration object
 */
export function applyEnvOverrides(raw: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  for (const override of ENV_OVERRIDES) {
    const value = env[override.variable];
    if (value === undefined || value === '') {
      continue;
    }
    const target = override.section ? sectionOf(raw, override.section) : raw;
    target[override.key] = override.parse(value);
  }
  return raw;
}

// ============================================
// Loading
// ============================================

export interface LoadConfigOptions {
  /** Explicit YAML file; it must exist */
  configPath?: string;
  /** Where eda-bridge.yaml and .env are looked for */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Load .env files into process.env first (default: true) */
  loadDotenv?: boolean;
}

/**
 * Validate a raw configuration object
 * @throws ConfigError naming every offending field
 */
export function parseConfig(raw: unknown): BridgeConfig {
  const result = BridgeConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const formattedErrors = result.error.errors
      .map((err) => `  - ${err.path.join('.') || '(root)'}: ${err.message}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration:\n${formattedErrors}`);
  }
  return result.data;
}

async function readYaml(configPath: string, required: boolean): Promise<RawConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (isNotFound(error) && !required) {
      return {};
    }
    throw new ConfigError(`Cannot read ${configPath}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${path.basename(configPath)}: ${errorMessage(error)}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${path.basename(configPath)} must contain a mapping at the top level`);
  }
  return parsed;
}

/**
 * Resolve configuration: defaults < YAML file < environment
 * Arguments given to start() are applied on top by the caller.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<BridgeConfig> {
  const cwd = options.cwd ?? process.cwd();
  if (options.loadDotenv !== false) {
    loadEnvFiles(cwd);
  }

  const raw = options.configPath
    ? await readYaml(path.resolve(cwd, options.configPath), true)
    : await readYaml(path.join(cwd, CONFIG_FILE_NAME), false);

  return parseConfig(applyEnvOverrides(raw, options.env ?? process.env));
}

/**
 * Session settings derived from the session section
 */
export function sessionSettingsFrom(config: BridgeConfig, cwd?: string): SessionSettings {
  const { errorPatterns: _errorPatterns, ...settings } = config.session;
  return cwd ? { ...settings, cwd } : settings;
}

export function errorPatternsFrom(config: BridgeConfig): RegExp[] {
  return config.session.errorPatterns.map((source) => new RegExp(source));
}
