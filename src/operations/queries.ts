import { InvalidArgumentError } from '../errors.js';
import { parseObjectList } from '../parsers/objects.js';
import type { DesignObject } from '../parsers/types.js';
import type { CompletionKind } from '../session/types.js';
import { tclQuote } from '../tcl.js';
import { outcome } from './detail.js';
import type { OperationContext, OperationResult } from './types.js';

const MAX_HIERARCHY_CELLS = 500;
const MAX_REFERENCE_LOOKUPS = 100;

// ============================================================================
// Hierarchy
// ============================================================================

/** Instance name → children */
export interface HierarchyTree {
  [instance: string]: HierarchyTree;
}

export interface HierarchyResult extends OperationResult {
  cells: string[];
  cellCount: number;
  /** Reference cell (module) of the first cells */
  cellModules: Record<string, string>;
  tree: HierarchyTree;
  maxDepth: number;
  truncated?: boolean;
  note?: string;
  error?: string;
}

export interface HierarchyOptions {
  /** 0 is the top level */
  maxDepth?: number;
  instancePattern?: string;
}

function buildTree(cells: string[]): HierarchyTree {
  const tree: HierarchyTree = {};
  for (const cell of [...cells].sort()) {
    let level = tree;
    for (const part of cell.split('/')) {
      const next = level[part] ?? {};
      level[part] = next;
      level = next;
    }
  }
  return tree;
}

export async function getDesignHierarchy(
  ctx: OperationContext,
  options: HierarchyOptions = {}
): Promise<HierarchyResult> {
  const startTime = Date.now();
  const maxDepth = options.maxDepth ?? 3;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new InvalidArgumentError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }

  const tx = await ctx.runner.execute(`get_cells -hierarchical ${tclQuote(options.instancePattern ?? '*')}`);
  const base = outcome(tx);
  const parsed = parseObjectList('hierarchy', tx.output);

  if (!base.success || parsed.objects.length === 0) {
    return {
      ...base,
      cells: [],
      cellCount: 0,
      cellModules: {},
      tree: {},
      maxDepth,
      error: base.success ? 'No cells found' : tx.output,
    };
  }

  const cells = parsed.objects
    .filter((object) => (object.depth ?? 0) <= maxDepth)
    .map((object) => object.name);

  const cellModules: Record<string, string> = {};
  for (const cell of cells.slice(0, MAX_REFERENCE_LOOKUPS)) {
    const refTx = await ctx.runner.execute(`get_property REF_NAME [get_cells ${tclQuote(cell)}]`);
    const refName = refTx.output.trim();
    if (refTx.completion === 'prompt-matched' && refName) {
      cellModules[cell] = refName;
    }
  }

  const result: HierarchyResult = {
    ...base,
    elapsedMs: Date.now() - startTime,
    cells: cells.slice(0, MAX_HIERARCHY_CELLS),
    cellCount: cells.length,
    cellModules,
    tree: buildTree(cells.slice(0, MAX_HIERARCHY_CELLS)),
    maxDepth,
  };
  if (cells.length > MAX_HIERARCHY_CELLS) {
    result.truncated = true;
    result.note = 'Cell list truncated. Narrow instancePattern or generate the hierarchy report to a file.';
  }
  return result;
}

// ============================================================================
// Ports, nets, cells
// ============================================================================

export interface ObjectQueryResult extends OperationResult {
  /** Names as returned by the engine */
  names: string[];
  /** Same names with bus bits folded */
  objects: DesignObject[];
  error?: string;
}

export interface PatternOptions {
  pattern?: string;
  limit?: number;
}

function checkLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError(`limit must be a positive integer, got ${limit}`);
  }
  return limit;
}

async function queryObjects(
  ctx: OperationContext,
  kind: 'ports' | 'nets' | 'cells',
  command: string
): Promise<ObjectQueryResult> {
  const tx = await ctx.runner.execute(command);
  const base = outcome(tx);
  if (!base.success) {
    return { ...base, names: [], objects: [], error: tx.output };
  }
  const parsed = parseObjectList(kind, tx.output);
  return {
    ...base,
    names: parsed.objects.flatMap((object) => expandBus(object)),
    objects: parsed.objects,
  };
}

function expandBus(object: DesignObject): string[] {
  if (!object.range) {
    return [object.name];
  }
  const names: string[] = [];
  for (let bit = object.range.msb; bit >= object.range.lsb; bit--) {
    names.push(`${object.name}[${bit}]`);
  }
  return names.length === object.width ? names : [object.name];
}

export async function getPorts(ctx: OperationContext): Promise<ObjectQueryResult> {
  return queryObjects(ctx, 'ports', 'get_ports *');
}

export async function getNets(ctx: OperationContext, options: PatternOptions = {}): Promise<ObjectQueryResult> {
  const limit = checkLimit(options.limit ?? 100);
  return queryObjects(ctx, 'nets', `lrange [get_nets ${tclQuote(options.pattern ?? '*')}] 0 ${limit - 1}`);
}

export async function getCells(ctx: OperationContext, options: PatternOptions = {}): Promise<ObjectQueryResult> {
  const limit = checkLimit(options.limit ?? 100);
  return queryObjects(ctx, 'cells', `lrange [get_cells ${tclQuote(options.pattern ?? '*')}] 0 ${limit - 1}`);
}

// ============================================================================
// Raw commands
// ============================================================================

export interface RawCommandResult extends OperationResult {
  completion: CompletionKind;
  output: string;
  sent: boolean;
  truncated: boolean;
  totalLength: number;
  artifactPath?: string;
  reportId?: string;
  staleOutput?: string;
}

/**
 * Send a Tcl command as is; long output is spilled to an artifact
 */
export async function runTcl(
  ctx: OperationContext,
  command: string,
  options: { timeoutMs?: number } = {}
): Promise<RawCommandResult> {
  const tx = await ctx.runner.execute(command, options);
  const envelope = await ctx.store.envelopeWithArtifact(tx.output, ctx.config.reports.maxResponseChars, 'tcl');

  const result: RawCommandResult = {
    ...outcome(tx),
    completion: tx.completion,
    output: envelope.content,
    sent: tx.sent,
    truncated: envelope.truncated,
    totalLength: envelope.totalLength,
  };
  if (envelope.artifactPath) {
    result.artifactPath = envelope.artifactPath;
  }
  if (envelope.reportId) {
    result.reportId = envelope.reportId;
  }
  if (tx.staleOutput) {
    result.staleOutput = tx.staleOutput;
  }
  return result;
}
