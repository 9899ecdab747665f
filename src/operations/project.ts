import { tclQuote } from '../tcl.js';
import { outcome } from './detail.js';
import type { OperationContext, OperationResult } from './types.js';

export interface ProjectResult extends OperationResult {
  output: string;
  projectPath?: string;
}

export interface ProjectInfo extends OperationResult {
  name?: string;
  part?: string;
  targetLanguage?: string;
  directory?: string;
}

const INFO_QUERIES = {
  name: 'current_project',
  part: 'get_property PART [current_project]',
  targetLanguage: 'get_property TARGET_LANGUAGE [current_project]',
  directory: 'get_property DIRECTORY [current_project]',
} as const;

type InfoField = keyof typeof INFO_QUERIES;

const INFO_FIELDS: InfoField[] = ['name', 'part', 'targetLanguage', 'directory'];

export async function openProject(ctx: OperationContext, projectPath: string): Promise<ProjectResult> {
  const tx = await ctx.runner.execute(`open_project ${tclQuote(projectPath)}`);
  const result: ProjectResult = { ...outcome(tx), output: tx.output };
  if (result.success) {
    result.projectPath = projectPath;
    ctx.logger.info(`Opened project ${projectPath}`);
  }
  return result;
}

export async function closeProject(ctx: OperationContext): Promise<ProjectResult> {
  const tx = await ctx.runner.execute('close_project');
  return { ...outcome(tx), output: tx.output };
}

/**
 * Name, part, language and directory of the open project
 * Fields the engine refuses to report are left out.
 */
export async function getProjectInfo(ctx: OperationContext): Promise<ProjectInfo> {
  const startTime = Date.now();
  const info: ProjectInfo = { success: true, elapsedMs: 0 };
  const errors: string[] = [];

  for (const field of INFO_FIELDS) {
    const tx = await ctx.runner.execute(INFO_QUERIES[field]);
    if (tx.completion === 'prompt-matched' && tx.output.trim()) {
      info[field] = tx.output.trim();
    } else {
      errors.push(...tx.errors);
    }
  }

  // No name means no project is open
  info.success = info.name !== undefined;
  info.elapsedMs = Date.now() - startTime;
  if (errors.length > 0) {
    info.errors = errors;
  }
  return info;
}
