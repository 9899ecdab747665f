import type { Transaction } from '../session/types.js';
import type { DetailLevel, OperationContext, OperationResult, RawDetail } from './types.js';

const DETAIL_LEVELS: readonly DetailLevel[] = ['summary', 'standard', 'full'];

export function isDetailLevel(value: string): value is DetailLevel {
  return DETAIL_LEVELS.some((level) => level === value);
}

/**
 * Envelope raw text for the requested detail level
 * Text that does not fit is written to an artifact the result points at.
 */
export async function attachRaw(
  ctx: OperationContext,
  raw: string,
  level: DetailLevel,
  reportType: string
): Promise<RawDetail> {
  if (level === 'summary') {
    return {};
  }

  const limit = ctx.config.reports.maxResponseChars;
  const result = await ctx.store.envelopeWithArtifact(raw, level === 'standard' ? Math.floor(limit / 2) : limit, reportType);
  if (!result.truncated) {
    return { raw: result.content };
  }

  const detail: RawDetail = {
    raw: result.content,
    rawTruncated: true,
    rawTotalLength: result.totalLength,
  };
  if (result.artifactPath) {
    detail.artifactPath = result.artifactPath;
  }
  if (result.reportId) {
    detail.reportId = result.reportId;
  }
  if (result.note) {
    detail.note = result.note;
  }
  return detail;
}

/**
 * success / elapsedMs / errors of one transaction
 */
export function outcome(tx: Transaction): OperationResult {
  const result: OperationResult = {
    success: tx.completion === 'prompt-matched',
    elapsedMs: tx.elapsedMs,
  };
  if (tx.errors.length > 0) {
    result.errors = tx.errors;
  }
  return result;
}

/**
 * Parsed report without its raw text
 */
export function withoutRaw<T extends { raw: string }>(parsed: T): Omit<T, 'raw'> {
  const { raw: _raw, ...rest } = parsed;
  return rest;
}
