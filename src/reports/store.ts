import { promises as fs } from 'node:fs';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import {
  FileNotFoundError,
  InvalidArgumentError,
  RangeOutOfBoundsError,
  ReportNotFoundError,
  errorMessage,
  isNotFound,
} from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { CommandRunner } from '../session/types.js';
import { tclQuote } from '../tcl.js';
import { countLines, envelope, type Envelope } from './envelope.js';

export interface ReportStoreOptions {
  directory: string;
  /** Artifacts older than this are deleted whenever the directory is prepared */
  cacheHours: number;
  logger?: Logger;
}

export interface ReportArtifact {
  reportId: string;
  filePath: string;
  reportType: string;
  createdAt: string;
  sizeBytes: number;
  totalLength: number;
  lineCount: number;
}

export interface FullReportResult {
  success: boolean;
  elapsedMs: number;
  artifact?: ReportArtifact;
  error?: string;
}

export interface ReportSection {
  filePath: string;
  offset: number;
  content: string;
  returnedLength: number;
  totalLength: number;
  hasMore: boolean;
}

export interface LineWindowOptions {
  /** 1-based */
  startLine?: number;
  numLines?: number;
  /** Case-insensitive regular expression; the window opens around the first match */
  searchPattern?: string;
}

export interface LineWindow {
  filePath: string;
  startLine: number;
  endLine: number;
  totalLines: number;
  returnedLines: number;
  content: string;
  matchLine?: number;
  warning?: string;
}

/** A report id from this store, or a path to any text file */
export type ReportRef = { reportId: string } | { filePath: string };

const DEFAULT_WINDOW_LINES = 100;

/**
 * On-disk artifacts for output too large to return inline
 *
 * Files are named `<type>_<id>.txt` so an id can still be resolved after the
 * in-memory index is gone (e.g. from another process).
 */
export class ReportStore {
  private readonly index = new Map<string, ReportArtifact>();
  private readonly logger: Logger;

  constructor(private readonly options: ReportStoreOptions) {
    this.logger = options.logger ?? createLogger('reports');
  }

  get directory(): string {
    return this.options.directory;
  }

  /**
   * Create the directory and drop expired artifacts
   */
  async prepare(): Promise<string> {
    await fs.mkdir(this.directory, { recursive: true });
    await this.cleanup();
    return this.directory;
  }

  /**
   * Delete artifacts older than the retention window
   * @returns Number of files removed
   */
  async cleanup(now: number = Date.now()): Promise<number> {
    const cutoff = now - this.options.cacheHours * 3600 * 1000;
    let removed = 0;

    for (const name of await fs.readdir(this.directory)) {
      if (!name.endsWith('.txt')) {
        continue;
      }
      const filePath = path.join(this.directory, name);
      try {
        const stat = await fs.stat(filePath);
        if (stat.mtimeMs < cutoff) {
          await fs.unlink(filePath);
          removed++;
          this.forget(filePath);
        }
      } catch (error) {
        this.logger.debug(`Skipping ${name} during cleanup: ${errorMessage(error)}`);
      }
    }

    if (removed > 0) {
      this.logger.info(`Removed ${removed} expired report(s) from ${this.directory}`);
    }
    return removed;
  }

  newReportId(): string {
    return uuidv4().slice(0, 8);
  }

  pathFor(reportType: string, reportId: string): string {
    return path.join(this.directory, `${reportType}_${reportId}.txt`);
  }

  // ============================================================================
  // Writing
  // ============================================================================

  /**
   * Run a report command with `-file` and index the file it wrote
   *
   * A command that prints instead of writing leaves no file behind; its
   * output is written to the destination instead.
   */
  async generateFullReport(
    runner: CommandRunner,
    command: string,
    options: { reportType: string; destinationPath?: string }
  ): Promise<FullReportResult> {
    const startTime = Date.now();
    await this.prepare();

    const reportId = this.newReportId();
    const filePath = options.destinationPath
      ? path.resolve(options.destinationPath)
      : this.pathFor(options.reportType, reportId);

    const tx = await runner.execute(`${command} -file ${tclQuote(filePath)}`);
    if (tx.completion !== 'prompt-matched') {
      return {
        success: false,
        elapsedMs: Date.now() - startTime,
        error: tx.errors.join('\n') || tx.output || `Report command ended with ${tx.completion}`,
      };
    }

    if (!(await exists(filePath))) {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, tx.output, 'utf-8');
    }

    const artifact = await this.register(reportId, filePath, options.reportType);
    this.logger.info(`Wrote ${options.reportType} report ${reportId} (${artifact.lineCount} lines) to ${filePath}`);
    return { success: true, elapsedMs: Date.now() - startTime, artifact };
  }

  /**
   * Write text as a new artifact
   */
  async save(content: string, reportType: string): Promise<ReportArtifact> {
    await this.prepare();
    const reportId = this.newReportId();
    const filePath = this.pathFor(reportType, reportId);
    await fs.writeFile(filePath, content, 'utf-8');
    return this.register(reportId, filePath, reportType);
  }

  /**
   * Envelope content; when it does not fit, the complete text is written to
   * an artifact and the envelope points at it
   */
  async envelopeWithArtifact(content: string, maxChars: number, reportType: string): Promise<Envelope> {
    const result = envelope(content, maxChars);
    if (!result.truncated) {
      return result;
    }

    const artifact = await this.save(content, reportType);
    return {
      ...result,
      artifactPath: artifact.filePath,
      reportId: artifact.reportId,
      note: `${result.note ?? 'Output truncated'}. Full text in report ${artifact.reportId}; read it in sections.`,
    };
  }

  // ============================================================================
  // Reading
  // ============================================================================

  /**
   * Resolve a report id (index first, then the directory) or check a path
   */
  async resolve(ref: ReportRef): Promise<string> {
    if ('filePath' in ref) {
      if (!(await exists(ref.filePath))) {
        throw new FileNotFoundError(ref.filePath);
      }
      return ref.filePath;
    }

    const indexed = this.index.get(ref.reportId);
    if (indexed) {
      return indexed.filePath;
    }

    const suffix = `_${ref.reportId}.txt`;
    const names = await fs.readdir(this.directory).catch((error: unknown) => {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    });
    const match = names.find((name) => name.endsWith(suffix));
    if (!match) {
      throw new ReportNotFoundError(ref.reportId);
    }
    return path.join(this.directory, match);
  }

  /**
   * Character range of an artifact
   * A range running past the end is clipped; one starting past it is an error.
   */
  async readReportSection(filePath: string, offset: number, length: number): Promise<ReportSection> {
    if (!Number.isInteger(offset) || !Number.isInteger(length) || offset < 0 || length < 0) {
      throw new InvalidArgumentError(`Offset and length must be non-negative integers, got ${offset} and ${length}`);
    }

    const text = await readText(filePath);
    if (offset > text.length || (offset === text.length && text.length > 0)) {
      throw new RangeOutOfBoundsError(offset, length, text.length);
    }

    const content = text.slice(offset, offset + length);
    return {
      filePath,
      offset,
      content,
      returnedLength: content.length,
      totalLength: text.length,
      hasMore: offset + content.length < text.length,
    };
  }

  /**
   * Window of lines from an artifact
   */
  async readReportLines(ref: ReportRef, options: LineWindowOptions = {}): Promise<LineWindow> {
    const filePath = await this.resolve(ref);
    const numLines = options.numLines ?? DEFAULT_WINDOW_LINES;
    if (!Number.isInteger(numLines) || numLines < 1) {
      throw new InvalidArgumentError(`numLines must be a positive integer, got ${numLines}`);
    }

    const lines = splitLines(await readText(filePath));
    let startLine = Math.max(1, options.startLine ?? 1);
    let matchLine: number | undefined;

    if (options.searchPattern) {
      const pattern = compilePattern(options.searchPattern);
      const index = lines.findIndex((line) => pattern.test(line));
      if (index < 0) {
        return {
          filePath,
          startLine,
          endLine: startLine - 1,
          totalLines: lines.length,
          returnedLines: 0,
          content: '',
          warning: `Pattern '${options.searchPattern}' not found in file`,
        };
      }
      matchLine = index + 1;
      startLine = Math.max(1, matchLine - Math.floor(numLines / 4));
    }

    const selected = lines.slice(startLine - 1, startLine - 1 + numLines);
    const window: LineWindow = {
      filePath,
      startLine,
      endLine: startLine - 1 + selected.length,
      totalLines: lines.length,
      returnedLines: selected.length,
      content: selected.join(''),
    };
    if (matchLine !== undefined) {
      window.matchLine = matchLine;
    }
    return window;
  }

  lookup(reportId: string): ReportArtifact | undefined {
    return this.index.get(reportId);
  }

  list(): ReportArtifact[] {
    return [...this.index.values()];
  }

  private async register(reportId: string, filePath: string, reportType: string): Promise<ReportArtifact> {
    const [stat, text] = await Promise.all([fs.stat(filePath), readText(filePath)]);
    const artifact: ReportArtifact = {
      reportId,
      filePath,
      reportType,
      createdAt: new Date().toISOString(),
      sizeBytes: stat.size,
      totalLength: text.length,
      lineCount: countLines(text),
    };
    this.index.set(reportId, artifact);
    return artifact;
  }

  private forget(filePath: string): void {
    for (const [reportId, artifact] of this.index) {
      if (artifact.filePath === filePath) {
        this.index.delete(reportId);
      }
    }
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

async function readText(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new FileNotFoundError(filePath);
    }
    throw error;
  }
}

/**
 * Lines with their terminators, so a window joins back to the original text
 */
function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source, 'i');
  } catch (error) {
    throw new InvalidArgumentError(`Invalid search pattern '${source}': ${errorMessage(error)}`);
  }
}
