import { stripControlSequences } from './escape.js';

const DEFAULT_TAIL_WINDOW = 512;

/**
 * Escape a literal string for use inside a RegExp
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Transaction framer
 *
 * Accumulates the raw character stream of one transaction and decides whether
 * it has reached the response boundary: the prompt sitting at the start of a
 * line with nothing but blanks after it, at the very end of what has been read.
 * Only a bounded tail of the stream is inspected per chunk, so multi-megabyte
 * reports do not turn into quadratic rescans.
 */
export class TransactionFramer {
  private chunks: string[] = [];
  private tail = '';
  private length = 0;
  private readonly promptAtEndPattern: RegExp;

  constructor(
    readonly prompt: string,
    private readonly tailWindow: number = DEFAULT_TAIL_WINDOW
  ) {
    if (!prompt) {
      throw new Error('Prompt cannot be empty');
    }
    this.promptAtEndPattern = new RegExp(`${escapeRegExp(prompt)}[ \\t]*$`);
  }

  /**
   * Append a chunk and report whether the prompt is now at the end
   */
  feed(chunk: string): boolean {
    if (chunk.length > 0) {
      this.chunks.push(chunk);
      this.length += chunk.length;
      this.tail = (this.tail + chunk).slice(-this.tailWindow);
    }
    return this.promptAtEnd();
  }

  /**
   * True when the buffered stream ends with the prompt at a line start
   * Prompt-like text followed by more output, or preceded by other text on
   * the same line, does not count.
   */
  promptAtEnd(): boolean {
    const text = stripControlSequences(this.tail);
    const match = this.promptAtEndPattern.exec(text);
    if (!match) {
      return false;
    }

    const before = text.slice(0, match.index);
    const lineStart = before.lastIndexOf('\n');
    if (before.slice(lineStart + 1).trim() !== '') {
      return false;
    }

    // With no newline inside the window, only a window holding the whole
    // stream proves the prompt starts a line
    return lineStart >= 0 || this.length <= this.tailWindow;
  }

  /**
   * Normalized text read so far (control sequences removed, \n line endings)
   */
  text(): string {
    return stripControlSequences(this.chunks.join(''));
  }

  /**
   * Raw character count read so far
   */
  get size(): number {
    return this.length;
  }

  /**
   * Last characters of the normalized stream, for diagnostics
   */
  tailText(maxChars: number = 200): string {
    return stripControlSequences(this.tail).slice(-maxChars);
  }

  reset(): void {
    this.chunks = [];
    this.tail = '';
    this.length = 0;
  }
}
