/**
 * Terminal escape handling
 * The engine runs on a PTY, so its output can carry color codes, cursor
 * movement and carriage returns that have no place in a response.
 */

// CSI sequences (ESC [ params final), OSC sequences (ESC ] ... BEL|ST) and
// two-character escapes (ESC followed by one char)
const CSI_PATTERN = /\x1b\[[0-?]*[ -/]*[@-~]/g;
const OSC_PATTERN = /\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)/g;
const SHORT_ESCAPE_PATTERN = /\x1b[@-Z\\-_]/g;

/**
 * Remove terminal control sequences and normalize line endings to \n
 *
 * @example
 * stripControlSequences('\x1b[32mok\x1b[0m\r\n')  // → "ok\n"
 */
export function stripControlSequences(input: string): string {
  return input
    .replace(OSC_PATTERN, '')
    .replace(CSI_PATTERN, '')
    .replace(SHORT_ESCAPE_PATTERN, '')
    .replace(/\r+\n/g, '\n')
    .replace(/\r/g, '')
    .replace(/[\x00-\x08\x0b\x0c\x0e-\x1f\x7f]/g, '');
}

/**
 * Escape special characters for display
 * Used when logging raw channel chunks
 */
export function escapeForDisplay(input: string): string {
  return input
    .replace(/\\/g, '\\\\')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t')
    .replace(/\x1b/g, '\\x1b')
    .replace(/[\x00-\x1f]/g, (char) => {
      const code = char.charCodeAt(0);
      return `\\x${code.toString(16).padStart(2, '0')}`;
    });
}
