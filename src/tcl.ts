import { InvalidArgumentError } from './errors.js';

/**
 * Quote a value as one Tcl word
 *
 * Braces keep everything literal (brackets, dollars, blanks), so they are the
 * default. A value that itself holds braces or ends in a backslash cannot be
 * braced safely and is double-quoted with Tcl's special characters escaped.
 *
 * @example
 * tclQuote('/proj/my design.xpr')  // → "{/proj/my design.xpr}"
 * tclQuote('a{b')                  // → "\"a\\{b\""
 */
export function tclQuote(value: string): string {
  if (/[\r\n]/.test(value)) {
    throw new InvalidArgumentError(`Value must be a single line: ${JSON.stringify(value)}`);
  }
  if (value === '') {
    return '{}';
  }
  if (!/[{}]/.test(value) && !value.endsWith('\\')) {
    return `{${value}}`;
  }
  return `"${value.replace(/[\\"$[\]{}]/g, '\\$&')}"`;
}

/**
 * Quote several values as a Tcl list
 */
export function tclList(values: string[]): string {
  return `[list ${values.map(tclQuote).join(' ')}]`;
}

const WORD_PATTERN = /^[A-Za-z0-9_.:\-/]+$/;

/**
 * Check a bare word (run name, fileset, radix...) before it is spliced into a
 * command unquoted
 */
export function assertTclWord(value: string, what: string): string {
  if (!WORD_PATTERN.test(value)) {
    throw new InvalidArgumentError(`Invalid ${what}: ${JSON.stringify(value)}`);
  }
  return value;
}
