/**
 * Response extraction and in-band error classification
 */

import { escapeRegExp } from './framer.js';

// Tcl interpreter errors only ever lead the response
const TCL_ERROR_PATTERNS: RegExp[] = [
  /^invalid command name/i,
  /^wrong # args:/i,
  /^can't read ".*": no such variable/i,
  /^expected .* but got/i,
  /^couldn't open/i,
  /^no files matched/i,
];

// Engine errors start the line and carry a bracketed message id:
//   ERROR: [Synth 8-87] can't read file ...
// Table cells such as "| Timing ERROR | 0 |" do not.
const ENGINE_ERROR_PATTERN = /^ERROR:\s*\[/;

const TCL_ERROR_SCAN_LINES = 5;

export interface ErrorClassification {
  tclError: boolean;
  engineError: boolean;
  messages: string[];
}

/**
 * Decide whether a response carries real errors
 *
 * @param output - Cleaned response text
 * @param extraPatterns - Additional line patterns treated as engine errors
 */
export function classifyErrors(output: string, extraPatterns: RegExp[] = []): ErrorClassification {
  const lines = output.trim().split('\n').map((line) => line.trim());
  const classification: ErrorClassification = {
    tclError: false,
    engineError: false,
    messages: [],
  };

  for (const line of lines.slice(0, TCL_ERROR_SCAN_LINES)) {
    if (TCL_ERROR_PATTERNS.some((pattern) => pattern.test(line))) {
      classification.tclError = true;
      classification.messages.push(line);
    }
  }

  for (const line of lines) {
    if (ENGINE_ERROR_PATTERN.test(line) || extraPatterns.some((pattern) => pattern.test(line))) {
      classification.engineError = true;
      if (!classification.messages.includes(line)) {
        classification.messages.push(line);
      }
    }
  }

  return classification;
}

export function isFailure(classification: ErrorClassification): boolean {
  return classification.tclError || classification.engineError;
}

/**
 * Turn the normalized text of one transaction into the response
 *
 * Drops the trailing prompt, the terminal echo of the command (and anything
 * before it), then trims trailing blanks per line and blank lines at both ends.
 */
export function extractResponse(text: string, command: string, prompt: string): string {
  let lines = text.split('\n');

  const trailingPrompt = new RegExp(`^\\s*${escapeRegExp(prompt)}[ \\t]*$`);
  if (lines.length > 0 && trailingPrompt.test(lines[lines.length - 1] ?? '')) {
    lines = lines.slice(0, -1);
  }

  lines = stripEcho(lines, command);

  const trimmed = lines.map((line) => line.replace(/[ \t]+$/, ''));
  let start = 0;
  let end = trimmed.length;
  while (start < end && trimmed[start] === '') {
    start++;
  }
  while (end > start && trimmed[end - 1] === '') {
    end--;
  }
  return trimmed.slice(start, end).join('\n');
}

function stripEcho(lines: string[], command: string): string[] {
  const echoed = command.trim();
  if (!echoed) {
    return lines;
  }
  // Only look a few lines in: the echo is at the head of the response
  const echoAt = lines.slice(0, 3).findIndex((line) => line.trim() === echoed);
  return echoAt < 0 ? lines : lines.slice(echoAt + 1);
}
