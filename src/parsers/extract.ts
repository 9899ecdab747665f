import { escapeRegExp } from '../session/framer.js';

/**
 * One field of a report, found by label and position
 * Extractors are independent: each one looks at the whole raw text and either
 * returns a value or undefined.
 */
export interface FieldExtractor<F extends string, V> {
  field: F;
  required?: boolean;
  extract(raw: string): V | undefined;
}

export interface ExtractionResult<F extends string, V> {
  values: Partial<Record<F, V>>;
  missing: F[];
}

/**
 * Run an ordered extractor table over raw text
 */
export function runExtractors<F extends string, V>(
  raw: string,
  table: ReadonlyArray<FieldExtractor<F, V>>
): ExtractionResult<F, V> {
  const values: Partial<Record<F, V>> = {};
  const missing: F[] = [];

  for (const extractor of table) {
    const value = extractor.extract(raw);
    if (value === undefined) {
      if (extractor.required) {
        missing.push(extractor.field);
      }
      continue;
    }
    values[extractor.field] = value;
  }

  return { values, missing };
}

// ============================================================================
// Scalars
// ============================================================================

const NUMBER_PATTERN = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parse a report number, tolerating thousands separators and ns/% suffixes
 * Returns undefined for NA, inf and anything else non-numeric.
 */
export function parseNumber(text: string | undefined): number | undefined {
  if (text === undefined) {
    return undefined;
  }
  const cleaned = text.trim().replace(/,/g, '').replace(/(?:ns|%)$/, '');
  return NUMBER_PATTERN.test(cleaned) ? Number(cleaned) : undefined;
}

/**
 * First value of a `Label : value` line
 */
export function labeledValue(raw: string, label: string): string | undefined {
  const pattern = new RegExp(`^[ \\t]*${escapeRegExp(label)}[ \\t]*:[ \\t]*(\\S+)`, 'm');
  return pattern.exec(raw)?.[1];
}

export function labeledNumber(raw: string, label: string): number | undefined {
  return parseNumber(labeledValue(raw, label));
}

// ============================================================================
// Whitespace-aligned tables
// ============================================================================

/**
 * Split an aligned table line into cells
 * Cells are separated by two or more blanks so multi-word headers stay whole.
 */
export function splitColumns(line: string): string[] {
  const trimmed = line.trim();
  return trimmed ? trimmed.split(/[ \t]{2,}/) : [];
}

function isRule(line: string): boolean {
  return /^[\s-]*-[\s-]*$/.test(line);
}

/**
 * Value under a column header
 *
 * Looks for a line holding `header` as one of its cells, skips an optional
 * dashed rule, and reads the matching cell of the next line when it has as
 * many cells as the header.
 */
export function columnValue(raw: string, header: string): string | undefined {
  const lines = raw.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const headers = splitColumns(lines[i] ?? '');
    const index = headers.indexOf(header);
    if (index < 0) {
      continue;
    }

    let valueLine = i + 1;
    if (isRule(lines[valueLine] ?? '')) {
      valueLine++;
    }
    const values = splitColumns(lines[valueLine] ?? '');
    if (values.length === headers.length) {
      return values[index];
    }
  }

  return undefined;
}

export function columnNumber(raw: string, header: string): number | undefined {
  return parseNumber(columnValue(raw, header));
}

// ============================================================================
// Pipe tables
// ============================================================================

export interface PipeTable {
  headers: string[];
  rows: PipeRow[];
}

export interface PipeRow {
  /** Trimmed cells, aligned with the table headers */
  cells: string[];
  /** Cells as printed, with their leading padding */
  rawCells: string[];
}

function pipeCells(line: string): string[] {
  const trimmed = line.trim();
  return trimmed.slice(1, trimmed.endsWith('|') ? -1 : undefined).split('|');
}

/**
 * Collect `| a | b |` tables
 *
 * A table starts at a row containing every one of `requiredHeaders` and runs
 * until the first line that is neither a row nor a `+---+` border.
 */
export function pipeTables(raw: string, requiredHeaders: string[]): PipeTable[] {
  const tables: PipeTable[] = [];
  let current: PipeTable | null = null;

  for (const line of raw.split('\n')) {
    const trimmed = line.trim();

    if (trimmed.startsWith('+')) {
      continue;
    }
    if (!trimmed.startsWith('|')) {
      current = null;
      continue;
    }

    const rawCells = pipeCells(trimmed);
    const cells = rawCells.map((cell) => cell.trim());

    if (requiredHeaders.every((header) => cells.some((cell) => cell.toLowerCase() === header.toLowerCase()))) {
      current = { headers: cells, rows: [] };
      tables.push(current);
      continue;
    }

    if (current && cells.length === current.headers.length) {
      current.rows.push({ cells, rawCells });
    }
  }

  return tables;
}

/**
 * Cell of a row by (case-insensitive) header name
 */
export function cellByHeader(table: PipeTable, row: PipeRow, header: string): string | undefined {
  const index = table.headers.findIndex((name) => name.toLowerCase() === header.toLowerCase());
  return index < 0 ? undefined : row.cells[index];
}

// ============================================================================
// Tcl lists
// ============================================================================

/**
 * Split a Tcl list into its elements; braced elements lose their braces
 *
 * @example
 * tokenizeTclList('clk {led[0]} led[1]')  // → ['clk', 'led[0]', 'led[1]']
 */
export function tokenizeTclList(text: string): string[] {
  const tokens: string[] = [];
  for (const match of text.matchAll(/\{([^}]*)\}|(\S+)/g)) {
    const token = match[1] ?? match[2];
    if (token !== undefined && token !== '') {
      tokens.push(token);
    }
  }
  return tokens;
}
