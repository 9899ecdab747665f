import { parseNumber, splitColumns } from './extract.js';
import type { Clock, ClockList } from './types.js';

// Both report_clocks and the Clock Summary of report_timing_summary:
//   Clock    Period(ns)  Waveform(ns)   Attributes  Sources
//   Clock    Waveform(ns)   Period(ns)  Frequency(MHz)
function isClockHeader(line: string): boolean {
  const columns = splitColumns(line);
  return columns[0] === 'Clock' && columns.includes('Period(ns)');
}

function rowTokens(line: string): string[] {
  return line.trim().match(/\{[^}]*\}|\S+/g) ?? [];
}

function unbrace(token: string): string {
  return token.startsWith('{') && token.endsWith('}') ? token.slice(1, -1).trim() : token;
}

function parseWaveform(token: string): [number, number] | undefined {
  const [rise, fall] = unbrace(token).split(/\s+/).map((edge) => parseNumber(edge));
  return rise === undefined || fall === undefined ? undefined : [rise, fall];
}

function parseClockRow(headers: string[], line: string): Clock | undefined {
  const tokens = rowTokens(line);
  const name = tokens.shift();
  if (!name) {
    return undefined;
  }
  const clock: Clock = { name };

  for (const header of headers.slice(1)) {
    if (tokens.length === 0) {
      break;
    }
    if (header === 'Sources') {
      clock.sources = tokens.splice(0).flatMap((token) => unbrace(token).split(/\s+/)).filter(Boolean);
      break;
    }
    // Attributes may be blank; a braced token belongs to the next column
    if (header === 'Attributes') {
      if (!tokens[0]?.startsWith('{')) {
        clock.attributes = (tokens.shift() ?? '').split(',').filter(Boolean);
      }
      continue;
    }

    const token = tokens.shift() ?? '';
    if (header === 'Period(ns)') {
      const period = parseNumber(token);
      if (period !== undefined) {
        clock.periodNs = period;
      }
    } else if (header === 'Waveform(ns)') {
      const waveform = parseWaveform(token);
      if (waveform) {
        clock.waveform = waveform;
      }
    } else if (header === 'Frequency(MHz)') {
      const frequency = parseNumber(token);
      if (frequency !== undefined) {
        clock.frequencyMhz = frequency;
      }
    }
  }

  if (clock.frequencyMhz === undefined && clock.periodNs !== undefined && clock.periodNs > 0) {
    clock.frequencyMhz = Number((1000 / clock.periodNs).toFixed(3));
  }
  return clock;
}

/**
 * Parse clock tables; the first table found wins
 */
export function parseClocks(raw: string): ClockList {
  const lines = raw.split('\n');
  const clocks: Clock[] = [];

  const headerAt = lines.findIndex(isClockHeader);
  if (headerAt >= 0) {
    const headers = splitColumns(lines[headerAt] ?? '');
    for (const line of lines.slice(headerAt + 1)) {
      if (/^[\s-]*-[\s-]*$/.test(line)) {
        continue;
      }
      if (!line.trim()) {
        break;
      }
      const clock = parseClockRow(headers, line);
      if (clock) {
        clocks.push(clock);
      }
    }
  }

  const missing = raw.trim() && clocks.length === 0 ? ['clocks'] : [];
  return {
    kind: 'clocks',
    raw,
    clocks,
    parseIncomplete: missing.length > 0,
    missingFields: missing,
  };
}
