import { labeledValue, parseNumber } from './extract.js';
import type { TimingPath, TimingPaths } from './types.js';

const DEFAULT_MAX_PATHS = 100;

// Every path block of report_timing opens with its slack line:
//   Slack (VIOLATED) :        -0.250ns  (required time - arrival time)
const SLACK_LINE = /^[ \t]*Slack\s*(?:\(([A-Z]+)\))?\s*:\s*([-\d.]+|inf)\s*ns/m;

function splitPathBlocks(raw: string): string[] {
  return raw.split(/\n(?=[ \t]*Slack\s*(?:\([A-Z]+\))?\s*:)/).filter((block) => SLACK_LINE.test(block));
}

// The clock sits in the parenthetical under the pin: (rising edge-triggered cell FDRE clocked by sys_clk ...)
function clockedBy(block: string, label: string): string | undefined {
  const pattern = new RegExp(`${label}:\\s*\\S+\\s+\\([^)]*?clocked by\\s+([^\\s{)]+)`);
  return pattern.exec(block)?.[1];
}

function parsePathBlock(block: string): TimingPath {
  const path: TimingPath = {};

  const slack = SLACK_LINE.exec(block);
  if (slack) {
    const value = parseNumber(slack[2]);
    if (value !== undefined) {
      path.slack = value;
    }
    if (slack[1]) {
      path.status = slack[1];
    }
  }

  const source = labeledValue(block, 'Source');
  if (source) {
    path.source = source;
  }
  const destination = labeledValue(block, 'Destination');
  if (destination) {
    path.destination = destination;
  }

  const sourceClock = labeledValue(block, 'Source Clock') ?? clockedBy(block, 'Source');
  if (sourceClock) {
    path.sourceClock = sourceClock;
  }
  const destinationClock = labeledValue(block, 'Destination Clock') ?? clockedBy(block, 'Destination');
  if (destinationClock) {
    path.destinationClock = destinationClock;
  }

  const group = /^[ \t]*Path Group:[ \t]*(.+?)[ \t]*$/m.exec(block)?.[1];
  if (group) {
    path.pathGroup = group;
  }
  const type = /^[ \t]*Path Type:[ \t]*(\S+)/m.exec(block)?.[1];
  if (type) {
    path.pathType = type;
  }

  const requirement = parseNumber(labeledValue(block, 'Requirement'));
  if (requirement !== undefined) {
    path.requirement = requirement;
  }
  const dataPathDelay = parseNumber(labeledValue(block, 'Data Path Delay'));
  if (dataPathDelay !== undefined) {
    path.dataPathDelay = dataPathDelay;
  }
  const logicLevels = parseNumber(labeledValue(block, 'Logic Levels'));
  if (logicLevels !== undefined) {
    path.logicLevels = logicLevels;
  }

  return path;
}

/**
 * Parse report_timing output into one record per path
 * A block without a readable slack is skipped; a kept path without source or
 * destination marks the report incomplete.
 */
export function parseTimingPaths(raw: string, maxPaths: number = DEFAULT_MAX_PATHS): TimingPaths {
  const paths: TimingPath[] = [];
  for (const block of splitPathBlocks(raw)) {
    const path = parsePathBlock(block);
    if (path.slack === undefined) {
      continue;
    }
    paths.push(path);
    if (paths.length >= maxPaths) {
      break;
    }
  }

  const missing: string[] = [];
  if (paths.length === 0 && SLACK_LINE.test(raw)) {
    missing.push('paths');
  }
  paths.forEach((path, index) => {
    if (path.source === undefined) {
      missing.push(`paths[${index}].source`);
    }
    if (path.destination === undefined) {
      missing.push(`paths[${index}].destination`);
    }
  });

  return {
    kind: 'timing-paths',
    raw,
    paths,
    parseIncomplete: missing.length > 0,
    missingFields: missing,
  };
}
