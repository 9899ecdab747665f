import type { EngineMessage, MessageList, Severity } from './types.js';

// Longest token first so CRITICAL WARNING is not read as WARNING
const SEVERITY_TOKENS: ReadonlyArray<[string, Severity]> = [
  ['CRITICAL WARNING', 'critical-warning'],
  ['ERROR', 'error'],
  ['WARNING', 'warning'],
  ['INFO', 'info'],
];

const MESSAGE_ID = /^\[([^\]]+)\]\s*/;

export function parseMessageLine(line: string): EngineMessage | undefined {
  const trimmed = line.trim();
  for (const [token, severity] of SEVERITY_TOKENS) {
    if (!trimmed.startsWith(`${token}:`)) {
      continue;
    }
    let text = trimmed.slice(token.length + 1).trim();
    const message: EngineMessage = { severity, text, line: trimmed };
    const id = MESSAGE_ID.exec(text);
    if (id?.[1]) {
      message.id = id[1];
      text = text.slice(id[0].length);
      message.text = text;
    }
    return message;
  }
  return undefined;
}

/**
 * Classify message lines by severity, in the order printed
 */
export function parseMessages(raw: string): MessageList {
  const messages: EngineMessage[] = [];
  const counts: Record<Severity, number> = {
    error: 0,
    'critical-warning': 0,
    warning: 0,
    info: 0,
  };

  for (const line of raw.split('\n')) {
    const message = parseMessageLine(line);
    if (message) {
      messages.push(message);
      counts[message.severity]++;
    }
  }

  return {
    kind: 'messages',
    raw,
    messages,
    counts,
    parseIncomplete: false,
    missingFields: [],
  };
}

export function filterBySeverity(list: MessageList, severities: Severity[]): EngineMessage[] {
  return list.messages.filter((message) => severities.includes(message.severity));
}
