/**
 * Response envelope
 *
 * Bounds what goes back inline. Content at or under the limit passes through
 * verbatim; anything longer is cut at `maxChars` UTF-16 code units (never
 * moved to a line boundary) and flagged. A cut that would split a surrogate
 * pair stops one unit earlier.
 */

export interface Envelope {
  content: string;
  truncated: boolean;
  totalLength: number;
  totalLines: number;
  returnedLength: number;
  /** Where the complete text was written, when it was spilled to disk */
  artifactPath?: string;
  reportId?: string;
  note?: string;
}

export function countLines(content: string): number {
  if (content === '') {
    return 0;
  }
  const newlines = content.split('\n').length - 1;
  return content.endsWith('\n') ? newlines : newlines + 1;
}

function cutPoint(content: string, limit: number): number {
  if (limit === 0) {
    return 0;
  }
  const last = content.charCodeAt(limit - 1);
  return last >= 0xd800 && last <= 0xdbff ? limit - 1 : limit;
}

export function envelope(content: string, maxChars: number): Envelope {
  const limit = Math.max(0, Math.floor(maxChars));
  const totalLength = content.length;
  const truncated = totalLength > limit;
  const returned = truncated ? content.slice(0, cutPoint(content, limit)) : content;

  const result: Envelope = {
    content: returned,
    truncated,
    totalLength,
    totalLines: countLines(content),
    returnedLength: returned.length,
  };
  if (truncated) {
    result.note = `Output truncated (${totalLength} chars -> ${returned.length} chars)`;
  }
  return result;
}
