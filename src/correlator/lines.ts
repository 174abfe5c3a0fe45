/**
 * Line splitting and per-line field extraction
 */

/**
 * Split decoded log text into 0-indexed lines. Empty lines are kept so that
 * line-index arithmetic (caller window, previous-line timestamp) stays exact.
 */
export function splitLines(text: string): string[] {
  return text.split('\n').map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

const TIMESTAMP_PATTERN = /^(\d{4}\/\d{2}\/\d{2}\s+\d{2}:\d{2}:\d{2})/;

/**
 * Leading `YYYY/MM/DD HH:MM:SS` prefix of a line, or null.
 */
export function extractTimestamp(line: string): string | null {
  const match = TIMESTAMP_PATTERN.exec(line);
  return match ? match[1] ?? null : null;
}

/**
 * Logger field of a `<timestamp>,<LEVEL>,<logger>,...` line, or null when the
 * line does not carry the comma-separated prefix.
 */
export function extractLogger(line: string): string | null {
  const timestamp = extractTimestamp(line);
  if (!timestamp) return null;

  const rest = line.slice(timestamp.length);
  if (!rest.startsWith(',')) return null;

  const fields = rest.slice(1).split(',');
  if (fields.length < 3) return null;

  const [level, logger] = fields;
  if (!level || !/^\w+$/.test(level)) return null;
  if (!logger) return null;

  return logger.trim() || null;
}

export function isSpace(ch: string): boolean {
  return ch.length > 0 && ch.trim() === '';
}

export function isIdentifierChar(ch: string): boolean {
  return /^[A-Za-z0-9_]$/.test(ch);
}
