/**
 * Caller resolver - proximity search for the DAO class that issued a statement
 *
 * Concurrent requests interleaved in one log can be attributed to the wrong
 * caller; the nearest marker after the statement wins.
 */

import { isSpace } from './lines.js';

export const UNKNOWN_CALLER = 'Unknown';

export interface CallerOptions {
  marker: string;         // Text that ends a DAO call, e.g. "Daoの終了"
  packagePrefix: string;  // Dotted path prefix that must follow the marker
  classSuffix: string;    // Short class names end with this token
  window: number;         // Lines searched after the statement line
}

export const DEFAULT_CALLER_OPTIONS: CallerOptions = {
  marker: 'Daoの終了',
  packagePrefix: 'jp.co.',
  classSuffix: 'Dao',
  window: 50,
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Short class name carried by one marker line, or null.
 */
export function extractCallerName(line: string, options: CallerOptions = DEFAULT_CALLER_OPTIONS): string | null {
  const start = `${options.marker}${options.packagePrefix}`;
  const suffixPattern = new RegExp(`([A-Za-z]*${escapeRegExp(options.classSuffix)})(?![A-Za-z0-9_])`);

  let from = 0;
  while (from < line.length) {
    const markerIndex = line.indexOf(start, from);
    if (markerIndex === -1) return null;
    from = markerIndex + 1;

    const pathStart = markerIndex + start.length;
    let pathEnd = pathStart;
    while (pathEnd < line.length && line.charAt(pathEnd) !== ',' && !isSpace(line.charAt(pathEnd))) {
      pathEnd++;
    }

    for (const segment of line.slice(pathStart, pathEnd).split('.')) {
      const match = suffixPattern.exec(segment);
      if (match?.[1] && match[1].length > options.classSuffix.length) {
        return match[1];
      }
    }
  }

  return null;
}

/**
 * Search the `window` lines after `statementLineIndex` for a caller marker.
 */
export function resolveCaller(
  lines: readonly string[],
  statementLineIndex: number,
  options: CallerOptions = DEFAULT_CALLER_OPTIONS
): string {
  const searchEnd = Math.min(lines.length, statementLineIndex + options.window + 1);

  for (let i = statementLineIndex + 1; i < searchEnd; i++) {
    const name = extractCallerName(lines[i] ?? '', options);
    if (name) return name;
  }

  return UNKNOWN_CALLER;
}
