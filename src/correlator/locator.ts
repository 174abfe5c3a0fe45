/**
 * Record locator - finds `id=<ID> sql=` and `id=<ID> params=` records
 *
 * Records are matched with a tagged-line scan instead of a file-wide regex:
 *   `id=` (at line start or after a non-identifier char), a token up to the
 *   next whitespace, one or more whitespace chars, then `sql=` or `params=`.
 */

import type { IdSummary, TransactionId } from '../types/index.js';
import { extractLogger, extractTimestamp, isIdentifierChar, isSpace } from './lines.js';

export type RecordTag = 'sql' | 'params';

export interface TaggedRecord {
  id: TransactionId;
  tag: RecordTag;
  body: string;   // Remainder of the line after the tag
}

export interface StatementMatch {
  id: TransactionId;
  template: string;
  lineIndex: number;
  timestamp: string | null;
  logger: string | null;
}

export interface ParameterMatch {
  id: TransactionId;
  body: string;   // `[type:idx:value]...`
  lineIndex: number;
  timestamp: string | null;
}

export type StatementLookup =
  | { found: true; match: StatementMatch }
  | { found: false };

const ID_MARKER = 'id=';
const TAGS: ReadonlyArray<{ tag: RecordTag; literal: string }> = [
  { tag: 'sql', literal: 'sql=' },
  { tag: 'params', literal: 'params=' },
];

/**
 * Find the first tagged record on a line. With `targetId`, only a record whose
 * ID equals it exactly is returned.
 */
export function matchTaggedLine(line: string, targetId?: TransactionId): TaggedRecord | null {
  let from = 0;

  while (from < line.length) {
    const markerIndex = line.indexOf(ID_MARKER, from);
    if (markerIndex === -1) return null;
    from = markerIndex + 1;

    if (markerIndex > 0 && isIdentifierChar(line.charAt(markerIndex - 1))) {
      continue;
    }

    const tokenStart = markerIndex + ID_MARKER.length;
    let tokenEnd = tokenStart;
    while (tokenEnd < line.length && !isSpace(line.charAt(tokenEnd))) tokenEnd++;
    if (tokenEnd === tokenStart) continue;

    let tagStart = tokenEnd;
    while (tagStart < line.length && isSpace(line.charAt(tagStart))) tagStart++;
    if (tagStart === tokenEnd) continue;

    const id = line.slice(tokenStart, tokenEnd);
    if (targetId !== undefined && id !== targetId) continue;

    for (const { tag, literal } of TAGS) {
      if (line.startsWith(literal, tagStart)) {
        return { id, tag, body: line.slice(tagStart + literal.length) };
      }
    }
  }

  return null;
}

function toStatement(lines: readonly string[], index: number, record: TaggedRecord): StatementMatch | null {
  const template = record.body.trim();
  if (template === '') return null;

  const line = lines[index] ?? '';
  const previous = index > 0 ? lines[index - 1] ?? '' : '';

  return {
    id: record.id,
    template,
    lineIndex: index,
    timestamp: extractTimestamp(line) ?? (index > 0 ? extractTimestamp(previous) : null),
    logger: extractLogger(line),
  };
}

function isHexToken(token: string): boolean {
  return /^[0-9a-f]+$/.test(token);
}

/**
 * A statement line carrying the full `<timestamp>,<LEVEL>,<logger>,` prefix.
 */
function hasRecordPrefix(line: string): boolean {
  return extractLogger(line) !== null;
}

/**
 * Statement record for `id`. The last line with the full record prefix wins;
 * a bare statement line is used only while no statement has been found.
 */
export function findStatement(lines: readonly string[], id: TransactionId): StatementLookup {
  let current: StatementMatch | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const record = matchTaggedLine(line, id);
    if (record?.tag !== 'sql') continue;
    if (current && !hasRecordPrefix(line)) continue;

    current = toStatement(lines, i, record) ?? current;
  }

  return current ? { found: true, match: current } : { found: false };
}

/**
 * Last statement record with a hex ID in the whole file; its ID is recovered
 * from the line.
 */
export function findLastStatement(lines: readonly string[]): StatementLookup {
  let last: StatementMatch | null = null;

  for (let i = 0; i < lines.length; i++) {
    const record = matchTaggedLine(lines[i] ?? '');
    if (record?.tag !== 'sql' || !isHexToken(record.id)) continue;

    last = toStatement(lines, i, record) ?? last;
  }

  return last ? { found: true, match: last } : { found: false };
}

/**
 * Every parameter record for `id`, in scan order.
 */
export function findAllParameterSets(lines: readonly string[], id: TransactionId): ParameterMatch[] {
  const matches: ParameterMatch[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const record = matchTaggedLine(line, id);
    if (record?.tag !== 'params') continue;

    const body = record.body.trimEnd();
    if (!body.startsWith('[')) continue;

    matches.push({ id, body, lineIndex: i, timestamp: extractTimestamp(line) });
  }

  return matches;
}

/**
 * Index of every hex-like ID that has a statement record, in first-seen
 * order, with the number of parameter records seen for it. Parameter records
 * for IDs without a statement are not indexed.
 */
export function findAllIds(lines: readonly string[]): IdSummary[] {
  const summaries = new Map<TransactionId, IdSummary>();

  for (const line of lines) {
    const record = matchTaggedLine(line);
    if (record?.tag !== 'sql' || !isHexToken(record.id)) continue;
    if (record.body.trim() === '' || summaries.has(record.id)) continue;

    summaries.set(record.id, { id: record.id, hasSql: true, parameterSetCount: 0 });
  }

  for (const line of lines) {
    const record = matchTaggedLine(line);
    if (record?.tag !== 'params') continue;

    const summary = summaries.get(record.id);
    if (summary) summary.parameterSetCount++;
  }

  return [...summaries.values()];
}
