/**
 * Correlator - recovers executed SQL from DAO-style log text
 *
 * Every operation takes the decoded log text and returns a freshly built
 * result; nothing is cached between calls.
 */

import type { Execution, IdSummary, LocateResult, TransactionId } from '../types/index.js';
import { DEFAULT_CALLER_OPTIONS } from './caller.js';
import { buildExecutions, type BuildOptions } from './executions.js';
import { splitLines } from './lines.js';
import { findAllIds, findAllParameterSets, findLastStatement, findStatement } from './locator.js';
import { DEFAULT_SUBSTITUTION_OPTIONS } from './substitute.js';

export type CorrelatorOptions = BuildOptions;

export const DEFAULT_CORRELATOR_OPTIONS: CorrelatorOptions = {
  caller: DEFAULT_CALLER_OPTIONS,
  substitution: DEFAULT_SUBSTITUTION_OPTIONS,
};

function locateInLines(
  lines: readonly string[],
  id: TransactionId,
  options: CorrelatorOptions
): LocateResult {
  const lookup = findStatement(lines, id);
  if (!lookup.found) {
    return { found: false, id, executions: [] };
  }

  const parameterMatches = findAllParameterSets(lines, id);
  return { found: true, id, executions: buildExecutions(lines, lookup.match, parameterMatches, options) };
}

/**
 * All executions of the statement logged for `id`.
 */
export function locateById(
  text: string,
  id: TransactionId,
  options: CorrelatorOptions = DEFAULT_CORRELATOR_OPTIONS
): LocateResult {
  return locateInLines(splitLines(text), id, options);
}

/**
 * Executions of the last statement in the file, under the ID recovered from
 * that statement line.
 */
export function locateLast(
  text: string,
  options: CorrelatorOptions = DEFAULT_CORRELATOR_OPTIONS
): LocateResult {
  const lines = splitLines(text);
  const lookup = findLastStatement(lines);
  if (!lookup.found) {
    return { found: false, id: null, executions: [] };
  }

  const { match } = lookup;
  const parameterMatches = findAllParameterSets(lines, match.id);
  return { found: true, id: match.id, executions: buildExecutions(lines, match, parameterMatches, options) };
}

/**
 * Navigation index of IDs with a statement record. Parameters are counted,
 * not decoded.
 */
export function indexAllIds(text: string): IdSummary[] {
  return findAllIds(splitLines(text));
}

/**
 * Executions of every indexed ID, in index order.
 */
export function locateAll(
  text: string,
  options: CorrelatorOptions = DEFAULT_CORRELATOR_OPTIONS
): Execution[] {
  const lines = splitLines(text);
  return findAllIds(lines).flatMap(summary => locateInLines(lines, summary.id, options).executions);
}

export { groupByTemplate } from './grouping.js';
export { splitLines, extractTimestamp, extractLogger } from './lines.js';
export {
  matchTaggedLine,
  findStatement,
  findLastStatement,
  findAllParameterSets,
  findAllIds,
  type StatementMatch,
  type ParameterMatch,
  type StatementLookup,
  type TaggedRecord,
} from './locator.js';
export { resolveCaller, extractCallerName, UNKNOWN_CALLER, DEFAULT_CALLER_OPTIONS, type CallerOptions } from './caller.js';
export { decodeParameters, decodeBinding, parameterKind } from './params.js';
export {
  substitutePlaceholders,
  quoteSqlString,
  DEFAULT_SUBSTITUTION_OPTIONS,
  type SubstitutionOptions,
  type SubstitutionResult,
} from './substitute.js';
export { buildExecutions, type BuildOptions } from './executions.js';
