/**
 * Execution builder - pairs one statement with its parameter sets
 */

import type { Execution, ParameterBinding } from '../types/index.js';
import { resolveCaller, type CallerOptions } from './caller.js';
import type { ParameterMatch, StatementMatch } from './locator.js';
import { decodeParameters } from './params.js';
import { substitutePlaceholders, type SubstitutionOptions } from './substitute.js';

export interface BuildOptions {
  caller: CallerOptions;
  substitution: SubstitutionOptions;
}

/**
 * Build one Execution per parameter set (or a single unfilled Execution when
 * there are none). Each substitution failure only affects its own Execution.
 */
export function buildExecutions(
  lines: readonly string[],
  statement: StatementMatch,
  parameterMatches: readonly ParameterMatch[],
  options: BuildOptions
): Execution[] {
  const callerName = resolveCaller(lines, statement.lineIndex, options.caller);
  const base = {
    id: statement.id,
    callerName,
    logger: statement.logger,
    template: statement.template,
  };

  if (parameterMatches.length === 0) {
    return [Object.freeze({
      ...base,
      timestamp: statement.timestamp,
      filledSql: statement.template,
      fillIssue: null,
      parameters: new Map<number, ParameterBinding>(),
      sequenceIndex: 1,
    })];
  }

  return parameterMatches.map((match, index) => {
    const parameters = decodeParameters(match.body);
    const result = substitutePlaceholders(statement.template, parameters, options.substitution);

    return Object.freeze({
      ...base,
      timestamp: match.timestamp ?? statement.timestamp,
      filledSql: result.ok ? result.sql : statement.template,
      fillIssue: result.ok ? null : result.issue,
      parameters,
      sequenceIndex: index + 1,
    });
  });
}
