/**
 * Placeholder substitution - replaces `?` markers with typed values
 */

import type { FillIssue, ParameterBinding, ParameterSet } from '../types/index.js';

export interface SubstitutionOptions {
  /** Type tokens rendered as quoted SQL string literals (case-insensitive) */
  quotedTypes: string[];
  /** Type tokens rendered verbatim (case-insensitive) */
  verbatimTypes: string[];
  /** Raw value that renders as bare NULL for any type; null disables it */
  nullLiteral: string | null;
}

export const DEFAULT_SUBSTITUTION_OPTIONS: SubstitutionOptions = {
  quotedTypes: ['string'],
  verbatimTypes: ['bigdecimal', 'number', 'int', 'long', 'float'],
  nullLiteral: null,
};

export type SubstitutionResult =
  | { ok: true; sql: string }
  | { ok: false; issue: FillIssue };

export function quoteSqlString(value: string): string {
  return `'${value.replaceAll("'", "''")}'`;
}

function hasType(types: readonly string[], typeName: string): boolean {
  const wanted = typeName.toLowerCase();
  return types.some(type => type.toLowerCase() === wanted);
}

function renderBinding(binding: ParameterBinding, options: SubstitutionOptions): string | null {
  if (options.nullLiteral !== null && binding.rawValue === options.nullLiteral) {
    return 'NULL';
  }

  if (hasType(options.quotedTypes, binding.typeName)) {
    return quoteSqlString(binding.rawValue);
  }
  if (hasType(options.verbatimTypes, binding.typeName)) {
    return binding.rawValue;
  }
  return null;
}

/**
 * Replace each `?` in order with the binding at the matching 1-based
 * position. The counter advances once per `?`, independent of the positions
 * present in the set. Fails on the first unsupported type or missing value.
 */
export function substitutePlaceholders(
  template: string,
  parameters: ParameterSet,
  options: SubstitutionOptions = DEFAULT_SUBSTITUTION_OPTIONS
): SubstitutionResult {
  let sql = '';
  let position = 0;

  for (const ch of template) {
    if (ch !== '?') {
      sql += ch;
      continue;
    }

    position++;
    const binding = parameters.get(position);
    if (!binding) {
      return { ok: false, issue: { kind: 'missing-value', position } };
    }

    const rendered = renderBinding(binding, options);
    if (rendered === null) {
      return { ok: false, issue: { kind: 'unsupported-type', position, typeName: binding.typeName } };
    }
    sql += rendered;
  }

  return { ok: true, sql };
}
