/**
 * SQL display formatting
 */

import type { ParameterSet } from '../types/index.js';

export const BREAK_KEYWORDS = ['SELECT', 'FROM', 'WHERE', 'AND', 'OR', 'ORDER BY', 'GROUP BY'] as const;

function keywordAt(sql: string, index: number): boolean {
  return BREAK_KEYWORDS.some(keyword =>
    sql.slice(index, index + keyword.length).toUpperCase() === keyword
    && sql.charAt(index + keyword.length) === ' '
  );
}

/**
 * Insert a line break before each clause keyword that sits between two
 * spaces. Only the preceding space is replaced, so the output is stable under
 * a second pass. Text inside single-quoted literals is left alone.
 */
export function prettyPrintSql(sql: string): string {
  let output = '';
  let inLiteral = false;

  for (let i = 0; i < sql.length; i++) {
    const ch = sql.charAt(i);

    if (ch === "'") {
      inLiteral = !inLiteral;
    } else if (ch === ' ' && !inLiteral && keywordAt(sql, i + 1)) {
      output += '\n';
      continue;
    }

    output += ch;
  }

  return output;
}

/**
 * One line per binding in position order: `  [1] String: hello`.
 */
export function formatParameters(parameters: ParameterSet): string {
  return [...parameters.values()]
    .sort((a, b) => a.position - b.position)
    .map(binding => `  [${binding.position}] ${binding.typeName}: ${binding.rawValue}`)
    .join('\n');
}
