/**
 * Query grouper - partitions executions by identical template text
 */

import { prettyPrintSql } from '../format/sql.js';
import type { Execution, QueryGroup } from '../types/index.js';

/**
 * Groups keep first-seen order, and executions keep their input order
 * within a group.
 */
export function groupByTemplate(executions: readonly Execution[]): QueryGroup[] {
  const groups = new Map<string, QueryGroup>();

  for (const execution of executions) {
    const existing = groups.get(execution.template);
    if (existing) {
      existing.executions.push(execution);
      continue;
    }

    groups.set(execution.template, {
      templateSql: execution.template,
      prettyTemplateSql: prettyPrintSql(execution.template),
      executions: [execution],
    });
  }

  return [...groups.values()];
}
