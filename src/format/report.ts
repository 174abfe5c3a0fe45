/**
 * Serializable and human-readable views of correlation results
 */

import type { Execution, FillIssue, ParameterBinding, QueryGroup } from '../types/index.js';

export interface ExecutionJson {
  id: string;
  sequenceIndex: number;
  timestamp: string | null;
  callerName: string;
  logger: string | null;
  template: string;
  filledSql: string;
  fillIssue: FillIssue | null;
  parameters: ParameterBinding[];
}

export interface QueryGroupJson {
  templateSql: string;
  prettyTemplateSql: string;
  executions: ExecutionJson[];
}

export function sortedBindings(execution: Execution): ParameterBinding[] {
  return [...execution.parameters.values()].sort((a, b) => a.position - b.position);
}

export function executionToJson(execution: Execution): ExecutionJson {
  return {
    id: execution.id,
    sequenceIndex: execution.sequenceIndex,
    timestamp: execution.timestamp,
    callerName: execution.callerName,
    logger: execution.logger,
    template: execution.template,
    filledSql: execution.filledSql,
    fillIssue: execution.fillIssue,
    parameters: sortedBindings(execution),
  };
}

export function queryGroupToJson(group: QueryGroup): QueryGroupJson {
  return {
    templateSql: group.templateSql,
    prettyTemplateSql: group.prettyTemplateSql,
    executions: group.executions.map(executionToJson),
  };
}

export function describeFillIssue(issue: FillIssue): string {
  switch (issue.kind) {
    case 'missing-value':
      return `Missing parameter value for position ${issue.position}`;
    case 'unsupported-type':
      return `Unsupported parameter type "${issue.typeName}" at position ${issue.position}`;
  }
}
