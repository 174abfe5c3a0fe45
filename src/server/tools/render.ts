/**
 * Text renderers for correlation results in MCP responses
 */

import { prettyPrintSql } from '../../format/sql.js';
import { describeFillIssue, sortedBindings } from '../../format/report.js';
import type { Execution, IdSummary, QueryGroup } from '../../types/index.js';
import { formatCompactSql, formatCompactTable } from './compact-format.js';

export type ResponseFormat = 'compact' | 'markdown';

export interface RenderOptions {
  format: ResponseFormat;
  prettyPrint: boolean;
}

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
};

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: 'text', text }] };
}

function displaySql(sql: string, options: RenderOptions): string {
  return options.prettyPrint ? prettyPrintSql(sql) : sql;
}

function renderCompactExecution(execution: Execution, options: RenderOptions): string {
  const fill = execution.fillIssue ? describeFillIssue(execution.fillIssue) : 'ok';
  const sections = [
    `[EXECUTION] seq=${execution.sequenceIndex} timestamp=${execution.timestamp ?? ''} fill=${fill}`,
    formatCompactSql(`filled #${execution.sequenceIndex}`, displaySql(execution.filledSql, options)),
  ];

  const bindings = sortedBindings(execution);
  if (bindings.length > 0) {
    sections.push(formatCompactTable(
      bindings.map(b => ({ position: b.position, type: b.typeName, value: b.rawValue })),
      { columns: ['position', 'type', 'value'] }
    ));
  }

  return sections.join('\n');
}

function renderMarkdownExecution(execution: Execution, options: RenderOptions): string {
  const heading = execution.timestamp
    ? `## Execution ${execution.sequenceIndex} (${execution.timestamp})`
    : `## Execution ${execution.sequenceIndex}`;
  let output = `${heading}\n\n\`\`\`sql\n${displaySql(execution.filledSql, options)}\n\`\`\`\n`;

  const bindings = sortedBindings(execution);
  if (bindings.length > 0) {
    output += '\n| Position | Type | Value |\n|----------|------|-------|\n';
    for (const binding of bindings) {
      output += `| ${binding.position} | ${binding.typeName} | ${binding.rawValue.replaceAll('|', '\\|')} |\n`;
    }
  }

  if (execution.fillIssue) {
    output += `\n> ${describeFillIssue(execution.fillIssue)}; showing the unfilled template.\n`;
  }

  return output;
}

/**
 * Render the executions of one statement. `executions` must be non-empty.
 */
export function renderExecutions(id: string, executions: readonly Execution[], options: RenderOptions): string {
  const callerName = executions[0]?.callerName ?? '';
  const template = executions[0]?.template ?? '';

  if (options.format === 'compact') {
    return [
      `[QUERY] id=${id} executions=${executions.length} caller=${callerName}`,
      formatCompactSql('template', displaySql(template, options)),
      ...executions.map(e => renderCompactExecution(e, options)),
    ].join('\n');
  }

  let output = `# Query ${id}\n\n`;
  output += `- Executions: ${executions.length}\n`;
  output += `- Caller: ${callerName}\n\n`;
  output += executions.map(e => renderMarkdownExecution(e, options)).join('\n');
  return output;
}

export function renderIdSummaries(
  summaries: readonly IdSummary[],
  format: ResponseFormat,
  total: number = summaries.length
): string {
  if (format === 'compact') {
    const columns = ['id', 'hasSql', 'parameterSets'];
    const rows = summaries.map(s => ({ id: s.id, hasSql: s.hasSql ? 'Y' : 'N', parameterSets: s.parameterSetCount }));
    const table = rows.length > 0 ? formatCompactTable(rows, { columns }) : columns.join('\t');
    return [`[IDS] total=${total} showing=${summaries.length}`, table].join('\n');
  }

  let output = `# Transaction IDs (${summaries.length} of ${total})\n\n`;
  output += '| ID | SQL | Parameter sets |\n|----|-----|----------------|\n';
  for (const summary of summaries) {
    output += `| ${summary.id} | ${summary.hasSql ? 'yes' : 'no'} | ${summary.parameterSetCount} |\n`;
  }
  return output;
}

export function renderQueryGroups(groups: readonly QueryGroup[], options: RenderOptions): string {
  if (options.format === 'compact') {
    const sections = [`[GROUPS] total=${groups.length}`];
    groups.forEach((group, index) => {
      sections.push(`[GROUP] n=${index + 1} executions=${group.executions.length}`);
      sections.push(formatCompactSql(`template #${index + 1}`, options.prettyPrint ? group.prettyTemplateSql : group.templateSql));
      sections.push(formatCompactTable(
        group.executions.map(e => ({
          id: e.id,
          seq: e.sequenceIndex,
          timestamp: e.timestamp,
          caller: e.callerName,
          filled: e.filledSql,
        })),
        { columns: ['id', 'seq', 'timestamp', 'caller', 'filled'] }
      ));
    });
    return sections.join('\n');
  }

  let output = `# Query groups (${groups.length})\n`;
  groups.forEach((group, index) => {
    output += `\n## Template ${index + 1} (${group.executions.length} executions)\n\n`;
    output += `\`\`\`sql\n${options.prettyPrint ? group.prettyTemplateSql : group.templateSql}\n\`\`\`\n\n`;
    for (const execution of group.executions) {
      const when = execution.timestamp ? ` ${execution.timestamp}` : '';
      output += `- \`${execution.id}\` #${execution.sequenceIndex}${when} (${execution.callerName}): \`${execution.filledSql}\`\n`;
    }
  });
  return output;
}
