/**
 * Console output helpers shared by the CLI commands
 */

import { prettyPrintSql, formatParameters } from '../format/sql.js';
import { describeFillIssue } from '../format/report.js';
import type { Execution, IdSummary, QueryGroup } from '../types/index.js';

// ANSI colors for terminal output
export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
};

export function log(message: string): void {
  console.log(message);
}

export function logSuccess(message: string): void {
  console.log(`${colors.green}✓${colors.reset} ${message}`);
}

export function logWarning(message: string): void {
  console.log(`${colors.yellow}⚠${colors.reset} ${message}`);
}

export function logInfo(message: string): void {
  console.log(`${colors.blue}ℹ${colors.reset} ${message}`);
}

export function logHeader(message: string): void {
  console.log(`\n${colors.bold}${colors.cyan}${message}${colors.reset}\n`);
}

export function logError(error: unknown): void {
  console.error('Error:', error instanceof Error ? error.message : error);
}

export function printExecutions(executions: readonly Execution[], pretty: boolean): void {
  const total = executions.length;

  for (const execution of executions) {
    log(`Execution ${execution.sequenceIndex}/${total} [id=${execution.id}]`);
    log(`  Caller:    ${execution.callerName}`);
    if (execution.logger) {
      log(`  Logger:    ${execution.logger}`);
    }
    log(`  Timestamp: ${execution.timestamp ?? '-'}`);
    log('  SQL:');
    log(pretty ? prettyPrintSql(execution.filledSql) : execution.filledSql);

    if (execution.parameters.size > 0) {
      log('  Parameters:');
      log(formatParameters(execution.parameters));
    }

    if (execution.fillIssue) {
      logWarning(`${describeFillIssue(execution.fillIssue)} (showing unfilled template)`);
    }
    log('');
  }
}

export function printIdSummaries(summaries: readonly IdSummary[]): void {
  log('ID\tSQL\tParameter sets');
  for (const summary of summaries) {
    log(`${summary.id}\t${summary.hasSql ? 'yes' : 'no'}\t${summary.parameterSetCount}`);
  }
}

export function printQueryGroups(groups: readonly QueryGroup[], pretty: boolean): void {
  groups.forEach((group, index) => {
    logHeader(`Template ${index + 1} (${group.executions.length} executions)`);
    log(pretty ? group.prettyTemplateSql : group.templateSql);
    log('');

    for (const execution of group.executions) {
      const when = execution.timestamp ? ` ${execution.timestamp}` : '';
      log(`  ${execution.id} #${execution.sequenceIndex}${when} ${execution.callerName}`);
      log(`    ${execution.filledSql}`);
    }
  });
}
