/**
 * group_by_template tool implementation
 */

import { groupByTemplate, locateAll, locateById } from '../../correlator/index.js';
import type { Execution } from '../../types/index.js';
import { enforceOutputBudget } from './compact-format.js';
import { renderOptionsFor, type ToolContext } from './context.js';
import { renderQueryGroups, textResponse, type ResponseFormat, type ToolResponse } from './render.js';

export interface GroupQueriesInput {
  logFile: string;
  id?: string;
  format?: ResponseFormat;
}

export async function groupQueriesTool(context: ToolContext, input: GroupQueriesInput): Promise<ToolResponse> {
  const text = await context.readLog(input.logFile);

  let executions: Execution[];
  if (input.id !== undefined) {
    const result = locateById(text, input.id, context.options);
    if (!result.found) {
      return textResponse(`ID not found: ${input.id}`);
    }
    executions = result.executions;
  } else {
    executions = locateAll(text, context.options);
  }

  if (executions.length === 0) {
    return textResponse('No SQL statements with a transaction ID were found in the log.');
  }

  const output = renderQueryGroups(groupByTemplate(executions), renderOptionsFor(context, input.format));
  return textResponse(enforceOutputBudget(output, context.config.output.maxBytes));
}
