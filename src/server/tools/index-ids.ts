/**
 * index_ids tool implementation
 */

import { indexAllIds } from '../../correlator/index.js';
import { enforceOutputBudget } from './compact-format.js';
import type { ToolContext } from './context.js';
import { renderIdSummaries, textResponse, type ResponseFormat, type ToolResponse } from './render.js';

export interface IndexIdsInput {
  logFile: string;
  limit?: number;
  offset?: number;
  format?: ResponseFormat;
}

export async function indexIdsTool(context: ToolContext, input: IndexIdsInput): Promise<ToolResponse> {
  const text = await context.readLog(input.logFile);
  const summaries = indexAllIds(text);

  if (summaries.length === 0) {
    return textResponse('No SQL statements with a transaction ID were found in the log.');
  }

  const offset = input.offset ?? 0;
  const limit = input.limit ?? 200;
  const page = summaries.slice(offset, offset + limit);

  let output = renderIdSummaries(page, input.format ?? 'compact', summaries.length);
  if (offset + page.length < summaries.length) {
    output += `\n[NEXT_OFFSET] ${offset + limit} of ${summaries.length}`;
  }

  return textResponse(enforceOutputBudget(output, context.config.output.maxBytes));
}
