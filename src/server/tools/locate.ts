/**
 * locate_by_id / locate_last tool implementations
 */

import { locateById, locateLast } from '../../correlator/index.js';
import type { LocateResult } from '../../types/index.js';
import { enforceOutputBudget } from './compact-format.js';
import { renderOptionsFor, type ToolContext } from './context.js';
import { renderExecutions, textResponse, type ResponseFormat, type ToolResponse } from './render.js';

export interface LocateByIdInput {
  logFile: string;
  id: string;
  format?: ResponseFormat;
}

export interface LocateLastInput {
  logFile: string;
  format?: ResponseFormat;
}

function respond(context: ToolContext, result: LocateResult, format: ResponseFormat | undefined, notFound: string): ToolResponse {
  if (!result.found) {
    return textResponse(notFound);
  }

  const text = renderExecutions(result.id, result.executions, renderOptionsFor(context, format));
  return textResponse(enforceOutputBudget(text, context.config.output.maxBytes));
}

export async function locateByIdTool(context: ToolContext, input: LocateByIdInput): Promise<ToolResponse> {
  const text = await context.readLog(input.logFile);
  const result = locateById(text, input.id, context.options);

  return respond(context, result, input.format, `ID not found: ${input.id}`);
}

export async function locateLastTool(context: ToolContext, input: LocateLastInput): Promise<ToolResponse> {
  const text = await context.readLog(input.logFile);
  const result = locateLast(text, context.options);

  return respond(context, result, input.format, 'No SQL statement found in the log.');
}
