/**
 * MCP Tool registration
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ToolContext } from './context.js';
import { groupQueriesTool } from './group-queries.js';
import { indexIdsTool } from './index-ids.js';
import { locateByIdTool, locateLastTool } from './locate.js';

const responseFormatSchema = z.enum(['compact', 'markdown']).optional().default('compact')
  .describe('Response format');

const logFileSchema = z.string().describe('Path to the application log file');

export function registerTools(server: McpServer, context: ToolContext): void {
  server.tool(
    'index_ids',
    'List every transaction ID that has a logged SQL statement, with the number of parameter dumps seen for it. Use this first to pick an ID.',
    {
      log_file: logFileSchema,
      limit: z.number().int().min(1).optional().default(200).describe('Maximum number of IDs to return'),
      offset: z.number().int().min(0).optional().default(0).describe('Skip first N IDs for pagination'),
      format: responseFormatSchema,
    },
    { title: 'Index IDs' },
    async ({ log_file, limit, offset, format }) => {
      return indexIdsTool(context, { logFile: log_file, limit, offset, format });
    }
  );

  server.tool(
    'locate_by_id',
    'Recover the SQL statement logged for a transaction ID, with one filled query per logged parameter set.',
    {
      log_file: logFileSchema,
      id: z.string().min(1).describe('Transaction ID as logged after "id="'),
      format: responseFormatSchema,
    },
    { title: 'Locate Query' },
    async ({ log_file, id, format }) => {
      return locateByIdTool(context, { logFile: log_file, id, format });
    }
  );

  server.tool(
    'locate_last',
    'Recover the most recent SQL statement in the log and its filled executions.',
    {
      log_file: logFileSchema,
      format: responseFormatSchema,
    },
    { title: 'Locate Last Query' },
    async ({ log_file, format }) => {
      return locateLastTool(context, { logFile: log_file, format });
    }
  );

  server.tool(
    'group_by_template',
    'Group executions by identical SQL template, for one transaction ID or for every ID in the log.',
    {
      log_file: logFileSchema,
      id: z.string().min(1).optional().describe('Restrict grouping to this transaction ID'),
      format: responseFormatSchema,
    },
    { title: 'Group Queries' },
    async ({ log_file, id, format }) => {
      return groupQueriesTool(context, { logFile: log_file, id, format });
    }
  );
}
