/**
 * MCP Server setup
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Config } from '../config/index.js';
import { createToolContext } from './tools/context.js';
import { registerTools } from './tools/index.js';

export interface ServerOptions {
  name?: string;
  version?: string;
}

export async function createServer(
  config: Config,
  options: ServerOptions = {}
): Promise<McpServer> {
  const server = new McpServer({
    name: options.name ?? 'sqltrail',
    version: options.version ?? '1.0.0',
  });

  registerTools(server, createToolContext(config));

  return server;
}

export async function startStdioServer(
  config: Config,
  options: ServerOptions = {}
): Promise<void> {
  const server = await createServer(config, options);
  const transport = new StdioServerTransport();

  await server.connect(transport);

  const shutdown = () => {
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error closing server:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

export { registerTools } from './tools/index.js';
export { createToolContext, type ToolContext } from './tools/context.js';
