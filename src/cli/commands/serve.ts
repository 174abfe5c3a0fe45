/**
 * serve command - Start the MCP server
 */

import { Command } from 'commander';
import { startStdioServer } from '../../server/index.js';
import { resolveConfig, type CommonOptions } from '../context.js';

export const serveCommand = new Command('serve')
  .description('Start the MCP server exposing log correlation tools over stdio')
  .option('-c, --config <path>', 'Path to config file')
  .option('-e, --encoding <name>', 'Log file encoding (overrides config)')
  .action(async (options: CommonOptions) => {
    try {
      const config = await resolveConfig({
        config: options.config ?? process.env['SQLTRAIL_CONFIG'],
        encoding: options.encoding ?? process.env['SQLTRAIL_ENCODING'],
      });

      await startStdioServer(config, {
        name: 'sqltrail',
        version: '1.0.0',
      });
    } catch (error) {
      // Log to stderr since stdout is used for MCP communication
      console.error('Error starting server:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
