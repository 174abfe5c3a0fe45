/**
 * last command - Show the most recent SQL statement in a log
 */

import { Command } from 'commander';
import { locateLast } from '../../correlator/index.js';
import { executionToJson } from '../../format/report.js';
import { loadLog, shouldPrettyPrint, type CommonOptions } from '../context.js';
import { log, logError, printExecutions } from '../output.js';

interface LastOptions extends CommonOptions {
  json: boolean;
}

export const lastCommand = new Command('last')
  .description('Show the most recent SQL statement in the log')
  .argument('<logfile>', 'Path to the application log')
  .option('-c, --config <path>', 'Path to config file')
  .option('-e, --encoding <name>', 'Log file encoding (overrides config)')
  .option('--no-pretty', 'Print SQL on a single line')
  .option('--json', 'Output as JSON', false)
  .action(async (logFile: string, options: LastOptions) => {
    try {
      const loaded = await loadLog(logFile, options);
      const result = locateLast(loaded.text, loaded.options);

      if (!result.found) {
        console.error('No SQL statement found in the log.');
        process.exit(1);
        return;
      }

      if (options.json) {
        console.log(JSON.stringify({
          id: result.id,
          executions: result.executions.map(executionToJson),
        }, null, 2));
        return;
      }

      log(`Last statement: id=${result.id}\n`);
      printExecutions(result.executions, shouldPrettyPrint(options, loaded.config));
    } catch (error) {
      logError(error);
      process.exit(1);
    }
  });
