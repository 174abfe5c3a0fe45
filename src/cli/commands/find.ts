/**
 * find command - Recover the SQL logged for one transaction ID
 */

import { Command } from 'commander';
import { locateById } from '../../correlator/index.js';
import { executionToJson } from '../../format/report.js';
import { loadLog, shouldPrettyPrint, type CommonOptions } from '../context.js';
import { log, logError, printExecutions } from '../output.js';

interface FindOptions extends CommonOptions {
  json: boolean;
}

export const findCommand = new Command('find')
  .description('Show the SQL and filled executions logged for a transaction ID')
  .argument('<logfile>', 'Path to the application log')
  .argument('<id>', 'Transaction ID as logged after "id="')
  .option('-c, --config <path>', 'Path to config file')
  .option('-e, --encoding <name>', 'Log file encoding (overrides config)')
  .option('--no-pretty', 'Print SQL on a single line')
  .option('--json', 'Output as JSON', false)
  .action(async (logFile: string, id: string, options: FindOptions) => {
    try {
      const loaded = await loadLog(logFile, options);
      const result = locateById(loaded.text, id, loaded.options);

      if (!result.found) {
        console.error(`ID not found: ${id}`);
        process.exit(1);
        return;
      }

      if (options.json) {
        console.log(JSON.stringify(result.executions.map(executionToJson), null, 2));
        return;
      }

      log(`Found ${result.executions.length} execution(s) for id=${id}\n`);
      printExecutions(result.executions, shouldPrettyPrint(options, loaded.config));
    } catch (error) {
      logError(error);
      process.exit(1);
    }
  });
