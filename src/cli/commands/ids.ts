/**
 * ids command - List transaction IDs found in a log
 */

import { Command } from 'commander';
import { indexAllIds } from '../../correlator/index.js';
import { loadLog, type CommonOptions } from '../context.js';
import { log, logError, printIdSummaries } from '../output.js';

interface IdsOptions extends CommonOptions {
  json: boolean;
}

export const idsCommand = new Command('ids')
  .description('List transaction IDs that have a logged SQL statement')
  .argument('<logfile>', 'Path to the application log')
  .option('-c, --config <path>', 'Path to config file')
  .option('-e, --encoding <name>', 'Log file encoding (overrides config)')
  .option('--json', 'Output as JSON', false)
  .action(async (logFile: string, options: IdsOptions) => {
    try {
      const { text } = await loadLog(logFile, options);
      const summaries = indexAllIds(text);

      if (options.json) {
        console.log(JSON.stringify(summaries, null, 2));
        return;
      }

      if (summaries.length === 0) {
        log('No SQL statements with a transaction ID were found.');
        return;
      }

      log(`Found ${summaries.length} IDs:\n`);
      printIdSummaries(summaries);
    } catch (error) {
      logError(error);
      process.exit(1);
    }
  });
