/**
 * groups command - Group executions by SQL template
 */

import { Command } from 'commander';
import { groupByTemplate, locateAll, locateById } from '../../correlator/index.js';
import { queryGroupToJson } from '../../format/report.js';
import type { Execution } from '../../types/index.js';
import { loadLog, shouldPrettyPrint, type CommonOptions } from '../context.js';
import { log, logError, printQueryGroups } from '../output.js';

interface GroupsOptions extends CommonOptions {
  json: boolean;
}

export const groupsCommand = new Command('groups')
  .description('Group executions by identical SQL template')
  .argument('<logfile>', 'Path to the application log')
  .argument('[id]', 'Only group the executions of this transaction ID')
  .option('-c, --config <path>', 'Path to config file')
  .option('-e, --encoding <name>', 'Log file encoding (overrides config)')
  .option('--no-pretty', 'Print SQL on a single line')
  .option('--json', 'Output as JSON', false)
  .action(async (logFile: string, id: string | undefined, options: GroupsOptions) => {
    try {
      const loaded = await loadLog(logFile, options);

      let executions: Execution[];
      if (id !== undefined) {
        const result = locateById(loaded.text, id, loaded.options);
        if (!result.found) {
          console.error(`ID not found: ${id}`);
          process.exit(1);
          return;
        }
        executions = result.executions;
      } else {
        executions = locateAll(loaded.text, loaded.options);
      }

      const groups = groupByTemplate(executions);

      if (options.json) {
        console.log(JSON.stringify(groups.map(queryGroupToJson), null, 2));
        return;
      }

      if (groups.length === 0) {
        log('No SQL statements with a transaction ID were found.');
        return;
      }

      log(`${groups.length} template(s), ${executions.length} execution(s)`);
      printQueryGroups(groups, shouldPrettyPrint(options, loaded.config));
    } catch (error) {
      logError(error);
      process.exit(1);
    }
  });
