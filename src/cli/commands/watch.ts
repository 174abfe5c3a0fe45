/**
 * watch command - Print the latest query whenever the log changes
 */

import { Command } from 'commander';
import path from 'node:path';
import { toCorrelatorOptions } from '../../config/index.js';
import { locateLast } from '../../correlator/index.js';
import { LogWatcher } from '../../reader/watcher.js';
import { resolveConfig, shouldPrettyPrint, type CommonOptions } from '../context.js';
import { log, logError, logHeader, logInfo, printExecutions } from '../output.js';

interface WatchOptions extends CommonOptions {
  debounce: string;
}

export const watchCommand = new Command('watch')
  .description('Watch a log file and print the most recent query on every change')
  .argument('<logfile>', 'Path to the application log')
  .option('-c, --config <path>', 'Path to config file')
  .option('-e, --encoding <name>', 'Log file encoding (overrides config)')
  .option('--no-pretty', 'Print SQL on a single line')
  .option('--debounce <ms>', 'Milliseconds to wait after a change', '300')
  .action(async (logFile: string, options: WatchOptions) => {
    try {
      if (!/^\d+$/.test(options.debounce.trim())) {
        throw new Error(`Invalid debounce: ${options.debounce} (expected a whole number of milliseconds)`);
      }
      const debounceMs = parseInt(options.debounce, 10);

      const config = await resolveConfig(options);
      const correlatorOptions = toCorrelatorOptions(config);
      const pretty = shouldPrettyPrint(options, config);
      const filePath = path.resolve(logFile);
      let lastShown: string | null = null;

      const watcher = new LogWatcher(filePath, config.log.encoding, {
        debounceMs,
      });

      watcher.on('changed', ({ text }) => {
        const result = locateLast(text, correlatorOptions);
        if (!result.found) {
          logInfo('No SQL statement found yet.');
          return;
        }

        // Only reprint when the latest statement or its executions changed
        const latest = result.executions[result.executions.length - 1];
        const fingerprint = `${result.id}:${result.executions.length}:${latest?.timestamp ?? ''}:${latest?.filledSql ?? ''}`;
        if (fingerprint === lastShown) return;
        lastShown = fingerprint;

        logHeader(`Latest statement: id=${result.id}`);
        printExecutions(result.executions, pretty);
      });

      watcher.on('error', ({ filePath: failedPath, error }) => {
        console.error(`Error reading ${failedPath}: ${error.message}`);
      });

      watcher.on('ready', () => {
        log(`Watching ${filePath} for changes... (Press Ctrl+C to stop)\n`);
      });

      await watcher.start();
      await watcher.refresh();

      const shutdown = () => {
        log('\nShutting down...');
        watcher.stop().then(
          () => process.exit(0),
          (error: unknown) => {
            logError(error);
            process.exit(1);
          }
        );
      };

      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    } catch (error) {
      logError(error);
      process.exit(1);
    }
  });
