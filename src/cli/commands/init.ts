/**
 * init command - Write a default configuration file
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { CONFIG_FILE_NAMES, LOG_ENCODINGS, getDefaultConfig } from '../../config/index.js';
import { logError, logInfo, logSuccess, logWarning } from '../output.js';

interface InitOptions {
  encoding?: string;
  force: boolean;
}

export const initCommand = new Command('init')
  .description('Create a sqltrail.config.json with default settings')
  .argument('[directory]', 'Directory to write the config into', '.')
  .option('-e, --encoding <name>', `Default log encoding (${LOG_ENCODINGS.join(', ')})`)
  .option('-f, --force', 'Overwrite an existing config file', false)
  .action(async (directory: string, options: InitOptions) => {
    try {
      const configPath = path.resolve(directory, CONFIG_FILE_NAMES[0] ?? 'sqltrail.config.json');

      if (fs.existsSync(configPath) && !options.force) {
        logWarning(`${configPath} already exists (use --force to overwrite)`);
        return;
      }

      const config = getDefaultConfig();
      if (options.encoding !== undefined) {
        const encoding = LOG_ENCODINGS.find(e => e === options.encoding?.toLowerCase());
        if (!encoding) {
          throw new Error(`Unsupported encoding: ${options.encoding} (expected one of ${LOG_ENCODINGS.join(', ')})`);
        }
        config.log.encoding = encoding;
      }

      await fs.promises.mkdir(path.dirname(configPath), { recursive: true });
      await fs.promises.writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');

      logSuccess(`Created ${configPath}`);
      logInfo(`Log encoding: ${config.log.encoding}`);
    } catch (error) {
      logError(error);
      process.exit(1);
    }
  });
